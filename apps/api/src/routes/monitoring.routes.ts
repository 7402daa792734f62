/**
 * Monitoring endpoints. Unauthenticated; they expose counters only.
 */

import type { FastifyPluginAsync } from 'fastify';
import { contract } from '@casevault/contract';
import { registerContractRoute } from '../lib/contract-route.js';
import type { SecretsCache } from '../services/secrets.service.js';
import { ok } from '../utils/reply.js';

export interface MonitoringRouteOptions {
  secrets: Pick<SecretsCache, 'stats'>;
  region: string;
}

export const monitoringRoutes: FastifyPluginAsync<MonitoringRouteOptions> = async (fastify, opts) => {
  const PREFIX = '/monitoring';

  registerContractRoute(fastify, contract.monitoring.secretsCacheStats, PREFIX, {
    handler: async (_request, reply) =>
      ok(reply, {
        region: opts.region,
        ...opts.secrets.stats(),
        timestamp: new Date().toISOString(),
      }),
  });
};
