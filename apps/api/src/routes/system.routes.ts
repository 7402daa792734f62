import type { FastifyPluginAsync } from 'fastify';
import { contract } from '@casevault/contract';
import { registerContractRoute } from '../lib/contract-route.js';
import { ok } from '../utils/reply.js';

export const systemRoutes: FastifyPluginAsync = async (fastify) => {
  registerContractRoute(fastify, contract.system.health, '', {
    handler: async (_request, reply) => ok(reply, { status: 'ok' as const, timestamp: new Date().toISOString() }),
  });
};
