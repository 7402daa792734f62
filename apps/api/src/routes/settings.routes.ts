/**
 * Admin runtime settings.
 *
 * GET/PUT /api/admin/settings/compression-mode?user_id=
 */

import type { FastifyPluginAsync } from 'fastify';
import { contract } from '@casevault/contract';
import { registerContractRoute } from '../lib/contract-route.js';
import { requireRoleLevel } from '../plugins/auth.js';
import type { IUserRepository } from '../repositories/index.js';
import type { RuntimeSettings } from '../services/runtime-settings.service.js';
import { ok } from '../utils/reply.js';

export interface SettingsRouteOptions {
  settings: RuntimeSettings;
  users: IUserRepository;
  minRoleLevel: number;
}

export const settingsRoutes: FastifyPluginAsync<SettingsRouteOptions> = async (fastify, opts) => {
  const PREFIX = '/admin/settings';
  const requireAdmin = requireRoleLevel(opts.users, opts.minRoleLevel);

  registerContractRoute(fastify, contract.settings.getCompressionMode, PREFIX, {
    preHandler: requireAdmin,
    handler: async (_request, reply) => {
      return ok(reply, { mode: opts.settings.getCompressionMode() });
    },
  });

  registerContractRoute(fastify, contract.settings.setCompressionMode, PREFIX, {
    preHandler: requireAdmin,
    handler: async (request, reply) => {
      const previous = opts.settings.getCompressionMode();
      const mode = opts.settings.setCompressionMode(request.contractData.body.mode);
      request.log.info(
        { code: 'COMPRESSION_MODE_CHANGED', userId: request.contractData.query.user_id, previous, mode },
        'Compression mode changed'
      );
      return ok(reply, { mode });
    },
  });
};
