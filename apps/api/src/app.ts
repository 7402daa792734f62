/**
 * Fastify application wiring, shared by the server entry point and tests.
 */

import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { CASE_IMAGES_HEADERS } from '@casevault/contract';
import { requestIdPlugin } from './plugins/request-id.js';
import { installErrorHandler } from './plugins/error-handler.js';
import type { IUserRepository } from './repositories/index.js';
import type { CaseImagesService } from './services/case-images/case-images.service.js';
import type { RuntimeSettings } from './services/runtime-settings.service.js';
import type { SecretsCache } from './services/secrets.service.js';
import { caseImagesRoutes } from './routes/case-images.routes.js';
import { settingsRoutes } from './routes/settings.routes.js';
import { systemRoutes } from './routes/system.routes.js';
import { monitoringRoutes } from './routes/monitoring.routes.js';

export interface AppDeps {
  caseImages: Pick<CaseImagesService, 'createArchive'>;
  settings: RuntimeSettings;
  users: IUserRepository;
  secrets: Pick<SecretsCache, 'stats'>;
  awsRegion: string;
  minRoleLevel: number;
  corsOrigin: string;
}

export async function configureApp(fastify: FastifyInstance, deps: AppDeps): Promise<FastifyInstance> {
  await fastify.register(cors, {
    origin: deps.corsOrigin,
    credentials: true,
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id', 'Content-Disposition', ...Object.values(CASE_IMAGES_HEADERS)],
  });

  // Correlation IDs for all requests
  requestIdPlugin(fastify);
  installErrorHandler(fastify);

  await fastify.register(systemRoutes, { prefix: '/api' });
  await fastify.register(caseImagesRoutes, { prefix: '/api/backoffice', service: deps.caseImages });
  await fastify.register(settingsRoutes, {
    prefix: '/api/admin/settings',
    settings: deps.settings,
    users: deps.users,
    minRoleLevel: deps.minRoleLevel,
  });
  await fastify.register(monitoringRoutes, { prefix: '/api/monitoring', secrets: deps.secrets, region: deps.awsRegion });

  return fastify;
}
