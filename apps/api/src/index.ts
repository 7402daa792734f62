/**
 * Case Vault - API Server
 * Fastify + Zod backend service
 */

import { availableParallelism } from 'os';
import Fastify from 'fastify';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { getConfig } from './config.js';
import { configureApp } from './app.js';
import { closePool } from './db/index.js';
import { getCaseFileRepository, getUserRepository } from './repositories/index.js';
import { SecretsCache } from './services/secrets.service.js';
import { S3CaseFileStore, storageLocationResolver } from './services/object-store.service.js';
import { RequestLogService } from './services/request-log.service.js';
import { RuntimeSettings } from './services/runtime-settings.service.js';
import { createCompressionPrimitives } from './services/compression/primitives.js';
import { FileCompressor } from './services/compression/file-compressor.js';
import { FileProcessor } from './services/case-images/file-processor.js';
import { CaseProcessor } from './services/case-images/case-processor.js';
import { BatchScheduler } from './services/case-images/batch-scheduler.js';
import { ArchiveAssembler } from './services/case-images/archive-assembler.js';
import { CaseImagesService } from './services/case-images/case-images.service.js';

async function main(): Promise<void> {
  const config = getConfig();

  const fastify = Fastify({
    logger: {
      level: config.server.logLevel,
      transport: config.server.prettyLogs
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    },
  });
  const log = fastify.log;

  const settings = new RuntimeSettings(config.compression.initialMode);
  const users = getUserRepository();

  // Only consulted for storage when CASE_DOCUMENTS_SECRET is set; its stats are always served
  const secrets = new SecretsCache(
    new SecretsManagerClient({ region: config.storage.region }),
    log,
    config.storage.secretTtlSeconds,
  );
  const store = new S3CaseFileStore(storageLocationResolver(config.storage, secrets), log);

  const compressor = new FileCompressor(
    createCompressionPrimitives({
      ghostscriptPath: config.compression.ghostscriptPath,
      ghostscriptTimeoutMs: config.compression.ghostscriptTimeoutMs,
      logger: log,
    }),
    () => settings.getCompressionMode(),
    log,
  );
  const caseProcessor = new CaseProcessor(
    new FileProcessor(store, compressor, log),
    config.caseFiles.fileWorkersPerCase,
    log,
  );

  const caseImages = new CaseImagesService({
    cases: getCaseFileRepository(),
    users,
    scheduler: new BatchScheduler(caseProcessor, config.caseFiles.batch, availableParallelism, log),
    assembler: new ArchiveAssembler(log),
    requestLog: new RequestLogService(log),
    workRoot: config.caseFiles.workDir,
    minRoleLevel: config.caseFiles.minRoleLevel,
    logger: log,
  });

  await configureApp(fastify, {
    caseImages,
    settings,
    users,
    secrets,
    awsRegion: config.storage.region,
    minRoleLevel: config.caseFiles.minRoleLevel,
    corsOrigin: config.server.corsOrigin,
  });

  fastify.addHook('onClose', async () => {
    await closePool();
  });

  try {
    await fastify.listen({ port: config.server.port, host: config.server.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

main().catch(err => {
  console.error('Failed to start API server:', err);
  process.exit(1);
});
