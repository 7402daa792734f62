/**
 * Environment configuration.
 *
 * Parsed once with zod; every tunable of the bulk case-file pipeline lives
 * here with its production default.
 */

import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ADMIN_ROLE_LEVEL, CompressionMode, DEFAULT_BATCH_TUNING, type BatchTuning } from '@casevault/domain';

const intFrom = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const boolFrom = (fallback: boolean) =>
  z.enum(['true', 'false']).default(fallback ? 'true' : 'false').transform(v => v === 'true');

const EnvSchema = z.object({
  NODE_ENV: z.string().default('production'),
  PORT: intFrom(3001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  DB_HOST: z.string().default('localhost'),
  DB_PORT: intFrom(5432),
  DB_NAME: z.string().default('casevault'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_SSL: boolFrom(false),

  AWS_REGION: z.string().default('us-east-1'),
  CASE_DOCUMENTS_SECRET: z.string().optional(),
  CASE_DOCUMENTS_BUCKET: z.string().optional(),
  CASE_DOCUMENTS_PREFIX: z.string().default('private/case-documents/'),
  SECRETS_CACHE_TTL_SECONDS: intFrom(300),

  CASE_FILES_WORK_DIR: z.string().default(join(tmpdir(), 'casevault-case-files')),
  COMPRESSION_MODE: CompressionMode.default('standard'),
  GHOSTSCRIPT_PATH: z.string().default('gs'),
  GHOSTSCRIPT_TIMEOUT_MS: intFrom(300_000),
  ADMIN_ROLE_LEVEL: z.coerce.number().int().default(ADMIN_ROLE_LEVEL),

  PIPELINE_CORE_FRACTION: z.coerce.number().positive().max(1).default(DEFAULT_BATCH_TUNING.coreFraction),
  PIPELINE_MAX_CASE_WORKERS: intFrom(DEFAULT_BATCH_TUNING.maxCaseWorkers),
  PIPELINE_SINGLE_BATCH_MAX_CASES: intFrom(DEFAULT_BATCH_TUNING.singleBatchMaxCases),
  PIPELINE_MEDIUM_BATCH_MAX_CASES: intFrom(DEFAULT_BATCH_TUNING.mediumBatchMaxCases),
  PIPELINE_MEDIUM_BATCH_SIZE: intFrom(DEFAULT_BATCH_TUNING.mediumBatchSize),
  PIPELINE_LARGE_BATCH_SIZE: intFrom(DEFAULT_BATCH_TUNING.largeBatchSize),
  PIPELINE_FILE_WORKERS_PER_CASE: intFrom(4),
});

export interface AppConfig {
  server: {
    port: number;
    host: string;
    logLevel: string;
    prettyLogs: boolean;
    corsOrigin: string;
  };
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    ssl: boolean;
  };
  storage: {
    region: string;
    secretName: string | null;
    bucket: string | null;
    prefix: string;
    secretTtlSeconds: number;
  };
  caseFiles: {
    workDir: string;
    minRoleLevel: number;
    fileWorkersPerCase: number;
    batch: BatchTuning;
  };
  compression: {
    initialMode: CompressionMode;
    ghostscriptPath: string;
    ghostscriptTimeoutMs: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  const e = parsed.data;

  return {
    server: {
      port: e.PORT,
      host: e.HOST,
      logLevel: e.LOG_LEVEL,
      prettyLogs: e.NODE_ENV === 'development',
      corsOrigin: e.CORS_ORIGIN,
    },
    database: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      database: e.DB_NAME,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      ssl: e.DB_SSL,
    },
    storage: {
      region: e.AWS_REGION,
      secretName: e.CASE_DOCUMENTS_SECRET ?? null,
      bucket: e.CASE_DOCUMENTS_BUCKET ?? null,
      prefix: e.CASE_DOCUMENTS_PREFIX,
      secretTtlSeconds: e.SECRETS_CACHE_TTL_SECONDS,
    },
    caseFiles: {
      workDir: e.CASE_FILES_WORK_DIR,
      minRoleLevel: e.ADMIN_ROLE_LEVEL,
      fileWorkersPerCase: e.PIPELINE_FILE_WORKERS_PER_CASE,
      batch: {
        coreFraction: e.PIPELINE_CORE_FRACTION,
        maxCaseWorkers: e.PIPELINE_MAX_CASE_WORKERS,
        singleBatchMaxCases: e.PIPELINE_SINGLE_BATCH_MAX_CASES,
        mediumBatchMaxCases: e.PIPELINE_MEDIUM_BATCH_MAX_CASES,
        mediumBatchSize: e.PIPELINE_MEDIUM_BATCH_SIZE,
        largeBatchSize: e.PIPELINE_LARGE_BATCH_SIZE,
      },
    },
    compression: {
      initialMode: e.COMPRESSION_MODE,
      ghostscriptPath: e.GHOSTSCRIPT_PATH,
      ghostscriptTimeoutMs: e.GHOSTSCRIPT_TIMEOUT_MS,
    },
  };
}

let cached: AppConfig | null = null;

/** Process-wide configuration, parsed on first use. */
export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
