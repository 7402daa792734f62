/**
 * Shared test fixtures.
 */

import { mkdtemp, rm, writeFile, truncate } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { pino } from 'pino';
import type { CaseFileRecord } from '@casevault/domain';
import type { SecretsCacheStats } from '../src/services/secrets.service.js';

export const silentLogger = pino({ level: 'silent' });

export const EMPTY_SECRETS_STATS: SecretsCacheStats = {
  cachedSecrets: 0,
  hits: 0,
  misses: 0,
  oldestAgeSeconds: null,
  newestAgeSeconds: null,
  status: 'empty',
};

export async function makeTempDir(prefix = 'casevault-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Sparse file of exactly `size` bytes. */
export async function writeSizedFile(path: string, size: number): Promise<void> {
  await writeFile(path, '');
  await truncate(path, size);
}

export function caseRecord(overrides: Partial<CaseFileRecord> & Pick<CaseFileRecord, 'caseId'>): CaseFileRecord {
  return {
    ownerId: 'owner-1',
    demoFile: null,
    noteFile: null,
    miscFile: null,
    patientFirst: null,
    patientLast: null,
    ...overrides,
  };
}
