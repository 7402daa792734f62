import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { pendingMigrations, runMigrations, type MigrationClient } from '../src/db/migrator.js';
import { makeTempDir, removeDir, silentLogger } from './helpers.js';

let dir: string;

/** Records every statement; fails the one containing `failOn`. */
function recordingClient(applied: string[], failOn?: string) {
  const statements: string[] = [];
  const client: MigrationClient = {
    async query(text: string, values?: unknown[]) {
      statements.push(values ? `${text.trim()} ${JSON.stringify(values)}` : text.trim());
      if (failOn && text.includes(failOn)) {
        throw new Error(`syntax error near "${failOn}"`);
      }
      if (text.startsWith('SELECT name FROM schema_migrations')) {
        return { rows: applied.map(name => ({ name })) };
      }
      return { rows: [] };
    },
  };
  return { client, statements };
}

beforeEach(async () => {
  dir = await makeTempDir();
  await writeFile(join(dir, '002_request_logs.sql'), 'CREATE TABLE request_logs (id INT);');
  await writeFile(join(dir, '001_case_files.sql'), 'CREATE TABLE cases (id INT);');
  await writeFile(join(dir, 'README.md'), 'not a migration');
});

afterEach(async () => {
  await removeDir(dir);
});

describe('pendingMigrations', () => {
  it('keeps unapplied .sql files in name order', () => {
    expect(pendingMigrations(['003.sql', 'notes.txt', '001.sql', '002.sql'], new Set(['002.sql']))).toEqual([
      '001.sql',
      '003.sql',
    ]);
  });
});

describe('runMigrations', () => {
  it('applies pending files in order, each in a transaction', async () => {
    const { client, statements } = recordingClient(['001_case_files.sql']);

    const run = await runMigrations(client, dir, silentLogger);

    expect(run).toEqual({ applied: ['002_request_logs.sql'], skipped: ['001_case_files.sql'] });
    expect(statements.slice(2)).toEqual([
      'BEGIN',
      'CREATE TABLE request_logs (id INT);',
      'INSERT INTO schema_migrations (name) VALUES ($1) ["002_request_logs.sql"]',
      'COMMIT',
    ]);
  });

  it('rolls back and stops at the first failing file', async () => {
    const { client, statements } = recordingClient([], 'CREATE TABLE cases');

    await expect(runMigrations(client, dir, silentLogger)).rejects.toThrow('syntax error near "CREATE TABLE cases"');

    expect(statements.slice(2)).toEqual(['BEGIN', 'CREATE TABLE cases (id INT);', 'ROLLBACK']);
  });
});
