/**
 * Applies `db/migrations/*.sql` in file-name order, each in its own
 * transaction, recording applied names in `schema_migrations`.
 */

import { readFile, readdir } from 'fs/promises';
import { join } from 'path';
import type { Logger } from 'pino';
import { z } from 'zod';

/** The part of a pg client the runner needs. */
export interface MigrationClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const AppliedRows = z.array(z.object({ name: z.string() }));

export interface MigrationRun {
  applied: string[];
  skipped: string[];
}

/** SQL files not yet applied, sorted by name. */
export function pendingMigrations(files: readonly string[], applied: ReadonlySet<string>): string[] {
  return files.filter(f => f.endsWith('.sql') && !applied.has(f)).sort();
}

export async function runMigrations(client: MigrationClient, directory: string, log: Logger): Promise<MigrationRun> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const { rows } = await client.query('SELECT name FROM schema_migrations');
  const applied = new Set(AppliedRows.parse(rows).map(r => r.name));
  const files = await readdir(directory);
  const pending = pendingMigrations(files, applied);
  const skipped = files.filter(f => f.endsWith('.sql') && applied.has(f)).sort();

  for (const name of pending) {
    const sql = await readFile(join(directory, name), 'utf8');
    await client.query('BEGIN');
    try {
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [name]);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      log.error({ code: 'MIGRATION_FAILED', migration: name, err }, 'Migration rolled back');
      throw err;
    }
    log.info({ code: 'MIGRATION_APPLIED', migration: name }, 'Migration applied');
  }

  log.info({ code: 'MIGRATIONS_DONE', applied: pending.length, skipped: skipped.length }, 'Schema up to date');
  return { applied: pending, skipped };
}
