/**
 * `npm run db:migrate`: bring the case-file schema up to date.
 */

import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import pg from 'pg';
import { pino } from 'pino';
import { loadConfig } from '../src/config.js';
import { runMigrations } from '../src/db/migrator.js';

const { database, server } = loadConfig();
const log = pino({ level: server.logLevel });
const migrationsDir = join(dirname(fileURLToPath(import.meta.url)), 'migrations');

const client = new pg.Client({
  host: database.host,
  port: database.port,
  database: database.database,
  user: database.user,
  password: database.password,
  ssl: database.ssl ? { rejectUnauthorized: false } : undefined,
});

try {
  await client.connect();
  await runMigrations(client, migrationsDir, log);
} catch (err) {
  log.fatal({ code: 'MIGRATE_ABORTED', err }, 'Could not migrate the database');
  process.exitCode = 1;
} finally {
  await client.end();
}
