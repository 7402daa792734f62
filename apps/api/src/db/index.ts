import pg, { type QueryResultRow } from 'pg';
import { getConfig } from '../config.js';

const { Pool } = pg;

const { database } = getConfig();

export const pool = new Pool({
  host: database.host,
  port: database.port,
  database: database.database,
  user: database.user,
  password: database.password,

  // Managed Postgres requires SSL; local Postgres usually does not
  ssl: database.ssl ? { rejectUnauthorized: false } : undefined,

  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  return pool.query<T>(text, params);
}

export async function closePool(): Promise<void> {
  await pool.end();
}
