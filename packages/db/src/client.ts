import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import pg from 'pg';
import { schema } from './schemas/index.js';

export type Schema = typeof schema;

/** Any Postgres-backed drizzle database carrying this schema (node-postgres in production). */
export type Database = PgDatabase<PgQueryResultHKT, Schema>;

export type DbHandle = {
  db: Database;
  close: () => Promise<void>;
};

export function createDb(connectionString: string): DbHandle {
  const pool = new pg.Pool({ connectionString, max: 4 });
  const db = drizzle(pool, { schema });
  return { db, close: () => pool.end() };
}
