import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import { applySchema, type Database, schema } from '@aa-savings/db';

export type TestDb = {
  db: Database;
  close: () => Promise<void>;
};

/** In-process Postgres with the store schema applied. */
export async function createTestDb(): Promise<TestDb> {
  const client = new PGlite();
  const db = drizzle(client, { schema });
  await applySchema(db);
  return { db, close: () => client.close() };
}

/** Deterministic clock: each call is `stepMs` later than the previous one. */
export function steppingClock(start = '2026-01-01T00:00:00.000Z', stepMs = 60_000) {
  let t = new Date(start).getTime() - stepMs;
  return () => {
    t += stepMs;
    return new Date(t);
  };
}
