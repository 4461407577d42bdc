import { type Database, runsTable } from '@aa-savings/db';
import type { Health } from '@aa-savings/types';
import { desc, eq, sql } from 'drizzle-orm';
import type { FastifyBaseLogger } from 'fastify';

export const SERVICE_NAME = 'aa-savings-api';

export async function checkHealth(db: Database, log?: FastifyBaseLogger): Promise<Health> {
  const startedAt = Date.now();

  let dbOk = false;
  let dbLatencyMs: number | null = null;
  let lastCompletedRun: Health['lastCompletedRun'] = { runId: null, completedAt: null };
  try {
    const t0 = Date.now();
    await db.execute(sql`select 1`);
    dbLatencyMs = Date.now() - t0;

    const [row] = await db
      .select({ runId: runsTable.runId, completedAt: runsTable.completedAt })
      .from(runsTable)
      .where(eq(runsTable.status, 'completed'))
      .orderBy(desc(runsTable.runTimestamp), desc(runsTable.runId))
      .limit(1);
    if (row) {
      lastCompletedRun = { runId: row.runId, completedAt: row.completedAt?.toISOString() ?? null };
    }
    dbOk = true;
  } catch (err) {
    log?.warn({ err }, 'health check: database unavailable');
    dbLatencyMs = null;
  }

  return {
    ok: dbOk,
    service: SERVICE_NAME,
    time: {
      server: new Date().toISOString(),
      uptimeSec: Math.floor(process.uptime()),
    },
    db: { ok: dbOk, latencyMs: dbLatencyMs },
    lastCompletedRun,
    durationMs: Date.now() - startedAt,
  };
}
