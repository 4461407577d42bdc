import {
  type ClusterVariant,
  clusterMetadataTable,
  clusterResultsTable,
  clusterSinglesTable,
  type Database,
  runsTable,
} from '@aa-savings/db';
import type {
  HistoryPoint,
  Opportunity,
  OptimizationRatePoint,
  TrendPoint,
  VelocityPoint,
} from '@aa-savings/types';
import { and, asc, count, desc, eq, gt, inArray, sql } from 'drizzle-orm';
import type { AnyPgColumn } from 'drizzle-orm/pg-core';
import { roundMoney } from '../../clusters/values.js';
import { OPTIMIZABLE_PERCENT, percentOf } from './stats.js';

function variantSum(variant: ClusterVariant, column: AnyPgColumn) {
  return sql<number>`coalesce(sum(case when ${clusterSinglesTable.variant} = ${variant} then ${column} else 0 end), 0)`.mapWith(
    Number
  );
}

/** Per successful result: canonical savings plus current/optimal subtotals from its singles. */
export function resultTotals(db: Database) {
  return db
    .select({
      resultId: clusterResultsTable.resultId,
      runId: clusterResultsTable.runId,
      mcUid: clusterResultsTable.mcUid,
      totalSavings: clusterResultsTable.totalSavings,
      savingsPercent: clusterResultsTable.savingsPercent,
      currentTotal: variantSum('current', clusterSinglesTable.totalPrice).as('current_total'),
      optimalTotal: variantSum('optimal', clusterSinglesTable.totalPrice).as('optimal_total'),
      currentInstance: variantSum('current', clusterSinglesTable.instancePrice).as(
        'current_instance'
      ),
      optimalInstance: variantSum('optimal', clusterSinglesTable.instancePrice).as(
        'optimal_instance'
      ),
      currentStorage: variantSum('current', clusterSinglesTable.storagePrice).as('current_storage'),
      optimalStorage: variantSum('optimal', clusterSinglesTable.storagePrice).as('optimal_storage'),
    })
    .from(clusterResultsTable)
    .leftJoin(clusterSinglesTable, eq(clusterSinglesTable.resultId, clusterResultsTable.resultId))
    .where(eq(clusterResultsTable.status, 'success'))
    .groupBy(clusterResultsTable.resultId)
    .as('totals');
}

export async function latestCompletedRunId(db: Database): Promise<number | null> {
  const [row] = await db
    .select({ runId: runsTable.runId })
    .from(runsTable)
    .where(eq(runsTable.status, 'completed'))
    .orderBy(desc(runsTable.runTimestamp), desc(runsTable.runId))
    .limit(1);
  return row?.runId ?? null;
}

/** An explicit run id wins; otherwise the most recently completed run, if any. */
export async function resolveRunId(db: Database, runId?: number): Promise<number | null> {
  return runId ?? latestCompletedRunId(db);
}

/** Most recent first, successful results only. */
export async function history(db: Database, mcUid: string, limit: number): Promise<HistoryPoint[]> {
  const rows = await db
    .select({
      runId: runsTable.runId,
      timestamp: runsTable.runTimestamp,
      label: runsTable.label,
      currentPrice: variantSum('current', clusterSinglesTable.totalPrice),
      optimalPrice: variantSum('optimal', clusterSinglesTable.totalPrice),
      savings: clusterResultsTable.totalSavings,
      savingsPercent: clusterResultsTable.savingsPercent,
    })
    .from(clusterResultsTable)
    .innerJoin(runsTable, eq(runsTable.runId, clusterResultsTable.runId))
    .leftJoin(clusterSinglesTable, eq(clusterSinglesTable.resultId, clusterResultsTable.resultId))
    .where(and(eq(clusterResultsTable.mcUid, mcUid), eq(clusterResultsTable.status, 'success')))
    .groupBy(runsTable.runId, clusterResultsTable.resultId)
    .orderBy(desc(runsTable.runTimestamp), desc(runsTable.runId))
    .limit(limit);

  return rows.map((r) => ({
    runId: r.runId,
    timestamp: r.timestamp,
    label: r.label,
    currentPrice: roundMoney(r.currentPrice),
    optimalPrice: roundMoney(r.optimalPrice),
    savings: roundMoney(r.savings ?? 0),
    savingsPercent: roundMoney(r.savingsPercent ?? 0),
  }));
}

type RunAggregateRow = {
  runId: number;
  timestamp: Date;
  label: string | null;
  totalCurrent: number;
  totalOptimal: number;
  totalSavings: number;
};

function toTrendPoint(r: RunAggregateRow): TrendPoint {
  return {
    runId: r.runId,
    timestamp: r.timestamp,
    label: r.label,
    totalCurrent: roundMoney(r.totalCurrent),
    totalOptimal: roundMoney(r.totalOptimal),
    totalSavings: roundMoney(r.totalSavings),
    savingsPercent: roundMoney(percentOf(r.totalCurrent - r.totalOptimal, r.totalCurrent)),
  };
}

/**
 * Per completed run, most recent first. Only results with positive savings enter the totals;
 * a run without any is left out.
 */
export async function savingsTrend(db: Database, limit: number): Promise<TrendPoint[]> {
  const t = resultTotals(db);
  const rows = await db
    .select({
      runId: runsTable.runId,
      timestamp: runsTable.runTimestamp,
      label: runsTable.label,
      totalCurrent: sql<number>`sum(${t.currentTotal})`.mapWith(Number),
      totalOptimal: sql<number>`sum(${t.optimalTotal})`.mapWith(Number),
      totalSavings: sql<number>`sum(${t.totalSavings})`.mapWith(Number),
    })
    .from(runsTable)
    .innerJoin(t, eq(t.runId, runsTable.runId))
    .where(and(eq(runsTable.status, 'completed'), gt(t.totalSavings, 0)))
    .groupBy(runsTable.runId)
    .orderBy(desc(runsTable.runTimestamp), desc(runsTable.runId))
    .limit(limit);

  return rows.map(toTrendPoint);
}

/** Trend figures for hand-picked runs, oldest first; runs without positive savings report zeros. */
export async function runComparison(db: Database, runIds: number[]): Promise<TrendPoint[]> {
  if (!runIds.length) return [];
  const t = resultTotals(db);
  const rows = await db
    .select({
      runId: runsTable.runId,
      timestamp: runsTable.runTimestamp,
      label: runsTable.label,
      totalCurrent: sql<number>`coalesce(sum(${t.currentTotal}), 0)`.mapWith(Number),
      totalOptimal: sql<number>`coalesce(sum(${t.optimalTotal}), 0)`.mapWith(Number),
      totalSavings: sql<number>`coalesce(sum(${t.totalSavings}), 0)`.mapWith(Number),
    })
    .from(runsTable)
    .leftJoin(t, and(eq(t.runId, runsTable.runId), gt(t.totalSavings, 0)))
    .where(inArray(runsTable.runId, runIds))
    .groupBy(runsTable.runId)
    .orderBy(asc(runsTable.runTimestamp), asc(runsTable.runId));

  return rows.map(toTrendPoint);
}

/**
 * Ranked by savings, largest first. Without a run id the latest completed run is used;
 * `limit` undefined returns every successful unit.
 */
export async function topOpportunities(
  db: Database,
  runId?: number,
  limit?: number
): Promise<Opportunity[]> {
  const resolved = await resolveRunId(db, runId);
  if (resolved === null) return [];

  const t = resultTotals(db);
  const query = db
    .select({
      mcUid: t.mcUid,
      currentPrice: t.currentTotal,
      optimalPrice: t.optimalTotal,
      savings: t.totalSavings,
      savingsPercent: t.savingsPercent,
      provider: clusterMetadataTable.cloudProvider,
      engineVersion: sql<
        string | null
      >`coalesce(${clusterMetadataTable.softwareVersion}, ${clusterMetadataTable.engineVersion})`,
      name: clusterMetadataTable.clusterName,
      region: clusterMetadataTable.region,
      creationDate: clusterMetadataTable.creationDate,
    })
    .from(t)
    .leftJoin(clusterMetadataTable, eq(clusterMetadataTable.mcUid, t.mcUid))
    .where(eq(t.runId, resolved))
    .orderBy(desc(t.totalSavings), asc(t.mcUid))
    .$dynamic();

  const rows = await (limit === undefined ? query : query.limit(limit));

  return rows.map((r) => ({
    mcUid: r.mcUid,
    currentPrice: roundMoney(r.currentPrice),
    optimalPrice: roundMoney(r.optimalPrice),
    savings: roundMoney(r.savings ?? 0),
    savingsPercent: roundMoney(r.savingsPercent ?? 0),
    provider: r.provider,
    engineVersion: r.engineVersion,
    name: r.name,
    region: r.region,
    creationDate: r.creationDate,
  }));
}

type CompletedRun = { runId: number; timestamp: Date; label: string | null };

/** The last `limit` completed runs, oldest first. */
async function recentCompletedRuns(db: Database, limit: number): Promise<CompletedRun[]> {
  const rows = await db
    .select({ runId: runsTable.runId, timestamp: runsTable.runTimestamp, label: runsTable.label })
    .from(runsTable)
    .where(eq(runsTable.status, 'completed'))
    .orderBy(desc(runsTable.runTimestamp), desc(runsTable.runId))
    .limit(limit);
  return rows.reverse();
}

/** Sum of positive savings per run; runs without any are absent from the map. */
export async function positiveSavingsByRun(
  db: Database,
  runIds: number[]
): Promise<Map<number, number>> {
  if (!runIds.length) return new Map();
  const rows = await db
    .select({
      runId: clusterResultsTable.runId,
      total: sql<number>`sum(${clusterResultsTable.totalSavings})`.mapWith(Number),
    })
    .from(clusterResultsTable)
    .where(
      and(
        inArray(clusterResultsTable.runId, runIds),
        eq(clusterResultsTable.status, 'success'),
        gt(clusterResultsTable.totalSavings, 0)
      )
    )
    .groupBy(clusterResultsTable.runId);
  return new Map(rows.map((r) => [r.runId, r.total]));
}

/** Change of positive savings from one completed run to the next; the first run has delta 0. */
export async function savingsVelocity(db: Database, limit: number): Promise<VelocityPoint[]> {
  const runs = await recentCompletedRuns(db, limit);
  const totals = await positiveSavingsByRun(
    db,
    runs.map((r) => r.runId)
  );

  let previous: number | null = null;
  return runs.map((run) => {
    const total = totals.get(run.runId) ?? 0;
    const delta = previous === null ? 0 : total - previous;
    previous = total;
    return { ...run, totalSavings: roundMoney(total), delta: roundMoney(delta) };
  });
}

/** Share of successful units above the optimizable threshold, per completed run, oldest first. */
export async function optimizationRateTrend(
  db: Database,
  limit: number
): Promise<OptimizationRatePoint[]> {
  const runs = await recentCompletedRuns(db, limit);
  if (!runs.length) return [];

  const rows = await db
    .select({
      runId: clusterResultsTable.runId,
      totalCount: count(),
      optimizedCount: count(
        sql`case when ${clusterResultsTable.savingsPercent} > ${OPTIMIZABLE_PERCENT} then 1 end`
      ),
    })
    .from(clusterResultsTable)
    .where(
      and(
        inArray(
          clusterResultsTable.runId,
          runs.map((r) => r.runId)
        ),
        eq(clusterResultsTable.status, 'success')
      )
    )
    .groupBy(clusterResultsTable.runId);
  const byRun = new Map(rows.map((r) => [r.runId, r]));

  return runs.map((run) => {
    const counts = byRun.get(run.runId);
    const totalCount = counts?.totalCount ?? 0;
    const optimizedCount = counts?.optimizedCount ?? 0;
    return {
      ...run,
      optimizedCount,
      totalCount,
      rate: roundMoney(percentOf(optimizedCount, totalCount)),
    };
  });
}
