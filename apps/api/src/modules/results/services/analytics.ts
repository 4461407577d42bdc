import {
  clusterMetadataTable,
  clusterResultsTable,
  clusterSinglesTable,
  type Database,
  runsTable,
} from '@aa-savings/db';
import type {
  AgeBucket,
  ComponentCost,
  Correlation,
  DistributionBucket,
  FilterOptions,
  GroupTotals,
  PriceComparison,
  PriorityScore,
  RegionEfficiency,
  RunSummary,
  SavingsBreakdown,
  ShardBox,
  ShardCountBucket,
  StorageTypeGroup,
  VersionAgePoint,
} from '@aa-savings/types';
import { and, desc, eq, lt, or, sql } from 'drizzle-orm';
import { roundMoney } from '../../clusters/values.js';
import { positiveSavingsByRun, resolveRunId, resultTotals } from './queries.js';
import * as stats from './stats.js';
import type { AnalyticsFilters, ResultFact } from './stats.js';

export type { AnalyticsFilters } from './stats.js';

type Clock = () => Date;
const systemClock: Clock = () => new Date();

/** Every successful unit of a run, joined with metadata and its current singles. */
export async function loadRunFacts(db: Database, runId: number): Promise<ResultFact[]> {
  const t = resultTotals(db);
  const rows = await db
    .select({
      resultId: t.resultId,
      mcUid: t.mcUid,
      totalSavings: t.totalSavings,
      savingsPercent: t.savingsPercent,
      currentTotal: t.currentTotal,
      optimalTotal: t.optimalTotal,
      currentInstance: t.currentInstance,
      optimalInstance: t.optimalInstance,
      currentStorage: t.currentStorage,
      optimalStorage: t.optimalStorage,
      name: clusterMetadataTable.clusterName,
      provider: clusterMetadataTable.cloudProvider,
      version: sql<
        string | null
      >`coalesce(${clusterMetadataTable.softwareVersion}, ${clusterMetadataTable.engineVersion})`,
      region: clusterMetadataTable.region,
      storageType: clusterMetadataTable.storageType,
      creationDate: clusterMetadataTable.creationDate,
      shardsCount: clusterMetadataTable.shardsCount,
      maxShardsCount: clusterMetadataTable.maxShardsCount,
    })
    .from(t)
    .leftJoin(clusterMetadataTable, eq(clusterMetadataTable.mcUid, t.mcUid))
    .where(eq(t.runId, runId))
    .orderBy(t.mcUid);

  const singles = await db
    .select({
      resultId: clusterSinglesTable.resultId,
      infra: clusterSinglesTable.infra,
      totalPrice: clusterSinglesTable.totalPrice,
    })
    .from(clusterSinglesTable)
    .innerJoin(clusterResultsTable, eq(clusterResultsTable.resultId, clusterSinglesTable.resultId))
    .where(
      and(
        eq(clusterResultsTable.runId, runId),
        eq(clusterResultsTable.status, 'success'),
        eq(clusterSinglesTable.variant, 'current')
      )
    )
    .orderBy(clusterSinglesTable.singleId);

  const byResult = new Map<number, ResultFact['currentSingles']>();
  for (const s of singles) {
    const list = byResult.get(s.resultId) ?? [];
    list.push({ infra: s.infra, totalPrice: s.totalPrice });
    byResult.set(s.resultId, list);
  }

  return rows.map(({ resultId, totalSavings, savingsPercent, ...rest }) => ({
    ...rest,
    totalSavings: totalSavings ?? 0,
    savingsPercent: savingsPercent ?? 0,
    currentSingles: byResult.get(resultId) ?? [],
  }));
}

/** Facts of the requested run, or of the latest completed run; null when there is none. */
async function factsFor(db: Database, runId?: number) {
  const resolved = await resolveRunId(db, runId);
  if (resolved === null) return null;
  return { runId: resolved, facts: await loadRunFacts(db, resolved) };
}

export async function runSummary(db: Database, runId?: number): Promise<RunSummary | null> {
  const resolved = await resolveRunId(db, runId);
  if (resolved === null) return null;

  const [run] = await db.select().from(runsTable).where(eq(runsTable.runId, resolved)).limit(1);
  if (!run) return null;

  const figures = stats.runFigures(await loadRunFacts(db, resolved));

  const [previous] = await db
    .select({ runId: runsTable.runId })
    .from(runsTable)
    .where(
      and(
        eq(runsTable.status, 'completed'),
        or(
          lt(runsTable.runTimestamp, run.runTimestamp),
          and(eq(runsTable.runTimestamp, run.runTimestamp), lt(runsTable.runId, run.runId))
        )
      )
    )
    .orderBy(desc(runsTable.runTimestamp), desc(runsTable.runId))
    .limit(1);

  let savingsChange: number | null = null;
  let savingsChangePercent: number | null = null;
  if (previous) {
    const totals = await positiveSavingsByRun(db, [previous.runId]);
    const prior = totals.get(previous.runId) ?? 0;
    savingsChange = roundMoney(figures.totalSavings - prior);
    savingsChangePercent =
      prior > 0 ? roundMoney(((figures.totalSavings - prior) / prior) * 100) : null;
  }

  return {
    runId: run.runId,
    timestamp: run.runTimestamp,
    label: run.label,
    clusterCount: figures.clusterCount,
    clustersWithSavings: figures.clustersWithSavings,
    totalCurrent: roundMoney(figures.totalCurrent),
    totalOptimal: roundMoney(figures.totalOptimal),
    totalSavings: roundMoney(figures.totalSavings),
    savingsPercent: roundMoney(stats.percentOf(figures.totalSavings, figures.totalCurrent)),
    avgSavings: roundMoney(figures.avgSavings),
    medianSavings: roundMoney(figures.medianSavings),
    highImpactCount: figures.highImpactCount,
    optimizationRate: roundMoney(figures.optimizationRate),
    storageSavings: roundMoney(figures.storageSavings),
    costEfficiency: roundMoney(figures.costEfficiency),
    previousRunId: previous?.runId ?? null,
    savingsChange,
    savingsChangePercent,
  };
}

export async function savingsDistribution(
  db: Database,
  runId?: number,
  filters: AnalyticsFilters = {}
): Promise<DistributionBucket[]> {
  const scoped = await factsFor(db, runId);
  return stats.savingsDistribution(scoped?.facts ?? [], filters);
}

export async function ageDistribution(
  db: Database,
  runId?: number,
  filters: AnalyticsFilters = {},
  now: Clock = systemClock
): Promise<AgeBucket[]> {
  const scoped = await factsFor(db, runId);
  return stats.ageDistribution(scoped?.facts ?? [], now(), filters);
}

export async function savingsBreakdown(db: Database, runId?: number): Promise<SavingsBreakdown> {
  const scoped = await factsFor(db, runId);
  return stats.savingsBreakdown(scoped?.facts ?? []);
}

/** Grouped by metadata provider, largest current spend first; units without metadata are skipped. */
export async function providerComparison(
  db: Database,
  runId?: number,
  filters: AnalyticsFilters = {}
): Promise<GroupTotals[]> {
  const scoped = await factsFor(db, runId);
  const facts = (scoped?.facts ?? []).filter((f) => stats.matchesFilters(f, filters));
  return stats
    .groupTotals(facts, (f) => f.provider)
    .sort((a, b) => b.totalCurrent - a.totalCurrent);
}

/** Grouped by version, newest version first. */
export async function versionAnalysis(
  db: Database,
  runId?: number,
  filters: AnalyticsFilters = {}
): Promise<GroupTotals[]> {
  const scoped = await factsFor(db, runId);
  const facts = (scoped?.facts ?? []).filter((f) => stats.matchesFilters(f, filters));
  return stats
    .groupTotals(facts, (f) => f.version)
    .sort((a, b) => b.key.localeCompare(a.key, undefined, { numeric: true }));
}

export async function shardCostBoxPlot(
  db: Database,
  runId?: number,
  filters: AnalyticsFilters = {}
): Promise<ShardBox[]> {
  const scoped = await factsFor(db, runId);
  return stats.shardCostBoxPlot(scoped?.facts ?? [], filters);
}

export async function priorityScores(
  db: Database,
  runId: number | undefined,
  limit: number,
  filters: AnalyticsFilters = {},
  now: Clock = systemClock
): Promise<PriorityScore[]> {
  const scoped = await factsFor(db, runId);
  return stats.priorityScores(scoped?.facts ?? [], now(), limit, filters);
}

export async function ageSavingsCorrelation(
  db: Database,
  runId?: number,
  filters: AnalyticsFilters = {},
  now: Clock = systemClock
): Promise<Correlation> {
  const scoped = await factsFor(db, runId);
  return stats.ageSavingsCorrelation(scoped?.facts ?? [], now(), filters);
}

export async function sizeSavingsCorrelation(db: Database, runId?: number): Promise<Correlation> {
  const scoped = await factsFor(db, runId);
  return stats.sizeSavingsCorrelation(scoped?.facts ?? []);
}

export async function storageTypeDistribution(
  db: Database,
  runId?: number,
  filters: AnalyticsFilters = {}
): Promise<StorageTypeGroup[]> {
  const scoped = await factsFor(db, runId);
  return stats.storageTypeDistribution(scoped?.facts ?? [], filters);
}

export async function regionalCostEfficiency(
  db: Database,
  runId?: number,
  filters: AnalyticsFilters = {}
): Promise<RegionEfficiency[]> {
  const scoped = await factsFor(db, runId);
  return stats.regionalCostEfficiency(scoped?.facts ?? [], filters);
}

export async function currentVsOptimal(
  db: Database,
  runId: number | undefined,
  limit: number
): Promise<PriceComparison[]> {
  const scoped = await factsFor(db, runId);
  return stats.currentVsOptimal(scoped?.facts ?? [], limit);
}

export async function costByComponent(
  db: Database,
  runId?: number,
  version?: string
): Promise<ComponentCost[]> {
  const scoped = await factsFor(db, runId);
  return stats.costByComponent(scoped?.facts ?? [], version);
}

export async function versionAgeAnalysis(
  db: Database,
  runId?: number,
  filters: AnalyticsFilters = {},
  now: Clock = systemClock
): Promise<VersionAgePoint[]> {
  const scoped = await factsFor(db, runId);
  return stats.versionAgeAnalysis(scoped?.facts ?? [], now(), filters);
}

export async function shardCountDistribution(
  db: Database,
  runId?: number,
  filters: AnalyticsFilters = {}
): Promise<ShardCountBucket[]> {
  const scoped = await factsFor(db, runId);
  return stats.shardCountDistribution(scoped?.facts ?? [], filters);
}

/** Providers and versions present among the run's successful units. */
export async function filterOptions(db: Database, runId?: number): Promise<FilterOptions> {
  const scoped = await factsFor(db, runId);
  const providers = new Set<string>();
  const versions = new Set<string>();
  for (const fact of scoped?.facts ?? []) {
    if (fact.provider) providers.add(fact.provider);
    if (fact.version) versions.add(fact.version);
  }
  return {
    providers: [...providers].sort(),
    versions: [...versions].sort((a, b) => b.localeCompare(a, undefined, { numeric: true })),
  };
}
