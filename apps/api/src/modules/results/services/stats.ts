import type { CloudProvider } from '@aa-savings/db';
import type {
  AgeBucket,
  ComponentCost,
  Correlation,
  DistributionBucket,
  GroupTotals,
  PriceComparison,
  PriorityLevel,
  PriorityScore,
  RegionEfficiency,
  SavingsBreakdown,
  ScatterPoint,
  ShardBox,
  ShardCountBucket,
  StorageTypeGroup,
  VersionAgePoint,
} from '@aa-savings/types';
import { type InfraMap, roundMoney } from '../../clusters/values.js';

/** One successful unit of a run with its subtotals and whatever metadata is known. */
export type ResultFact = {
  mcUid: string;
  totalSavings: number;
  savingsPercent: number;
  currentTotal: number;
  optimalTotal: number;
  currentInstance: number;
  optimalInstance: number;
  currentStorage: number;
  optimalStorage: number;
  name: string | null;
  provider: string | null;
  /** Software version when known, engine version otherwise. */
  version: string | null;
  region: string | null;
  storageType: string | null;
  creationDate: string | null;
  shardsCount: number | null;
  maxShardsCount: number | null;
  currentSingles: Array<{ infra: InfraMap; totalPrice: number }>;
};

export type AnalyticsFilters = {
  provider?: string;
  version?: string;
  minSavings?: number;
  minPercent?: number;
};

const DAY_MS = 86_400_000;
const HIGH_IMPACT_SAVINGS = 2000;
/** Above this savings percent a unit counts as optimizable. */
export const OPTIMIZABLE_PERCENT = 10;

export const SAVINGS_BUCKETS: ReadonlyArray<{ label: string; min: number; max: number | null }> = [
  { label: '$0-$500', min: 0, max: 500 },
  { label: '$500-$1K', min: 500, max: 1000 },
  { label: '$1K-$2K', min: 1000, max: 2000 },
  { label: '$2K-$5K', min: 2000, max: 5000 },
  { label: '$5K-$10K', min: 5000, max: 10_000 },
  { label: '$10K+', min: 10_000, max: null },
];

// upper bounds in days, exclusive
export const AGE_BUCKETS: ReadonlyArray<{ label: string; maxDays: number | null }> = [
  { label: '0-6mo', maxDays: 180 },
  { label: '6-12mo', maxDays: 365 },
  { label: '1-2y', maxDays: 730 },
  { label: '2-3y', maxDays: 1095 },
  { label: '3y+', maxDays: null },
];

export const SHARD_COUNT_BUCKETS: ReadonlyArray<{ label: string; maxShards: number | null }> = [
  { label: '1-10', maxShards: 10 },
  { label: '11-50', maxShards: 50 },
  { label: '51-100', maxShards: 100 },
  { label: '101-200', maxShards: 200 },
  { label: '200+', maxShards: null },
];

export const SHARD_BUCKETS: ReadonlyArray<{ label: string; maxShards: number | null }> = [
  { label: '1-5', maxShards: 5 },
  { label: '6-10', maxShards: 10 },
  { label: '11-20', maxShards: 20 },
  { label: '21+', maxShards: null },
];

const AWS_PREFIXES = ['m', 'r', 'c', 't', 'i', 'x', 'z', 'p', 'g', 'd'];
const GCP_PREFIXES = ['n1', 'n2', 'c2', 'c3', 'e2', 'm1', 'm2'];

export const percentOf = (part: number, whole: number) => (whole === 0 ? 0 : (part / whole) * 100);

/** Best guess from instance-type naming when metadata carries no provider. */
export function detectProvider(instanceTypes: Iterable<string>): CloudProvider | 'Unknown' {
  for (const type of instanceTypes) {
    if (type.startsWith('Standard_')) return 'Azure';
    const lower = type.toLowerCase();
    if (lower.includes('-') && GCP_PREFIXES.some((p) => lower.startsWith(p))) return 'GCP';
    if (lower.includes('.') && AWS_PREFIXES.some((p) => lower.startsWith(p))) return 'AWS';
  }
  return 'Unknown';
}

export function effectiveProvider(fact: ResultFact): string {
  if (fact.provider) return fact.provider;
  return detectProvider(fact.currentSingles.flatMap((s) => Object.keys(s.infra)));
}

const metadataProvider = (fact: ResultFact): string | null => fact.provider;

/**
 * Provider matches on metadata only unless `providerOf` says otherwise, so a unit without
 * a recorded provider never passes a provider filter.
 */
export function matchesFilters(
  fact: ResultFact,
  filters: AnalyticsFilters = {},
  providerOf: (fact: ResultFact) => string | null = metadataProvider
): boolean {
  const { provider, version, minSavings, minPercent } = filters;
  if (provider && provider !== 'All' && providerOf(fact) !== provider) return false;
  if (version && version !== 'All' && fact.version !== version) return false;
  if (minSavings !== undefined && fact.totalSavings < minSavings) return false;
  if (minPercent !== undefined && fact.savingsPercent < minPercent) return false;
  return true;
}

/** Value at `⌊n·k/4⌋` of the sorted sample; no interpolation. */
export function quartiles(values: readonly number[]) {
  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;
  if (!n) return null;
  const at = (i: number) => sorted[Math.min(i, n - 1)] ?? 0;
  return {
    min: at(0),
    q1: at(Math.floor(n / 4)),
    median: at(Math.floor(n / 2)),
    q3: at(Math.floor((3 * n) / 4)),
    max: at(n - 1),
  };
}

/** Upper middle element for even sizes; 0 for an empty sample. */
export function median(values: readonly number[]): number {
  return quartiles(values)?.median ?? 0;
}

export function ageInDays(creationDate: string | null, now: Date): number | null {
  if (!creationDate) return null;
  const t = Date.parse(creationDate);
  if (Number.isNaN(t)) return null;
  return Math.floor((now.getTime() - t) / DAY_MS);
}

export function savingsDistribution(
  facts: readonly ResultFact[],
  filters: AnalyticsFilters = {}
): DistributionBucket[] {
  const minSavings = Math.max(0, filters.minSavings ?? 0);
  const buckets = SAVINGS_BUCKETS.map((b) => ({ ...b, count: 0, totalSavings: 0 }));

  for (const fact of facts) {
    if (!matchesFilters(fact, { ...filters, minSavings }, effectiveProvider)) continue;
    const bucket = buckets.find(
      (b) => fact.totalSavings >= b.min && (b.max === null || fact.totalSavings < b.max)
    );
    if (!bucket) continue;
    bucket.count += 1;
    bucket.totalSavings += fact.totalSavings;
  }

  return buckets.map((b) => ({ ...b, totalSavings: roundMoney(b.totalSavings) }));
}

export function ageDistribution(
  facts: readonly ResultFact[],
  now: Date,
  filters: AnalyticsFilters = {}
): AgeBucket[] {
  const buckets = AGE_BUCKETS.map((b) => ({ ...b, count: 0, totalSavings: 0 }));

  for (const fact of facts) {
    if (!matchesFilters(fact, filters)) continue;
    const days = ageInDays(fact.creationDate, now);
    if (days === null) continue;
    const bucket = buckets.find((b) => b.maxDays === null || days < b.maxDays);
    if (!bucket) continue;
    bucket.count += 1;
    bucket.totalSavings += fact.totalSavings;
  }

  return buckets.map((b) => ({
    label: b.label,
    count: b.count,
    totalSavings: roundMoney(b.totalSavings),
  }));
}

/** Positive-savings units only; each side is clamped at zero after summing. */
export function savingsBreakdown(facts: readonly ResultFact[]): SavingsBreakdown {
  let instance = 0;
  let storage = 0;
  for (const fact of facts) {
    if (fact.totalSavings <= 0) continue;
    instance += fact.currentInstance - fact.optimalInstance;
    storage += fact.currentStorage - fact.optimalStorage;
  }
  const instanceSavings = Math.max(0, instance);
  const storageSavings = Math.max(0, storage);
  const totalSavings = instanceSavings + storageSavings;

  return {
    instanceSavings: roundMoney(instanceSavings),
    storageSavings: roundMoney(storageSavings),
    totalSavings: roundMoney(totalSavings),
    instancePercent: roundMoney(percentOf(instanceSavings, totalSavings)),
    storagePercent: roundMoney(percentOf(storageSavings, totalSavings)),
  };
}

/** Units whose key is null are left out. */
export function groupTotals(
  facts: readonly ResultFact[],
  keyOf: (fact: ResultFact) => string | null
): GroupTotals[] {
  const groups = new Map<
    string,
    { clusterCount: number; totalCurrent: number; totalOptimal: number; totalSavings: number }
  >();

  for (const fact of facts) {
    const key = keyOf(fact);
    if (key === null) continue;
    const g = groups.get(key) ?? {
      clusterCount: 0,
      totalCurrent: 0,
      totalOptimal: 0,
      totalSavings: 0,
    };
    g.clusterCount += 1;
    g.totalCurrent += fact.currentTotal;
    g.totalOptimal += fact.optimalTotal;
    g.totalSavings += fact.totalSavings;
    groups.set(key, g);
  }

  return [...groups].map(([key, g]) => ({
    key,
    clusterCount: g.clusterCount,
    totalCurrent: roundMoney(g.totalCurrent),
    totalOptimal: roundMoney(g.totalOptimal),
    totalSavings: roundMoney(g.totalSavings),
    avgSavings: roundMoney(g.totalSavings / g.clusterCount),
  }));
}

export function shardBucketOf(shards: number): string {
  const bucket = SHARD_BUCKETS.find((b) => b.maxShards === null || shards <= b.maxShards);
  return bucket?.label ?? '21+';
}

/** Cost per shard of every current physical cluster, grouped by the unit's shard count. */
export function shardCostBoxPlot(
  facts: readonly ResultFact[],
  filters: AnalyticsFilters = {}
): ShardBox[] {
  const costs = new Map<string, number[]>();
  for (const fact of facts) {
    const shards = fact.shardsCount;
    if (!shards || shards <= 0 || !matchesFilters(fact, filters)) continue;
    const bucket = shardBucketOf(shards);
    const list = costs.get(bucket) ?? [];
    for (const single of fact.currentSingles) list.push(single.totalPrice / shards);
    costs.set(bucket, list);
  }

  const boxes: ShardBox[] = [];
  for (const { label } of SHARD_BUCKETS) {
    const values = costs.get(label) ?? [];
    const q = quartiles(values);
    if (!q) continue;
    boxes.push({
      bucket: label,
      count: values.length,
      min: roundMoney(q.min),
      q1: roundMoney(q.q1),
      median: roundMoney(q.median),
      q3: roundMoney(q.q3),
      max: roundMoney(q.max),
    });
  }
  return boxes;
}

export function priorityScore(input: {
  savings: number;
  savingsPercent: number;
  ageYears: number;
  currentPrice: number;
}): number {
  const savingsScore = Math.min(100, (input.savings / 10_000) * 100) * 0.4;
  const percentScore = Math.min(100, input.savingsPercent) * 0.3;
  const ageScore = Math.min(100, input.ageYears * 20) * 0.2;
  const costScore = Math.min(100, (input.currentPrice / 10_000) * 100) * 0.1;
  return savingsScore + percentScore + ageScore + costScore;
}

export function priorityLevel(score: number): PriorityLevel {
  if (score >= 70) return 'high';
  if (score >= 40) return 'medium';
  return 'low';
}

export function priorityScores(
  facts: readonly ResultFact[],
  now: Date,
  limit: number,
  filters: AnalyticsFilters = {}
): PriorityScore[] {
  const scored = facts
    .filter((f) => f.totalSavings > 0 && matchesFilters(f, filters))
    .map((f) => {
      const days = ageInDays(f.creationDate, now);
      const ageYears = days === null ? null : days / 365;
      const score = priorityScore({
        savings: f.totalSavings,
        savingsPercent: f.savingsPercent,
        ageYears: ageYears ?? 0,
        currentPrice: f.currentTotal,
      });
      return { fact: f, ageYears, score };
    })
    .sort((a, b) => b.score - a.score || a.fact.mcUid.localeCompare(b.fact.mcUid))
    .slice(0, limit);

  return scored.map(({ fact, ageYears, score }) => ({
    mcUid: fact.mcUid,
    name: fact.name,
    provider: fact.provider,
    savings: roundMoney(fact.totalSavings),
    savingsPercent: roundMoney(fact.savingsPercent),
    currentPrice: roundMoney(fact.currentTotal),
    ageYears: ageYears === null ? null : roundMoney(ageYears),
    score: Math.round(score * 10) / 10,
    priority: priorityLevel(score),
  }));
}

export type RunFigures = {
  clusterCount: number;
  clustersWithSavings: number;
  totalCurrent: number;
  totalOptimal: number;
  totalSavings: number;
  avgSavings: number;
  medianSavings: number;
  highImpactCount: number;
  optimizationRate: number;
  storageSavings: number;
  costEfficiency: number;
};

/** Unrounded dashboard figures; totals cover positive-savings units only. */
export function runFigures(facts: readonly ResultFact[]): RunFigures {
  const positive = facts.filter((f) => f.totalSavings > 0);
  const sum = (pick: (f: ResultFact) => number) => positive.reduce((acc, f) => acc + pick(f), 0);

  const totalCurrent = sum((f) => f.currentTotal);
  const totalOptimal = sum((f) => f.optimalTotal);
  const totalSavings = sum((f) => f.totalSavings);
  const optimizable = facts.filter((f) => f.savingsPercent > OPTIMIZABLE_PERCENT).length;

  return {
    clusterCount: facts.length,
    clustersWithSavings: positive.length,
    totalCurrent,
    totalOptimal,
    totalSavings,
    avgSavings: positive.length ? totalSavings / positive.length : 0,
    medianSavings: median(positive.map((f) => f.totalSavings)),
    highImpactCount: positive.filter((f) => f.totalSavings > HIGH_IMPACT_SAVINGS).length,
    optimizationRate: percentOf(optimizable, facts.length),
    storageSavings: sum((f) => f.currentStorage - f.optimalStorage),
    costEfficiency: totalCurrent > 0 ? (totalOptimal / totalCurrent) * 100 : 100,
  };
}

const round1 = (n: number) => Math.round(n * 10) / 10;

/** Pearson coefficient of the points; null below two points or without variance. */
export function pearson(points: ReadonlyArray<{ x: number; y: number }>): number | null {
  const n = points.length;
  if (n < 2) return null;
  const mx = points.reduce((acc, p) => acc + p.x, 0) / n;
  const my = points.reduce((acc, p) => acc + p.y, 0) / n;
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (const { x, y } of points) {
    sxy += (x - mx) * (y - my);
    sxx += (x - mx) ** 2;
    syy += (y - my) ** 2;
  }
  if (sxx === 0 || syy === 0) return null;
  return Math.round((sxy / Math.sqrt(sxx * syy)) * 10_000) / 10_000;
}

function scatterPoint(fact: ResultFact, x: number): ScatterPoint {
  return {
    mcUid: fact.mcUid,
    label: fact.name ?? fact.mcUid,
    x,
    y: roundMoney(fact.totalSavings),
    savingsPercent: roundMoney(fact.savingsPercent),
    provider: fact.provider,
    version: fact.version,
  };
}

function correlation(points: ScatterPoint[]): Correlation {
  return { coefficient: pearson(points), points };
}

/** Age in days against savings; units without a usable creation date are left out. */
export function ageSavingsCorrelation(
  facts: readonly ResultFact[],
  now: Date,
  filters: AnalyticsFilters = {}
): Correlation {
  const points: ScatterPoint[] = [];
  for (const fact of facts) {
    if (!matchesFilters(fact, filters)) continue;
    const days = ageInDays(fact.creationDate, now);
    if (days !== null) points.push(scatterPoint(fact, days));
  }
  return correlation(points);
}

/** Current monthly cost of each unit against its savings. */
export function sizeSavingsCorrelation(facts: readonly ResultFact[]): Correlation {
  return correlation(facts.map((f) => scatterPoint(f, roundMoney(f.currentTotal))));
}

/** Grouped by the recorded storage type string, most common first. */
export function storageTypeDistribution(
  facts: readonly ResultFact[],
  filters: AnalyticsFilters = {}
): StorageTypeGroup[] {
  const groups = new Map<string, { count: number; savings: number }>();
  for (const fact of facts) {
    if (fact.storageType === null || !matchesFilters(fact, filters)) continue;
    const g = groups.get(fact.storageType) ?? { count: 0, savings: 0 };
    g.count += 1;
    g.savings += fact.totalSavings;
    groups.set(fact.storageType, g);
  }
  return [...groups]
    .map(([storageType, g]) => ({
      storageType,
      clusterCount: g.count,
      avgSavings: roundMoney(g.savings / g.count),
    }))
    .sort((a, b) => b.clusterCount - a.clusterCount || a.storageType.localeCompare(b.storageType));
}

/**
 * Positive-savings units grouped by region and provider. The average cost is taken over
 * current physical clusters; units without any are left out.
 */
export function regionalCostEfficiency(
  facts: readonly ResultFact[],
  filters: AnalyticsFilters = {}
): RegionEfficiency[] {
  type Group = { region: string; provider: string; units: number; costs: number[]; savings: number };
  const groups = new Map<string, Group>();
  for (const fact of facts) {
    const { region, provider } = fact;
    if (region === null || provider === null) continue;
    if (fact.totalSavings <= 0 || !fact.currentSingles.length) continue;
    if (!matchesFilters(fact, filters)) continue;
    const key = `${provider}|${region}`;
    const g: Group = groups.get(key) ?? { region, provider, units: 0, costs: [], savings: 0 };
    g.units += 1;
    g.savings += fact.totalSavings;
    for (const single of fact.currentSingles) g.costs.push(single.totalPrice);
    groups.set(key, g);
  }
  return [...groups.values()]
    .map((g) => ({
      region: g.region,
      provider: g.provider,
      clusterCount: g.units,
      avgCostPerCluster: roundMoney(g.costs.reduce((a, c) => a + c, 0) / g.costs.length),
      totalSavings: roundMoney(g.savings),
      bubbleRadius: round1(Math.max(5, Math.min(50, g.savings / 1000))),
    }))
    .sort((a, b) => b.totalSavings - a.totalSavings || a.region.localeCompare(b.region));
}

/** The `limit` largest savers with their current and optimal totals. */
export function currentVsOptimal(facts: readonly ResultFact[], limit: number): PriceComparison[] {
  return [...facts]
    .sort((a, b) => b.totalSavings - a.totalSavings || a.mcUid.localeCompare(b.mcUid))
    .slice(0, limit)
    .map((f) => ({
      mcUid: f.mcUid,
      name: f.name,
      currentPrice: roundMoney(f.currentTotal),
      optimalPrice: roundMoney(f.optimalTotal),
      savings: roundMoney(f.totalSavings),
    }));
}

/** Current instance and storage spend per provider; only the version filter applies. */
export function costByComponent(
  facts: readonly ResultFact[],
  version?: string
): ComponentCost[] {
  const groups = new Map<string, { instance: number; storage: number }>();
  for (const fact of facts) {
    if (fact.provider === null || !fact.currentSingles.length) continue;
    if (!matchesFilters(fact, { version })) continue;
    const g = groups.get(fact.provider) ?? { instance: 0, storage: 0 };
    g.instance += fact.currentInstance;
    g.storage += fact.currentStorage;
    groups.set(fact.provider, g);
  }
  return [...groups]
    .map(([provider, g]) => ({
      provider,
      instanceCost: roundMoney(g.instance),
      storageCost: roundMoney(g.storage),
      totalCost: roundMoney(g.instance + g.storage),
    }))
    .sort((a, b) => b.totalCost - a.totalCost);
}

/** One bubble per unit with both a version and a usable creation date. */
export function versionAgeAnalysis(
  facts: readonly ResultFact[],
  now: Date,
  filters: AnalyticsFilters = {}
): VersionAgePoint[] {
  const points: VersionAgePoint[] = [];
  for (const fact of facts) {
    if (fact.version === null || !matchesFilters(fact, filters)) continue;
    const ageDays = ageInDays(fact.creationDate, now);
    if (ageDays === null) continue;
    points.push({
      mcUid: fact.mcUid,
      name: fact.name,
      version: fact.version,
      ageDays,
      savings: roundMoney(fact.totalSavings),
      savingsPercent: roundMoney(fact.savingsPercent),
      bubbleRadius: round1(fact.totalSavings / 100),
      provider: fact.provider,
      region: fact.region,
    });
  }
  return points;
}

/** Every bucket is returned; utilization averages only units with a positive shard ceiling. */
export function shardCountDistribution(
  facts: readonly ResultFact[],
  filters: AnalyticsFilters = {}
): ShardCountBucket[] {
  type Bucket = { label: string; maxShards: number | null; savings: number[]; utilization: number[] };
  const buckets = SHARD_COUNT_BUCKETS.map(
    (b): Bucket => ({ label: b.label, maxShards: b.maxShards, savings: [], utilization: [] })
  );
  for (const fact of facts) {
    const shards = fact.shardsCount;
    if (shards === null || !matchesFilters(fact, filters)) continue;
    const bucket = buckets.find((b) => b.maxShards === null || shards <= b.maxShards);
    if (!bucket) continue;
    bucket.savings.push(fact.totalSavings);
    if (fact.maxShardsCount && fact.maxShardsCount > 0) {
      bucket.utilization.push((shards / fact.maxShardsCount) * 100);
    }
  }
  const mean = (xs: number[]) => (xs.length ? xs.reduce((a, x) => a + x, 0) / xs.length : 0);
  return buckets.map((b) => ({
    label: b.label,
    count: b.savings.length,
    avgSavings: roundMoney(mean(b.savings)),
    avgUtilization: round1(mean(b.utilization)),
  }));
}
