import { pino } from 'pino';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createTestDb, steppingClock, type TestDb } from '../../../../test/fixtures/pglite.js';
import { metadata, pairOf, unitResult } from '../../../../test/fixtures/results.js';
import {
  ageDistribution,
  ageSavingsCorrelation,
  costByComponent,
  currentVsOptimal,
  filterOptions,
  priorityScores,
  providerComparison,
  regionalCostEfficiency,
  runSummary,
  savingsBreakdown,
  savingsDistribution,
  shardCostBoxPlot,
  shardCountDistribution,
  sizeSavingsCorrelation,
  storageTypeDistribution,
  versionAgeAnalysis,
  versionAnalysis,
} from './analytics.js';
import { ResultStore } from './store.js';

const now = () => new Date('2026-01-01T00:00:00.000Z');

describe('run analytics', () => {
  let t: TestDb;
  let firstRun: number;
  let secondRun: number;

  beforeAll(async () => {
    t = await createTestDb();
    const store = new ResultStore(t.db, {
      logger: pino({ level: 'silent' }),
      now: steppingClock('2025-12-20T00:00:00.000Z'),
    });

    firstRun = await store.beginRun('first', 1);
    await store.saveSuccess(firstRun, unitResult('A', 1000, 800));
    await store.finalizeRun(firstRun, null);

    secondRun = await store.beginRun('second', 3);
    await store.saveSuccess(secondRun, unitResult('A', 1000, 700));
    await store.saveSuccess(secondRun, {
      uid: 'B',
      pairs: [pairOf('B-c1', { instance: 3000, storage: 200 }, { instance: 2000, storage: 100 })],
    });
    await store.saveSuccess(secondRun, unitResult('C', 500, 600));
    await store.finalizeRun(secondRun, null);

    await store.upsertMetadata(
      'A',
      metadata({
        clusterName: 'orders',
        cloudProvider: 'AWS',
        engineVersion: '7.2',
        softwareVersion: '7.4',
        shardsCount: 4,
        maxShardsCount: 8,
        region: 'us-east-1',
        storageType: 'gp3',
        creationDate: '2025-12-01',
      })
    );
    await store.upsertMetadata(
      'B',
      metadata({
        clusterName: 'sessions',
        cloudProvider: 'GCP',
        engineVersion: '7.2',
        shardsCount: 12,
        maxShardsCount: 24,
        region: 'europe-west1',
        storageType: 'pd-ssd',
        creationDate: '2023-06-01',
      })
    );
  });

  afterAll(async () => {
    await t.close();
  });

  it('summarises the latest completed run against the previous one', async () => {
    expect(await runSummary(t.db)).toEqual({
      runId: secondRun,
      timestamp: expect.any(Date),
      label: 'second',
      clusterCount: 3,
      clustersWithSavings: 2,
      totalCurrent: 4200,
      totalOptimal: 2800,
      totalSavings: 1400,
      savingsPercent: 33.33,
      avgSavings: 700,
      medianSavings: 1100,
      highImpactCount: 0,
      optimizationRate: 66.67,
      storageSavings: 100,
      costEfficiency: 66.67,
      previousRunId: firstRun,
      savingsChange: 1200,
      savingsChangePercent: 600,
    });
  });

  it('has no previous run for the first one and nothing for unknown runs', async () => {
    expect(await runSummary(t.db, firstRun)).toMatchObject({
      runId: firstRun,
      totalSavings: 200,
      previousRunId: null,
      savingsChange: null,
      savingsChangePercent: null,
    });
    expect(await runSummary(t.db, 9999)).toBeNull();
  });

  it('buckets savings with provider filtering', async () => {
    const all = await savingsDistribution(t.db);
    expect(all.map((b) => b.count)).toEqual([1, 0, 1, 0, 0, 0]);

    const gcp = await savingsDistribution(t.db, undefined, { provider: 'GCP' });
    expect(gcp.map((b) => [b.label, b.count, b.totalSavings])).toEqual([
      ['$0-$500', 0, 0],
      ['$500-$1K', 0, 0],
      ['$1K-$2K', 1, 1100],
      ['$2K-$5K', 0, 0],
      ['$5K-$10K', 0, 0],
      ['$10K+', 0, 0],
    ]);
  });

  it('groups by provider and by version', async () => {
    expect((await providerComparison(t.db)).map((g) => [g.key, g.totalCurrent, g.totalSavings])).toEqual([
      ['GCP', 3200, 1100],
      ['AWS', 1000, 300],
    ]);
    expect((await versionAnalysis(t.db)).map((g) => [g.key, g.clusterCount])).toEqual([
      ['7.4', 1],
      ['7.2', 1],
    ]);
    expect(await filterOptions(t.db)).toEqual({ providers: ['AWS', 'GCP'], versions: ['7.4', '7.2'] });
  });

  it('splits instance and storage savings', async () => {
    expect(await savingsBreakdown(t.db, secondRun)).toEqual({
      instanceSavings: 1300,
      storageSavings: 100,
      totalSavings: 1400,
      instancePercent: 92.86,
      storagePercent: 7.14,
    });
  });

  it('measures cost per shard from metadata shard counts', async () => {
    expect(await shardCostBoxPlot(t.db)).toEqual([
      { bucket: '1-5', count: 1, min: 250, q1: 250, median: 250, q3: 250, max: 250 },
      { bucket: '11-20', count: 1, min: 266.67, q1: 266.67, median: 266.67, q3: 266.67, max: 266.67 },
    ]);
  });

  it('buckets ages and ranks priorities against the given clock', async () => {
    const ages = await ageDistribution(t.db, undefined, {}, now);
    expect(ages.map((b) => [b.label, b.count, b.totalSavings])).toEqual([
      ['0-6mo', 1, 300],
      ['6-12mo', 0, 0],
      ['1-2y', 0, 0],
      ['2-3y', 1, 1100],
      ['3y+', 0, 0],
    ]);

    const ranked = await priorityScores(t.db, undefined, 10, {}, now);
    expect(ranked.map((r) => [r.mcUid, r.priority])).toEqual([
      ['B', 'low'],
      ['A', 'low'],
    ]);
  });

  it('groups by storage type, region and provider component', async () => {
    expect(await storageTypeDistribution(t.db)).toEqual([
      { storageType: 'gp3', clusterCount: 1, avgSavings: 300 },
      { storageType: 'pd-ssd', clusterCount: 1, avgSavings: 1100 },
    ]);
    expect(await regionalCostEfficiency(t.db)).toEqual([
      {
        region: 'europe-west1',
        provider: 'GCP',
        clusterCount: 1,
        avgCostPerCluster: 3200,
        totalSavings: 1100,
        bubbleRadius: 5,
      },
      {
        region: 'us-east-1',
        provider: 'AWS',
        clusterCount: 1,
        avgCostPerCluster: 1000,
        totalSavings: 300,
        bubbleRadius: 5,
      },
    ]);
    expect(await costByComponent(t.db)).toEqual([
      { provider: 'GCP', instanceCost: 3000, storageCost: 200, totalCost: 3200 },
      { provider: 'AWS', instanceCost: 1000, storageCost: 0, totalCost: 1000 },
    ]);
    expect(await currentVsOptimal(t.db, undefined, 2)).toEqual([
      { mcUid: 'B', name: 'sessions', currentPrice: 3200, optimalPrice: 2100, savings: 1100 },
      { mcUid: 'A', name: 'orders', currentPrice: 1000, optimalPrice: 700, savings: 300 },
    ]);
  });

  it('plots age and size against savings', async () => {
    const age = await ageSavingsCorrelation(t.db, undefined, {}, now);
    expect(age.coefficient).toBe(1);
    expect(age.points.map((p) => [p.mcUid, p.x, p.y])).toEqual([
      ['A', 31, 300],
      ['B', 945, 1100],
    ]);

    const size = await sizeSavingsCorrelation(t.db);
    expect(size.coefficient).toBe(0.9875);
    expect(size.points.map((p) => [p.mcUid, p.x, p.y])).toEqual([
      ['A', 1000, 300],
      ['B', 3200, 1100],
      ['C', 500, -100],
    ]);
  });

  it('relates versions to age and shard counts to utilization', async () => {
    expect(
      (await versionAgeAnalysis(t.db, undefined, {}, now)).map((p) => [p.version, p.ageDays, p.bubbleRadius])
    ).toEqual([
      ['7.4', 31, 3],
      ['7.2', 945, 11],
    ]);
    expect(
      (await shardCountDistribution(t.db)).map((b) => [b.label, b.count, b.avgSavings, b.avgUtilization])
    ).toEqual([
      ['1-10', 1, 300, 50],
      ['11-50', 1, 1100, 50],
      ['51-100', 0, 0, 0],
      ['101-200', 0, 0, 0],
      ['200+', 0, 0, 0],
    ]);
  });

  it('answers empty results when no run has completed', async () => {
    const empty = await createTestDb();
    try {
      expect(await runSummary(empty.db)).toBeNull();
      expect((await savingsDistribution(empty.db)).every((b) => b.count === 0)).toBe(true);
      expect(await filterOptions(empty.db)).toEqual({ providers: [], versions: [] });
    } finally {
      await empty.close();
    }
  });
});
