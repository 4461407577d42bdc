import { describe, expect, it } from 'vitest';
import {
  ageDistribution,
  ageInDays,
  ageSavingsCorrelation,
  costByComponent,
  currentVsOptimal,
  detectProvider,
  effectiveProvider,
  groupTotals,
  matchesFilters,
  median,
  pearson,
  priorityLevel,
  priorityScore,
  priorityScores,
  quartiles,
  regionalCostEfficiency,
  type ResultFact,
  runFigures,
  savingsBreakdown,
  savingsDistribution,
  shardBucketOf,
  shardCostBoxPlot,
  shardCountDistribution,
  sizeSavingsCorrelation,
  storageTypeDistribution,
  versionAgeAnalysis,
} from './stats.js';

const NOW = new Date('2026-01-01T00:00:00.000Z');

function fact(overrides: Partial<ResultFact> = {}): ResultFact {
  return {
    mcUid: 'mc',
    totalSavings: 0,
    savingsPercent: 0,
    currentTotal: 0,
    optimalTotal: 0,
    currentInstance: 0,
    optimalInstance: 0,
    currentStorage: 0,
    optimalStorage: 0,
    name: null,
    provider: null,
    version: null,
    region: null,
    storageType: null,
    creationDate: null,
    shardsCount: null,
    maxShardsCount: null,
    currentSingles: [],
    ...overrides,
  };
}

describe('detectProvider', () => {
  it('recognises instance naming per cloud', () => {
    expect(detectProvider(['m5.large'])).toBe('AWS');
    expect(detectProvider(['n2-standard-4'])).toBe('GCP');
    expect(detectProvider(['Standard_E4s_v3'])).toBe('Azure');
  });

  it('falls back to Unknown', () => {
    expect(detectProvider(['custom'])).toBe('Unknown');
    expect(detectProvider([])).toBe('Unknown');
  });
});

describe('filters', () => {
  it('matches the metadata provider unless told to guess from instance types', () => {
    const gcpByName = fact({ currentSingles: [{ infra: { 'n2-standard-4': 2 }, totalPrice: 10 }] });
    const tagged = fact({ provider: 'AWS', currentSingles: gcpByName.currentSingles });

    expect(matchesFilters(gcpByName, { provider: 'GCP' })).toBe(false);
    expect(matchesFilters(gcpByName, { provider: 'GCP' }, effectiveProvider)).toBe(true);
    expect(matchesFilters(tagged, { provider: 'GCP' }, effectiveProvider)).toBe(false);
    expect(matchesFilters(tagged, { provider: 'All' })).toBe(true);
  });

  it('guesses a missing provider for the savings distribution only', () => {
    const untagged = fact({
      totalSavings: 600,
      savingsPercent: 20,
      currentTotal: 3000,
      creationDate: '2025-12-01',
      currentSingles: [{ infra: { 'm5.large': 2 }, totalPrice: 3000 }],
    });
    const aws = { provider: 'AWS' };

    expect(savingsDistribution([untagged], aws).map((b) => b.count)).toEqual([0, 1, 0, 0, 0, 0]);
    expect(priorityScores([untagged], NOW, 10, aws)).toEqual([]);
    expect(ageDistribution([untagged], NOW, aws).map((b) => b.count)).toEqual([0, 0, 0, 0, 0]);
  });

  it('applies version and thresholds', () => {
    const f = fact({ version: '7.4', totalSavings: 300, savingsPercent: 12 });
    expect(matchesFilters(f, { version: '7.4', minSavings: 300, minPercent: 12 })).toBe(true);
    expect(matchesFilters(f, { version: '7.2' })).toBe(false);
    expect(matchesFilters(f, { minSavings: 301 })).toBe(false);
    expect(matchesFilters(f, { minPercent: 12.5 })).toBe(false);
  });
});

describe('quartiles', () => {
  it('picks elements by truncated index', () => {
    expect(quartiles([5, 1, 4, 2, 3])).toEqual({ min: 1, q1: 2, median: 3, q3: 4, max: 5 });
    expect(quartiles([10, 20])).toEqual({ min: 10, q1: 10, median: 20, q3: 20, max: 20 });
    expect(quartiles([])).toBeNull();
  });

  it('takes the upper middle as median', () => {
    expect(median([4, 1, 3, 2])).toBe(3);
    expect(median([])).toBe(0);
  });
});

describe('savingsDistribution', () => {
  it('buckets non-negative savings with inclusive lower bounds', () => {
    const facts = [0, 499.99, 500, 1500, 12_000, -20].map((s, i) =>
      fact({ mcUid: `mc-${i}`, totalSavings: s })
    );

    expect(savingsDistribution(facts)).toEqual([
      { label: '$0-$500', min: 0, max: 500, count: 2, totalSavings: 499.99 },
      { label: '$500-$1K', min: 500, max: 1000, count: 1, totalSavings: 500 },
      { label: '$1K-$2K', min: 1000, max: 2000, count: 1, totalSavings: 1500 },
      { label: '$2K-$5K', min: 2000, max: 5000, count: 0, totalSavings: 0 },
      { label: '$5K-$10K', min: 5000, max: 10_000, count: 0, totalSavings: 0 },
      { label: '$10K+', min: 10_000, max: null, count: 1, totalSavings: 12_000 },
    ]);
  });

  it('honours the minimum savings filter', () => {
    const facts = [100, 600].map((s) => fact({ totalSavings: s }));
    const counts = savingsDistribution(facts, { minSavings: 200 }).map((b) => b.count);
    expect(counts).toEqual([0, 1, 0, 0, 0, 0]);
  });
});

describe('ageDistribution', () => {
  it('measures age in whole days', () => {
    expect(ageInDays('2025-12-01', NOW)).toBe(31);
    expect(ageInDays('not a date', NOW)).toBeNull();
    expect(ageInDays(null, NOW)).toBeNull();
  });

  it('buckets by creation date and skips unknown ages', () => {
    const dates = ['2025-12-01', '2025-03-01', '2024-06-01', '2023-06-01', '2020-01-01', null, 'x'];
    const facts = dates.map((d) => fact({ creationDate: d, totalSavings: 10 }));

    expect(ageDistribution(facts, NOW)).toEqual([
      { label: '0-6mo', count: 1, totalSavings: 10 },
      { label: '6-12mo', count: 1, totalSavings: 10 },
      { label: '1-2y', count: 1, totalSavings: 10 },
      { label: '2-3y', count: 1, totalSavings: 10 },
      { label: '3y+', count: 1, totalSavings: 10 },
    ]);
  });
});

describe('savingsBreakdown', () => {
  it('splits positive savings into instance and storage parts', () => {
    const facts = [
      fact({
        totalSavings: 90,
        currentInstance: 300,
        optimalInstance: 200,
        currentStorage: 50,
        optimalStorage: 60,
      }),
      fact({
        totalSavings: 80,
        currentInstance: 100,
        optimalInstance: 50,
        currentStorage: 40,
        optimalStorage: 10,
      }),
      fact({ totalSavings: -500, currentInstance: 0, optimalInstance: 500 }),
    ];

    expect(savingsBreakdown(facts)).toEqual({
      instanceSavings: 150,
      storageSavings: 20,
      totalSavings: 170,
      instancePercent: 88.24,
      storagePercent: 11.76,
    });
  });

  it('clamps a net storage increase at zero', () => {
    const facts = [fact({ totalSavings: 10, currentStorage: 10, optimalStorage: 40 })];
    expect(savingsBreakdown(facts)).toMatchObject({ storageSavings: 0, storagePercent: 0 });
  });
});

describe('groupTotals', () => {
  it('aggregates per key and drops null keys', () => {
    const facts = [
      fact({ provider: 'AWS', currentTotal: 100, optimalTotal: 60, totalSavings: 40 }),
      fact({ provider: 'AWS', currentTotal: 50, optimalTotal: 40, totalSavings: 10 }),
      fact({ provider: null, currentTotal: 999, optimalTotal: 0, totalSavings: 999 }),
    ];

    expect(groupTotals(facts, (f) => f.provider)).toEqual([
      {
        key: 'AWS',
        clusterCount: 2,
        totalCurrent: 150,
        totalOptimal: 100,
        totalSavings: 50,
        avgSavings: 25,
      },
    ]);
  });
});

describe('shardCostBoxPlot', () => {
  it('maps shard counts to buckets', () => {
    expect([1, 5, 6, 10, 11, 20, 21, 300].map(shardBucketOf)).toEqual([
      '1-5',
      '1-5',
      '6-10',
      '6-10',
      '11-20',
      '11-20',
      '21+',
      '21+',
    ]);
  });

  it('divides each current cluster by the unit shard count', () => {
    const facts = [
      fact({
        shardsCount: 4,
        currentSingles: [
          { infra: {}, totalPrice: 400 },
          { infra: {}, totalPrice: 200 },
        ],
      }),
      fact({ shardsCount: 8, currentSingles: [{ infra: {}, totalPrice: 800 }] }),
      fact({ shardsCount: null, currentSingles: [{ infra: {}, totalPrice: 5 }] }),
      fact({ shardsCount: 0, currentSingles: [{ infra: {}, totalPrice: 5 }] }),
    ];

    expect(shardCostBoxPlot(facts)).toEqual([
      { bucket: '1-5', count: 2, min: 50, q1: 50, median: 100, q3: 100, max: 100 },
      { bucket: '6-10', count: 1, min: 100, q1: 100, median: 100, q3: 100, max: 100 },
    ]);
  });
});

describe('priority', () => {
  it('weights savings, percent, age and cost', () => {
    expect(
      priorityScore({ savings: 5000, savingsPercent: 50, ageYears: 2, currentPrice: 10_000 })
    ).toBeCloseTo(53, 10);
    expect(
      priorityScore({ savings: 20_000, savingsPercent: 80, ageYears: 10, currentPrice: 30_000 })
    ).toBeCloseTo(94, 10);
  });

  it('maps scores to levels', () => {
    expect(priorityLevel(70)).toBe('high');
    expect(priorityLevel(69.9)).toBe('medium');
    expect(priorityLevel(40)).toBe('medium');
    expect(priorityLevel(39.9)).toBe('low');
  });

  it('ranks positive savings only and honours the limit', () => {
    const facts = [
      fact({ mcUid: 'small', totalSavings: 100, savingsPercent: 5, currentTotal: 2000 }),
      fact({
        mcUid: 'big',
        totalSavings: 20_000,
        savingsPercent: 80,
        currentTotal: 30_000,
        creationDate: '2016-01-01',
      }),
      fact({ mcUid: 'loss', totalSavings: -10, savingsPercent: -1, currentTotal: 100 }),
    ];

    const ranked = priorityScores(facts, NOW, 5);
    expect(ranked.map((r) => [r.mcUid, r.priority])).toEqual([
      ['big', 'high'],
      ['small', 'low'],
    ]);
    expect(ranked[0]?.score).toBe(94);
    expect(ranked[1]?.ageYears).toBeNull();
    expect(priorityScores(facts, NOW, 1)).toHaveLength(1);
  });
});

describe('runFigures', () => {
  it('summarises positive savings and the optimizable share', () => {
    const figures = runFigures([
      fact({
        totalSavings: 3000,
        savingsPercent: 30,
        currentTotal: 10_000,
        optimalTotal: 7000,
        currentStorage: 100,
        optimalStorage: 50,
      }),
      fact({ totalSavings: 100, savingsPercent: 10, currentTotal: 1000, optimalTotal: 900 }),
      fact({ totalSavings: -50, savingsPercent: -10, currentTotal: 500, optimalTotal: 550 }),
    ]);

    expect(figures).toMatchObject({
      clusterCount: 3,
      clustersWithSavings: 2,
      totalCurrent: 11_000,
      totalOptimal: 7900,
      totalSavings: 3100,
      avgSavings: 1550,
      medianSavings: 3000,
      highImpactCount: 1,
      storageSavings: 50,
    });
    expect(figures.optimizationRate).toBeCloseTo(33.333, 3);
    expect(figures.costEfficiency).toBeCloseTo(71.818, 3);
  });

  it('reports full efficiency for an empty run', () => {
    expect(runFigures([])).toMatchObject({ clusterCount: 0, costEfficiency: 100, medianSavings: 0 });
  });
});

describe('correlations', () => {
  it('computes the Pearson coefficient', () => {
    expect(pearson([{ x: 1, y: 2 }, { x: 2, y: 4 }, { x: 3, y: 6 }])).toBe(1);
    expect(pearson([{ x: 1, y: 6 }, { x: 2, y: 4 }, { x: 3, y: 2 }])).toBe(-1);
    expect(pearson([{ x: 1, y: 1 }])).toBeNull();
    expect(pearson([{ x: 1, y: 5 }, { x: 2, y: 5 }])).toBeNull();
  });

  it('plots age against savings for units with a creation date', () => {
    const facts = [
      fact({
        mcUid: 'a',
        name: 'orders',
        provider: 'AWS',
        version: '7.4',
        creationDate: '2025-12-01',
        totalSavings: 100,
        savingsPercent: 10,
      }),
      fact({ mcUid: 'b', creationDate: '2024-01-01', totalSavings: 300 }),
      fact({ mcUid: 'c', totalSavings: 50 }),
    ];

    expect(ageSavingsCorrelation(facts, NOW)).toEqual({
      coefficient: 1,
      points: [
        { mcUid: 'a', label: 'orders', x: 31, y: 100, savingsPercent: 10, provider: 'AWS', version: '7.4' },
        { mcUid: 'b', label: 'b', x: 731, y: 300, savingsPercent: 0, provider: null, version: null },
      ],
    });
    const aws = ageSavingsCorrelation(facts, NOW, { provider: 'AWS' });
    expect(aws.coefficient).toBeNull();
    expect(aws.points.map((p) => p.mcUid)).toEqual(['a']);
  });

  it('plots current cost against savings', () => {
    const facts = [
      fact({ mcUid: 'x', currentTotal: 1000, totalSavings: 100 }),
      fact({ mcUid: 'y', currentTotal: 3000, totalSavings: 50 }),
    ];

    const result = sizeSavingsCorrelation(facts);
    expect(result.coefficient).toBe(-1);
    expect(result.points.map((p) => [p.x, p.y])).toEqual([
      [1000, 100],
      [3000, 50],
    ]);
  });
});

describe('storageTypeDistribution', () => {
  it('groups by storage type, most common first', () => {
    const facts = [
      fact({ storageType: 'gp3', totalSavings: 100 }),
      fact({ storageType: 'pd-ssd', totalSavings: 50 }),
      fact({ storageType: 'gp3', totalSavings: 300 }),
      fact({ storageType: null, totalSavings: 999 }),
    ];

    expect(storageTypeDistribution(facts)).toEqual([
      { storageType: 'gp3', clusterCount: 2, avgSavings: 200 },
      { storageType: 'pd-ssd', clusterCount: 1, avgSavings: 50 },
    ]);
  });
});

describe('regionalCostEfficiency', () => {
  it('groups positive savers by region and provider', () => {
    const single = (totalPrice: number) => ({ infra: {}, totalPrice });
    const facts = [
      fact({ region: 'us-east-1', provider: 'AWS', totalSavings: 2000, currentSingles: [single(1000), single(3000)] }),
      fact({ region: 'us-east-1', provider: 'AWS', totalSavings: 4000, currentSingles: [single(2000)] }),
      fact({ region: 'europe-west1', provider: 'GCP', totalSavings: 500, currentSingles: [single(800)] }),
      fact({ region: 'us-east-1', provider: 'AWS', totalSavings: -10, currentSingles: [single(9999)] }),
      fact({ region: null, provider: 'AWS', totalSavings: 100, currentSingles: [single(10)] }),
      fact({ region: 'eu-west-1', provider: 'AWS', totalSavings: 100 }),
    ];

    expect(regionalCostEfficiency(facts)).toEqual([
      {
        region: 'us-east-1',
        provider: 'AWS',
        clusterCount: 2,
        avgCostPerCluster: 2000,
        totalSavings: 6000,
        bubbleRadius: 6,
      },
      {
        region: 'europe-west1',
        provider: 'GCP',
        clusterCount: 1,
        avgCostPerCluster: 800,
        totalSavings: 500,
        bubbleRadius: 5,
      },
    ]);
    expect(regionalCostEfficiency(facts, { provider: 'GCP' }).map((r) => r.region)).toEqual([
      'europe-west1',
    ]);
  });
});

describe('currentVsOptimal', () => {
  it('lists the largest savers with both totals', () => {
    const facts = [
      fact({ mcUid: 'a', name: 'n', totalSavings: 100, currentTotal: 500, optimalTotal: 400 }),
      fact({ mcUid: 'b', totalSavings: 300, currentTotal: 1000, optimalTotal: 700 }),
      fact({ mcUid: 'c', totalSavings: -5, currentTotal: 100, optimalTotal: 105 }),
    ];

    expect(currentVsOptimal(facts, 2)).toEqual([
      { mcUid: 'b', name: null, currentPrice: 1000, optimalPrice: 700, savings: 300 },
      { mcUid: 'a', name: 'n', currentPrice: 500, optimalPrice: 400, savings: 100 },
    ]);
  });
});

describe('costByComponent', () => {
  const one = [{ infra: {}, totalPrice: 1 }];
  const facts = [
    fact({ provider: 'AWS', version: '7.4', currentInstance: 300, currentStorage: 50, currentSingles: one }),
    fact({ provider: 'GCP', version: '7.2', currentInstance: 1000, currentStorage: 0, currentSingles: one }),
    fact({ provider: 'AWS', version: '7.2', currentInstance: 100, currentStorage: 20, currentSingles: one }),
    fact({ provider: null, currentInstance: 5000, currentSingles: one }),
    fact({ provider: 'AWS', currentInstance: 7000 }),
  ];

  it('sums current instance and storage spend per provider', () => {
    expect(costByComponent(facts)).toEqual([
      { provider: 'GCP', instanceCost: 1000, storageCost: 0, totalCost: 1000 },
      { provider: 'AWS', instanceCost: 400, storageCost: 70, totalCost: 470 },
    ]);
  });

  it('narrows by version', () => {
    expect(costByComponent(facts, '7.2')).toEqual([
      { provider: 'GCP', instanceCost: 1000, storageCost: 0, totalCost: 1000 },
      { provider: 'AWS', instanceCost: 100, storageCost: 20, totalCost: 120 },
    ]);
  });
});

describe('versionAgeAnalysis', () => {
  it('needs both a version and a creation date', () => {
    const facts = [
      fact({
        mcUid: 'mc-1',
        name: 'orders',
        version: '7.4',
        creationDate: '2025-12-01',
        totalSavings: 250,
        savingsPercent: 25,
        provider: 'AWS',
        region: 'us-east-1',
      }),
      fact({ mcUid: 'mc-2', creationDate: '2025-12-01', totalSavings: 10 }),
      fact({ mcUid: 'mc-3', version: '6.2', totalSavings: 10 }),
    ];

    expect(versionAgeAnalysis(facts, NOW)).toEqual([
      {
        mcUid: 'mc-1',
        name: 'orders',
        version: '7.4',
        ageDays: 31,
        savings: 250,
        savingsPercent: 25,
        bubbleRadius: 2.5,
        provider: 'AWS',
        region: 'us-east-1',
      },
    ]);
  });
});

describe('shardCountDistribution', () => {
  it('returns every bucket with average savings and utilization', () => {
    const facts = [
      fact({ shardsCount: 4, maxShardsCount: 8, totalSavings: 100 }),
      fact({ shardsCount: 10, maxShardsCount: 0, totalSavings: 300 }),
      fact({ shardsCount: 60, maxShardsCount: 100, totalSavings: 50 }),
      fact({ shardsCount: null, totalSavings: 999 }),
      fact({ shardsCount: 250, totalSavings: 10 }),
    ];

    expect(shardCountDistribution(facts)).toEqual([
      { label: '1-10', count: 2, avgSavings: 200, avgUtilization: 50 },
      { label: '11-50', count: 0, avgSavings: 0, avgUtilization: 0 },
      { label: '51-100', count: 1, avgSavings: 50, avgUtilization: 60 },
      { label: '101-200', count: 0, avgSavings: 0, avgUtilization: 0 },
      { label: '200+', count: 1, avgSavings: 10, avgUtilization: 0 },
    ]);
  });
});
