import { z } from 'zod/v4';

const Money = z.number();
const RunScoped = { runId: z.coerce.number().int().positive().optional() };

export const RunScopedQuerySchema = z.object(RunScoped);

export const TrendQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(30),
});

export const TopQuerySchema = z.object({
  ...RunScoped,
  limit: z.coerce.number().int().positive().max(10_000).optional(),
});

export const DistributionQuerySchema = z.object({
  ...RunScoped,
  minSavings: z.coerce.number().nonnegative().optional(),
  minPercent: z.coerce.number().nonnegative().optional(),
  provider: z.string().min(1).optional(),
  version: z.string().min(1).optional(),
});

export const PriorityQuerySchema = DistributionQuerySchema.extend({
  limit: z.coerce.number().int().positive().max(500).default(10),
});

export const RunLimitQuerySchema = z.object({
  ...RunScoped,
  limit: z.coerce.number().int().positive().max(500).default(10),
});

export const ComponentQuerySchema = z.object({
  ...RunScoped,
  version: z.string().min(1).optional(),
});

export const CompareQuerySchema = z.object({
  runIds: z
    .string()
    .min(1)
    .transform((s) =>
      s
        .split(',')
        .map((x) => x.trim())
        .filter(Boolean)
        .map(Number)
    )
    .pipe(z.array(z.number().int().positive()).min(1).max(50)),
});

export const TrendPointSchema = z.object({
  runId: z.number().int(),
  timestamp: z.date(),
  label: z.string().nullable(),
  totalCurrent: Money,
  totalOptimal: Money,
  totalSavings: Money,
  savingsPercent: z.number(),
});

export const OpportunitySchema = z.object({
  mcUid: z.string(),
  currentPrice: Money,
  optimalPrice: Money,
  savings: Money,
  savingsPercent: z.number(),
  provider: z.string().nullable(),
  engineVersion: z.string().nullable(),
  name: z.string().nullable(),
  region: z.string().nullable(),
  creationDate: z.string().nullable(),
});

export const RunSummarySchema = z.object({
  runId: z.number().int(),
  timestamp: z.date(),
  label: z.string().nullable(),
  clusterCount: z.number().int(),
  clustersWithSavings: z.number().int(),
  totalCurrent: Money,
  totalOptimal: Money,
  totalSavings: Money,
  savingsPercent: z.number(),
  avgSavings: Money,
  medianSavings: Money,
  highImpactCount: z.number().int(),
  optimizationRate: z.number(),
  storageSavings: Money,
  costEfficiency: z.number(),
  previousRunId: z.number().int().nullable(),
  savingsChange: Money.nullable(),
  savingsChangePercent: z.number().nullable(),
});

export const DistributionBucketSchema = z.object({
  label: z.string(),
  min: z.number(),
  max: z.number().nullable(),
  count: z.number().int(),
  totalSavings: Money,
});

export const AgeBucketSchema = z.object({
  label: z.string(),
  count: z.number().int(),
  totalSavings: Money,
});

export const SavingsBreakdownSchema = z.object({
  instanceSavings: Money,
  storageSavings: Money,
  totalSavings: Money,
  instancePercent: z.number(),
  storagePercent: z.number(),
});

export const GroupTotalsSchema = z.object({
  key: z.string(),
  clusterCount: z.number().int(),
  totalCurrent: Money,
  totalOptimal: Money,
  totalSavings: Money,
  avgSavings: Money,
});

export const ShardBoxSchema = z.object({
  bucket: z.string(),
  count: z.number().int(),
  min: Money,
  q1: Money,
  median: Money,
  q3: Money,
  max: Money,
});

export const VelocityPointSchema = z.object({
  runId: z.number().int(),
  timestamp: z.date(),
  label: z.string().nullable(),
  totalSavings: Money,
  delta: Money,
});

export const OptimizationRatePointSchema = z.object({
  runId: z.number().int(),
  timestamp: z.date(),
  label: z.string().nullable(),
  optimizedCount: z.number().int(),
  totalCount: z.number().int(),
  rate: z.number(),
});

export const PriorityLevelSchema = z.enum(['high', 'medium', 'low']);

export const PriorityScoreSchema = z.object({
  mcUid: z.string(),
  name: z.string().nullable(),
  provider: z.string().nullable(),
  savings: Money,
  savingsPercent: z.number(),
  currentPrice: Money,
  ageYears: z.number().nullable(),
  score: z.number(),
  priority: PriorityLevelSchema,
});

export const FilterOptionsSchema = z.object({
  providers: z.array(z.string()),
  versions: z.array(z.string()),
});

export const ScatterPointSchema = z.object({
  mcUid: z.string(),
  label: z.string(),
  x: z.number(),
  y: Money,
  savingsPercent: z.number(),
  provider: z.string().nullable(),
  version: z.string().nullable(),
});

export const CorrelationSchema = z.object({
  coefficient: z.number().nullable(),
  points: z.array(ScatterPointSchema),
});

export const StorageTypeGroupSchema = z.object({
  storageType: z.string(),
  clusterCount: z.number().int(),
  avgSavings: Money,
});

export const RegionEfficiencySchema = z.object({
  region: z.string(),
  provider: z.string(),
  clusterCount: z.number().int(),
  avgCostPerCluster: Money,
  totalSavings: Money,
  bubbleRadius: z.number(),
});

export const PriceComparisonSchema = z.object({
  mcUid: z.string(),
  name: z.string().nullable(),
  currentPrice: Money,
  optimalPrice: Money,
  savings: Money,
});

export const ComponentCostSchema = z.object({
  provider: z.string(),
  instanceCost: Money,
  storageCost: Money,
  totalCost: Money,
});

export const VersionAgePointSchema = z.object({
  mcUid: z.string(),
  name: z.string().nullable(),
  version: z.string(),
  ageDays: z.number().int(),
  savings: Money,
  savingsPercent: z.number(),
  bubbleRadius: z.number(),
  provider: z.string().nullable(),
  region: z.string().nullable(),
});

export const ShardCountBucketSchema = z.object({
  label: z.string(),
  count: z.number().int(),
  avgSavings: Money,
  avgUtilization: z.number(),
});

export const TrendResponseSchema = z.array(TrendPointSchema);
export const TopResponseSchema = z.array(OpportunitySchema);
export const DistributionResponseSchema = z.array(DistributionBucketSchema);
export const AgeDistributionResponseSchema = z.array(AgeBucketSchema);
export const GroupTotalsResponseSchema = z.array(GroupTotalsSchema);
export const ShardBoxResponseSchema = z.array(ShardBoxSchema);
export const VelocityResponseSchema = z.array(VelocityPointSchema);
export const OptimizationRateResponseSchema = z.array(OptimizationRatePointSchema);
export const PriorityResponseSchema = z.array(PriorityScoreSchema);
export const StorageTypeResponseSchema = z.array(StorageTypeGroupSchema);
export const RegionEfficiencyResponseSchema = z.array(RegionEfficiencySchema);
export const PriceComparisonResponseSchema = z.array(PriceComparisonSchema);
export const ComponentCostResponseSchema = z.array(ComponentCostSchema);
export const VersionAgeResponseSchema = z.array(VersionAgePointSchema);
export const ShardCountResponseSchema = z.array(ShardCountBucketSchema);
