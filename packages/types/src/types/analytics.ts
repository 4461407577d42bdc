import { z } from 'zod/v4';
import {
  AgeBucketSchema,
  CompareQuerySchema,
  ComponentCostSchema,
  ComponentQuerySchema,
  CorrelationSchema,
  DistributionBucketSchema,
  DistributionQuerySchema,
  FilterOptionsSchema,
  GroupTotalsSchema,
  OpportunitySchema,
  OptimizationRatePointSchema,
  PriceComparisonSchema,
  PriorityLevelSchema,
  PriorityQuerySchema,
  PriorityScoreSchema,
  RegionEfficiencySchema,
  RunLimitQuerySchema,
  RunScopedQuerySchema,
  RunSummarySchema,
  SavingsBreakdownSchema,
  ScatterPointSchema,
  ShardBoxSchema,
  ShardCountBucketSchema,
  StorageTypeGroupSchema,
  TopQuerySchema,
  TrendPointSchema,
  TrendQuerySchema,
  VelocityPointSchema,
  VersionAgePointSchema,
} from '../schemas/analytics.js';

export type RunScopedQuery = z.infer<typeof RunScopedQuerySchema>;
export type TrendQuery = z.infer<typeof TrendQuerySchema>;
export type TopQuery = z.infer<typeof TopQuerySchema>;
export type DistributionQuery = z.infer<typeof DistributionQuerySchema>;
export type PriorityQuery = z.infer<typeof PriorityQuerySchema>;
export type CompareQuery = z.infer<typeof CompareQuerySchema>;
export type TrendPoint = z.infer<typeof TrendPointSchema>;
export type Opportunity = z.infer<typeof OpportunitySchema>;
export type RunSummary = z.infer<typeof RunSummarySchema>;
export type DistributionBucket = z.infer<typeof DistributionBucketSchema>;
export type AgeBucket = z.infer<typeof AgeBucketSchema>;
export type SavingsBreakdown = z.infer<typeof SavingsBreakdownSchema>;
export type GroupTotals = z.infer<typeof GroupTotalsSchema>;
export type ShardBox = z.infer<typeof ShardBoxSchema>;
export type VelocityPoint = z.infer<typeof VelocityPointSchema>;
export type OptimizationRatePoint = z.infer<typeof OptimizationRatePointSchema>;
export type PriorityLevel = z.infer<typeof PriorityLevelSchema>;
export type PriorityScore = z.infer<typeof PriorityScoreSchema>;
export type FilterOptions = z.infer<typeof FilterOptionsSchema>;
export type RunLimitQuery = z.infer<typeof RunLimitQuerySchema>;
export type ComponentQuery = z.infer<typeof ComponentQuerySchema>;
export type ScatterPoint = z.infer<typeof ScatterPointSchema>;
export type Correlation = z.infer<typeof CorrelationSchema>;
export type StorageTypeGroup = z.infer<typeof StorageTypeGroupSchema>;
export type RegionEfficiency = z.infer<typeof RegionEfficiencySchema>;
export type PriceComparison = z.infer<typeof PriceComparisonSchema>;
export type ComponentCost = z.infer<typeof ComponentCostSchema>;
export type VersionAgePoint = z.infer<typeof VersionAgePointSchema>;
export type ShardCountBucket = z.infer<typeof ShardCountBucketSchema>;
