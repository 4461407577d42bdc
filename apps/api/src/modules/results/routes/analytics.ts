import {
  AgeDistributionResponseSchema,
  CompareQuerySchema,
  ComponentCostResponseSchema,
  ComponentQuerySchema,
  CorrelationSchema,
  DistributionQuerySchema,
  DistributionResponseSchema,
  FilterOptionsSchema,
  GroupTotalsResponseSchema,
  OptimizationRateResponseSchema,
  PriorityQuerySchema,
  PriceComparisonResponseSchema,
  PriorityResponseSchema,
  RegionEfficiencyResponseSchema,
  RunLimitQuerySchema,
  RunScopedQuerySchema,
  RunSummarySchema,
  SavingsBreakdownSchema,
  ShardBoxResponseSchema,
  ShardCountResponseSchema,
  StorageTypeResponseSchema,
  TopQuerySchema,
  TopResponseSchema,
  TrendQuerySchema,
  TrendResponseSchema,
  VelocityResponseSchema,
  VersionAgeResponseSchema,
} from '@aa-savings/types';
import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { RunNotFoundError } from '../errors.js';
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
} from '../services/analytics.js';
import {
  optimizationRateTrend,
  runComparison,
  savingsTrend,
  savingsVelocity,
  topOpportunities,
} from '../services/queries.js';

export type AnalyticsRouteOptions = {
  /** Reference time for age-based figures. */
  now?: () => Date;
};

/**
 * Read-only dashboard queries. Run-scoped endpoints default to the latest completed run
 * and answer empty figures when there is none.
 */
export default function analyticsRoutes(app: FastifyInstance, opts: AnalyticsRouteOptions) {
  const r = app.withTypeProvider<ZodTypeProvider>();
  const now = opts.now ?? (() => new Date());

  r.get(
    '/summary',
    { schema: { querystring: RunScopedQuerySchema, response: { 200: RunSummarySchema } } },
    async (req) => {
      const summary = await runSummary(app.db, req.query.runId);
      if (summary) return summary;
      if (req.query.runId !== undefined) throw new RunNotFoundError(req.query.runId);
      throw app.httpErrors.notFound('No completed run yet');
    }
  );

  r.get(
    '/trend',
    { schema: { querystring: TrendQuerySchema, response: { 200: TrendResponseSchema } } },
    async (req) => savingsTrend(app.db, req.query.limit)
  );

  r.get(
    '/top',
    { schema: { querystring: TopQuerySchema, response: { 200: TopResponseSchema } } },
    async (req) => topOpportunities(app.db, req.query.runId, req.query.limit)
  );

  r.get(
    '/distribution',
    { schema: { querystring: DistributionQuerySchema, response: { 200: DistributionResponseSchema } } },
    async (req) => {
      const { runId, ...filters } = req.query;
      return savingsDistribution(app.db, runId, filters);
    }
  );

  r.get(
    '/age',
    {
      schema: { querystring: DistributionQuerySchema, response: { 200: AgeDistributionResponseSchema } },
    },
    async (req) => {
      const { runId, ...filters } = req.query;
      return ageDistribution(app.db, runId, filters, now);
    }
  );

  r.get(
    '/breakdown',
    { schema: { querystring: RunScopedQuerySchema, response: { 200: SavingsBreakdownSchema } } },
    async (req) => savingsBreakdown(app.db, req.query.runId)
  );

  r.get(
    '/components',
    { schema: { querystring: ComponentQuerySchema, response: { 200: ComponentCostResponseSchema } } },
    async (req) => costByComponent(app.db, req.query.runId, req.query.version)
  );

  r.get(
    '/current-vs-optimal',
    {
      schema: { querystring: RunLimitQuerySchema, response: { 200: PriceComparisonResponseSchema } },
    },
    async (req) => currentVsOptimal(app.db, req.query.runId, req.query.limit)
  );

  r.get(
    '/providers',
    { schema: { querystring: DistributionQuerySchema, response: { 200: GroupTotalsResponseSchema } } },
    async (req) => {
      const { runId, ...filters } = req.query;
      return providerComparison(app.db, runId, filters);
    }
  );

  r.get(
    '/versions',
    { schema: { querystring: DistributionQuerySchema, response: { 200: GroupTotalsResponseSchema } } },
    async (req) => {
      const { runId, ...filters } = req.query;
      return versionAnalysis(app.db, runId, filters);
    }
  );

  r.get(
    '/shards',
    { schema: { querystring: DistributionQuerySchema, response: { 200: ShardBoxResponseSchema } } },
    async (req) => {
      const { runId, ...filters } = req.query;
      return shardCostBoxPlot(app.db, runId, filters);
    }
  );

  r.get(
    '/shard-counts',
    { schema: { querystring: DistributionQuerySchema, response: { 200: ShardCountResponseSchema } } },
    async (req) => {
      const { runId, ...filters } = req.query;
      return shardCountDistribution(app.db, runId, filters);
    }
  );

  r.get(
    '/storage-types',
    { schema: { querystring: DistributionQuerySchema, response: { 200: StorageTypeResponseSchema } } },
    async (req) => {
      const { runId, ...filters } = req.query;
      return storageTypeDistribution(app.db, runId, filters);
    }
  );

  r.get(
    '/regions',
    {
      schema: { querystring: DistributionQuerySchema, response: { 200: RegionEfficiencyResponseSchema } },
    },
    async (req) => {
      const { runId, ...filters } = req.query;
      return regionalCostEfficiency(app.db, runId, filters);
    }
  );

  r.get(
    '/version-age',
    { schema: { querystring: DistributionQuerySchema, response: { 200: VersionAgeResponseSchema } } },
    async (req) => {
      const { runId, ...filters } = req.query;
      return versionAgeAnalysis(app.db, runId, filters, now);
    }
  );

  r.get(
    '/correlations/age',
    { schema: { querystring: DistributionQuerySchema, response: { 200: CorrelationSchema } } },
    async (req) => {
      const { runId, ...filters } = req.query;
      return ageSavingsCorrelation(app.db, runId, filters, now);
    }
  );

  r.get(
    '/correlations/size',
    { schema: { querystring: RunScopedQuerySchema, response: { 200: CorrelationSchema } } },
    async (req) => sizeSavingsCorrelation(app.db, req.query.runId)
  );

  r.get(
    '/velocity',
    { schema: { querystring: TrendQuerySchema, response: { 200: VelocityResponseSchema } } },
    async (req) => savingsVelocity(app.db, req.query.limit)
  );

  r.get(
    '/optimization-rate',
    { schema: { querystring: TrendQuerySchema, response: { 200: OptimizationRateResponseSchema } } },
    async (req) => optimizationRateTrend(app.db, req.query.limit)
  );

  r.get(
    '/priority',
    { schema: { querystring: PriorityQuerySchema, response: { 200: PriorityResponseSchema } } },
    async (req) => {
      const { runId, limit, ...filters } = req.query;
      return priorityScores(app.db, runId, limit, filters, now);
    }
  );

  r.get(
    '/filters',
    { schema: { querystring: RunScopedQuerySchema, response: { 200: FilterOptionsSchema } } },
    async (req) => filterOptions(app.db, req.query.runId)
  );

  // GET /v1/analytics/compare?runIds=3,5,8
  r.get(
    '/compare',
    { schema: { querystring: CompareQuerySchema, response: { 200: TrendResponseSchema } } },
    async (req) => runComparison(app.db, req.query.runIds)
  );
}
