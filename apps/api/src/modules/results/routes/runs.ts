import {
  MultiClusterResultsResponseSchema,
  RunDetailResponseSchema,
  RunIdParamSchema,
  RunsListQuerySchema,
  RunsListResponseSchema,
} from '@aa-savings/types';
import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { RunNotFoundError } from '../errors.js';
import { ResultStore } from '../services/store.js';

export default function runsRoutes(app: FastifyInstance) {
  const r = app.withTypeProvider<ZodTypeProvider>();
  const store = new ResultStore(app.db);

  // GET /v1/runs?limit=20
  r.get(
    '/',
    { schema: { querystring: RunsListQuerySchema, response: { 200: RunsListResponseSchema } } },
    async (req) => store.listRuns(req.query.limit)
  );

  // GET /v1/runs/:runId
  r.get(
    '/:runId',
    { schema: { params: RunIdParamSchema, response: { 200: RunDetailResponseSchema } } },
    async (req) => {
      const run = await store.getRun(req.params.runId);
      if (!run) throw new RunNotFoundError(req.params.runId);
      return { run, stats: await store.countResults(run.runId) };
    }
  );

  // GET /v1/runs/:runId/results (successful units, with their pairs)
  r.get(
    '/:runId/results',
    {
      schema: { params: RunIdParamSchema, response: { 200: MultiClusterResultsResponseSchema } },
    },
    async (req) => {
      const run = await store.getRun(req.params.runId);
      if (!run) throw new RunNotFoundError(req.params.runId);
      return store.loadRunResults(run.runId);
    }
  );
}
