import { HistoryQuerySchema, HistoryResponseSchema, McUidParamSchema } from '@aa-savings/types';
import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { history } from '../services/queries.js';

export default function clustersRoutes(app: FastifyInstance) {
  const r = app.withTypeProvider<ZodTypeProvider>();

  // GET /v1/clusters/:mcUid/history?limit=10
  r.get(
    '/:mcUid/history',
    {
      schema: {
        params: McUidParamSchema,
        querystring: HistoryQuerySchema,
        response: { 200: HistoryResponseSchema },
      },
    },
    async (req) => history(app.db, req.params.mcUid, req.query.limit)
  );
}
