import { HealthSchema } from '@aa-savings/types';
import type { FastifyInstance } from 'fastify';
import { checkHealth } from './services.js';

export default function healthRoutes(app: FastifyInstance) {
  app.get(
    '/healthz',
    { schema: { response: { 200: HealthSchema, 503: HealthSchema } } },
    async (req, reply) => {
      const report = await checkHealth(app.db, req.log);
      reply.header('cache-control', 'no-store');
      return reply.code(report.ok ? 200 : 503).send(report);
    }
  );

  app.head('/healthz', async (req, reply) => {
    const report = await checkHealth(app.db, req.log);
    reply.header('cache-control', 'no-store');
    return reply.code(report.ok ? 200 : 503).send();
  });
}
