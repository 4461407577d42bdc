import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { httpRequestDuration, httpRequests, registry } from '../../lib/metrics.js';

function routeLabel(req: FastifyRequest) {
  return req.routeOptions.url ?? 'unmatched';
}

export default fp(async (app: FastifyInstance) => {
  app.addHook('onRequest', async (req) => {
    req._prom_end = httpRequestDuration.startTimer();
  });

  app.addHook('onResponse', async (req, reply) => {
    const method = req.method;
    const route = routeLabel(req);
    const status_code = String(reply.statusCode);

    httpRequests.inc({ method, route, status_code });
    req._prom_end?.({ method, route, status_code });
  });

  app.get('/metrics', async (_req, reply) => {
    reply.header('Content-Type', registry.contentType);
    return registry.metrics();
  });
});
