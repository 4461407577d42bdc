import type { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { errorResponseForStatus } from '../lib/errors.js';
import { RunNotFoundError } from '../modules/results/errors.js';

function statusOf(err: FastifyError): number {
  if (err instanceof RunNotFoundError) return 404;
  if (err.validation) return 400;
  const raw = err.statusCode ?? 500;
  return Number.isFinite(raw) && raw >= 400 && raw <= 599 ? raw : 500;
}

const plugin: FastifyPluginAsync = fp(async (app) => {
  app.setErrorHandler((err: FastifyError, req, reply) => {
    const status = statusOf(err);

    if (status >= 500) {
      req.log.error({ err }, 'request_error');
      return reply.status(status).send(errorResponseForStatus(status, 'Internal Server Error'));
    }

    const message =
      typeof err.message === 'string' && err.message ? err.message : 'Unexpected error';
    const details = err.validation?.map((v) => ({
      path: v.instancePath,
      message: v.message ?? 'invalid',
    }));

    return reply.status(status).send(errorResponseForStatus(status, message, details));
  });

  app.setNotFoundHandler((req, reply) => {
    reply.status(404).send(errorResponseForStatus(404, `Route ${req.method} ${req.url} not found`));
  });
});

export default plugin;
