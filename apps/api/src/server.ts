import type { Database } from '@aa-savings/db';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import sensible from '@fastify/sensible';
import Fastify, { type FastifyServerOptions } from 'fastify';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import healthRoutes from './modules/health/routes.js';
import analyticsRoutes from './modules/results/routes/analytics.js';
import clustersRoutes from './modules/results/routes/clusters.js';
import runsRoutes from './modules/results/routes/runs.js';
import errorHandler from './plugins/error-handler.js';
import metricsHttp from './plugins/prometheus/metrics-http.js';

export type BuildServerOptions = {
  db: Database;
  logger?: FastifyServerOptions['logger'];
  /** Browser origin allowed by CORS; none when null. */
  webOrigin?: string | null;
  now?: () => Date;
};

export async function buildServer(opts: BuildServerOptions) {
  const app = Fastify({
    logger: opts.logger ?? true,
    trustProxy: true,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.decorate('db', opts.db);

  await app.register(helmet, { contentSecurityPolicy: false });
  await app.register(cors, {
    origin: opts.webOrigin ? [opts.webOrigin] : false,
    methods: ['GET', 'HEAD', 'OPTIONS'],
    maxAge: 600,
    credentials: false,
  });
  await app.register(sensible);
  await app.register(errorHandler);
  await app.register(metricsHttp);

  await app.register(healthRoutes); // /healthz

  await app.register(runsRoutes, { prefix: '/v1/runs' });
  await app.register(clustersRoutes, { prefix: '/v1/clusters' });
  await app.register(analyticsRoutes, { prefix: '/v1/analytics', now: opts.now });

  return app;
}
