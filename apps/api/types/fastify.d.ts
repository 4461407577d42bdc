import 'fastify';

import type { Database } from '@aa-savings/db';

declare module 'fastify' {
  interface FastifyInstance {
    // Decorated by buildServer
    db: Database;
  }

  interface FastifyRequest {
    // Prometheus HTTP timing helper (set by metrics plugin)
    _prom_end?: (labels?: Record<string, string>) => void;
  }
}
