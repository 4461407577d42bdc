import { createDb, type Database } from '@aa-savings/db';
import { HttpClusterApi } from '../../modules/clusters/client.js';
import { RateLimitedClusterApi } from '../../modules/clusters/rate-limited-client.js';
import type { ReportEnv } from '../env.js';
import type { Logger } from '../logger.js';
import { createThrottle } from '../rate-limiter.js';

export type Command = (args: string[]) => Promise<void>;

/** Opens a pool for the duration of `work` and always closes it. */
export async function withDatabase<T>(
  databaseUrl: string,
  work: (db: Database) => Promise<T>
): Promise<T> {
  const handle = createDb(databaseUrl);
  try {
    return await work(handle.db);
  } finally {
    await handle.close();
  }
}

/** The collaborator client as the report driver uses it: throttled, with retries. */
export function buildClusterApi(env: ReportEnv, log: Logger): RateLimitedClusterApi {
  const http = new HttpClusterApi({
    baseUrl: env.clusterApi.baseUrl,
    username: env.clusterApi.username,
    password: env.clusterApi.password,
    timeoutMs: env.clusterApi.timeoutMs,
  });
  return new RateLimitedClusterApi(
    http,
    createThrottle(env.clusterApi.callsPerSecond),
    env.retry,
    log
  );
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
