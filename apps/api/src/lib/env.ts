export type ClusterApiEnv = {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs: number;
  callsPerSecond: number;
};

export type RetryEnv = {
  maxTries: number;
  delayMs: number;
  backoffFactor: number;
};

export type ReportEnv = {
  databaseUrl: string;
  clusterApi: ClusterApiEnv;
  retry: RetryEnv;
  parallel: boolean;
  maxWorkers: number;
  excludeUids: string[];
  logLevel: string;
};

export type ApiRuntimeEnv = {
  nodeEnv: string;
  databaseUrl: string;
  host: string;
  port: number;
  webOrigin: string | null;
  logLevel: string;
};

type Source = Record<string, string | undefined>;

function read(src: Source, name: string): string {
  return (src[name] ?? '').trim();
}

function parsePort(src: Source, name: string, fallback: number): number {
  const raw = read(src, name);
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
    throw new Error(`Invalid ${name}: expected integer port (1-65535), got "${raw}"`);
  }
  return parsed;
}

function parsePositive(
  src: Source,
  name: string,
  fallback: number,
  opts: { integer?: boolean } = {}
): number {
  const raw = read(src, name);
  if (!raw) return fallback;
  const parsed = Number(raw);
  const ok = Number.isFinite(parsed) && parsed > 0 && (!opts.integer || Number.isInteger(parsed));
  if (!ok) {
    const kind = opts.integer ? 'positive integer' : 'positive number';
    throw new Error(`Invalid ${name}: expected ${kind}, got "${raw}"`);
  }
  return parsed;
}

function parseList(src: Source, name: string): string[] {
  return read(src, name)
    .split(',')
    .map((x) => x.trim())
    .filter(Boolean);
}

/** Collector settings. Throws before any run exists when credentials are missing. */
export function validateReportEnv(src: Source = process.env): ReportEnv {
  const missing: string[] = [];
  for (const name of [
    'DATABASE_URL',
    'CLUSTER_API_URL',
    'CLUSTER_API_USERNAME',
    'CLUSTER_API_PASSWORD',
  ]) {
    if (!read(src, name)) missing.push(name);
  }
  if (missing.length > 0) {
    throw new Error(`Missing required report env vars: ${missing.join(', ')}`);
  }

  return {
    databaseUrl: read(src, 'DATABASE_URL'),
    clusterApi: {
      baseUrl: read(src, 'CLUSTER_API_URL').replace(/\/+$/, ''),
      username: read(src, 'CLUSTER_API_USERNAME'),
      password: read(src, 'CLUSTER_API_PASSWORD'),
      timeoutMs: parsePositive(src, 'CLUSTER_API_TIMEOUT_MS', 30_000, { integer: true }),
      callsPerSecond: parsePositive(src, 'CLUSTER_API_CALLS_PER_SECOND', 2),
    },
    retry: {
      maxTries: parsePositive(src, 'RETRY_MAX_TRIES', 3, { integer: true }),
      delayMs: parsePositive(src, 'RETRY_DELAY_MS', 5_000, { integer: true }),
      backoffFactor: parsePositive(src, 'RETRY_BACKOFF', 2),
    },
    parallel: read(src, 'REPORT_PARALLEL') === '1',
    maxWorkers: parsePositive(src, 'REPORT_MAX_WORKERS', 5, { integer: true }),
    excludeUids: parseList(src, 'REPORT_EXCLUDE_UIDS'),
    logLevel: read(src, 'LOG_LEVEL') || 'info',
  };
}

/** For commands that only read or write the store. */
export function validateDatabaseEnv(src: Source = process.env): { databaseUrl: string } {
  const databaseUrl = read(src, 'DATABASE_URL');
  if (!databaseUrl) throw new Error('Missing required env vars: DATABASE_URL');
  return { databaseUrl };
}

export function validateApiRuntimeEnv(src: Source = process.env): ApiRuntimeEnv {
  if (!read(src, 'DATABASE_URL')) {
    throw new Error('Missing required API env vars: DATABASE_URL');
  }

  return {
    nodeEnv: read(src, 'NODE_ENV') || 'development',
    databaseUrl: read(src, 'DATABASE_URL'),
    host: read(src, 'HOST') || '0.0.0.0',
    port: parsePort(src, 'PORT', 3001),
    webOrigin: read(src, 'WEB_ORIGIN') || null,
    logLevel: read(src, 'LOG_LEVEL') || 'info',
  };
}
