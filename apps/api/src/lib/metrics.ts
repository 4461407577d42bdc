import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry, prefix: 'aa_savings_' });

export type ClusterOutcomeLabel =
  | 'persisted'
  | 'failed'
  | 'skipped_already_done'
  | 'skipped_inactive';

export const clusterOutcomes = new Counter({
  name: 'aa_savings_cluster_outcomes_total',
  help: 'Multi-cluster units handled by the report driver, by outcome.',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const clusterApiRetries = new Counter({
  name: 'aa_savings_cluster_api_retries_total',
  help: 'Retried calls to the cluster management API.',
  labelNames: ['operation'] as const,
  registers: [registry],
});

export const reportDuration = new Histogram({
  name: 'aa_savings_report_duration_seconds',
  help: 'Wall time of a report run.',
  buckets: [1, 5, 15, 60, 300, 900, 1800, 3600, 7200],
  registers: [registry],
});

export const reportLastRun = new Gauge({
  name: 'aa_savings_report_last_run_timestamp',
  help: 'UNIX timestamp (seconds) of the last finalized report run.',
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'aa_savings_http_request_duration_seconds',
  help: 'HTTP request duration (seconds)',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export const httpRequests = new Counter({
  name: 'aa_savings_http_requests_total',
  help: 'HTTP requests count',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export function recordOutcome(outcome: ClusterOutcomeLabel) {
  clusterOutcomes.inc({ outcome });
}

export function startReportTimer() {
  const end = reportDuration.startTimer();
  return () => end();
}

export function setLastRunNow() {
  reportLastRun.set(Date.now() / 1000);
}
