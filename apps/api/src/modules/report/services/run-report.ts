import type { RunStats } from '@aa-savings/types';
import { setLastRunNow, startReportTimer } from '../../../lib/metrics.js';
import type { MultiClusterRef } from '../../clusters/client.js';
import { roundMoney } from '../../clusters/values.js';
import { RunNotFoundError, RunStateError } from '../../results/errors.js';
import { processMultiCluster, type ReportDeps, type UnitOutcome } from './process-multi-cluster.js';

export type RunReportOptions = {
  /** Resume this run instead of opening a new one. */
  runId?: number;
  label?: string;
  artifactPath?: string | null;
  /** Process at most this many units (after exclusions). */
  limit?: number;
  excludeUids?: readonly string[];
  parallel?: boolean;
  maxWorkers?: number;
  now?: () => Date;
};

export type RunReportSummary = {
  runId: number;
  label: string | null;
  resumed: boolean;
  units: number;
  persisted: number;
  failed: number;
  skippedAlreadyDone: number;
  skippedInactive: number;
  /** Savings of the units persisted by this invocation. */
  totalSavings: number;
  stats: RunStats;
};

const pad = (n: number) => String(n).padStart(2, '0');

/** `run_YYYYMMDD_HHMMSS` in UTC. */
export function defaultRunLabel(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `run_${date}_${time}`;
}

export function selectUnits(
  refs: readonly MultiClusterRef[],
  excludeUids: readonly string[] = [],
  limit?: number
): MultiClusterRef[] {
  const excluded = new Set(excludeUids);
  const kept = refs.filter((r) => !excluded.has(r.uid));
  return limit === undefined ? kept : kept.slice(0, limit);
}

async function processAll(
  units: readonly MultiClusterRef[],
  concurrency: number,
  handle: (unit: MultiClusterRef) => Promise<UnitOutcome>
): Promise<UnitOutcome[]> {
  const outcomes: UnitOutcome[] = [];
  let nextIndex = 0;

  async function worker() {
    while (true) {
      const i = nextIndex++;
      const unit = units[i];
      if (!unit) break;
      outcomes[i] = await handle(unit);
    }
  }

  const workers = Array.from({ length: Math.max(1, concurrency) }, () => worker());
  await Promise.all(workers);
  return outcomes;
}

/**
 * Collects every listed unit into a run and finalizes it. A resumed run skips units
 * that already succeeded; a completed run cannot be resumed.
 */
export async function runReport(
  deps: ReportDeps,
  opts: RunReportOptions = {}
): Promise<RunReportSummary> {
  const endTimer = startReportTimer();
  const now = opts.now ?? (() => new Date());

  const units = selectUnits(await deps.api.listMultiClusters(), opts.excludeUids, opts.limit);

  let runId: number;
  let label: string | null;
  const resumed = opts.runId !== undefined;
  if (opts.runId !== undefined) {
    const run = await deps.store.getRun(opts.runId);
    if (!run) throw new RunNotFoundError(opts.runId);
    if (run.status === 'completed') {
      throw new RunStateError(
        `Run ${run.runId} is already completed and cannot be resumed`,
        run.runId
      );
    }
    runId = run.runId;
    label = run.label;
  } else {
    label = opts.label ?? defaultRunLabel(now());
    runId = await deps.store.beginRun(label, units.length);
  }

  const log = deps.log.child({ runId });
  const concurrency = opts.parallel ? (opts.maxWorkers ?? 1) : 1;
  log.info({ units: units.length, resumed, concurrency }, 'report run started');

  const outcomes = await processAll(units, concurrency, (unit) =>
    processMultiCluster({ ...deps, log }, runId, unit.uid)
  );

  const stats = await deps.store.finalizeRun(runId, opts.artifactPath ?? null);
  endTimer();
  setLastRunNow();

  const summary: RunReportSummary = {
    runId,
    label,
    resumed,
    units: units.length,
    persisted: 0,
    failed: 0,
    skippedAlreadyDone: 0,
    skippedInactive: 0,
    totalSavings: 0,
    stats,
  };
  for (const o of outcomes) {
    switch (o.outcome) {
      case 'persisted':
        summary.persisted += 1;
        summary.totalSavings += o.savings.totalSavings;
        break;
      case 'failed':
        summary.failed += 1;
        break;
      case 'skipped_already_done':
        summary.skippedAlreadyDone += 1;
        break;
      case 'skipped_inactive':
        summary.skippedInactive += 1;
        break;
    }
  }
  summary.totalSavings = roundMoney(summary.totalSavings);

  log.info(summary, 'report run finalized');
  return summary;
}
