import { errorMessage } from '../../../lib/errors.js';
import type { Logger } from '../../../lib/logger.js';
import { type ClusterOutcomeLabel, recordOutcome } from '../../../lib/metrics.js';
import { toMultiCluster } from '../../clusters/blueprint.js';
import type { ClusterApi } from '../../clusters/client.js';
import { extractClusterMetadata } from '../../clusters/metadata.js';
import { pairClusters } from '../../clusters/pairing.js';
import type { ResultStore, SavingsFigures } from '../../results/services/store.js';

/** Status the management API reports for a unit that can be planned. */
export const READY_STATUS = 'done';

export type ReportDeps = {
  api: ClusterApi;
  store: ResultStore;
  log: Logger;
};

export type UnitOutcome =
  | { mcUid: string; outcome: 'skipped_already_done' }
  | { mcUid: string; outcome: 'skipped_inactive'; status: string }
  | { mcUid: string; outcome: 'persisted'; savings: SavingsFigures }
  | { mcUid: string; outcome: 'failed'; error: string };

function done<T extends { outcome: ClusterOutcomeLabel }>(result: T): T {
  recordOutcome(result.outcome);
  return result;
}

/**
 * Handles one multi-cluster unit end to end. Anything that goes wrong between the resume
 * check and the final write is recorded as a failed result; only a failing store write
 * of that failure escapes.
 */
export async function processMultiCluster(
  deps: ReportDeps,
  runId: number,
  mcUid: string
): Promise<UnitOutcome> {
  const log = deps.log.child({ runId, mcUid });

  try {
    if (await deps.store.isAlreadyProcessed(runId, mcUid)) {
      log.debug('already processed in this run, skipping');
      return done({ mcUid, outcome: 'skipped_already_done' });
    }

    const status = await deps.api.getMultiClusterStatus(mcUid);
    if (status !== READY_STATUS) {
      log.info({ status }, 'multi-cluster not ready, skipping');
      return done({ mcUid, outcome: 'skipped_inactive', status });
    }

    const blueprint = await deps.api.getMultiClusterBlueprint(mcUid);
    await deps.store.upsertMetadata(mcUid, extractClusterMetadata(blueprint));
    const current = toMultiCluster(mcUid, blueprint);

    const plan = await deps.api.planOptimalMultiCluster(mcUid);
    const optimal = toMultiCluster(mcUid, plan);

    const savings = await deps.store.saveSuccess(runId, pairClusters(current, optimal));
    log.info(savings, 'multi-cluster persisted');
    return done({ mcUid, outcome: 'persisted', savings });
  } catch (err) {
    const error = errorMessage(err);
    log.error({ err }, 'multi-cluster failed');
    await deps.store.saveFailure(runId, mcUid, error);
    return done({ mcUid, outcome: 'failed', error });
  }
}
