import type { Logger } from '../../lib/logger.js';
import { clusterApiRetries } from '../../lib/metrics.js';
import type { CallThrottle } from '../../lib/rate-limiter.js';
import { type RetryPolicy, withRetry } from '../../lib/retry.js';
import { errorMessage } from '../../lib/errors.js';
import type { ClusterApi, MultiClusterRef } from './client.js';

type Operation = keyof ClusterApi;

/**
 * Decorates a ClusterApi with the collector's call policy: every attempt waits
 * for the throttle, failed attempts are retried with exponential backoff.
 */
export class RateLimitedClusterApi implements ClusterApi {
  constructor(
    private readonly inner: ClusterApi,
    private readonly throttle: CallThrottle,
    private readonly retry: RetryPolicy,
    private readonly log: Logger,
    private readonly sleep?: (ms: number) => Promise<void>
  ) {}

  listMultiClusters(): Promise<MultiClusterRef[]> {
    return this.call('listMultiClusters', null, () => this.inner.listMultiClusters());
  }

  getMultiClusterStatus(mcUid: string): Promise<string> {
    return this.call('getMultiClusterStatus', mcUid, () => this.inner.getMultiClusterStatus(mcUid));
  }

  getMultiClusterBlueprint(mcUid: string): Promise<unknown> {
    return this.call('getMultiClusterBlueprint', mcUid, () =>
      this.inner.getMultiClusterBlueprint(mcUid)
    );
  }

  planOptimalMultiCluster(mcUid: string): Promise<unknown> {
    return this.call('planOptimalMultiCluster', mcUid, () =>
      this.inner.planOptimalMultiCluster(mcUid)
    );
  }

  private call<T>(operation: Operation, mcUid: string | null, fn: () => Promise<T>): Promise<T> {
    return withRetry(() => this.throttle.schedule(fn), {
      ...this.retry,
      sleep: this.sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        clusterApiRetries.inc({ operation });
        this.log.warn(
          { operation, mcUid, attempt, maxTries: this.retry.maxTries, delayMs, err: errorMessage(error) },
          'cluster api call failed, retrying'
        );
      },
    });
  }
}
