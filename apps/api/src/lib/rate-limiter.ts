import Bottleneck from 'bottleneck';

/** The part of a limiter callers depend on. */
export type CallThrottle = {
  schedule<R>(fn: () => PromiseLike<R>): Promise<R>;
};

/**
 * One job at a time, consecutive job starts at least `1000 / callsPerSecond` ms apart.
 * Bottleneck queues concurrent callers, so the spacing holds under a worker pool too.
 */
export function createThrottle(callsPerSecond: number): Bottleneck {
  if (!Number.isFinite(callsPerSecond) || callsPerSecond <= 0) {
    throw new Error(`callsPerSecond must be a positive number, got ${callsPerSecond}`);
  }
  return new Bottleneck({
    maxConcurrent: 1,
    minTime: Math.ceil(1000 / callsPerSecond),
  });
}
