import { pino } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import type { CallThrottle } from '../../lib/rate-limiter.js';
import type { ClusterApi } from './client.js';
import { RateLimitedClusterApi } from './rate-limited-client.js';

const silent = pino({ level: 'silent' });

class CountingThrottle implements CallThrottle {
  scheduled = 0;

  async schedule<R>(fn: () => PromiseLike<R>): Promise<R> {
    this.scheduled += 1;
    return fn();
  }
}

function innerApi(overrides: Partial<ClusterApi> = {}): ClusterApi {
  return {
    listMultiClusters: vi.fn(async () => []),
    getMultiClusterStatus: vi.fn(async () => 'done'),
    getMultiClusterBlueprint: vi.fn(async () => ({ blueprints: [] })),
    planOptimalMultiCluster: vi.fn(async () => ({ blueprints: [] })),
    ...overrides,
  };
}

describe('RateLimitedClusterApi', () => {
  it('sends every attempt through the throttle', async () => {
    let calls = 0;
    const inner = innerApi({
      getMultiClusterStatus: async () => {
        calls += 1;
        if (calls < 3) throw new Error('socket hang up');
        return 'done';
      },
    });
    const throttle = new CountingThrottle();
    const waits: number[] = [];

    const api = new RateLimitedClusterApi(
      inner,
      throttle,
      { maxTries: 3, delayMs: 5_000, backoffFactor: 2 },
      silent,
      async (ms) => {
        waits.push(ms);
      }
    );

    await expect(api.getMultiClusterStatus('mc-1')).resolves.toBe('done');
    expect(throttle.scheduled).toBe(3);
    expect(waits).toEqual([5_000, 10_000]);
  });

  it('surfaces the last error after exhausting retries', async () => {
    const inner = innerApi({
      getMultiClusterBlueprint: async () => {
        throw new Error('blueprint fetch timeout');
      },
    });
    const throttle = new CountingThrottle();
    const warn = vi.spyOn(silent, 'warn');

    const api = new RateLimitedClusterApi(
      inner,
      throttle,
      { maxTries: 2, delayMs: 1, backoffFactor: 2 },
      silent,
      async () => undefined
    );

    await expect(api.getMultiClusterBlueprint('mc-2')).rejects.toThrow('blueprint fetch timeout');
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('passes results through unchanged', async () => {
    const inner = innerApi({
      listMultiClusters: async () => [{ uid: 'mc-1', name: null }],
    });
    const api = new RateLimitedClusterApi(
      inner,
      new CountingThrottle(),
      { maxTries: 1, delayMs: 0, backoffFactor: 1 },
      silent
    );
    await expect(api.listMultiClusters()).resolves.toEqual([{ uid: 'mc-1', name: null }]);
  });
});
