export type RetryPolicy = {
  maxTries: number;
  delayMs: number;
  backoffFactor: number;
};

export type RetryAttempt = {
  attempt: number;
  delayMs: number;
  error: unknown;
};

export type RetryOptions = RetryPolicy & {
  onRetry?: (info: RetryAttempt) => void;
  sleep?: (ms: number) => Promise<void>;
};

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` up to `maxTries` times. Before each retry it waits `delay`, then
 * multiplies `delay` by `backoffFactor`. The last error is rethrown without a
 * trailing wait.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions
): Promise<T> {
  const maxTries = Math.max(1, Math.floor(opts.maxTries));
  const wait = opts.sleep ?? sleep;
  let delay = opts.delayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxTries) throw err;
      opts.onRetry?.({ attempt, delayMs: delay, error: err });
      await wait(delay);
      delay *= opts.backoffFactor;
    }
  }
}
