const DEFAULT_TIMEOUT_MS = 30_000;

export class HttpTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

function mergeSignals(a?: AbortSignal | null, b?: AbortSignal | null): AbortSignal | undefined {
  if (!a) return b ?? undefined;
  if (!b) return a;

  const controller = new AbortController();
  const onAbort = () => controller.abort();
  a.addEventListener('abort', onAbort, { once: true });
  b.addEventListener('abort', onAbort, { once: true });
  return controller.signal;
}

export type HttpFetchInit = RequestInit & {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/**
 * Single bounded request. Retrying is left to the caller so that every attempt
 * can go through the caller's throttle.
 */
export async function httpFetch(url: string, init: HttpFetchInit = {}): Promise<Response> {
  const { timeoutMs, fetchImpl, ...reqInit } = init;
  const timeout =
    typeof timeoutMs === 'number' && Number.isFinite(timeoutMs) ? timeoutMs : DEFAULT_TIMEOUT_MS;
  const doFetch = fetchImpl ?? fetch;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);
  const signal = mergeSignals(reqInit.signal, controller.signal);

  try {
    return await doFetch(url, { ...reqInit, signal });
  } catch (err) {
    if (controller.signal.aborted) throw new HttpTimeoutError(url, timeout);
    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}
