export interface BackoffPolicy {
  baseMs: number;
  capMs: number;
}

/**
 * Exponential backoff with jitter: min(base * 2^(attempt-1), cap), scaled by a
 * uniform factor in [0.75, 1.25).
 *
 * @param attempt - 1-indexed number of the attempt that just failed
 * @param random - source of uniform [0, 1) values (injectable for tests)
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  const exponential = policy.baseMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(exponential, policy.capMs);
  return Math.round(capped * (0.75 + 0.5 * random()));
}

/**
 * Sleep helper for retry delays. Resolves early when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
