/** Longest delay `setTimeout` honours; larger values fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export type BackoffOptions = {
  baseDelayMs: number;
  maxDelayMs: number;
};

/**
 * Delay to wait after the given (1-based) failed attempt. Exponential, capped,
 * and free of jitter so that a run's timing policy is reproducible.
 */
export function backoffDelay(attempt: number, opts: BackoffOptions): number {
  return Math.min(opts.baseDelayMs * 2 ** (attempt - 1), opts.maxDelayMs);
}

/** Sleep that resolves early (without throwing) when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
