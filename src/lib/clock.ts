/**
 * Clock abstraction for deadline-based polling.
 */

export interface Clock {
  /** Milliseconds since an arbitrary, monotonic origin */
  now(): number;
  /** Wait for `ms`; resolves early when `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Clock backed by performance.now() and setTimeout.
 */
export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};
