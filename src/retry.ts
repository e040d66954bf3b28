/**
 * Bounded retry with pluggable backoff.
 */

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before the attempt that follows `attempt` (1-based). */
  backoffMs: (attempt: number) => number;
  isRetryable: (err: unknown) => boolean;
}

export interface RetryHooks {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  signal?: AbortSignal;
}

/** `2^attempt` seconds: 2 s after the first failure, 4 s after the second, ... */
export function exponentialBackoff(baseMs = 1000): (attempt: number) => number {
  return (attempt) => 2 ** attempt * baseMs;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

/**
 * Run `task` until it resolves, the error is not retryable, or attempts run
 * out. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await task(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || hooks.signal?.aborted || !policy.isRetryable(err)) {
        throw err;
      }
      const delayMs = policy.backoffMs(attempt);
      hooks.onRetry?.({ attempt, delayMs, error: err });
      await wait(delayMs, hooks.signal);
      if (hooks.signal?.aborted) {
        throw err;
      }
    }
  }
}
