/**
 * Resolves after `ms`. Rejects with the signal's reason when it aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function jitter(maxMs: number): number {
  if (maxMs <= 0) return 0;
  return Math.floor(Math.random() * (maxMs + 1));
}

export interface BackoffPolicy {
  baseMs: number;
  multiplier: number;
  maxMs: number;
}

/**
 * Delay after the `failures`-th consecutive retryable failure (1-based).
 * Non-decreasing in `failures` as long as `multiplier >= 1`.
 */
export function backoffDelay(failures: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, failures - 1);
  return Math.min(policy.maxMs, policy.baseMs * policy.multiplier ** exponent);
}
