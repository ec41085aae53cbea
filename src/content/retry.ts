/**
 * Retry with exponential backoff.
 *
 * Delays double per attempt from `backoffBaseMs`, are capped at
 * `backoffMaxMs`, and carry "equal jitter" (half fixed, half random) so
 * concurrent retries against the same backend spread out.
 */

export interface RetryPolicy {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs?: number;
  jitter?: boolean;
}

export const MAX_BACKOFF_MS = 30_000;

export function computeBackoff(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = policy.backoffBaseMs * Math.pow(2, attempt - 1);
  const capped = Math.min(exponential, policy.backoffMaxMs ?? MAX_BACKOFF_MS);
  if (policy.jitter === false) return capped;
  return Math.round(capped / 2 + (random() * capped) / 2);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  isRetryable: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Run `operation` until it succeeds, throws a non-retryable error, or the
 * attempt budget is spent. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  const wait = options.sleep ?? sleep;
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (attempt >= policy.maxAttempts || !options.isRetryable(err)) throw err;
      const delay = computeBackoff(policy, attempt);
      options.onRetry?.(err, attempt, delay);
      await wait(delay);
    }
  }
}
