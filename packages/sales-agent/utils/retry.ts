// Attempt-bounded retry with exponential backoff

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryPolicy {
  /** Total attempts including the first call */
  attempts: number;
  multiplier: number;
  minDelayMs: number;
  maxDelayMs: number;
}

/** Text enrichment: 3 attempts, waits clamped to [4s, 10s] */
export const ENRICHMENT_RETRY: RetryPolicy = {
  attempts: 3,
  multiplier: 1,
  minDelayMs: 4_000,
  maxDelayMs: 10_000,
};

/** Answer generation and embedding calls: 3 attempts, waits clamped to [1s, 10s] */
export const GENERATION_RETRY: RetryPolicy = {
  attempts: 3,
  multiplier: 1,
  minDelayMs: 1_000,
  maxDelayMs: 10_000,
};

/**
 * Wait before the next attempt, after `failedAttempts` failures:
 * multiplier · 2^(failedAttempts - 1) seconds, clamped to [minDelayMs, maxDelayMs].
 */
export function backoffDelay(failedAttempts: number, policy: RetryPolicy): number {
  const raw = policy.multiplier * Math.pow(2, failedAttempts - 1) * 1000;
  return Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, raw));
}

export interface RetryOptions {
  sleep?: Sleep;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Run `fn` until it resolves or the policy's attempts are exhausted.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === policy.attempts) break;
      const delayMs = backoffDelay(attempt, policy);
      options.onRetry?.({ attempt, delayMs, error: err });
      await wait(delayMs);
    }
  }

  throw lastError;
}
