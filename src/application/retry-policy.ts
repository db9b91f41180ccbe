/**
 * Bounded retry with exponential backoff around a whole pipeline call.
 *
 * `maxAttempts` counts every attempt including the first; `0` removes the
 * ceiling and keeps retrying for as long as the collaborators fail.
 */
export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 0,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

/** Delay before the attempt following failed attempt `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(attempt - 1, 0);
  return Math.min(exponential, policy.maxDelayMs);
}

export function isFinalAttempt(policy: RetryPolicy, attempt: number): boolean {
  return policy.maxAttempts > 0 && attempt >= policy.maxAttempts;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
