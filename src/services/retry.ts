import { TransientTransferError } from './errors';

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = ms => new Promise(resolve => setTimeout(resolve, ms));

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export interface RetryOptions {
  policy: RetryPolicy;
  sleep?: Sleeper;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

/** Delay after the given failed attempt (1-based): base * 2^(attempt-1), capped */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

export function isRetryable(error: unknown): boolean {
  return error instanceof TransientTransferError;
}

/**
 * Run fn until it succeeds, fails with a non-retryable error, or the attempt
 * bound is reached. Never throws; the result carries the attempt count.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<RetryResult<T>> {
  const { policy, onRetry } = options;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await fn();
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (!isRetryable(error) || attempt >= maxAttempts) {
        return { ok: false, error, attempts: attempt };
      }
      const delay = backoffDelay(attempt, policy);
      onRetry?.(attempt, delay, error);
      await wait(delay);
    }
  }
}
