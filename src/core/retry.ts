/**
 * Bounded retry with exponential backoff
 */

import type { Config } from '@utils/config';
import { sleep } from '@utils/async';

/**
 * Retry configuration for stage execution
 */
export interface RetryPolicy {
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts: number;
  /** Delay before the first retry in ms (default: 1000) */
  initialDelayMs: number;
  /** Maximum delay in ms (default: 10000) */
  maxDelayMs: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
};

export function retryPolicyFromConfig(config: Config): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: config.maxAttempts,
    initialDelayMs: config.retryDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
  };
}

/**
 * Delay before retry number `retry` (1-based): initial * multiplier^(retry-1), capped
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, Math.max(0, retry - 1));
  return Math.min(delay, policy.maxDelayMs);
}

export interface RetryHooks {
  signal?: AbortSignal | undefined;
  /** Whether a failure may be retried; non-retryable errors are rethrown at once */
  shouldRetry: (error: unknown) => boolean;
  onRetry?: ((error: unknown, retry: number, delayMs: number) => void) | undefined;
}

/**
 * Run `operation` until it succeeds, a failure is not retryable, or attempts run out.
 * The last error is rethrown unchanged.
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !hooks.shouldRetry(error)) {
        throw error;
      }

      const delay = backoffDelay(policy, attempt);
      hooks.onRetry?.(error, attempt, delay);
      await sleep(delay, hooks.signal);
    }
  }
}
