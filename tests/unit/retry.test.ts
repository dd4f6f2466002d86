/**
 * Unit tests for retry with backoff
 */

import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_RETRY_POLICY, backoffDelay, executeWithRetry, type RetryPolicy } from '@core/retry';
import { CancelledError } from '../../src/types/error.types.js';
import { captureRejection } from '../setup.js';

const fastPolicy: RetryPolicy = { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 5, backoffMultiplier: 2 };

describe('retry', () => {
  describe('backoffDelay', () => {
    it('should grow exponentially', () => {
      expect(backoffDelay(DEFAULT_RETRY_POLICY, 1)).toBe(1000);
      expect(backoffDelay(DEFAULT_RETRY_POLICY, 2)).toBe(2000);
      expect(backoffDelay(DEFAULT_RETRY_POLICY, 3)).toBe(4000);
    });

    it('should cap at the maximum delay', () => {
      expect(backoffDelay(DEFAULT_RETRY_POLICY, 5)).toBe(10000);
    });
  });

  describe('executeWithRetry', () => {
    it('should return the first success', async () => {
      const operation = vi.fn(async (attempt: number) => `attempt ${attempt}`);

      await expect(executeWithRetry(operation, fastPolicy, { shouldRetry: () => true })).resolves.toBe('attempt 1');
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should retry retryable failures with backoff', async () => {
      const failure = new Error('busy');
      const operation = vi
        .fn<(attempt: number) => Promise<string>>()
        .mockRejectedValueOnce(failure)
        .mockRejectedValueOnce(failure)
        .mockResolvedValueOnce('ok');
      const onRetry = vi.fn();

      const result = await executeWithRetry(operation, fastPolicy, { shouldRetry: () => true, onRetry });

      expect(result).toBe('ok');
      expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
      expect(onRetry.mock.calls).toEqual([
        [failure, 1, 1],
        [failure, 2, 2],
      ]);
    });

    it('should rethrow a non-retryable failure at once', async () => {
      const failure = new Error('bad input');
      const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(failure);

      const error = await captureRejection(executeWithRetry(operation, fastPolicy, { shouldRetry: () => false }));

      expect(error).toBe(failure);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should rethrow the last failure when attempts run out', async () => {
      let calls = 0;
      const operation = async (): Promise<string> => {
        calls++;
        throw new Error(`failure ${calls}`);
      };

      const error = await captureRejection(executeWithRetry(operation, fastPolicy, { shouldRetry: () => true }));

      expect(error).toBeInstanceOf(Error);
      expect(error).toMatchObject({ message: 'failure 3' });
      expect(calls).toBe(3);
    });

    it('should stop waiting when the signal aborts', async () => {
      const controller = new AbortController();
      const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new Error('busy'));
      const slowPolicy: RetryPolicy = { ...fastPolicy, initialDelayMs: 60_000, maxDelayMs: 60_000 };

      const error = await captureRejection(
        executeWithRetry(operation, slowPolicy, {
          signal: controller.signal,
          shouldRetry: () => true,
          onRetry: () => controller.abort(),
        })
      );

      expect(error).toBeInstanceOf(CancelledError);
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });
});
