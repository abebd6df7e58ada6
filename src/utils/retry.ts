/**
 * Retry and throttling helpers for remote calls
 */

import pRetry from 'p-retry';

export interface RetryPolicy {
  maxAttempts: number;                            // Total attempts, including the first
  baseDelayMs: number;                            // Delay before the first retry
  isRetryable: (error: unknown) => boolean;
  onRetry?: (info: RetryAttempt) => void;
}

export interface RetryAttempt {
  attempt: number;                                // 1-based number of the attempt that failed
  delayMs: number;                                // Wait before the next attempt
  error: Error;
}

/**
 * Backoff delay before retry n (0-based): baseDelayMs * 2^n
 */
export function backoffDelay(baseDelayMs: number, retryIndex: number): number {
  return baseDelayMs * Math.pow(2, retryIndex);
}

/**
 * Run fn under a retry policy. Non-retryable errors are rethrown at once;
 * when attempts run out the last error is rethrown.
 */
export async function executeWithPolicy<T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  const retries = Math.max(0, policy.maxAttempts - 1);

  return pRetry(
    async () => {
      try {
        return await fn();
      } catch (error) {
        if (!policy.isRetryable(error)) {
          throw new pRetry.AbortError(error instanceof Error ? error : new Error(String(error)));
        }
        throw error;
      }
    },
    {
      retries,
      factor: 2,
      minTimeout: policy.baseDelayMs,
      maxTimeout: Infinity,
      randomize: false,
      onFailedAttempt: error => {
        if (error.retriesLeft > 0 && policy.onRetry) {
          policy.onRetry({
            attempt: error.attemptNumber,
            delayMs: backoffDelay(policy.baseDelayMs, error.attemptNumber - 1),
            error
          });
        }
      }
    }
  );
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}
