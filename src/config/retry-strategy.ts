/**
 * Decides whether, and after how long, attempt number `retry` (counting from 1)
 * may happen. `null` means no more attempts.
 */
export interface RetryStrategy {
  retryDelay(retry: number): number | null;
}

export const noRetryStrategy: RetryStrategy = {
  retryDelay: () => null,
};

export function immediateRetry(): RetryStrategy {
  return { retryDelay: () => 0 };
}

export function exponentialBackoff(
  initialDelayMs: number,
  maxDelayMs: number,
  multiplier: number = 2,
): RetryStrategy {
  return {
    retryDelay: (retry) => Math.min(initialDelayMs * Math.pow(multiplier, retry - 1), maxDelayMs),
  };
}

export function maxRetries(strategy: RetryStrategy, retries: number): RetryStrategy {
  return {
    retryDelay: (retry) => (retry > retries ? null : strategy.retryDelay(retry)),
  };
}
