/**
 * Retry Logic with Exponential Backoff
 *
 * Used for every outbound transport call: artifact delivery, broadcast sends
 * and notifications. Attempts are bounded; only errors `isRetryable` accepts
 * are retried.
 */

import { logger } from './logger';

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier?: number;
}

export interface RetryOptions extends RetryPolicy {
  isRetryable: (error: unknown) => boolean;

  /**
   * Called after a failed attempt that will be retried, before the delay.
   * Awaited, so callers can persist attempt counts.
   */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void | Promise<void>;

  /**
   * Checked before every retry. Returning false stops the loop with
   * `RetryAbortedError`.
   */
  shouldContinue?: () => boolean;

  /** Label used in log lines. */
  label?: string;
}

export class RetryAbortedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(`Retry aborted after ${attempts} attempt(s)`);
    this.name = 'RetryAbortedError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(
      `All ${attempts} attempt(s) failed: ${lastError instanceof Error ? lastError.message : String(lastError)}`
    );
    this.name = 'RetryExhaustedError';
  }
}

export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  const multiplier = policy.backoffMultiplier ?? 2;
  const exponentialDelay = policy.baseDelayMs * Math.pow(multiplier, attempt - 1);
  const jitter = Math.random() * 0.1 * exponentialDelay; // 0-10%
  return Math.floor(Math.min(exponentialDelay + jitter, policy.maxDelayMs));
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run `operation` until it resolves, a non-retryable error is thrown, or the
 * attempt budget is spent (`RetryExhaustedError`).
 *
 * @example
 * const result = await retryWithBackoff(() => sendArtifact(order), {
 *   maxAttempts: 5,
 *   baseDelayMs: 1000,
 *   maxDelayMs: 30000,
 *   isRetryable: (e) => e instanceof TransientDeliveryError,
 * });
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (!options.isRetryable(error)) {
        throw error;
      }

      if (attempt === maxAttempts) {
        logger.warn('[Retry] Attempts exhausted', {
          label: options.label,
          attempts: attempt,
          error: error instanceof Error ? error.message : String(error),
        });
        throw new RetryExhaustedError(attempt, error);
      }

      const delayMs = calculateDelay(attempt, options);
      await options.onRetry?.(attempt, error, delayMs);

      if (options.shouldContinue && !options.shouldContinue()) {
        throw new RetryAbortedError(attempt, error);
      }

      await sleep(delayMs);

      if (options.shouldContinue && !options.shouldContinue()) {
        throw new RetryAbortedError(attempt, error);
      }
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}
