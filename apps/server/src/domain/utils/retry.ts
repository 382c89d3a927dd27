/**
 * Retry strategy implementations.
 * Fully testable with dependency injection for delays.
 */

import { calculateBackoff } from "./backoff.js";

export interface RetryOptions {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Base delay in ms between retries */
  baseDelayMs?: number;
  /** Maximum delay in ms */
  maxDelayMs?: number;
  /** Whether a failure is worth retrying (default: always) */
  shouldRetry?: (error: Error) => boolean;
  /** Callback for each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export type RetryResult<T> =
  | { success: true; value: T; attempts: number }
  | { success: false; error: Error; attempts: number };

export interface DelayProvider {
  delay(ms: number): Promise<void>;
}

/**
 * Default delay provider using setTimeout.
 */
export class TimeoutDelayProvider implements DelayProvider {
  async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Mock delay provider for testing (instant delays).
 */
export class InstantDelayProvider implements DelayProvider {
  public delays: number[] = [];

  async delay(ms: number): Promise<void> {
    this.delays.push(ms);
  }
}

const DEFAULT_OPTIONS = {
  baseDelayMs: 100,
  maxDelayMs: 5000,
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Execute an operation with retry logic.
 *
 * @example
 * const result = await executeWithRetry(
 *   () => cache.settle(lease, outcome, ttlMs),
 *   { maxRetries: 3, baseDelayMs: 100 }
 * );
 * if (!result.success) {
 *   log.cache.error({ attempts: result.attempts }, "settle failed");
 * }
 */
export async function executeWithRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
  delayProvider: DelayProvider = new TimeoutDelayProvider()
): Promise<RetryResult<T>> {
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_OPTIONS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs;
  let attempt = 0;

  while (true) {
    attempt++;
    try {
      const value = await operation();
      return { success: true, value, attempts: attempt };
    } catch (error) {
      const lastError = toError(error);
      const retryable = options.shouldRetry ? options.shouldRetry(lastError) : true;

      if (!retryable || attempt > options.maxRetries) {
        return { success: false, error: lastError, attempts: attempt };
      }

      const delayMs = calculateBackoff(attempt, { baseDelayMs, maxDelayMs });
      options.onRetry?.(attempt, lastError, delayMs);
      await delayProvider.delay(delayMs);
    }
  }
}
