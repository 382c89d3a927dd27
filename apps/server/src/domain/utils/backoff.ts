/**
 * Pure utility functions for exponential backoff calculation.
 * These are fully unit-testable with no side effects.
 */

import type { RandomSource } from "./time.js";

export interface BackoffOptions {
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /**
   * Jitter factor 0-1 (default: 0). The delay is reduced by up to this
   * fraction, so jitter never pushes a delay past the cap.
   */
  jitterFactor?: number;
  /** Random source for jitter (default: Math.random) */
  random?: RandomSource;
}

const DEFAULT_BACKOFF_OPTIONS: Required<Omit<BackoffOptions, "random">> = {
  baseDelayMs: 500,
  maxDelayMs: 30000,
  jitterFactor: 0,
};

/**
 * Calculate exponential backoff delay.
 *
 * @param attempt - The failed attempt number (1-indexed: the wait after the
 *   first failure is attempt 1)
 * @returns Delay in milliseconds
 *
 * @example
 * // Default: 500ms, 1s, 2s, 4s ... 30s (capped)
 * calculateBackoff(1) // 500
 * calculateBackoff(2) // 1000
 * calculateBackoff(10) // 30000 (capped)
 */
export function calculateBackoff(attempt: number, options?: BackoffOptions): number {
  const { baseDelayMs, maxDelayMs, jitterFactor } = {
    ...DEFAULT_BACKOFF_OPTIONS,
    ...options,
  };

  const exponent = Math.max(0, attempt - 1);
  const exponentialDelay = baseDelayMs * Math.pow(2, exponent);

  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  if (jitterFactor > 0) {
    const random = options?.random ?? Math.random;
    const jitter = cappedDelay * jitterFactor * random();
    return Math.floor(cappedDelay - jitter);
  }

  return cappedDelay;
}
