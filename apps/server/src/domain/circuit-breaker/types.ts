/**
 * Circuit breaker types.
 */

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitBreakerConfig {
  /** Number of failures within window to trip circuit */
  threshold: number;
  /** Time in ms before attempting reset from open state */
  resetMs: number;
  /** Sliding window size in ms for counting failures */
  windowMs: number;
}

export interface CircuitBreakerStatus {
  state: CircuitState;
  /** Failures inside the current window */
  failures: number;
  lastFailure: number;
  isAvailable: boolean;
}
