/**
 * Sliding-window circuit breaker.
 *
 * closed -> open once `threshold` failures land inside `windowMs`;
 * open -> half-open after `resetMs`; half-open closes on the next success
 * and reopens on the next failure.
 */

import { SystemTimeProvider, type TimeProvider } from "../utils/time.js";
import type { CircuitBreakerConfig, CircuitBreakerStatus, CircuitState } from "./types.js";

export type CircuitTransition = { from: CircuitState; to: CircuitState };

export class CircuitBreaker {
  private state: CircuitState = "closed";
  private failureTimestamps: number[] = [];
  private openedAt = 0;
  private lastFailure = 0;

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly time: TimeProvider = new SystemTimeProvider(),
    private readonly onTransition?: (transition: CircuitTransition) => void
  ) {}

  /**
   * Whether an operation may run now. Moves open -> half-open once the
   * reset timeout has passed.
   */
  canProceed(): boolean {
    if (this.state !== "open") return true;

    if (this.time.now() - this.openedAt >= this.config.resetMs) {
      this.transition("half-open");
      return true;
    }
    return false;
  }

  recordSuccess(): void {
    if (this.state === "half-open") {
      this.failureTimestamps = [];
      this.transition("closed");
    }
  }

  recordFailure(): void {
    const now = this.time.now();
    this.failureTimestamps = this.prune([...this.failureTimestamps, now], now);
    this.lastFailure = now;

    if (this.state === "half-open" || this.failureTimestamps.length >= this.config.threshold) {
      this.openedAt = now;
      this.transition("open");
    }
  }

  status(): CircuitBreakerStatus {
    const now = this.time.now();
    return {
      state: this.state,
      failures: this.prune(this.failureTimestamps, now).length,
      lastFailure: this.lastFailure,
      isAvailable: this.state !== "open" || now - this.openedAt >= this.config.resetMs,
    };
  }

  private prune(timestamps: number[], now: number): number[] {
    const windowStart = now - this.config.windowMs;
    return timestamps.filter((ts) => ts >= windowStart);
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.onTransition?.({ from, to });
  }
}
