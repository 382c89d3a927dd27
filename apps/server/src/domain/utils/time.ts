/**
 * Time and randomness providers for testable time-dependent code.
 * Token expiry, lease TTLs and backoff jitter all read through these.
 */

export interface TimeProvider {
  /** Get current timestamp in milliseconds */
  now(): number;
}

/**
 * Default time provider using system clock.
 */
export class SystemTimeProvider implements TimeProvider {
  now(): number {
    return Date.now();
  }
}

/**
 * Mock time provider for testing.
 */
export class MockTimeProvider implements TimeProvider {
  private currentTime: number;

  constructor(initialTime: number = 0) {
    this.currentTime = initialTime;
  }

  now(): number {
    return this.currentTime;
  }

  /** Advance time by specified milliseconds */
  advanceBy(ms: number): void {
    this.currentTime += ms;
  }

  setTime(time: number): void {
    this.currentTime = time;
  }
}

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export const systemRandom: RandomSource = () => Math.random();
