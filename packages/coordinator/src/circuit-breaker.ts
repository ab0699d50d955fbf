/**
 * Circuit Breaker — one global failure counter.
 *
 * Every resolver-reported failure increments the counter. When it
 * reaches the threshold the breaker trips and stays tripped until an
 * admin resets it, which is allowed only once the cooldown has passed
 * since the previous reset. Failures are not attributed to any cause.
 */

import { CoordinationError } from "./errors.js";

export interface CircuitBreakerStatus {
  readonly failureCount: number;
  readonly tripped: boolean;
  readonly threshold: number;
  readonly lastResetTime: number;
}

export interface CircuitBreakerOptions {
  readonly threshold: number;
  readonly cooldownSeconds: number;

  /** Time the cooldown is first measured from */
  readonly startTime: number;
}

export class CircuitBreaker {
  private failureCount = 0;
  private tripped = false;
  private threshold: number;
  private lastResetTime: number;
  private readonly cooldownSeconds: number;

  constructor(options: CircuitBreakerOptions) {
    this.threshold = options.threshold;
    this.cooldownSeconds = options.cooldownSeconds;
    this.lastResetTime = options.startTime;
  }

  assertClosed(): void {
    if (this.tripped) {
      throw new CoordinationError(
        "CIRCUIT_BREAKER_TRIPPED",
        `Circuit breaker tripped after ${this.failureCount} failures`,
        { failureCount: this.failureCount, threshold: this.threshold },
      );
    }
  }

  /**
   * Count one failure.
   * @returns true if this failure tripped the breaker
   */
  recordFailure(): boolean {
    this.failureCount += 1;
    if (!this.tripped && this.failureCount >= this.threshold) {
      this.tripped = true;
      return true;
    }
    return false;
  }

  /**
   * Zero the counter and close the breaker.
   * @returns the failure count before the reset
   */
  reset(now: number): number {
    const earliest = this.lastResetTime + this.cooldownSeconds;
    if (now < earliest) {
      throw new CoordinationError(
        "TIMING_ERROR",
        `Circuit breaker cooldown has ${earliest - now}s remaining`,
        { earliest },
      );
    }
    const previous = this.failureCount;
    this.failureCount = 0;
    this.tripped = false;
    this.lastResetTime = now;
    return previous;
  }

  /** Takes effect from the next recorded failure. */
  setThreshold(threshold: number): void {
    this.threshold = threshold;
  }

  status(): CircuitBreakerStatus {
    return {
      failureCount: this.failureCount,
      tripped: this.tripped,
      threshold: this.threshold,
      lastResetTime: this.lastResetTime,
    };
  }

  /** Rebuild state from a journal replay. */
  restore(status: Omit<CircuitBreakerStatus, "threshold">): void {
    this.failureCount = status.failureCount;
    this.tripped = status.tripped;
    this.lastResetTime = status.lastResetTime;
  }
}
