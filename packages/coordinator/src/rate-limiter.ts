/**
 * Rate Limiter — per-period admission counters.
 *
 * A period is one height. Each period has a global counter and one
 * counter per submitter; both increment together on every accepted
 * buffer call. Buckets for periods more than `retainPeriods` behind the
 * current one are evicted on each check.
 */

import type { Address } from "@meridian/types";
import { CoordinationError } from "./errors.js";

export interface RateLimits {
  readonly globalLimit: number;
  readonly submitterLimit: number;
  readonly retainPeriods: number;
}

interface PeriodBucket {
  global: number;
  readonly submitters: Map<Address, number>;
}

export interface RateUsage {
  readonly global: number;
  readonly submitter: number;
}

export class RateLimiter {
  private readonly buckets = new Map<number, PeriodBucket>();
  private readonly limits: RateLimits;

  constructor(limits: RateLimits) {
    this.limits = limits;
  }

  /**
   * Reject if one more admission in `period` would exceed either cap.
   */
  check(period: number, submitter: Address): void {
    this.evict(period);
    const usage = this.usage(period, submitter);

    if (usage.global >= this.limits.globalLimit) {
      throw new CoordinationError(
        "RATE_LIMITED",
        `Global rate limit of ${this.limits.globalLimit} per period reached`,
        { period, scope: "global", limit: this.limits.globalLimit },
      );
    }
    if (usage.submitter >= this.limits.submitterLimit) {
      throw new CoordinationError(
        "RATE_LIMITED",
        `Submitter ${submitter} reached ${this.limits.submitterLimit} per period`,
        { period, scope: "submitter", limit: this.limits.submitterLimit },
      );
    }
  }

  /** Count one accepted admission. */
  record(period: number, submitter: Address): void {
    let bucket = this.buckets.get(period);
    if (bucket === undefined) {
      bucket = { global: 0, submitters: new Map() };
      this.buckets.set(period, bucket);
    }
    bucket.global += 1;
    bucket.submitters.set(submitter, (bucket.submitters.get(submitter) ?? 0) + 1);
  }

  usage(period: number, submitter: Address): RateUsage {
    const bucket = this.buckets.get(period);
    return {
      global: bucket?.global ?? 0,
      submitter: bucket?.submitters.get(submitter) ?? 0,
    };
  }

  /** Number of periods currently held in memory. */
  get bucketCount(): number {
    return this.buckets.size;
  }

  private evict(current: number): void {
    const oldest = current - this.limits.retainPeriods;
    for (const period of this.buckets.keys()) {
      if (period < oldest) {
        this.buckets.delete(period);
      }
    }
  }
}
