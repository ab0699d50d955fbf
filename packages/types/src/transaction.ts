/**
 * Transaction Record Types
 *
 * The lifecycle of a buffered cross-domain transaction:
 *
 *   BUFFERED → READY → EXECUTED
 *   BUFFERED → EXPIRED → REFUNDED
 *   BUFFERED | READY → FAILED → REFUNDED
 *
 * Records are never deleted. Terminal tags are retained for audit.
 */

import type { Address, Hex32, HexBytes } from "./identifiers.js";

/**
 * Lifecycle state of a record, as a tagged value.
 * Each tag carries the facts established when it was entered.
 */
export type TransactionState =
  | { readonly tag: "BUFFERED" }
  | { readonly tag: "READY"; readonly readyAt: number }
  | {
      readonly tag: "EXECUTED";
      readonly readyAt: number;
      readonly executedAt: number;
    }
  | {
      readonly tag: "EXPIRED";
      readonly expiredAt: number;
      readonly reason: string;
    }
  | {
      readonly tag: "FAILED";
      readonly failedAt: number;
      readonly reason: string;
    }
  | {
      readonly tag: "REFUNDED";
      readonly refundedAt: number;
      readonly from: "EXPIRED" | "FAILED";
    };

export type TransactionStateTag = TransactionState["tag"];

/** A state as observed from outside; EMPTY means no record exists. */
export type ObservedState = TransactionStateTag | "EMPTY";

/**
 * A buffered transaction intent.
 */
export interface TransactionRecord {
  /** Caller-chosen, unique for the lifetime of the ledger */
  readonly id: Hex32;

  /** Domain the intent originates from */
  readonly originDomain: Address;

  /** Domain the intent settles on (never equal to origin) */
  readonly targetDomain: Address;

  /** Opaque payload; "0x" until revealed on the commit path */
  readonly payload: HexBytes;

  /** Record that must be READY or EXECUTED before this one resolves */
  readonly dependencyId?: Hex32;

  /** Logical execution time (unix seconds) */
  readonly requestedTime: number;

  /** requestedTime + coordination window, fixed at creation */
  readonly expiry: number;

  readonly state: TransactionState;

  /** sha256(payload ‖ secret), present only on the commit path */
  readonly commitmentHash?: Hex32;

  /** Last height at which a reveal is accepted (commit path only) */
  readonly revealDeadline?: number;

  readonly revealed: boolean;

  readonly creator: Address;

  readonly refundRecipient: Address;

  readonly swapGroupId?: Hex32;

  readonly creationHeight: number;

  /** Unix seconds at creation */
  readonly createdAt: number;
}

/**
 * Lifecycle of a swap group.
 *
 * - open: accepting members, not all legs READY
 * - complete: every leg reached READY; membership sealed
 * - expired: collectively failed by expireGroup; membership sealed
 */
export type SwapGroupStatus = "open" | "complete" | "expired";

/**
 * A bounded set of co-dependent records (at most four legs).
 */
export interface SwapGroup {
  readonly id: Hex32;
  readonly members: readonly Hex32[];
  readonly readyCount: number;
  readonly status: SwapGroupStatus;
  readonly createdAt: number;
}

/**
 * Summary returned by groupStatus().
 */
export interface SwapGroupSummary {
  readonly size: number;
  readonly readyCount: number;
  readonly allReady: boolean;
}
