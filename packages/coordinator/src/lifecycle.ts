/**
 * Record lifecycle.
 *
 *   BUFFERED → READY → EXECUTED
 *   BUFFERED | READY → EXPIRED → REFUNDED
 *   BUFFERED | READY → FAILED → REFUNDED
 *
 * Each transition function pattern-matches the current tag and returns
 * the next tagged value, or throws STATE_ERROR for an edge the table
 * does not allow.
 */

import type {
  TransactionRecord,
  TransactionState,
  TransactionStateTag,
} from "@meridian/types";
import { CoordinationError } from "./errors.js";

// =============================================================================
// Valid Transitions
// =============================================================================

export const VALID_TRANSITIONS: Record<
  TransactionStateTag,
  readonly TransactionStateTag[]
> = {
  BUFFERED: ["READY", "EXPIRED", "FAILED"],
  READY: ["EXECUTED", "EXPIRED", "FAILED"],
  EXECUTED: [],
  EXPIRED: ["REFUNDED"],
  FAILED: ["REFUNDED"],
  REFUNDED: [],
};

export function canTransition(
  from: TransactionStateTag,
  to: TransactionStateTag,
): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function assertTransition(
  record: TransactionRecord,
  target: TransactionStateTag,
): void {
  if (!canTransition(record.state.tag, target)) {
    throw new CoordinationError(
      "STATE_ERROR",
      `Cannot transition transaction '${record.id}' from ${record.state.tag} to ${target}`,
      { id: record.id, from: record.state.tag, to: target },
    );
  }
}

/** True when no further transition is possible. */
export function isTerminal(tag: TransactionStateTag): boolean {
  return VALID_TRANSITIONS[tag].length === 0;
}

/** True for tags an operator may still act on (not yet settled or failed). */
export function isLive(tag: TransactionStateTag): boolean {
  return tag === "BUFFERED" || tag === "READY";
}

// =============================================================================
// Transition functions
// =============================================================================

function invalid(from: TransactionState, to: TransactionStateTag): CoordinationError {
  return new CoordinationError(
    "STATE_ERROR",
    `Cannot transition from ${from.tag} to ${to}`,
    { from: from.tag, to },
  );
}

export function toReady(state: TransactionState, at: number): TransactionState {
  switch (state.tag) {
    case "BUFFERED":
      return { tag: "READY", readyAt: at };
    default:
      throw invalid(state, "READY");
  }
}

export function toExecuted(state: TransactionState, at: number): TransactionState {
  switch (state.tag) {
    case "READY":
      return { tag: "EXECUTED", readyAt: state.readyAt, executedAt: at };
    default:
      throw invalid(state, "EXECUTED");
  }
}

export function toExpired(
  state: TransactionState,
  at: number,
  reason: string,
): TransactionState {
  switch (state.tag) {
    case "BUFFERED":
    case "READY":
      return { tag: "EXPIRED", expiredAt: at, reason };
    default:
      throw invalid(state, "EXPIRED");
  }
}

export function toFailed(
  state: TransactionState,
  at: number,
  reason: string,
): TransactionState {
  switch (state.tag) {
    case "BUFFERED":
    case "READY":
      return { tag: "FAILED", failedAt: at, reason };
    default:
      throw invalid(state, "FAILED");
  }
}

export function toRefunded(state: TransactionState, at: number): TransactionState {
  switch (state.tag) {
    case "EXPIRED":
    case "FAILED":
      return { tag: "REFUNDED", refundedAt: at, from: state.tag };
    default:
      throw invalid(state, "REFUNDED");
  }
}
