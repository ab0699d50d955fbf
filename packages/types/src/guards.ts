/**
 * Runtime Type Guards
 *
 * Narrowing functions for meridian domain types.
 * Used at system boundaries: API inputs, JSONL files read back from disk.
 */

import type { Address, Hex32, HexBytes } from "./identifiers.js";
import type { Role } from "./role.js";
import type { Signal, SignalType } from "./signal.js";
import { SIGNAL_TYPES } from "./signal.js";
import type {
  SwapGroup,
  TransactionRecord,
  TransactionState,
  TransactionStateTag,
} from "./transaction.js";

// =============================================================================
// Identifier guards
// =============================================================================

const HEX32 = /^0x[0-9a-fA-F]{64}$/;
const ADDRESS = /^0x[0-9a-fA-F]{40}$/;
const HEX_BYTES = /^0x(?:[0-9a-fA-F]{2})*$/;

export function isHex32(value: unknown): value is Hex32 {
  return typeof value === "string" && HEX32.test(value);
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS.test(value);
}

export function isHexBytes(value: unknown): value is HexBytes {
  return typeof value === "string" && HEX_BYTES.test(value);
}

// =============================================================================
// Role guards
// =============================================================================

const ROLE_SET = new Set<string>(["BUFFER", "RESOLVE", "ADMIN"]);

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLE_SET.has(value);
}

// =============================================================================
// Lifecycle guards
// =============================================================================

const STATE_TAGS = new Set<string>([
  "BUFFERED",
  "READY",
  "EXECUTED",
  "EXPIRED",
  "FAILED",
  "REFUNDED",
]);

export function isTransactionStateTag(
  value: unknown,
): value is TransactionStateTag {
  return typeof value === "string" && STATE_TAGS.has(value);
}

export function isTransactionState(value: unknown): value is TransactionState {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  switch (v.tag) {
    case "BUFFERED":
      return true;
    case "READY":
      return typeof v.readyAt === "number";
    case "EXECUTED":
      return typeof v.readyAt === "number" && typeof v.executedAt === "number";
    case "EXPIRED":
      return typeof v.expiredAt === "number" && typeof v.reason === "string";
    case "FAILED":
      return typeof v.failedAt === "number" && typeof v.reason === "string";
    case "REFUNDED":
      return (
        typeof v.refundedAt === "number" &&
        (v.from === "EXPIRED" || v.from === "FAILED")
      );
    default:
      return false;
  }
}

function isOptional<T>(
  value: unknown,
  guard: (v: unknown) => v is T,
): boolean {
  return value === undefined || guard(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function isTransactionRecord(
  value: unknown,
): value is TransactionRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isHex32(v.id) &&
    isAddress(v.originDomain) &&
    isAddress(v.targetDomain) &&
    isHexBytes(v.payload) &&
    isOptional(v.dependencyId, isHex32) &&
    isNumber(v.requestedTime) &&
    isNumber(v.expiry) &&
    isTransactionState(v.state) &&
    isOptional(v.commitmentHash, isHex32) &&
    isOptional(v.revealDeadline, isNumber) &&
    typeof v.revealed === "boolean" &&
    isAddress(v.creator) &&
    isAddress(v.refundRecipient) &&
    isOptional(v.swapGroupId, isHex32) &&
    isNumber(v.creationHeight) &&
    isNumber(v.createdAt)
  );
}

export function isSwapGroup(value: unknown): value is SwapGroup {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isHex32(v.id) &&
    Array.isArray(v.members) &&
    v.members.every(isHex32) &&
    isNumber(v.readyCount) &&
    (v.status === "open" || v.status === "complete" || v.status === "expired") &&
    isNumber(v.createdAt)
  );
}

// =============================================================================
// Signal guards
// =============================================================================

const SIGNAL_TYPE_SET = new Set<string>(SIGNAL_TYPES);

export function isSignalType(value: unknown): value is SignalType {
  return typeof value === "string" && SIGNAL_TYPE_SET.has(value);
}

/**
 * Structural check of a signal envelope. Payload shape is trusted once
 * the type is known, since signals are only produced by the engine.
 */
export function isSignal(value: unknown): value is Signal {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (!isSignalType(v.type)) return false;
  if (v.payload === null || typeof v.payload !== "object") return false;
  if (v.metadata === null || typeof v.metadata !== "object") return false;
  const m = v.metadata as Record<string, unknown>;
  return (
    typeof m.signalId === "string" &&
    typeof m.timestamp === "string" &&
    isNumber(m.time) &&
    isNumber(m.height) &&
    isAddress(m.actor)
  );
}
