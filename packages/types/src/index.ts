/**
 * @meridian/types — Shared domain types for the meridian stack.
 *
 * Used across all meridian packages:
 * - Identifiers (256-bit ids, participant addresses, payload bytes)
 * - Transaction records and their tagged lifecycle
 * - Swap groups
 * - Roles
 * - Signals
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Identifiers
export type { Hex32, Address, HexBytes } from "./identifiers.js";
export { ZERO_ID, ZERO_ADDRESS, EMPTY_BYTES } from "./identifiers.js";

// Transactions and groups
export type {
  TransactionState,
  TransactionStateTag,
  ObservedState,
  TransactionRecord,
  SwapGroup,
  SwapGroupStatus,
  SwapGroupSummary,
} from "./transaction.js";

// Roles
export type { Role, RoleGrant } from "./role.js";
export { ROLES } from "./role.js";

// Signals
export type {
  Signal,
  SignalBody,
  SignalType,
  SignalPayloads,
  SignalMetadata,
  TypedSignal,
  FailureReason,
} from "./signal.js";
export { SIGNAL_TYPES } from "./signal.js";

// Runtime type guards
export {
  isHex32,
  isAddress,
  isHexBytes,
  isRole,
  isTransactionStateTag,
  isTransactionState,
  isTransactionRecord,
  isSwapGroup,
  isSignalType,
  isSignal,
} from "./guards.js";
