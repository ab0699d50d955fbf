/**
 * Signal Types
 *
 * Signals are the engine's externally observable output. An external
 * settlement layer watches Ready / GroupCompleted to act; operational
 * tooling watches Failed / CircuitBreakerTripped to intervene.
 *
 * Rules:
 * - Signals are immutable after emission
 * - Failed and CircuitBreakerTripped may accompany a rejected call; every
 *   other signal follows a committed state change
 * - The journal that records them is append-only and hash-chained
 */

import type { Address, Hex32 } from "./identifiers.js";
import type { Role } from "./role.js";

/**
 * Metadata common to all signals.
 */
export interface SignalMetadata {
  /** Unique signal ID */
  readonly signalId: string;

  /** ISO 8601 rendering of `time` */
  readonly timestamp: string;

  /** Engine clock time (unix seconds) at emission */
  readonly time: number;

  /** Engine clock height at emission */
  readonly height: number;

  /** Caller whose operation produced this signal */
  readonly actor: Address;
}

/** Why a record failed, as carried by the Failed signal. */
export type FailureReason =
  | "RESOLUTION_DELAY"
  | "NOT_REVEALED"
  | "EXPIRED"
  | "DEPENDENCY_UNMET"
  | "NOT_YET_DUE"
  | "GROUP_EXPIRED"
  | "REPORTED";

/**
 * Payloads keyed by signal type.
 */
export interface SignalPayloads {
  readonly Buffered: {
    readonly id: Hex32;
    readonly originDomain: Address;
    readonly targetDomain: Address;
    readonly requestedTime: number;
    readonly committed: boolean;
  };
  readonly Revealed: { readonly id: Hex32 };
  readonly Ready: { readonly id: Hex32; readonly targetDomain: Address };
  readonly Executed: { readonly id: Hex32 };
  readonly Failed: {
    readonly id: Hex32;
    readonly reason: FailureReason;
    readonly detail: string;
  };
  readonly Expired: { readonly id: Hex32 };
  readonly Refunded: { readonly id: Hex32; readonly recipient: Address };
  readonly GroupCreated: { readonly groupId: Hex32; readonly firstMember: Hex32 };
  readonly GroupMemberAdded: {
    readonly groupId: Hex32;
    readonly id: Hex32;
    readonly size: number;
  };
  readonly GroupCompleted: {
    readonly groupId: Hex32;
    readonly members: readonly Hex32[];
  };
  readonly GroupExpired: {
    readonly groupId: Hex32;
    readonly expiredMembers: readonly Hex32[];
  };
  readonly RoleGranted: { readonly role: Role; readonly account: Address };
  readonly RoleRevoked: { readonly role: Role; readonly account: Address };
  readonly OwnershipTransferred: {
    readonly previousOwner: Address;
    readonly newOwner: Address;
  };
  readonly EmergencyAdminChanged: { readonly emergencyAdmin: Address };
  readonly Paused: Record<string, never>;
  readonly Unpaused: Record<string, never>;
  readonly CircuitBreakerTripped: {
    readonly failureCount: number;
    readonly threshold: number;
  };
  readonly CircuitBreakerReset: { readonly previousFailureCount: number };
  readonly ConfigUpdated: {
    readonly key: "coordinationWindow" | "maxPayloadSize" | "circuitBreakerThreshold";
    readonly value: number;
  };
}

export type SignalType = keyof SignalPayloads;

/**
 * A signal of a specific type.
 */
export interface TypedSignal<T extends SignalType> {
  readonly type: T;
  readonly metadata: SignalMetadata;
  readonly payload: SignalPayloads[T];
}

/**
 * Any signal, discriminated by `type`.
 */
export type Signal = { [T in SignalType]: TypedSignal<T> }[SignalType];

/**
 * A signal before metadata is attached.
 */
export type SignalBody = {
  [T in SignalType]: {
    readonly type: T;
    readonly payload: SignalPayloads[T];
  };
}[SignalType];

export const SIGNAL_TYPES: readonly SignalType[] = [
  "Buffered",
  "Revealed",
  "Ready",
  "Executed",
  "Failed",
  "Expired",
  "Refunded",
  "GroupCreated",
  "GroupMemberAdded",
  "GroupCompleted",
  "GroupExpired",
  "RoleGranted",
  "RoleRevoked",
  "OwnershipTransferred",
  "EmergencyAdminChanged",
  "Paused",
  "Unpaused",
  "CircuitBreakerTripped",
  "CircuitBreakerReset",
  "ConfigUpdated",
];
