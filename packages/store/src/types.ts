/**
 * @meridian/store — Core types.
 *
 * Two append-only logs back the coordination engine:
 *
 * - The record ledger: every version of every transaction record and
 *   swap group, keyed by 256-bit id. The latest version of an id is its
 *   current state. Nothing is ever removed.
 * - The signal journal: every signal the engine emitted, in order.
 *
 * Both logs are hash-chained so tampering with any persisted entry is
 * detectable from that point forward.
 */

import type {
  Hex32,
  Signal,
  SwapGroup,
  TransactionRecord,
} from "@meridian/types";

// =============================================================================
// Chained entries
// =============================================================================

/**
 * Fields shared by every hash-chained entry.
 */
export interface ChainLink {
  /** Position in the log (1-based, contiguous) */
  readonly position: number;

  /** Hash of the preceding entry, or GENESIS_HASH for position 1 */
  readonly previousHash: string;

  /** sha256(canonicalize(content) + previousHash) */
  readonly hash: string;
}

export interface RecordEntry extends ChainLink {
  readonly kind: "record";
  readonly value: TransactionRecord;
}

export interface GroupEntry extends ChainLink {
  readonly kind: "group";
  readonly value: SwapGroup;
}

/** One line of the record ledger. */
export type LedgerEntry = RecordEntry | GroupEntry;

/** One line of the signal journal. */
export interface StoredSignal extends ChainLink {
  readonly signal: Signal;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface IntegrityResult {
  readonly valid: boolean;

  /** Position of the last entry that verified, 0 if none */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Record Store Interface
// =============================================================================

/**
 * Append-only store of transaction records and swap groups.
 *
 * Invariants:
 * - put* appends a new version; earlier versions stay readable via history
 * - get* returns the latest version
 * - ids are never removed
 */
export interface RecordStore {
  getRecord(id: Hex32): TransactionRecord | undefined;

  hasRecord(id: Hex32): boolean;

  /** Append a new version of a record. */
  putRecord(record: TransactionRecord): void;

  /** Every stored version of a record, oldest first. */
  recordHistory(id: Hex32): readonly TransactionRecord[];

  /** Latest version of every record, in first-insertion order. */
  listRecords(): readonly TransactionRecord[];

  /** Number of distinct record ids. */
  recordCount(): number;

  getGroup(id: Hex32): SwapGroup | undefined;

  putGroup(group: SwapGroup): void;

  listGroups(): readonly SwapGroup[];

  /** Number of ledger entries appended so far. */
  position(): number;

  verifyIntegrity(): IntegrityResult;
}

// =============================================================================
// Signal Journal Interface
// =============================================================================

export type SignalHandler = (stored: StoredSignal) => void;

export interface Subscription {
  unsubscribe(): void;
}

export interface ReadSignalsOptions {
  /** Start from this position (inclusive). Default: 1 */
  readonly fromPosition?: number | undefined;

  /** Maximum number of signals to return. Default: unlimited */
  readonly maxCount?: number | undefined;
}

/**
 * Append-only, hash-chained journal of emitted signals.
 *
 * Subscribers are called synchronously, in position order, once every
 * signal of the append has been written.
 */
export interface SignalJournal {
  append(signal: Signal): StoredSignal;

  /** Write all signals, then dispatch them. */
  appendAll(signals: readonly Signal[]): readonly StoredSignal[];

  readAll(options?: ReadSignalsOptions): readonly StoredSignal[];

  subscribe(handler: SignalHandler): Subscription;

  /** Position of the last appended signal, 0 if empty. */
  position(): number;

  verifyIntegrity(): IntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "INVALID_POSITION"
  | "INVALID_ENTRY"
  | "IO_FAILURE";

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}
