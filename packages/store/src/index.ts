/**
 * @meridian/store — Append-only persistence for the coordination engine.
 *
 * Provides:
 * - RecordStore: versioned transaction records and swap groups
 * - SignalJournal: ordered, subscribable log of emitted signals
 * - In-memory backends (tests, short-lived processes)
 * - JSONL backends (durable, fsync per append, torn-line tolerant)
 * - SHA-256 hash chain over RFC 8785 canonical JSON
 */

export type {
  ChainLink,
  RecordEntry,
  GroupEntry,
  LedgerEntry,
  StoredSignal,
  IntegrityError,
  IntegrityResult,
  RecordStore,
  SignalJournal,
  SignalHandler,
  Subscription,
  ReadSignalsOptions,
  StoreErrorCode,
} from "./types.js";
export { StoreError } from "./types.js";

export { InMemoryRecordStore, JsonlRecordStore } from "./record-store.js";
export type { JsonlRecordStoreOptions } from "./record-store.js";

export { InMemorySignalJournal, JsonlSignalJournal } from "./signal-journal.js";
export type { JsonlSignalJournalOptions } from "./signal-journal.js";

export {
  GENESIS_HASH,
  computeEntryHash,
  verifyHashChain,
  ledgerEntryContent,
  signalEntryContent,
} from "./hash-chain.js";
