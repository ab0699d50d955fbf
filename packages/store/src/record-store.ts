/**
 * @meridian/store — Record ledger implementations.
 *
 * InMemoryRecordStore keeps the full version history of every record and
 * group in memory. JsonlRecordStore adds durability by persisting each
 * ledger entry as one JSON line and rebuilding the index on construction.
 *
 * Properties:
 * - O(1) put (amortized) and latest-version lookup
 * - Version history retained forever
 * - Every entry participates in one hash chain
 */

import type { Hex32, SwapGroup, TransactionRecord } from "@meridian/types";
import { isSwapGroup, isTransactionRecord } from "@meridian/types";
import {
  computeEntryHash,
  GENESIS_HASH,
  ledgerEntryContent,
  verifyHashChain,
} from "./hash-chain.js";
import { appendJsonLine, ensureParentDir, readJsonLines } from "./jsonl-file.js";
import type {
  ChainLink,
  GroupEntry,
  IntegrityResult,
  LedgerEntry,
  RecordEntry,
  RecordStore,
} from "./types.js";

export class InMemoryRecordStore implements RecordStore {
  /** Per-id record versions, oldest first */
  private readonly _records = new Map<Hex32, TransactionRecord[]>();

  /** Latest version of each group */
  private readonly _groups = new Map<Hex32, SwapGroup>();

  /** The full ledger, in append order */
  private readonly _log: LedgerEntry[] = [];

  private _lastHash: string = GENESIS_HASH;

  // ─── Records ────────────────────────────────────────────────────────

  getRecord(id: Hex32): TransactionRecord | undefined {
    const versions = this._records.get(id);
    return versions?.[versions.length - 1];
  }

  hasRecord(id: Hex32): boolean {
    return this._records.has(id);
  }

  putRecord(record: TransactionRecord): void {
    const entry: RecordEntry = {
      kind: "record",
      value: record,
      ...this._nextLink("record", record),
    };
    this.persist(entry);
    this._index(entry);
  }

  recordHistory(id: Hex32): readonly TransactionRecord[] {
    return [...(this._records.get(id) ?? [])];
  }

  listRecords(): readonly TransactionRecord[] {
    const latest: TransactionRecord[] = [];
    for (const versions of this._records.values()) {
      const last = versions[versions.length - 1];
      if (last !== undefined) {
        latest.push(last);
      }
    }
    return latest;
  }

  recordCount(): number {
    return this._records.size;
  }

  // ─── Groups ─────────────────────────────────────────────────────────

  getGroup(id: Hex32): SwapGroup | undefined {
    return this._groups.get(id);
  }

  putGroup(group: SwapGroup): void {
    const entry: GroupEntry = {
      kind: "group",
      value: group,
      ...this._nextLink("group", group),
    };
    this.persist(entry);
    this._index(entry);
  }

  listGroups(): readonly SwapGroup[] {
    return [...this._groups.values()];
  }

  // ─── Log ────────────────────────────────────────────────────────────

  position(): number {
    return this._log.length;
  }

  verifyIntegrity(): IntegrityResult {
    return verifyHashChain(this._log, ledgerEntryContent);
  }

  // ─── Extension points ───────────────────────────────────────────────

  /**
   * Durably record an entry before it becomes visible.
   * The in-memory store has nothing to persist.
   */
  protected persist(_entry: LedgerEntry): void {}

  /**
   * Re-index an entry read back from durable storage, keeping its
   * stored link fields so integrity checks see what is on disk.
   */
  protected restore(entry: LedgerEntry): void {
    this._index(entry);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _nextLink(kind: LedgerEntry["kind"], value: unknown): ChainLink {
    const position = this._log.length + 1;
    const previousHash = this._lastHash;
    const hash = computeEntryHash(
      ledgerEntryContent({ kind, position, value }),
      previousHash,
    );
    return { position, previousHash, hash };
  }

  private _index(entry: LedgerEntry): void {
    if (entry.kind === "record") {
      const versions = this._records.get(entry.value.id);
      if (versions === undefined) {
        this._records.set(entry.value.id, [entry.value]);
      } else {
        versions.push(entry.value);
      }
    } else {
      this._groups.set(entry.value.id, entry.value);
    }

    this._log.push(entry);
    this._lastHash = entry.hash;
  }
}

// =============================================================================
// JSONL backend
// =============================================================================

export interface JsonlRecordStoreOptions {
  /** Path to the JSONL ledger file */
  readonly filePath: string;
}

/**
 * File-backed record ledger.
 *
 * If the file exists its entries are replayed on construction; otherwise
 * it is created on first put. The parent directory is created if needed.
 */
export class JsonlRecordStore extends InMemoryRecordStore {
  private readonly _filePath: string;

  constructor(options: JsonlRecordStoreOptions) {
    super();
    this._filePath = options.filePath;
    ensureParentDir(this._filePath);

    for (const value of readJsonLines(this._filePath)) {
      const entry = parseLedgerEntry(value);
      if (entry !== undefined) {
        this.restore(entry);
      }
    }
  }

  get filePath(): string {
    return this._filePath;
  }

  protected override persist(entry: LedgerEntry): void {
    appendJsonLine(this._filePath, entry);
  }
}

function parseLedgerEntry(value: unknown): LedgerEntry | undefined {
  if (value === null || typeof value !== "object") return undefined;
  const v = value as Record<string, unknown>;
  if (
    typeof v.position !== "number" ||
    typeof v.previousHash !== "string" ||
    typeof v.hash !== "string"
  ) {
    return undefined;
  }
  const link = { position: v.position, previousHash: v.previousHash, hash: v.hash };

  if (v.kind === "record" && isTransactionRecord(v.value)) {
    return { kind: "record", value: v.value, ...link };
  }
  if (v.kind === "group" && isSwapGroup(v.value)) {
    return { kind: "group", value: v.value, ...link };
  }
  return undefined;
}
