/**
 * @meridian/store — Signal journal implementations.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of signals returned)
 * - Synchronous subscriber dispatch, in position order, after the
 *   whole batch is written
 */

import type { Signal } from "@meridian/types";
import { isSignal } from "@meridian/types";
import {
  computeEntryHash,
  GENESIS_HASH,
  signalEntryContent,
  verifyHashChain,
} from "./hash-chain.js";
import { appendJsonLine, ensureParentDir, readJsonLines } from "./jsonl-file.js";
import type {
  IntegrityResult,
  ReadSignalsOptions,
  SignalHandler,
  SignalJournal,
  StoredSignal,
  Subscription,
} from "./types.js";
import { StoreError } from "./types.js";

export class InMemorySignalJournal implements SignalJournal {
  private readonly _log: StoredSignal[] = [];

  private readonly _subscribers = new Set<SignalHandler>();

  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(signal: Signal): StoredSignal {
    const stored = this.write(signal);
    this.dispatch([stored]);
    return stored;
  }

  appendAll(signals: readonly Signal[]): readonly StoredSignal[] {
    const stored = signals.map((signal) => this.write(signal));
    this.dispatch(stored);
    return stored;
  }

  private write(signal: Signal): StoredSignal {
    const position = this._log.length + 1;
    const previousHash = this._lastHash;
    const hash = computeEntryHash(
      signalEntryContent({ position, signal }),
      previousHash,
    );
    const stored: StoredSignal = { signal, position, previousHash, hash };

    this.persist(stored);
    this._log.push(stored);
    this._lastHash = hash;
    return stored;
  }

  /** Every subscriber sees every entry; failures are rethrown afterwards. */
  private dispatch(entries: readonly StoredSignal[]): void {
    const failures: unknown[] = [];
    for (const stored of entries) {
      for (const handler of this._subscribers) {
        try {
          handler(stored);
        } catch (err) {
          failures.push(err);
        }
      }
    }

    const [first] = failures;
    if (failures.length === 1) {
      throw first;
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} signal subscribers failed`);
    }
  }

  // ─── Read ───────────────────────────────────────────────────────────

  readAll(options?: ReadSignalsOptions): readonly StoredSignal[] {
    const fromPosition = options?.fromPosition ?? 1;
    const maxCount = options?.maxCount;

    if (fromPosition < 1) {
      throw new StoreError(
        "INVALID_POSITION",
        `fromPosition must be >= 1, got ${fromPosition}`,
      );
    }

    const result = this._log.slice(fromPosition - 1);
    return maxCount !== undefined && maxCount >= 0
      ? result.slice(0, maxCount)
      : result;
  }

  position(): number {
    return this._log.length;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(handler: SignalHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): IntegrityResult {
    return verifyHashChain(this._log, signalEntryContent);
  }

  // ─── Extension points ───────────────────────────────────────────────

  protected persist(_stored: StoredSignal): void {}

  /** Load an entry from durable storage without dispatching it. */
  protected restore(stored: StoredSignal): void {
    this._log.push(stored);
    this._lastHash = stored.hash;
  }
}

// =============================================================================
// JSONL backend
// =============================================================================

export interface JsonlSignalJournalOptions {
  readonly filePath: string;
}

export class JsonlSignalJournal extends InMemorySignalJournal {
  private readonly _filePath: string;

  constructor(options: JsonlSignalJournalOptions) {
    super();
    this._filePath = options.filePath;
    ensureParentDir(this._filePath);

    for (const value of readJsonLines(this._filePath)) {
      const stored = parseStoredSignal(value);
      if (stored !== undefined) {
        this.restore(stored);
      }
    }
  }

  get filePath(): string {
    return this._filePath;
  }

  protected override persist(stored: StoredSignal): void {
    appendJsonLine(this._filePath, stored);
  }
}

function parseStoredSignal(value: unknown): StoredSignal | undefined {
  if (value === null || typeof value !== "object") return undefined;
  const v = value as Record<string, unknown>;
  if (
    typeof v.position !== "number" ||
    typeof v.previousHash !== "string" ||
    typeof v.hash !== "string" ||
    !isSignal(v.signal)
  ) {
    return undefined;
  }
  return {
    signal: v.signal,
    position: v.position,
    previousHash: v.previousHash,
    hash: v.hash,
  };
}
