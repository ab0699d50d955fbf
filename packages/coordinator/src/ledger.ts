/**
 * Transaction Ledger — admission of new records.
 *
 * Preconditions are checked in a fixed order and each failure rejects
 * before anything is written. Capability, pause and breaker checks run
 * in the engine before the ledger is reached; the ledger covers the
 * rest, starting with rate limits.
 */

import type { RecordStore } from "@meridian/store";
import type {
  Address,
  Hex32,
  ObservedState,
  TransactionRecord,
  TransactionStateTag,
} from "@meridian/types";
import { EMPTY_BYTES } from "@meridian/types";
import type { ConfigSource } from "./config.js";
import type { OperationContext } from "./context.js";
import {
  byteLength,
  parseAddress,
  parseHexBytes,
  parseNonZeroHex32,
  parseOptionalHex32,
} from "./encoding.js";
import { CoordinationError } from "./errors.js";
import type { RateLimiter } from "./rate-limiter.js";
import type { SwapGroupTracker } from "./swap-groups.js";

// =============================================================================
// Inputs
// =============================================================================

/** Direct submission: the payload is public from the start. */
export interface BufferInput {
  readonly id: string;
  readonly originDomain: string;
  readonly targetDomain: string;
  readonly payload: string;
  readonly dependencyId?: string | undefined;
  readonly requestedTime: number;
}

/** Committed submission: only sha256(payload ‖ secret) is disclosed. */
export interface BufferCommittedInput {
  readonly id: string;
  readonly originDomain: string;
  readonly targetDomain: string;
  readonly commitmentHash: string;
  readonly dependencyId?: string | undefined;
  readonly requestedTime: number;
  readonly groupId?: string | undefined;

  /** Defaults to the caller */
  readonly refundRecipient?: string | undefined;
}

export interface ListRecordsFilter {
  readonly state?: TransactionStateTag | undefined;
  readonly targetDomain?: string | undefined;
}

// =============================================================================
// Ledger
// =============================================================================

export class TransactionLedger {
  private readonly store: RecordStore;
  private readonly rateLimiter: RateLimiter;
  private readonly groups: SwapGroupTracker;
  private readonly config: ConfigSource;

  constructor(
    store: RecordStore,
    rateLimiter: RateLimiter,
    groups: SwapGroupTracker,
    config: ConfigSource,
  ) {
    this.store = store;
    this.rateLimiter = rateLimiter;
    this.groups = groups;
    this.config = config;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Admission
  // ───────────────────────────────────────────────────────────────────────

  buffer(ctx: OperationContext, input: BufferInput): TransactionRecord {
    this.rateLimiter.check(ctx.height, ctx.caller);
    const id = this.parseFreshId(input.id);
    const [originDomain, targetDomain] = this.parseDomains(input);

    const payload = parseHexBytes(input.payload, "payload");
    const size = byteLength(payload);
    if (size === 0) {
      throw new CoordinationError("VALIDATION_ERROR", "payload must not be empty", {
        field: "payload",
      });
    }
    this.assertPayloadSize(size);

    this.assertRequestedTime(ctx, input.requestedTime);
    const dependencyId = this.parseDependency(id, input.dependencyId);

    const record: TransactionRecord = {
      id,
      originDomain,
      targetDomain,
      payload,
      ...(dependencyId !== undefined ? { dependencyId } : {}),
      requestedTime: input.requestedTime,
      expiry: input.requestedTime + this.config().coordinationWindow,
      state: { tag: "BUFFERED" },
      revealed: false,
      creator: ctx.caller,
      refundRecipient: ctx.caller,
      creationHeight: ctx.height,
      createdAt: ctx.time,
    };

    return this.admit(ctx, record);
  }

  bufferCommitted(
    ctx: OperationContext,
    input: BufferCommittedInput,
  ): TransactionRecord {
    this.rateLimiter.check(ctx.height, ctx.caller);
    const id = this.parseFreshId(input.id);
    const [originDomain, targetDomain] = this.parseDomains(input);
    const commitmentHash = parseNonZeroHex32(input.commitmentHash, "commitmentHash");
    this.assertRequestedTime(ctx, input.requestedTime);
    const dependencyId = this.parseDependency(id, input.dependencyId);

    const groupId = parseOptionalHex32(input.groupId, "groupId");
    if (groupId !== undefined) {
      this.groups.assertCanJoin(groupId);
    }

    const refundRecipient: Address =
      input.refundRecipient === undefined
        ? ctx.caller
        : parseAddress(input.refundRecipient, "refundRecipient");

    const record: TransactionRecord = {
      id,
      originDomain,
      targetDomain,
      payload: EMPTY_BYTES,
      ...(dependencyId !== undefined ? { dependencyId } : {}),
      requestedTime: input.requestedTime,
      expiry: input.requestedTime + this.config().coordinationWindow,
      state: { tag: "BUFFERED" },
      commitmentHash,
      revealDeadline: ctx.height + this.config().revealWindow,
      revealed: false,
      creator: ctx.caller,
      refundRecipient,
      ...(groupId !== undefined ? { swapGroupId: groupId } : {}),
      creationHeight: ctx.height,
      createdAt: ctx.time,
    };

    return this.admit(ctx, record);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(id: Hex32): TransactionRecord | undefined {
    return this.store.getRecord(id);
  }

  /** Missing records are a STATE_ERROR: the id is in the EMPTY state. */
  require(id: Hex32): TransactionRecord {
    const record = this.store.getRecord(id);
    if (record === undefined) {
      throw new CoordinationError(
        "STATE_ERROR",
        `Transaction '${id}' not found`,
        { id, state: "EMPTY" },
      );
    }
    return record;
  }

  observedState(id: Hex32): ObservedState {
    return this.store.getRecord(id)?.state.tag ?? "EMPTY";
  }

  list(filter: ListRecordsFilter = {}): readonly TransactionRecord[] {
    const target = filter.targetDomain?.toLowerCase();
    return this.store.listRecords().filter(
      (r) =>
        (filter.state === undefined || r.state.tag === filter.state) &&
        (target === undefined || r.targetDomain === target),
    );
  }

  count(): number {
    return this.store.recordCount();
  }

  /** Replace the stored record with a new version. */
  update(record: TransactionRecord): void {
    this.store.putRecord(record);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private admit(ctx: OperationContext, record: TransactionRecord): TransactionRecord {
    this.store.putRecord(record);
    if (record.swapGroupId !== undefined) {
      this.groups.join(ctx, record.swapGroupId, record.id);
    }
    this.rateLimiter.record(ctx.height, ctx.caller);

    ctx.emit({
      type: "Buffered",
      payload: {
        id: record.id,
        originDomain: record.originDomain,
        targetDomain: record.targetDomain,
        requestedTime: record.requestedTime,
        committed: record.commitmentHash !== undefined,
      },
    });
    return record;
  }

  private parseFreshId(raw: string): Hex32 {
    const id = parseNonZeroHex32(raw, "id");
    if (this.store.hasRecord(id)) {
      throw new CoordinationError(
        "VALIDATION_ERROR",
        `Transaction '${id}' already exists`,
        { id },
      );
    }
    return id;
  }

  private parseDomains(input: {
    readonly originDomain: string;
    readonly targetDomain: string;
  }): [Address, Address] {
    const origin = parseAddress(input.originDomain, "originDomain");
    const target = parseAddress(input.targetDomain, "targetDomain");
    if (origin === target) {
      throw new CoordinationError(
        "VALIDATION_ERROR",
        "originDomain and targetDomain must differ",
        { field: "targetDomain" },
      );
    }
    return [origin, target];
  }

  private assertPayloadSize(size: number): void {
    const max = this.config().maxPayloadSize;
    if (size > max) {
      throw new CoordinationError(
        "VALIDATION_ERROR",
        `payload is ${size} bytes; the limit is ${max}`,
        { field: "payload", size, max },
      );
    }
  }

  private assertRequestedTime(ctx: OperationContext, requestedTime: number): void {
    if (!Number.isSafeInteger(requestedTime)) {
      throw new CoordinationError(
        "VALIDATION_ERROR",
        "requestedTime must be an integer number of seconds",
        { field: "requestedTime" },
      );
    }
    const latest = ctx.time + this.config().maxFutureOffset;
    if (requestedTime < ctx.time || requestedTime > latest) {
      throw new CoordinationError(
        "VALIDATION_ERROR",
        `requestedTime must be within [${ctx.time}, ${latest}], got ${requestedTime}`,
        { field: "requestedTime", earliest: ctx.time, latest },
      );
    }
  }

  /**
   * Parse the dependency and reject any that would close a cycle.
   * Dependencies on ids not yet buffered are allowed.
   */
  private parseDependency(id: Hex32, raw: string | undefined): Hex32 | undefined {
    const dependencyId = parseOptionalHex32(raw, "dependencyId");
    if (dependencyId === undefined) return undefined;

    if (dependencyId === id) {
      throw new CoordinationError(
        "VALIDATION_ERROR",
        `Transaction '${id}' cannot depend on itself`,
        { field: "dependencyId" },
      );
    }

    const seen = new Set<Hex32>();
    let cursor: Hex32 | undefined = dependencyId;
    while (cursor !== undefined && !seen.has(cursor)) {
      seen.add(cursor);
      const next: Hex32 | undefined = this.store.getRecord(cursor)?.dependencyId;
      if (next === id) {
        throw new CoordinationError(
          "VALIDATION_ERROR",
          `Dependency on '${dependencyId}' would form a cycle through '${cursor}'`,
          { field: "dependencyId", via: cursor },
        );
      }
      cursor = next;
    }
    return dependencyId;
  }
}
