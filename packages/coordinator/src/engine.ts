/**
 * Coordination Engine — the façade over every component.
 *
 * Composes:
 * - RoleRegistry (capabilities, owner, emergency admin)
 * - RateLimiter and CircuitBreaker (abuse resistance)
 * - TransactionLedger (admission)
 * - CommitRevealVerifier (delayed disclosure)
 * - DependencyResolver (BUFFERED → READY and settlement outcomes)
 * - SwapGroupTracker (all-or-nothing groups)
 *
 * Every call runs to completion before returning. Signals raised during
 * a call are journaled when it finishes, whether it succeeded or not, so
 * a rejected resolve still publishes its Failed signal.
 *
 * Roles, ownership, pause, tunables, breaker state and rate counters are
 * not kept in the record store; on construction they are rebuilt by
 * replaying the signal journal.
 */

import { randomUUID } from "node:crypto";
import type {
  RecordStore,
  SignalJournal,
  StoredSignal,
} from "@meridian/store";
import { InMemoryRecordStore, InMemorySignalJournal } from "@meridian/store";
import type {
  Address,
  Hex32,
  ObservedState,
  Role,
  RoleGrant,
  Signal,
  SignalBody,
  SwapGroup,
  SwapGroupSummary,
  TransactionRecord,
} from "@meridian/types";
import { isRole } from "@meridian/types";
import { CircuitBreaker } from "./circuit-breaker.js";
import type { CircuitBreakerStatus } from "./circuit-breaker.js";
import type { Clock } from "./clock.js";
import type {
  EngineConfig,
  EngineConfigOverrides,
  TunableSetting,
} from "./config.js";
import { assertTunable, resolveEngineConfig } from "./config.js";
import type { OperationContext } from "./context.js";
import {
  computeCommitment,
  parseAddress,
  parseHex32,
  parseHexBytes,
  parseNonZeroHex32,
} from "./encoding.js";
import { CoordinationError } from "./errors.js";
import { CommitRevealVerifier } from "./commit-reveal.js";
import type {
  BufferCommittedInput,
  BufferInput,
  ListRecordsFilter,
} from "./ledger.js";
import { TransactionLedger } from "./ledger.js";
import { ProcessingLocks } from "./processing-locks.js";
import { RateLimiter } from "./rate-limiter.js";
import { DependencyResolver } from "./resolver.js";
import { RoleRegistry } from "./role-registry.js";
import { SwapGroupTracker } from "./swap-groups.js";

export interface CoordinationEngineOptions {
  /** Holds ADMIN from the start and alone grants roles */
  readonly owner: string;

  readonly clock: Clock;

  /** Defaults to an in-memory store */
  readonly store?: RecordStore | undefined;

  /** Defaults to an in-memory journal */
  readonly journal?: SignalJournal | undefined;

  readonly config?: EngineConfigOverrides | undefined;

  /** Signal id source. Defaults to random UUIDs. */
  readonly signalId?: (() => string) | undefined;
}

// =============================================================================
// Engine
// =============================================================================

export class CoordinationEngine {
  readonly store: RecordStore;
  readonly journal: SignalJournal;

  private readonly clock: Clock;
  private readonly nextSignalId: () => string;
  private config: EngineConfig;
  private paused = false;

  private readonly roles: RoleRegistry;
  private readonly rateLimiter: RateLimiter;
  private readonly breaker: CircuitBreaker;
  private readonly locks = new ProcessingLocks();
  private readonly groups: SwapGroupTracker;
  private readonly ledger: TransactionLedger;
  private readonly verifier: CommitRevealVerifier;
  private readonly resolver: DependencyResolver;

  constructor(options: CoordinationEngineOptions) {
    this.config = resolveEngineConfig(options.config);
    this.clock = options.clock;
    this.store = options.store ?? new InMemoryRecordStore();
    this.journal = options.journal ?? new InMemorySignalJournal();
    this.nextSignalId = options.signalId ?? randomUUID;

    const owner = parseAddress(options.owner, "owner");
    const history = this.journal.readAll();
    const config = (): EngineConfig => this.config;

    this.roles = new RoleRegistry(owner);
    this.rateLimiter = new RateLimiter({
      globalLimit: this.config.globalRateLimit,
      submitterLimit: this.config.submitterRateLimit,
      retainPeriods: this.config.rateLimitRetainPeriods,
    });
    this.breaker = new CircuitBreaker({
      threshold: this.config.circuitBreakerThreshold,
      cooldownSeconds: this.config.circuitBreakerCooldown,
      startTime: history[0]?.signal.metadata.time ?? this.clock.now(),
    });
    this.groups = new SwapGroupTracker(this.store, this.breaker, config);
    this.ledger = new TransactionLedger(this.store, this.rateLimiter, this.groups, config);
    this.verifier = new CommitRevealVerifier(this.ledger, config);
    this.resolver = new DependencyResolver({
      ledger: this.ledger,
      groups: this.groups,
      breaker: this.breaker,
      locks: this.locks,
      config,
    });

    if (history.length === 0) {
      this.run(owner, (ctx) => {
        this.roles.grant("ADMIN", owner);
        ctx.emit({ type: "RoleGranted", payload: { role: "ADMIN", account: owner } });
      });
    } else {
      this.replay(history);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transactions
  // ───────────────────────────────────────────────────────────────────────

  buffer(caller: string, input: BufferInput): TransactionRecord {
    return this.run(caller, (ctx) => {
      this.admitMutation(ctx, "BUFFER");
      return this.ledger.buffer(ctx, input);
    });
  }

  bufferCommitted(caller: string, input: BufferCommittedInput): TransactionRecord {
    return this.run(caller, (ctx) => {
      this.admitMutation(ctx, "BUFFER");
      return this.ledger.bufferCommitted(ctx, input);
    });
  }

  reveal(caller: string, id: string, payload: string, secret: string): TransactionRecord {
    return this.run(caller, (ctx) => {
      this.roles.requireRole("BUFFER", ctx.caller);
      this.assertNotPaused();
      return this.verifier.reveal(ctx, parseHex32(id, "id"), payload, secret);
    });
  }

  resolve(caller: string, id: string): TransactionRecord {
    return this.run(caller, (ctx) => {
      this.admitMutation(ctx, "RESOLVE");
      return this.resolver.resolve(ctx, parseHex32(id, "id"));
    });
  }

  markExecuted(caller: string, id: string): TransactionRecord {
    return this.run(caller, (ctx) => {
      this.roles.requireRole("RESOLVE", ctx.caller);
      this.assertNotPaused();
      return this.resolver.markExecuted(ctx, parseHex32(id, "id"));
    });
  }

  markFailed(caller: string, id: string, reason: string): TransactionRecord {
    return this.run(caller, (ctx) => {
      this.roles.requireRole("RESOLVE", ctx.caller);
      this.assertNotPaused();
      return this.resolver.markFailed(ctx, parseHex32(id, "id"), reason);
    });
  }

  claimRefund(caller: string, id: string): TransactionRecord {
    return this.run(caller, (ctx) => {
      this.assertNotPaused();
      return this.resolver.claimRefund(ctx, parseHex32(id, "id"));
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Swap groups
  // ───────────────────────────────────────────────────────────────────────

  addToGroup(caller: string, id: string, groupId: string): SwapGroup {
    return this.run(caller, (ctx) => {
      this.roles.requireRole("BUFFER", ctx.caller);
      this.assertNotPaused();
      const record = this.ledger.require(parseHex32(id, "id"));
      return this.groups.addToGroup(ctx, record, parseNonZeroHex32(groupId, "groupId"));
    });
  }

  expireGroup(caller: string, groupId: string): readonly Hex32[] {
    return this.run(caller, (ctx) => {
      this.roles.requireRole("RESOLVE", ctx.caller);
      this.assertNotPaused();
      return this.groups.expireGroup(ctx, parseHex32(groupId, "groupId"));
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Roles and ownership
  // ───────────────────────────────────────────────────────────────────────

  /** @returns false when the account already held the role */
  grantRole(caller: string, role: string, account: string): boolean {
    return this.run(caller, (ctx) => {
      this.roles.requireOwner(ctx.caller);
      const parsedRole = parseRole(role);
      const grantee = parseAddress(account, "account");
      const changed = this.roles.grant(parsedRole, grantee);
      if (changed) {
        ctx.emit({ type: "RoleGranted", payload: { role: parsedRole, account: grantee } });
      }
      return changed;
    });
  }

  /** @returns false when the account did not hold the role */
  revokeRole(caller: string, role: string, account: string): boolean {
    return this.run(caller, (ctx) => {
      this.roles.requireOwner(ctx.caller);
      const parsedRole = parseRole(role);
      const grantee = parseAddress(account, "account");
      const changed = this.roles.revoke(parsedRole, grantee);
      if (changed) {
        ctx.emit({ type: "RoleRevoked", payload: { role: parsedRole, account: grantee } });
      }
      return changed;
    });
  }

  transferOwnership(caller: string, newOwner: string): void {
    this.run(caller, (ctx) => {
      this.roles.requireOwner(ctx.caller);
      const next = parseAddress(newOwner, "newOwner");
      const previousOwner = this.roles.transferOwnership(next);
      ctx.emit({
        type: "OwnershipTransferred",
        payload: { previousOwner, newOwner: next },
      });
    });
  }

  setEmergencyAdmin(caller: string, account: string): void {
    this.run(caller, (ctx) => {
      this.roles.requireOwner(ctx.caller);
      const emergencyAdmin = parseAddress(account, "emergencyAdmin");
      this.roles.setEmergencyAdmin(emergencyAdmin);
      ctx.emit({ type: "EmergencyAdminChanged", payload: { emergencyAdmin } });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Pause and breaker
  // ───────────────────────────────────────────────────────────────────────

  pause(caller: string): void {
    this.run(caller, (ctx) => {
      this.roles.requirePauser(ctx.caller);
      if (this.paused) {
        throw new CoordinationError("STATE_ERROR", "Engine is already paused");
      }
      this.paused = true;
      ctx.emit({ type: "Paused", payload: {} });
    });
  }

  unpause(caller: string): void {
    this.run(caller, (ctx) => {
      this.roles.requireAdmin(ctx.caller);
      if (!this.paused) {
        throw new CoordinationError("STATE_ERROR", "Engine is not paused");
      }
      this.paused = false;
      ctx.emit({ type: "Unpaused", payload: {} });
    });
  }

  resetBreaker(caller: string): CircuitBreakerStatus {
    return this.run(caller, (ctx) => {
      this.roles.requireAdmin(ctx.caller);
      const previousFailureCount = this.breaker.reset(ctx.time);
      ctx.emit({ type: "CircuitBreakerReset", payload: { previousFailureCount } });
      return this.breaker.status();
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Tunables
  // ───────────────────────────────────────────────────────────────────────

  setCoordinationWindow(caller: string, seconds: number): void {
    this.setTunable(caller, "coordinationWindow", seconds);
  }

  setMaxPayloadSize(caller: string, bytes: number): void {
    this.setTunable(caller, "maxPayloadSize", bytes);
  }

  setCircuitBreakerThreshold(caller: string, threshold: number): void {
    this.setTunable(caller, "circuitBreakerThreshold", threshold);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getRecord(id: string): TransactionRecord | undefined {
    return this.ledger.get(parseHex32(id, "id"));
  }

  getState(id: string): ObservedState {
    return this.ledger.observedState(parseHex32(id, "id"));
  }

  isReady(id: string): boolean {
    return this.getState(id) === "READY";
  }

  listRecords(filter?: ListRecordsFilter): readonly TransactionRecord[] {
    return this.ledger.list(filter);
  }

  /**
   * READY records a settlement layer for `targetDomain` may act on.
   * Members of groups that are not yet complete are withheld.
   */
  readyForDomain(targetDomain: string): readonly TransactionRecord[] {
    const target = parseAddress(targetDomain, "targetDomain");
    return this.ledger
      .list({ state: "READY", targetDomain: target })
      .filter((r) => this.groups.isSettleable(r));
  }

  transactionCount(): number {
    return this.ledger.count();
  }

  groupStatus(groupId: string): SwapGroupSummary {
    return this.groups.status(parseHex32(groupId, "groupId"));
  }

  groupMembers(groupId: string): readonly Hex32[] {
    return this.groups.get(parseHex32(groupId, "groupId"))?.members ?? [];
  }

  getGroup(groupId: string): SwapGroup | undefined {
    return this.groups.get(parseHex32(groupId, "groupId"));
  }

  hasRole(role: string, account: string): boolean {
    return this.roles.hasRole(parseRole(role), parseAddress(account, "account"));
  }

  listRoleGrants(): readonly RoleGrant[] {
    return this.roles.listGrants();
  }

  owner(): Address {
    return this.roles.owner;
  }

  emergencyAdmin(): Address {
    return this.roles.emergencyAdmin;
  }

  isPaused(): boolean {
    return this.paused;
  }

  circuitBreakerStatus(): CircuitBreakerStatus {
    return this.breaker.status();
  }

  getConfig(): EngineConfig {
    return this.config;
  }

  /** sha256(payload ‖ secret), for clients preparing a committed submission. */
  computeCommitment(payload: string, secret: string): Hex32 {
    return computeCommitment(
      parseHexBytes(payload, "payload"),
      parseHex32(secret, "secret"),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run one call. Signals raised by `fn` are journaled after it
   * returns or throws, all of them before any subscriber runs. When `fn`
   * threw, its error wins and a subscriber failure becomes its cause.
   */
  private run<T>(rawCaller: string, fn: (ctx: OperationContext) => T): T {
    const caller = parseAddress(rawCaller, "caller");
    const time = this.clock.now();
    const height = this.clock.height();
    const pending: SignalBody[] = [];

    const ctx: OperationContext = {
      caller,
      time,
      height,
      emit: (body) => {
        pending.push(body);
      },
    };

    let result: T;
    try {
      result = fn(ctx);
    } catch (err) {
      try {
        this.publish(pending, ctx);
      } catch (deliveryError) {
        if (!(err instanceof Error) || err.cause !== undefined) {
          throw new AggregateError([err, deliveryError], "Call and signal delivery both failed");
        }
        err.cause = deliveryError;
      }
      throw err;
    }

    this.publish(pending, ctx);
    return result;
  }

  private publish(pending: readonly SignalBody[], ctx: OperationContext): void {
    if (pending.length > 0) {
      this.journal.appendAll(pending.map((body) => this.toSignal(body, ctx)));
    }
  }

  private toSignal(body: SignalBody, ctx: OperationContext): Signal {
    return {
      ...body,
      metadata: {
        signalId: this.nextSignalId(),
        timestamp: new Date(ctx.time * 1000).toISOString(),
        time: ctx.time,
        height: ctx.height,
        actor: ctx.caller,
      },
    };
  }

  /** Capability, pause and breaker checks, in that order. */
  private admitMutation(ctx: OperationContext, role: Role): void {
    this.roles.requireRole(role, ctx.caller);
    this.assertNotPaused();
    this.breaker.assertClosed();
  }

  private assertNotPaused(): void {
    if (this.paused) {
      throw new CoordinationError("STATE_ERROR", "Engine is paused");
    }
  }

  private setTunable(caller: string, key: TunableSetting, value: number): void {
    this.run(caller, (ctx) => {
      this.roles.requireAdmin(ctx.caller);
      assertTunable(key, value);
      this.applyTunable(key, value);
      ctx.emit({ type: "ConfigUpdated", payload: { key, value } });
    });
  }

  private applyTunable(key: TunableSetting, value: number): void {
    switch (key) {
      case "coordinationWindow":
        this.config = { ...this.config, coordinationWindow: value };
        break;
      case "maxPayloadSize":
        this.config = { ...this.config, maxPayloadSize: value };
        break;
      case "circuitBreakerThreshold":
        this.config = { ...this.config, circuitBreakerThreshold: value };
        this.breaker.setThreshold(value);
        break;
    }
  }

  /**
   * Rebuild the state that lives outside the record store.
   */
  private replay(history: readonly StoredSignal[]): void {
    let failureCount = 0;
    let tripped = false;
    let lastResetTime = this.breaker.status().lastResetTime;
    const oldestPeriod = this.clock.height() - this.config.rateLimitRetainPeriods;

    for (const { signal } of history) {
      switch (signal.type) {
        case "RoleGranted":
          this.roles.grant(signal.payload.role, signal.payload.account);
          break;
        case "RoleRevoked":
          this.roles.revoke(signal.payload.role, signal.payload.account);
          break;
        case "OwnershipTransferred":
          this.roles.transferOwnership(signal.payload.newOwner);
          break;
        case "EmergencyAdminChanged":
          this.roles.setEmergencyAdmin(signal.payload.emergencyAdmin);
          break;
        case "Paused":
          this.paused = true;
          break;
        case "Unpaused":
          this.paused = false;
          break;
        case "ConfigUpdated":
          this.applyTunable(signal.payload.key, signal.payload.value);
          break;
        case "Failed":
          failureCount += 1;
          // Same rule as a live failure, against the threshold in force then
          if (failureCount >= this.breaker.status().threshold) {
            tripped = true;
          }
          break;
        case "CircuitBreakerTripped":
          tripped = true;
          break;
        case "CircuitBreakerReset":
          failureCount = 0;
          tripped = false;
          lastResetTime = signal.metadata.time;
          break;
        case "Buffered":
          if (signal.metadata.height >= oldestPeriod) {
            this.rateLimiter.record(signal.metadata.height, signal.metadata.actor);
          }
          break;
        default:
          break;
      }
    }

    this.breaker.restore({ failureCount, tripped, lastResetTime });
  }
}

function parseRole(value: string): Role {
  if (!isRole(value)) {
    throw new CoordinationError(
      "VALIDATION_ERROR",
      `role must be one of BUFFER, RESOLVE, ADMIN; got '${value}'`,
      { field: "role" },
    );
  }
  return value;
}
