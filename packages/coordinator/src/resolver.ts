/**
 * Dependency Resolver — the state-transition core.
 *
 * resolve() moves a BUFFERED record to READY once every eligibility
 * condition holds. Each failed condition is reported to the circuit
 * breaker and paired with a Failed signal; the record stays BUFFERED,
 * except when it is found past expiry, which commits EXPIRED first.
 * Nothing is queued or retried here: callers re-invoke.
 */

import type {
  FailureReason,
  Hex32,
  TransactionRecord,
} from "@meridian/types";
import type { CircuitBreaker } from "./circuit-breaker.js";
import type { ConfigSource } from "./config.js";
import type { OperationContext } from "./context.js";
import type { CoordinationErrorCode } from "./errors.js";
import { CoordinationError } from "./errors.js";
import { reportFailure } from "./failures.js";
import type { TransactionLedger } from "./ledger.js";
import {
  assertTransition,
  toExecuted,
  toExpired,
  toFailed,
  toReady,
  toRefunded,
} from "./lifecycle.js";
import type { ProcessingLocks } from "./processing-locks.js";
import type { SwapGroupTracker } from "./swap-groups.js";

export interface ResolverDeps {
  readonly ledger: TransactionLedger;
  readonly groups: SwapGroupTracker;
  readonly breaker: CircuitBreaker;
  readonly locks: ProcessingLocks;
  readonly config: ConfigSource;
}

const MAX_REASON_LENGTH = 256;

export class DependencyResolver {
  private readonly deps: ResolverDeps;

  constructor(deps: ResolverDeps) {
    this.deps = deps;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Resolution
  // ───────────────────────────────────────────────────────────────────────

  resolve(ctx: OperationContext, id: Hex32): TransactionRecord {
    return this.deps.locks.withLock(id, () => {
      const record = this.deps.ledger.require(id);

      if (record.state.tag !== "BUFFERED") {
        throw new CoordinationError(
          "STATE_ERROR",
          `Transaction '${id}' is ${record.state.tag}; only BUFFERED records resolve`,
          { id, state: record.state.tag },
        );
      }

      const eligibleAt = record.creationHeight + this.deps.config().minResolutionDelay;
      if (ctx.height < eligibleAt) {
        this.fail(
          ctx,
          record,
          "RESOLUTION_DELAY",
          "TIMING_ERROR",
          `Transaction '${id}' needs height ${eligibleAt}, current ${ctx.height}`,
        );
      }

      const expired = ctx.time > record.expiry;

      if (record.commitmentHash !== undefined && !record.revealed && !expired) {
        this.fail(
          ctx,
          record,
          "NOT_REVEALED",
          "STATE_ERROR",
          `Transaction '${id}' has not been revealed`,
        );
      }

      if (expired) {
        this.deps.ledger.update({
          ...record,
          state: toExpired(record.state, ctx.time, "coordination window elapsed"),
        });
        ctx.emit({ type: "Expired", payload: { id } });
        this.fail(
          ctx,
          record,
          "EXPIRED",
          "TIMING_ERROR",
          `Transaction '${id}' expired at ${record.expiry}`,
        );
      }

      if (record.dependencyId !== undefined) {
        const dependency = this.deps.ledger.get(record.dependencyId);
        const tag = dependency?.state.tag ?? "EMPTY";
        if (tag !== "READY" && tag !== "EXECUTED") {
          this.fail(
            ctx,
            record,
            "DEPENDENCY_UNMET",
            "DEPENDENCY_UNMET",
            `Dependency '${record.dependencyId}' is ${tag}`,
          );
        }
      }

      if (ctx.time < record.requestedTime) {
        this.fail(
          ctx,
          record,
          "NOT_YET_DUE",
          "TIMING_ERROR",
          `Transaction '${id}' is not due until ${record.requestedTime}`,
        );
      }

      const ready: TransactionRecord = {
        ...record,
        state: toReady(record.state, ctx.time),
      };
      this.deps.ledger.update(ready);
      ctx.emit({
        type: "Ready",
        payload: { id, targetDomain: record.targetDomain },
      });

      if (record.swapGroupId !== undefined) {
        this.deps.groups.memberReady(ctx, record.swapGroupId);
      }
      return ready;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Settlement outcomes
  // ───────────────────────────────────────────────────────────────────────

  markExecuted(ctx: OperationContext, id: Hex32): TransactionRecord {
    const record = this.deps.ledger.require(id);
    assertTransition(record, "EXECUTED");

    if (record.swapGroupId !== undefined && !this.deps.groups.isSettleable(record)) {
      throw new CoordinationError(
        "STATE_ERROR",
        `Swap group '${record.swapGroupId}' is not complete`,
        { id, groupId: record.swapGroupId },
      );
    }

    const executed: TransactionRecord = {
      ...record,
      state: toExecuted(record.state, ctx.time),
    };
    this.deps.ledger.update(executed);
    ctx.emit({ type: "Executed", payload: { id } });
    return executed;
  }

  markFailed(ctx: OperationContext, id: Hex32, reason: string): TransactionRecord {
    const trimmed = reason.trim();
    if (trimmed.length === 0 || trimmed.length > MAX_REASON_LENGTH) {
      throw new CoordinationError(
        "VALIDATION_ERROR",
        `reason must be 1 to ${MAX_REASON_LENGTH} characters`,
        { field: "reason" },
      );
    }

    const record = this.deps.ledger.require(id);
    assertTransition(record, "FAILED");

    const failed: TransactionRecord = {
      ...record,
      state: toFailed(record.state, ctx.time, trimmed),
    };
    this.deps.ledger.update(failed);

    if (record.swapGroupId !== undefined && record.state.tag === "READY") {
      this.deps.groups.memberUnready(record.swapGroupId);
    }
    reportFailure(ctx, this.deps.breaker, id, "REPORTED", trimmed);
    return failed;
  }

  claimRefund(ctx: OperationContext, id: Hex32): TransactionRecord {
    const record = this.deps.ledger.require(id);

    if (ctx.caller !== record.refundRecipient) {
      throw new CoordinationError(
        "AUTHORIZATION_ERROR",
        `Only ${record.refundRecipient} may claim the refund for '${id}'`,
        { id, caller: ctx.caller },
      );
    }
    assertTransition(record, "REFUNDED");

    const refunded: TransactionRecord = {
      ...record,
      state: toRefunded(record.state, ctx.time),
    };
    this.deps.ledger.update(refunded);
    ctx.emit({
      type: "Refunded",
      payload: { id, recipient: record.refundRecipient },
    });
    return refunded;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private fail(
    ctx: OperationContext,
    record: TransactionRecord,
    reason: FailureReason,
    code: CoordinationErrorCode,
    message: string,
  ): never {
    reportFailure(ctx, this.deps.breaker, record.id, reason, message);
    throw new CoordinationError(code, message, { id: record.id, reason });
  }
}
