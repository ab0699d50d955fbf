/**
 * Tests for the record lifecycle transition table and functions.
 */

import { describe, it, expect } from "vitest";
import type { TransactionStateTag } from "@meridian/types";
import {
  VALID_TRANSITIONS,
  canTransition,
  isLive,
  isTerminal,
  toExecuted,
  toExpired,
  toFailed,
  toReady,
  toRefunded,
} from "../src/lifecycle.js";
import { CoordinationError } from "../src/errors.js";

const ALL: readonly TransactionStateTag[] = [
  "BUFFERED",
  "READY",
  "EXECUTED",
  "EXPIRED",
  "FAILED",
  "REFUNDED",
];

describe("VALID_TRANSITIONS", () => {
  it("never allows a transition back to BUFFERED", () => {
    for (const from of ALL) {
      expect(canTransition(from, "BUFFERED")).toBe(false);
    }
  });

  it("treats EXECUTED and REFUNDED as terminal", () => {
    expect(ALL.filter(isTerminal)).toEqual(["EXECUTED", "REFUNDED"]);
  });

  it("only refunds failed or expired records", () => {
    const refundable = ALL.filter((tag) => VALID_TRANSITIONS[tag].includes("REFUNDED"));
    expect(refundable).toEqual(["EXPIRED", "FAILED"]);
  });

  it("considers BUFFERED and READY live", () => {
    expect(ALL.filter(isLive)).toEqual(["BUFFERED", "READY"]);
  });
});

describe("transition functions", () => {
  it("carries readyAt through execution", () => {
    const ready = toReady({ tag: "BUFFERED" }, 10);
    expect(toExecuted(ready, 20)).toEqual({ tag: "EXECUTED", readyAt: 10, executedAt: 20 });
  });

  it("expires from BUFFERED and READY", () => {
    expect(toExpired({ tag: "BUFFERED" }, 5, "late")).toEqual({
      tag: "EXPIRED",
      expiredAt: 5,
      reason: "late",
    });
    expect(toExpired({ tag: "READY", readyAt: 1 }, 5, "late").tag).toBe("EXPIRED");
  });

  it("records where a refund came from", () => {
    expect(toRefunded({ tag: "EXPIRED", expiredAt: 1, reason: "x" }, 9)).toEqual({
      tag: "REFUNDED",
      refundedAt: 9,
      from: "EXPIRED",
    });
    expect(toRefunded({ tag: "FAILED", failedAt: 1, reason: "x" }, 9)).toEqual({
      tag: "REFUNDED",
      refundedAt: 9,
      from: "FAILED",
    });
  });

  it("rejects disallowed edges with STATE_ERROR", () => {
    const executed = { tag: "EXECUTED", readyAt: 1, executedAt: 2 } as const;
    expect(() => toReady(executed, 3)).toThrow(CoordinationError);
    expect(() => toFailed(executed, 3, "x")).toThrow("Cannot transition from EXECUTED to FAILED");
    expect(() => toExecuted({ tag: "BUFFERED" }, 3)).toThrow(
      "Cannot transition from BUFFERED to EXECUTED",
    );
    expect(() => toRefunded({ tag: "READY", readyAt: 1 }, 3)).toThrow(CoordinationError);
  });
});
