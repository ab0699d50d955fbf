/**
 * Runtime type guard tests for @meridian/types
 *
 * Guards must accept engine-produced values and reject malformed input
 * arriving from the API or from files on disk.
 */
import { describe, it, expect } from "vitest";
import {
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
} from "../src/guards.js";
import { ZERO_ID, ZERO_ADDRESS } from "../src/identifiers.js";
import type { TransactionRecord } from "../src/transaction.js";

const ID = `0x${"ab".repeat(32)}`;
const ORIGIN = `0x${"11".repeat(20)}`;
const TARGET = `0x${"22".repeat(20)}`;

function makeRecord(overrides: Partial<TransactionRecord> = {}): TransactionRecord {
  return {
    id: ID,
    originDomain: ORIGIN,
    targetDomain: TARGET,
    payload: "0xdeadbeef",
    requestedTime: 1_000,
    expiry: 1_030,
    state: { tag: "BUFFERED" },
    revealed: false,
    creator: ORIGIN,
    refundRecipient: ORIGIN,
    creationHeight: 10,
    createdAt: 990,
    ...overrides,
  };
}

// =============================================================================
// Identifier guards
// =============================================================================

describe("isHex32", () => {
  it("accepts 64 hex digits with prefix", () => {
    expect(isHex32(ID)).toBe(true);
    expect(isHex32(ZERO_ID)).toBe(true);
  });

  it("accepts mixed case", () => {
    expect(isHex32(`0x${"Ab".repeat(32)}`)).toBe(true);
  });

  it("rejects wrong width", () => {
    expect(isHex32(`0x${"ab".repeat(31)}`)).toBe(false);
    expect(isHex32(`0x${"ab".repeat(33)}`)).toBe(false);
  });

  it("rejects missing prefix and non-strings", () => {
    expect(isHex32("ab".repeat(32))).toBe(false);
    expect(isHex32(42)).toBe(false);
    expect(isHex32(null)).toBe(false);
  });
});

describe("isAddress", () => {
  it("accepts 40 hex digits with prefix", () => {
    expect(isAddress(ORIGIN)).toBe(true);
    expect(isAddress(ZERO_ADDRESS)).toBe(true);
  });

  it("rejects a 256-bit id", () => {
    expect(isAddress(ID)).toBe(false);
  });
});

describe("isHexBytes", () => {
  it("accepts the empty blob", () => {
    expect(isHexBytes("0x")).toBe(true);
  });

  it("rejects odd-length hex", () => {
    expect(isHexBytes("0xabc")).toBe(false);
  });

  it("rejects non-hex characters", () => {
    expect(isHexBytes("0xzz")).toBe(false);
  });
});

describe("isRole", () => {
  it("accepts the three capabilities", () => {
    expect(isRole("BUFFER")).toBe(true);
    expect(isRole("RESOLVE")).toBe(true);
    expect(isRole("ADMIN")).toBe(true);
  });

  it("is case sensitive", () => {
    expect(isRole("admin")).toBe(false);
  });
});

// =============================================================================
// Lifecycle guards
// =============================================================================

describe("isTransactionStateTag", () => {
  it("rejects EMPTY, which is never stored", () => {
    expect(isTransactionStateTag("EMPTY")).toBe(false);
  });

  it("accepts every stored tag", () => {
    for (const tag of ["BUFFERED", "READY", "EXECUTED", "EXPIRED", "FAILED", "REFUNDED"]) {
      expect(isTransactionStateTag(tag)).toBe(true);
    }
  });
});

describe("isTransactionState", () => {
  it("requires the facts each tag carries", () => {
    expect(isTransactionState({ tag: "READY", readyAt: 5 })).toBe(true);
    expect(isTransactionState({ tag: "READY" })).toBe(false);
    expect(isTransactionState({ tag: "EXPIRED", expiredAt: 5, reason: "late" })).toBe(true);
    expect(isTransactionState({ tag: "EXPIRED", expiredAt: 5 })).toBe(false);
  });

  it("accepts REFUNDED only from a failed tag", () => {
    expect(isTransactionState({ tag: "REFUNDED", refundedAt: 1, from: "FAILED" })).toBe(true);
    expect(isTransactionState({ tag: "REFUNDED", refundedAt: 1, from: "READY" })).toBe(false);
  });

  it("rejects unknown tags", () => {
    expect(isTransactionState({ tag: "PENDING" })).toBe(false);
  });
});

describe("isTransactionRecord", () => {
  it("accepts a direct record", () => {
    expect(isTransactionRecord(makeRecord())).toBe(true);
  });

  it("accepts a committed, grouped record", () => {
    expect(
      isTransactionRecord(
        makeRecord({
          payload: "0x",
          commitmentHash: ID,
          revealDeadline: 60,
          swapGroupId: ID,
        }),
      ),
    ).toBe(true);
  });

  it("rejects a malformed dependency id", () => {
    expect(isTransactionRecord({ ...makeRecord(), dependencyId: "0x01" })).toBe(false);
  });

  it("rejects a record with a bare-string state", () => {
    expect(isTransactionRecord({ ...makeRecord(), state: "BUFFERED" })).toBe(false);
  });
});

describe("isSwapGroup", () => {
  it("accepts a well-formed group", () => {
    expect(
      isSwapGroup({ id: ID, members: [ID], readyCount: 0, status: "open", createdAt: 1 }),
    ).toBe(true);
  });

  it("rejects an unknown status", () => {
    expect(
      isSwapGroup({ id: ID, members: [], readyCount: 0, status: "closed", createdAt: 1 }),
    ).toBe(false);
  });
});

// =============================================================================
// Signal guards
// =============================================================================

describe("isSignal", () => {
  const metadata = {
    signalId: "sig-1",
    timestamp: "1970-01-01T00:16:40.000Z",
    time: 1_000,
    height: 10,
    actor: ORIGIN,
  };

  it("accepts a signal envelope", () => {
    expect(isSignal({ type: "Ready", metadata, payload: { id: ID, targetDomain: TARGET } })).toBe(true);
  });

  it("rejects an unknown type", () => {
    expect(isSignalType("Settled")).toBe(false);
    expect(isSignal({ type: "Settled", metadata, payload: {} })).toBe(false);
  });

  it("rejects metadata without an actor address", () => {
    expect(isSignal({ type: "Paused", metadata: { ...metadata, actor: "ops" }, payload: {} })).toBe(false);
  });
});
