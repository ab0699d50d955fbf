/**
 * Tests for admission through CoordinationEngine.buffer / bufferCommitted.
 *
 * Verifies:
 * - Each precondition rejects with its code
 * - Preconditions are checked in order
 * - Rejections leave no trace in the store or journal
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  BUFFERER,
  OUTSIDER,
  OWNER,
  R1,
  R2,
  SECRET,
  T0,
  H0,
  committed,
  direct,
  expectCode,
  groupId,
  setup,
  signalTypesSince,
  txId,
} from "./fixtures.js";
import type { Harness } from "./fixtures.js";

describe("buffer", () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
  });

  it("stores a BUFFERED record with expiry fixed at creation", () => {
    const record = h.engine.buffer(BUFFERER, direct(1));

    expect(record).toEqual({
      id: txId(1),
      originDomain: R1,
      targetDomain: R2,
      payload: "0xdeadbeef",
      requestedTime: T0 + 30,
      expiry: T0 + 60,
      state: { tag: "BUFFERED" },
      revealed: false,
      creator: BUFFERER,
      refundRecipient: BUFFERER,
      creationHeight: H0,
      createdAt: T0,
    });
    expect(h.engine.getState(txId(1))).toBe("BUFFERED");
    expect(h.engine.transactionCount()).toBe(1);
  });

  it("emits Buffered", () => {
    const before = h.engine.journal.position();
    h.engine.buffer(BUFFERER, direct(1));

    const [stored] = h.engine.journal.readAll({ fromPosition: before + 1 });
    expect(stored?.signal.type).toBe("Buffered");
    expect(stored?.signal.payload).toEqual({
      id: txId(1),
      originDomain: R1,
      targetDomain: R2,
      requestedTime: T0 + 30,
      committed: false,
    });
    expect(stored?.signal.metadata.actor).toBe(BUFFERER);
    expect(stored?.signal.metadata.height).toBe(H0);
  });

  it("normalises identifiers to lowercase", () => {
    const upper = `0x${"AB".repeat(32)}`;
    const record = h.engine.buffer(BUFFERER, direct(1, { id: upper }));
    expect(record.id).toBe(`0x${"ab".repeat(32)}`);
    expect(h.engine.getState(upper)).toBe("BUFFERED");
  });

  it("treats a zero dependency as none", () => {
    const record = h.engine.buffer(
      BUFFERER,
      direct(1, { dependencyId: `0x${"0".repeat(64)}` }),
    );
    expect(record.dependencyId).toBeUndefined();
    expect("dependencyId" in record).toBe(false);
  });

  // ─── Rejections ─────────────────────────────────────────────────────

  it("requires BUFFER capability", () => {
    expectCode(() => h.engine.buffer(OUTSIDER, direct(1)), "AUTHORIZATION_ERROR");
    expectCode(() => h.engine.buffer(OWNER, direct(1)), "AUTHORIZATION_ERROR");
  });

  it("rejects while paused", () => {
    h.engine.pause(OWNER);
    const err = expectCode(() => h.engine.buffer(BUFFERER, direct(1)), "STATE_ERROR");
    expect(err.message).toBe("Engine is paused");
  });

  it("checks capability before pause", () => {
    h.engine.pause(OWNER);
    expectCode(() => h.engine.buffer(OUTSIDER, direct(1)), "AUTHORIZATION_ERROR");
  });

  it("rejects a reused id regardless of other fields", () => {
    h.engine.buffer(BUFFERER, direct(1));
    const err = expectCode(
      () =>
        h.engine.buffer(
          BUFFERER,
          direct(1, { payload: "0x01", requestedTime: T0 + 100 }),
        ),
      "VALIDATION_ERROR",
    );
    expect(err.message).toBe(`Transaction '${txId(1)}' already exists`);
  });

  it("rejects the zero id", () => {
    expectCode(
      () => h.engine.buffer(BUFFERER, direct(1, { id: `0x${"0".repeat(64)}` })),
      "VALIDATION_ERROR",
    );
  });

  it("rejects equal origin and target", () => {
    const err = expectCode(
      () => h.engine.buffer(BUFFERER, direct(1, { targetDomain: R1 })),
      "VALIDATION_ERROR",
    );
    expect(err.message).toBe("originDomain and targetDomain must differ");
  });

  it("rejects a zero domain", () => {
    expectCode(
      () => h.engine.buffer(BUFFERER, direct(1, { originDomain: `0x${"0".repeat(40)}` })),
      "VALIDATION_ERROR",
    );
  });

  it("rejects an empty payload on the direct path", () => {
    const err = expectCode(
      () => h.engine.buffer(BUFFERER, direct(1, { payload: "0x" })),
      "VALIDATION_ERROR",
    );
    expect(err.message).toBe("payload must not be empty");
  });

  it("accepts a payload at the size bound and rejects one byte more", () => {
    h.engine.buffer(BUFFERER, direct(1, { payload: `0x${"ff".repeat(2048)}` }));
    const err = expectCode(
      () => h.engine.buffer(BUFFERER, direct(2, { payload: `0x${"ff".repeat(2049)}` })),
      "VALIDATION_ERROR",
    );
    expect(err.message).toBe("payload is 2049 bytes; the limit is 2048");
  });

  it("bounds requestedTime to [now, now + 24h]", () => {
    expectCode(
      () => h.engine.buffer(BUFFERER, direct(1, { requestedTime: T0 - 1 })),
      "VALIDATION_ERROR",
    );
    expectCode(
      () => h.engine.buffer(BUFFERER, direct(1, { requestedTime: T0 + 86_401 })),
      "VALIDATION_ERROR",
    );
    h.engine.buffer(BUFFERER, direct(1, { requestedTime: T0 }));
    h.engine.buffer(BUFFERER, direct(2, { requestedTime: T0 + 86_400 }));
    expect(h.engine.transactionCount()).toBe(2);
  });

  it("rejects a self-dependency", () => {
    const err = expectCode(
      () => h.engine.buffer(BUFFERER, direct(1, { dependencyId: txId(1) })),
      "VALIDATION_ERROR",
    );
    expect(err.message).toBe(`Transaction '${txId(1)}' cannot depend on itself`);
  });

  it("rejects a dependency that would close a cycle", () => {
    // 1 depends on 2, which does not exist yet
    h.engine.buffer(BUFFERER, direct(1, { dependencyId: txId(2) }));
    const err = expectCode(
      () => h.engine.buffer(BUFFERER, direct(2, { dependencyId: txId(1) })),
      "VALIDATION_ERROR",
    );
    expect(err.details).toEqual({ field: "dependencyId", via: txId(1) });
  });

  it("rejects a longer cycle", () => {
    h.engine.buffer(BUFFERER, direct(1, { dependencyId: txId(3) }));
    h.engine.buffer(BUFFERER, direct(2, { dependencyId: txId(1) }));
    expectCode(
      () => h.engine.buffer(BUFFERER, direct(3, { dependencyId: txId(2) })),
      "VALIDATION_ERROR",
    );
    expect(h.engine.getState(txId(3))).toBe("EMPTY");
  });

  it("leaves no trace when rejected", () => {
    const position = h.engine.journal.position();
    expectCode(
      () => h.engine.buffer(BUFFERER, direct(1, { targetDomain: R1 })),
      "VALIDATION_ERROR",
    );
    expect(h.engine.transactionCount()).toBe(0);
    expect(h.engine.journal.position()).toBe(position);
  });

  // ─── Rate limiting ──────────────────────────────────────────────────

  it("rejects the eleventh buffer from one submitter within a period", () => {
    for (let i = 1; i <= 10; i++) {
      h.engine.buffer(BUFFERER, direct(i));
    }
    const err = expectCode(() => h.engine.buffer(BUFFERER, direct(11)), "RATE_LIMITED");
    expect(err.retryable).toBe(true);

    h.clock.advance(0, 1);
    h.engine.buffer(BUFFERER, direct(11));
    expect(h.engine.transactionCount()).toBe(11);
  });

  it("checks rate limits before id freshness", () => {
    for (let i = 1; i <= 10; i++) {
      h.engine.buffer(BUFFERER, direct(i));
    }
    expectCode(() => h.engine.buffer(BUFFERER, direct(1)), "RATE_LIMITED");
  });

  it("does not count rejected calls against the limit", () => {
    for (let i = 1; i <= 10; i++) {
      expectCode(
        () => h.engine.buffer(BUFFERER, direct(i, { targetDomain: R1 })),
        "VALIDATION_ERROR",
      );
    }
    h.engine.buffer(BUFFERER, direct(1));
    expect(h.engine.transactionCount()).toBe(1);
  });

  it("enforces the global cap", () => {
    const limited = setup({ globalRateLimit: 2 });
    const second = `0x${"e4".repeat(20)}`;
    limited.engine.grantRole(OWNER, "BUFFER", second);

    limited.engine.buffer(BUFFERER, direct(1));
    limited.engine.buffer(second, direct(2));
    const err = expectCode(() => limited.engine.buffer(second, direct(3)), "RATE_LIMITED");
    expect(err.details).toEqual({ period: H0, scope: "global", limit: 2 });
  });
});

describe("bufferCommitted", () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
  });

  it("stores an empty payload, the commitment and a reveal deadline", () => {
    const commitment = h.engine.computeCommitment("0xcafebabe", SECRET);
    const record = h.engine.bufferCommitted(BUFFERER, committed(1, commitment));

    expect(record.payload).toBe("0x");
    expect(record.commitmentHash).toBe(commitment);
    expect(record.revealDeadline).toBe(H0 + 50);
    expect(record.revealed).toBe(false);
    expect(record.refundRecipient).toBe(BUFFERER);
  });

  it("uses an explicit refund recipient", () => {
    const commitment = h.engine.computeCommitment("0xcafebabe", SECRET);
    const record = h.engine.bufferCommitted(
      BUFFERER,
      committed(1, commitment, { refundRecipient: OUTSIDER }),
    );
    expect(record.refundRecipient).toBe(OUTSIDER);
  });

  it("rejects a zero commitment", () => {
    const err = expectCode(
      () => h.engine.bufferCommitted(BUFFERER, committed(1, `0x${"0".repeat(64)}`)),
      "VALIDATION_ERROR",
    );
    expect(err.message).toBe("commitmentHash must be non-zero");
  });

  it("creates a swap group for the first member, then emits Buffered", () => {
    const commitment = h.engine.computeCommitment("0xcafebabe", SECRET);
    const position = h.engine.journal.position();

    const record = h.engine.bufferCommitted(
      BUFFERER,
      committed(1, commitment, { groupId: groupId(1) }),
    );

    expect(record.swapGroupId).toBe(groupId(1));
    expect(h.engine.groupMembers(groupId(1))).toEqual([txId(1)]);
    expect(signalTypesSince(h.engine, position)).toEqual(["GroupCreated", "Buffered"]);
  });

  it("adds later members with GroupMemberAdded", () => {
    const commitment = h.engine.computeCommitment("0xcafebabe", SECRET);
    h.engine.bufferCommitted(BUFFERER, committed(1, commitment, { groupId: groupId(1) }));
    const position = h.engine.journal.position();
    h.engine.bufferCommitted(BUFFERER, committed(2, commitment, { groupId: groupId(1) }));

    expect(signalTypesSince(h.engine, position)).toEqual(["GroupMemberAdded", "Buffered"]);
    expect(h.engine.groupStatus(groupId(1))).toEqual({
      size: 2,
      readyCount: 0,
      allReady: false,
    });
  });

  it("rejects joining a full group before storing anything", () => {
    const commitment = h.engine.computeCommitment("0xcafebabe", SECRET);
    for (let i = 1; i <= 4; i++) {
      h.engine.bufferCommitted(BUFFERER, committed(i, commitment, { groupId: groupId(1) }));
    }
    expectCode(
      () =>
        h.engine.bufferCommitted(BUFFERER, committed(5, commitment, { groupId: groupId(1) })),
      "STATE_ERROR",
    );
    expect(h.engine.getState(txId(5))).toBe("EMPTY");
  });
});
