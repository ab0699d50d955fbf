import type {
  Hex32,
  Signal,
  SwapGroup,
  TransactionRecord,
} from "@meridian/types";

export const ORIGIN = "0x1111111111111111111111111111111111111111";
export const TARGET = "0x2222222222222222222222222222222222222222";
export const ACTOR = "0x3333333333333333333333333333333333333333";

export function id(n: number): Hex32 {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

export function makeRecord(
  n: number,
  overrides: Partial<TransactionRecord> = {},
): TransactionRecord {
  return {
    id: id(n),
    originDomain: ORIGIN,
    targetDomain: TARGET,
    payload: "0xdeadbeef",
    requestedTime: 1_000,
    expiry: 1_030,
    state: { tag: "BUFFERED" },
    revealed: false,
    creator: ACTOR,
    refundRecipient: ACTOR,
    creationHeight: 10,
    createdAt: 990,
    ...overrides,
  };
}

export function makeGroup(
  n: number,
  members: readonly Hex32[],
  overrides: Partial<SwapGroup> = {},
): SwapGroup {
  return {
    id: id(n),
    members,
    readyCount: 0,
    status: "open",
    createdAt: 990,
    ...overrides,
  };
}

export function makeSignal(seq: number, recordId: Hex32 = id(1)): Signal {
  return {
    type: "Ready",
    metadata: {
      signalId: `sig-${seq}`,
      timestamp: new Date(1_000_000 + seq * 1000).toISOString(),
      time: 1_000 + seq,
      height: 10 + seq,
      actor: ACTOR,
    },
    payload: { id: recordId, targetDomain: TARGET },
  };
}
