import type { Hex32, SignalType } from "@meridian/types";
import { ManualClock } from "../src/clock.js";
import type { EngineConfigOverrides } from "../src/config.js";
import { CoordinationEngine } from "../src/engine.js";
import { CoordinationError } from "../src/errors.js";
import type { CoordinationErrorCode } from "../src/errors.js";
import type { BufferCommittedInput, BufferInput } from "../src/ledger.js";

export const OWNER = `0x${"a0".repeat(20)}`;
export const BUFFERER = `0x${"b1".repeat(20)}`;
export const RESOLVER = `0x${"c2".repeat(20)}`;
export const OUTSIDER = `0x${"d3".repeat(20)}`;
export const R1 = `0x${"11".repeat(20)}`;
export const R2 = `0x${"22".repeat(20)}`;

export const T0 = 1_700_000_000;
export const H0 = 100;

export const SECRET = `0x${"5e".repeat(32)}`;
export const OTHER_SECRET = `0x${"6f".repeat(32)}`;

export function txId(n: number): Hex32 {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

export function groupId(n: number): Hex32 {
  return `0x${"9".repeat(60)}${n.toString(16).padStart(4, "0")}`;
}

export interface Harness {
  readonly clock: ManualClock;
  readonly engine: CoordinationEngine;
}

/**
 * A fresh engine at (T0, H0) with BUFFER granted to BUFFERER and
 * RESOLVE to RESOLVER.
 */
export function setup(config?: EngineConfigOverrides): Harness {
  const clock = new ManualClock(T0, H0);
  let seq = 0;
  const engine = new CoordinationEngine({
    owner: OWNER,
    clock,
    config,
    signalId: () => `sig-${++seq}`,
  });
  engine.grantRole(OWNER, "BUFFER", BUFFERER);
  engine.grantRole(OWNER, "RESOLVE", RESOLVER);
  return { clock, engine };
}

export function direct(n: number, overrides: Partial<BufferInput> = {}): BufferInput {
  return {
    id: txId(n),
    originDomain: R1,
    targetDomain: R2,
    payload: "0xdeadbeef",
    requestedTime: T0 + 30,
    ...overrides,
  };
}

export function committed(
  n: number,
  commitmentHash: string,
  overrides: Partial<BufferCommittedInput> = {},
): BufferCommittedInput {
  return {
    id: txId(n),
    originDomain: R1,
    targetDomain: R2,
    commitmentHash,
    requestedTime: T0,
    ...overrides,
  };
}

/** Signal types journaled so far, oldest first. */
export function signalTypes(engine: CoordinationEngine): SignalType[] {
  return engine.journal.readAll().map((s) => s.signal.type);
}

/** Signal types journaled after position `from`. */
export function signalTypesSince(engine: CoordinationEngine, from: number): SignalType[] {
  return engine.journal
    .readAll({ fromPosition: from + 1 })
    .map((s) => s.signal.type);
}

/** Run `fn` and return the CoordinationError it throws. */
export function catchError(fn: () => unknown): CoordinationError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof CoordinationError) return err;
    throw err;
  }
  throw new Error("expected a CoordinationError");
}

export function expectCode(fn: () => unknown, code: CoordinationErrorCode): CoordinationError {
  const err = catchError(fn);
  if (err.code !== code) {
    throw new Error(`expected ${code}, got ${err.code}: ${err.message}`);
  }
  return err;
}
