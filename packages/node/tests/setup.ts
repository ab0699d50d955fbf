/**
 * Test helpers for @meridian/node.
 *
 * Builds the app around an engine on a manual clock, with no HTTP
 * server.
 */

import { CoordinationEngine, ManualClock } from "@meridian/coordinator";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const OWNER = `0x${"a0".repeat(20)}`;
export const BUFFERER = `0x${"b1".repeat(20)}`;
export const RESOLVER = `0x${"c2".repeat(20)}`;
export const OUTSIDER = `0x${"d3".repeat(20)}`;
export const ORIGIN = `0x${"11".repeat(20)}`;
export const TARGET = `0x${"22".repeat(20)}`;

export const T0 = 1_700_000_000;

export function txId(n: number): string {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

export interface TestApp extends AppInstance {
  readonly clock: ManualClock;
}

/**
 * App over a fresh engine at (T0, height 100) with BUFFER granted to
 * BUFFERER and RESOLVE to RESOLVER. Open mode unless `auth` is given.
 */
export function createTestApp(options: Omit<CreateAppOptions, "engine"> = {}): TestApp {
  const clock = new ManualClock(T0, 100);
  let seq = 0;
  const engine = new CoordinationEngine({
    owner: OWNER,
    clock,
    signalId: () => `sig-${++seq}`,
  });
  engine.grantRole(OWNER, "BUFFER", BUFFERER);
  engine.grantRole(OWNER, "RESOLVE", RESOLVER);

  return { ...createApp({ ...options, engine }), clock };
}

/**
 * JSON request helper. `caller` is sent as X-Caller.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers: Record<string, string> = {},
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export function as(caller: string): Record<string, string> {
  return { "X-Caller": caller };
}

export function directBody(n: number, overrides: Record<string, unknown> = {}) {
  return {
    id: txId(n),
    originDomain: ORIGIN,
    targetDomain: TARGET,
    payload: "0xdeadbeef",
    requestedTime: T0 + 30,
    ...overrides,
  };
}

export interface ErrorBody {
  readonly error: {
    readonly code: string;
    readonly message: string;
    readonly details?: Record<string, unknown>;
  };
}

export async function readError(res: Response): Promise<ErrorBody["error"]> {
  const body = (await res.json()) as ErrorBody;
  return body.error;
}
