/**
 * Request logging middleware.
 *
 * Hands one structured entry per request to an injected sink; the entry
 * point wires that sink to pino at the entry's level.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export type RequestLogLevel = "info" | "warn" | "error";

export interface RequestLogEntry {
  readonly level: RequestLogLevel;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly caller: string | undefined;
}

/** Server faults log as error, rejected calls as warn. */
export function requestLogLevel(status: number): RequestLogLevel {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const status = c.res.status;
    log({
      level: requestLogLevel(status),
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      caller: c.get("caller"),
    });
  };
}
