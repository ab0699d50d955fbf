/**
 * Caller identification.
 *
 * Secured mode: every API request carries X-Api-Key, which maps to one
 * caller address. Missing or unknown keys get 401.
 *
 * Open mode (no keys configured): the caller names itself in X-Caller.
 * Reads need no caller; mutations fail with 401 without one.
 *
 * Authorization is the engine's job. This layer only decides who is
 * calling.
 */

import type { Context, MiddlewareHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Address } from "@meridian/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller";

export interface AuthConfig {
  /** Map of API key → caller address */
  readonly apiKeys: ReadonlyMap<string, Address>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const caller = config.apiKeys.get(apiKey);
    if (caller === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("caller", caller);
    return next();
  };
}

export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set("caller", c.req.header(CALLER_HEADER));
    return next();
  };
}

/**
 * The caller for a mutating route.
 *
 * @throws HTTPException 401 when none was identified
 */
export function requireCaller(c: Context<AppEnv>): Address {
  const caller = c.get("caller");
  if (caller === undefined) {
    throw new HTTPException(401, { message: `${CALLER_HEADER} header required` });
  }
  return caller;
}
