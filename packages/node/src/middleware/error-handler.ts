/**
 * Global error handler.
 *
 * Maps engine and store errors to HTTP status codes and renders the
 * error envelope. Anything unrecognised is a 500 whose message is not
 * exposed.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { isCoordinationError } from "@meridian/coordinator";
import type { CoordinationErrorCode } from "@meridian/coordinator";
import { StoreError } from "@meridian/store";
import type { StoreErrorCode } from "@meridian/store";
import { createErrorEnvelope, envelopeFor } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Record<CoordinationErrorCode, ContentfulStatusCode> = {
  VALIDATION_ERROR: 400,
  AUTHORIZATION_ERROR: 403,
  STATE_ERROR: 409,
  TIMING_ERROR: 422,
  DEPENDENCY_UNMET: 424,
  RATE_LIMITED: 429,
  CIRCUIT_BREAKER_TRIPPED: 503,
};

const STORE_STATUS_MAP: Record<StoreErrorCode, ContentfulStatusCode> = {
  INVALID_POSITION: 400,
  INVALID_ENTRY: 500,
  IO_FAILURE: 500,
};

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the app's onError handler. `onUnexpected` sees every error that
 * becomes a 500.
 */
export function createErrorHandler(
  onUnexpected?: (err: Error) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (isCoordinationError(err)) {
      return c.json(envelopeFor(err), STATUS_MAP[err.code]);
    }

    if (err instanceof StoreError && STORE_STATUS_MAP[err.code] !== 500) {
      return c.json(createErrorEnvelope(err.code, err.message), STORE_STATUS_MAP[err.code]);
    }

    if (err instanceof HTTPException) {
      const code = err.status === 401 ? "UNAUTHORIZED" : "HTTP_ERROR";
      return c.json(createErrorEnvelope(code, err.message), err.status);
    }

    onUnexpected?.(err);
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
