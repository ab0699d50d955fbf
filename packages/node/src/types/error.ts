/**
 * Error envelopes for API responses.
 *
 * Every error response has the shape
 * { error: { code, message, details? } }. Engine rejections keep their
 * own code; the HTTP layer adds NOT_FOUND, UNAUTHORIZED and
 * INTERNAL_ERROR.
 */

import type { CoordinationError, CoordinationErrorCode } from "@meridian/coordinator";

export type ApiErrorCode =
  | CoordinationErrorCode
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "INTERNAL_ERROR";

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): ErrorEnvelope {
  return {
    error: details === undefined ? { code, message } : { code, message, details },
  };
}

/** The envelope for an engine rejection, details included. */
export function envelopeFor(err: CoordinationError): ErrorEnvelope {
  return createErrorEnvelope(err.code, err.message, err.details);
}
