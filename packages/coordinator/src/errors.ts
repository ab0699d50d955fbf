/**
 * Coordination errors.
 *
 * Every rejection from the engine is a CoordinationError carrying one
 * code from a closed taxonomy. Rejections leave records untouched, with
 * one exception: a resolve attempt that finds its record past expiry
 * commits the EXPIRED transition and then rejects. Resolver rejections
 * still count against the circuit breaker.
 */

export type CoordinationErrorCode =
  | "VALIDATION_ERROR"
  | "AUTHORIZATION_ERROR"
  | "STATE_ERROR"
  | "TIMING_ERROR"
  | "DEPENDENCY_UNMET"
  | "RATE_LIMITED"
  | "CIRCUIT_BREAKER_TRIPPED";

const RETRYABLE: ReadonlySet<CoordinationErrorCode> = new Set([
  "DEPENDENCY_UNMET",
  "RATE_LIMITED",
]);

export class CoordinationError extends Error {
  public readonly code: CoordinationErrorCode;

  /** True when the same call may succeed later without any other change */
  public readonly retryable: boolean;

  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: CoordinationErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "CoordinationError";
    this.code = code;
    this.retryable = RETRYABLE.has(code);
    this.details = details;
  }
}

export function isCoordinationError(err: unknown): err is CoordinationError {
  return err instanceof CoordinationError;
}
