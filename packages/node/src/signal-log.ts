/**
 * Signal logging.
 *
 * The core packages never log; the node subscribes to the journal and
 * writes one line per signal.
 */

import type { StoredSignal } from "@meridian/store";
import type { SignalType } from "@meridian/types";

export type SignalLogLevel = "info" | "warn" | "error";

/** The slice of a pino logger this module writes to. */
export interface SignalLogger {
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
}

export function signalLogLevel(type: SignalType): SignalLogLevel {
  switch (type) {
    case "CircuitBreakerTripped":
      return "error";
    case "Failed":
    case "Expired":
    case "GroupExpired":
      return "warn";
    default:
      return "info";
  }
}

export function logSignal(logger: SignalLogger, stored: StoredSignal): void {
  const { signal } = stored;
  logger[signalLogLevel(signal.type)](
    {
      position: stored.position,
      signalId: signal.metadata.signalId,
      actor: signal.metadata.actor,
      height: signal.metadata.height,
      payload: signal.payload,
    },
    `signal ${signal.type}`,
  );
}
