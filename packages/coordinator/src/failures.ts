/**
 * Failure reporting.
 *
 * The only emitter of Failed signals. Each report counts once against
 * the circuit breaker, so replaying Failed signals since the last reset
 * reproduces the breaker's count.
 */

import type { FailureReason, Hex32 } from "@meridian/types";
import type { CircuitBreaker } from "./circuit-breaker.js";
import type { OperationContext } from "./context.js";

export function reportFailure(
  ctx: OperationContext,
  breaker: CircuitBreaker,
  id: Hex32,
  reason: FailureReason,
  detail: string,
): void {
  ctx.emit({ type: "Failed", payload: { id, reason, detail } });

  if (breaker.recordFailure()) {
    const { failureCount, threshold } = breaker.status();
    ctx.emit({
      type: "CircuitBreakerTripped",
      payload: { failureCount, threshold },
    });
  }
}
