/**
 * The per-call context threaded through every component.
 *
 * Time and height are read once when the call begins so every check
 * and every signal within one call agree on "now".
 */

import type { Address, SignalBody } from "@meridian/types";

export interface OperationContext {
  readonly caller: Address;
  readonly time: number;
  readonly height: number;

  /** Queue a signal; it is journaled when the call finishes. */
  emit(body: SignalBody): void;
}
