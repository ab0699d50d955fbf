/**
 * Per-record processing locks.
 *
 * A lock is a flag, not a queue: a second acquirer is rejected with
 * STATE_ERROR rather than made to wait. Callers retry.
 */

import type { Hex32 } from "@meridian/types";
import { CoordinationError } from "./errors.js";

export class ProcessingLocks {
  private readonly held = new Set<Hex32>();

  acquire(id: Hex32): void {
    if (this.held.has(id)) {
      throw new CoordinationError(
        "STATE_ERROR",
        `Transaction '${id}' is already being processed`,
        { id },
      );
    }
    this.held.add(id);
  }

  release(id: Hex32): void {
    this.held.delete(id);
  }

  isHeld(id: Hex32): boolean {
    return this.held.has(id);
  }

  /** Run `fn` holding the lock for `id`, releasing it however `fn` exits. */
  withLock<T>(id: Hex32, fn: () => T): T {
    this.acquire(id);
    try {
      return fn();
    } finally {
      this.release(id);
    }
  }
}
