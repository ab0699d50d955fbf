/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { CoordinationEngine } from "@meridian/coordinator";
import type { Address } from "@meridian/types";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The engine serving this app */
    engine: CoordinationEngine;

    /**
     * Authenticated caller address (set by caller middleware).
     * Absent only on unauthenticated reads in open mode.
     */
    caller: Address | undefined;
  };
}
