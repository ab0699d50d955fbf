/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (record store and journal hash chains)
 */

import { Hono } from "hono";
import type { IntegrityResult } from "@meridian/store";
import type { AppEnv } from "../types/api-contract.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly position: number;
  readonly detail?: string;
}

function summarize(integrity: IntegrityResult, position: number): SubsystemStatus {
  if (integrity.valid) {
    return { status: "ok", position };
  }
  const first = integrity.errors[0];
  return {
    status: "down",
    position,
    detail:
      first === undefined
        ? "integrity check failed"
        : `position ${first.position}: ${first.reason}`,
  };
}

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const engine = c.get("engine");
    const subsystems = {
      recordStore: summarize(engine.store.verifyIntegrity(), engine.store.position()),
      signalJournal: summarize(engine.journal.verifyIntegrity(), engine.journal.position()),
    };
    const ready =
      subsystems.recordStore.status === "ok" && subsystems.signalJournal.status === "ok";

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        paused: engine.isPaused(),
        circuitBreakerTripped: engine.circuitBreakerStatus().tripped,
        subsystems,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
