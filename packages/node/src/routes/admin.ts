/**
 * Administrative routes.
 *
 * GET    /api/v1/admin/status           — Owner, pause, breaker and config
 * POST   /api/v1/admin/pause            — Pause mutations
 * POST   /api/v1/admin/unpause          — Resume mutations
 * POST   /api/v1/admin/reset-breaker    — Reset the circuit breaker
 * PUT    /api/v1/admin/config           — Update tunables
 * POST   /api/v1/admin/ownership        — Transfer ownership
 * POST   /api/v1/admin/emergency-admin  — Replace the emergency admin
 */

import { Hono } from "hono";
import type { CoordinationEngine } from "@meridian/coordinator";
import type { AppEnv } from "../types/api-contract.js";
import {
  EmergencyAdminSchema,
  TransferOwnershipSchema,
  UpdateConfigSchema,
} from "../types/dto.js";
import { readBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

function status(engine: CoordinationEngine) {
  return {
    owner: engine.owner(),
    emergencyAdmin: engine.emergencyAdmin(),
    paused: engine.isPaused(),
    circuitBreaker: engine.circuitBreakerStatus(),
    config: engine.getConfig(),
    transactionCount: engine.transactionCount(),
    journalPosition: engine.journal.position(),
  };
}

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/status", (c) => {
    return c.json({ data: status(c.get("engine")) });
  });

  routes.post("/pause", (c) => {
    const caller = requireCaller(c);
    const engine = c.get("engine");
    engine.pause(caller);
    return c.json({ data: { paused: engine.isPaused() } });
  });

  routes.post("/unpause", (c) => {
    const caller = requireCaller(c);
    const engine = c.get("engine");
    engine.unpause(caller);
    return c.json({ data: { paused: engine.isPaused() } });
  });

  routes.post("/reset-breaker", (c) => {
    const caller = requireCaller(c);
    return c.json({ data: c.get("engine").resetBreaker(caller) });
  });

  // Settings apply in a fixed order; the first rejection stops the rest
  routes.put("/config", async (c) => {
    const caller = requireCaller(c);
    const body = await readBody(c, UpdateConfigSchema);
    const engine = c.get("engine");

    if (body.coordinationWindow !== undefined) {
      engine.setCoordinationWindow(caller, body.coordinationWindow);
    }
    if (body.maxPayloadSize !== undefined) {
      engine.setMaxPayloadSize(caller, body.maxPayloadSize);
    }
    if (body.circuitBreakerThreshold !== undefined) {
      engine.setCircuitBreakerThreshold(caller, body.circuitBreakerThreshold);
    }

    return c.json({ data: engine.getConfig() });
  });

  routes.post("/ownership", async (c) => {
    const caller = requireCaller(c);
    const body = await readBody(c, TransferOwnershipSchema);
    const engine = c.get("engine");
    engine.transferOwnership(caller, body.newOwner);
    return c.json({ data: { owner: engine.owner() } });
  });

  routes.post("/emergency-admin", async (c) => {
    const caller = requireCaller(c);
    const body = await readBody(c, EmergencyAdminSchema);
    const engine = c.get("engine");
    engine.setEmergencyAdmin(caller, body.account);
    return c.json({ data: { emergencyAdmin: engine.emergencyAdmin() } });
  });

  return routes;
}
