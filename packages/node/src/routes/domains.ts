/**
 * Settlement-facing routes.
 *
 * GET /api/v1/domains/:target/ready — READY records a settlement layer
 *   for the target domain may act on
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createDomainRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:target/ready", (c) => {
    return c.json({ data: c.get("engine").readyForDomain(c.req.param("target")) });
  });

  return routes;
}
