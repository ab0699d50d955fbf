/**
 * Swap group routes.
 *
 * GET    /api/v1/groups/:id          — Membership and readiness
 * POST   /api/v1/groups/:id/expire   — Collectively expire a lagging group
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requireCaller } from "../middleware/auth.js";

export function createGroupRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // Unknown groups report as empty rather than 404
  routes.get("/:id", (c) => {
    const engine = c.get("engine");
    const groupId = c.req.param("id");
    const group = engine.getGroup(groupId);

    return c.json({
      data: {
        groupId,
        ...engine.groupStatus(groupId),
        status: group?.status ?? null,
        members: engine.groupMembers(groupId),
      },
    });
  });

  routes.post("/:id/expire", (c) => {
    const caller = requireCaller(c);
    const groupId = c.req.param("id");
    const expiredMembers = c.get("engine").expireGroup(caller, groupId);
    return c.json({ data: { groupId, expiredMembers } });
  });

  return routes;
}
