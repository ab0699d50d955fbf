/**
 * Role routes.
 *
 * GET    /api/v1/roles                 — Every current grant
 * GET    /api/v1/roles/:role/:account  — Whether the account holds the role
 * POST   /api/v1/roles/grant           — Grant (owner only)
 * POST   /api/v1/roles/revoke          — Revoke (owner only)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RoleChangeSchema } from "../types/dto.js";
import { readBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

export function createRoleRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("engine").listRoleGrants() });
  });

  routes.get("/:role/:account", (c) => {
    const role = c.req.param("role");
    const account = c.req.param("account");
    const granted = c.get("engine").hasRole(role, account);
    return c.json({ data: { role, account: account.toLowerCase(), granted } });
  });

  routes.post("/grant", async (c) => {
    const caller = requireCaller(c);
    const body = await readBody(c, RoleChangeSchema);
    const changed = c.get("engine").grantRole(caller, body.role, body.account);
    return c.json({ data: { role: body.role, account: body.account.toLowerCase(), changed } });
  });

  routes.post("/revoke", async (c) => {
    const caller = requireCaller(c);
    const body = await readBody(c, RoleChangeSchema);
    const changed = c.get("engine").revokeRole(caller, body.role, body.account);
    return c.json({ data: { role: body.role, account: body.account.toLowerCase(), changed } });
  });

  return routes;
}
