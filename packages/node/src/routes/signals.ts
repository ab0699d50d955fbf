/**
 * Signal journal routes.
 *
 * GET /api/v1/signals — Journaled signals by position (cursor pagination)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListSignalsQuerySchema } from "../types/dto.js";
import { readQuery } from "../middleware/validate.js";
import { paginate } from "../types/pagination.js";

export function createSignalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = readQuery(c, ListSignalsQuerySchema);
    const all = c.get("engine").journal.readAll();
    const signals =
      query.type === undefined ? all : all.filter((s) => s.signal.type === query.type);

    return c.json(
      paginate(
        signals,
        { cursor: query.cursor, limit: query.limit },
        (s) => s.position,
        "position",
      ),
    );
  });

  return routes;
}
