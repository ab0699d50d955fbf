/**
 * Transaction routes.
 *
 * POST   /api/v1/transactions              — Buffer a direct submission
 * POST   /api/v1/transactions/commit       — Buffer a committed submission
 * GET    /api/v1/transactions              — List (cursor pagination)
 * GET    /api/v1/transactions/:id          — Get one record
 * GET    /api/v1/transactions/:id/state    — Observed state (EMPTY if unknown)
 * GET    /api/v1/transactions/:id/ready    — Whether the record is READY
 * POST   /api/v1/transactions/:id/reveal   — Reveal a committed payload
 * POST   /api/v1/transactions/:id/resolve  — BUFFERED → READY
 * POST   /api/v1/transactions/:id/execute  — READY → EXECUTED
 * POST   /api/v1/transactions/:id/fail     — Report a settlement failure
 * POST   /api/v1/transactions/:id/refund   — Claim a refund
 * POST   /api/v1/transactions/:id/group    — Join a swap group
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddToGroupSchema,
  BufferCommittedSchema,
  BufferTransactionSchema,
  ListTransactionsQuerySchema,
  MarkFailedSchema,
  RevealSchema,
} from "../types/dto.js";
import { readBody, readQuery } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

export function createTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Admission ─────────────────────────────────────────────────────

  routes.post("/", async (c) => {
    const caller = requireCaller(c);
    const body = await readBody(c, BufferTransactionSchema);
    const record = c.get("engine").buffer(caller, body);
    return c.json({ data: record }, 201);
  });

  routes.post("/commit", async (c) => {
    const caller = requireCaller(c);
    const body = await readBody(c, BufferCommittedSchema);
    const record = c.get("engine").bufferCommitted(caller, body);
    return c.json({ data: record }, 201);
  });

  // ─── Queries ───────────────────────────────────────────────────────

  routes.get("/", (c) => {
    const engine = c.get("engine");
    const query = readQuery(c, ListTransactionsQuerySchema);

    // Insertion order is stable because ids are never removed
    const sequence = new Map(engine.listRecords().map((r, i) => [r.id, i]));
    const records = engine.listRecords({
      state: query.state,
      targetDomain: query.targetDomain,
    });

    return c.json(
      paginate(
        records,
        { cursor: query.cursor, limit: query.limit },
        (r) => sequence.get(r.id) ?? -1,
        "sequence",
      ),
    );
  });

  routes.get("/:id", (c) => {
    const id = c.req.param("id");
    const record = c.get("engine").getRecord(id);
    if (record === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Transaction '${id}' not found`), 404);
    }
    return c.json({ data: record });
  });

  routes.get("/:id/state", (c) => {
    const id = c.req.param("id");
    return c.json({ data: { id, state: c.get("engine").getState(id) } });
  });

  routes.get("/:id/ready", (c) => {
    const id = c.req.param("id");
    return c.json({ data: { id, ready: c.get("engine").isReady(id) } });
  });

  // ─── Lifecycle ─────────────────────────────────────────────────────

  routes.post("/:id/reveal", async (c) => {
    const caller = requireCaller(c);
    const body = await readBody(c, RevealSchema);
    const record = c.get("engine").reveal(caller, c.req.param("id"), body.payload, body.secret);
    return c.json({ data: record });
  });

  routes.post("/:id/resolve", (c) => {
    const caller = requireCaller(c);
    return c.json({ data: c.get("engine").resolve(caller, c.req.param("id")) });
  });

  routes.post("/:id/execute", (c) => {
    const caller = requireCaller(c);
    return c.json({ data: c.get("engine").markExecuted(caller, c.req.param("id")) });
  });

  routes.post("/:id/fail", async (c) => {
    const caller = requireCaller(c);
    const body = await readBody(c, MarkFailedSchema);
    const record = c.get("engine").markFailed(caller, c.req.param("id"), body.reason);
    return c.json({ data: record });
  });

  routes.post("/:id/refund", (c) => {
    const caller = requireCaller(c);
    return c.json({ data: c.get("engine").claimRefund(caller, c.req.param("id")) });
  });

  routes.post("/:id/group", async (c) => {
    const caller = requireCaller(c);
    const body = await readBody(c, AddToGroupSchema);
    const group = c.get("engine").addToGroup(caller, c.req.param("id"), body.groupId);
    return c.json({ data: group });
  });

  return routes;
}
