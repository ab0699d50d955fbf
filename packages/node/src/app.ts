/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests can drive the app without starting a server.
 */

import { Hono } from "hono";
import type { CoordinationEngine } from "@meridian/coordinator";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, callerHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createTransactionRoutes } from "./routes/transactions.js";
import { createGroupRoutes } from "./routes/groups.js";
import { createRoleRoutes } from "./routes/roles.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createSignalRoutes } from "./routes/signals.js";
import { createDomainRoutes } from "./routes/domains.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly engine: CoordinationEngine;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;

  /** Receives every error that becomes a 500 */
  readonly onUnexpectedError?: ((err: Error) => void) | undefined;

  /**
   * API keys. When absent or empty the API runs in open mode and
   * callers identify themselves with X-Caller.
   */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly engine: CoordinationEngine;
  readonly secured: boolean;
}

export function createApp(options: CreateAppOptions): AppInstance {
  const { engine } = options;
  const secured = options.auth !== undefined && options.auth.apiKeys.size > 0;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("engine", engine);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  if (secured && options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    app.use("/api/*", callerHeaderMiddleware());
  }

  app.route("/api/v1/transactions", createTransactionRoutes());
  app.route("/api/v1/groups", createGroupRoutes());
  app.route("/api/v1/roles", createRoleRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/signals", createSignalRoutes());
  app.route("/api/v1/domains", createDomainRoutes());

  return { app, engine, secured };
}
