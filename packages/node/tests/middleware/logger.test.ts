/**
 * Tests for request logging middleware.
 */

import { describe, it, expect } from "vitest";
import { requestLogLevel } from "../../src/middleware/logger.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { BUFFERER, as, createTestApp, jsonRequest } from "../setup.js";

describe("loggerMiddleware", () => {
  it("logs one entry per request", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (e) => entries.push(e) });

    await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "req-1" }),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: "info",
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "req-1",
      caller: undefined,
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("records the caller and the error status", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (e) => entries.push(e) });

    await app.request(jsonRequest("/api/v1/admin/pause", "POST", undefined, as(BUFFERER)));

    expect(entries[0]).toMatchObject({
      level: "warn",
      method: "POST",
      path: "/api/v1/admin/pause",
      status: 403,
      caller: BUFFERER,
    });
  });
});

describe("requestLogLevel", () => {
  it("grades by status class", () => {
    expect(requestLogLevel(201)).toBe("info");
    expect(requestLogLevel(429)).toBe("warn");
    expect(requestLogLevel(503)).toBe("error");
  });
});
