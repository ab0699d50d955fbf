/**
 * Tests for config.ts — parseApiKeys, loadConfig, toEngineConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { CoordinationError } from "@meridian/coordinator";
import { loadConfig, parseApiKeys, toEngineConfig } from "../src/config.js";
import { BUFFERER, OWNER, RESOLVER } from "./setup.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses comma-separated entries and lowercases addresses", () => {
    const keys = parseApiKeys(` k1:0x${"B1".repeat(20)} , k2:${RESOLVER} `);
    expect(keys).toEqual([
      { key: "k1", caller: BUFFERER },
      { key: "k2", caller: RESOLVER },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow(
      'Invalid API_KEYS entry: "badentry". Expected format: key:0xaddress',
    );
    expect(() => parseApiKeys(`a:b:${OWNER}`)).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(`:${OWNER}`)).toThrow("API key cannot be empty");
  });

  it("throws on duplicate key", () => {
    expect(() => parseApiKeys(`k1:${OWNER},k1:${BUFFERER}`)).toThrow(
      'Duplicate API key in API_KEYS: "k1"',
    );
  });

  it("rejects malformed and zero addresses", () => {
    expect(() => parseApiKeys("k1:0x1234")).toThrow(CoordinationError);
    expect(() => parseApiKeys(`k1:0x${"00".repeat(20)}`)).toThrow(
      "API_KEYS caller must be non-zero",
    );
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults around the owner address", () => {
    const config = loadConfig({ OWNER_ADDRESS: OWNER });

    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.API_KEYS).toBe("");
    expect(config.COORDINATION_WINDOW_SECONDS).toBe(30);
    expect(config.CIRCUIT_BREAKER_THRESHOLD).toBe(50);
    expect(config.HEIGHT_INTERVAL_SECONDS).toBe(12);
    expect(config.GENESIS_TIME).toBeUndefined();
    expect(config.DATA_DIR).toBeUndefined();
  });

  it("coerces numeric strings", () => {
    const config = loadConfig({
      OWNER_ADDRESS: OWNER,
      PORT: "8080",
      COORDINATION_WINDOW_SECONDS: "120",
      GENESIS_TIME: "1700000000",
    });

    expect(config.PORT).toBe(8080);
    expect(config.COORDINATION_WINDOW_SECONDS).toBe(120);
    expect(config.GENESIS_TIME).toBe(1_700_000_000);
  });

  it("requires OWNER_ADDRESS", () => {
    expect(() => loadConfig({})).toThrow(ZodError);
  });

  it("enforces tunable bounds", () => {
    expect(() =>
      loadConfig({ OWNER_ADDRESS: OWNER, COORDINATION_WINDOW_SECONDS: "4" }),
    ).toThrow(ZodError);
    expect(() =>
      loadConfig({ OWNER_ADDRESS: OWNER, MAX_PAYLOAD_SIZE: "4096" }),
    ).toThrow(ZodError);
    expect(() =>
      loadConfig({ OWNER_ADDRESS: OWNER, CIRCUIT_BREAKER_THRESHOLD: "9" }),
    ).toThrow(ZodError);
  });
});

// =============================================================================
// toEngineConfig
// =============================================================================

describe("toEngineConfig", () => {
  it("maps environment names to engine settings", () => {
    const config = loadConfig({
      OWNER_ADDRESS: OWNER,
      SUBMITTER_RATE_LIMIT: "3",
      MIN_RESOLUTION_DELAY: "0",
    });

    expect(toEngineConfig(config)).toEqual({
      coordinationWindow: 30,
      maxPayloadSize: 2048,
      circuitBreakerThreshold: 50,
      circuitBreakerCooldown: 3600,
      globalRateLimit: 100,
      submitterRateLimit: 3,
      minResolutionDelay: 0,
      revealWindow: 50,
    });
  });
});
