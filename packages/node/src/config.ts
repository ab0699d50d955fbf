/**
 * @meridian/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { EngineConfigOverrides } from "@meridian/coordinator";
import { parseAddress } from "@meridian/coordinator";
import type { Address } from "@meridian/types";

// =============================================================================
// Schema
// =============================================================================

const positiveInt = z.coerce.number().int().min(1);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Engine
  OWNER_ADDRESS: z.string().regex(/^0x[0-9a-fA-F]{40}$/, "must be a 20-byte hex address"),
  COORDINATION_WINDOW_SECONDS: z.coerce.number().int().min(5).max(300).default(30),
  MAX_PAYLOAD_SIZE: z.coerce.number().int().min(32).max(2048).default(2048),
  CIRCUIT_BREAKER_THRESHOLD: z.coerce.number().int().min(10).default(50),
  CIRCUIT_BREAKER_COOLDOWN_SECONDS: positiveInt.default(3600),
  GLOBAL_RATE_LIMIT: positiveInt.default(100),
  SUBMITTER_RATE_LIMIT: positiveInt.default(10),
  MIN_RESOLUTION_DELAY: z.coerce.number().int().min(0).default(2),
  REVEAL_WINDOW: positiveInt.default(50),

  // Clock
  HEIGHT_INTERVAL_SECONDS: positiveInt.default(12),
  GENESIS_TIME: z.coerce.number().int().min(0).optional(),

  // Persistence; in-memory when unset
  DATA_DIR: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly caller: Address;
}

/**
 * Parse the API_KEYS env var. Each key authenticates as one caller address.
 *
 * Format: "key1:0xaddr1,key2:0xaddr2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, address] = parts;
    if (parts.length !== 2 || key === undefined || address === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:0xaddress`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }
    seen.add(key);

    keys.push({ key, caller: parseAddress(address, "API_KEYS caller") });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

export function toEngineConfig(config: AppConfig): EngineConfigOverrides {
  return {
    coordinationWindow: config.COORDINATION_WINDOW_SECONDS,
    maxPayloadSize: config.MAX_PAYLOAD_SIZE,
    circuitBreakerThreshold: config.CIRCUIT_BREAKER_THRESHOLD,
    circuitBreakerCooldown: config.CIRCUIT_BREAKER_COOLDOWN_SECONDS,
    globalRateLimit: config.GLOBAL_RATE_LIMIT,
    submitterRateLimit: config.SUBMITTER_RATE_LIMIT,
    minResolutionDelay: config.MIN_RESOLUTION_DELAY,
    revealWindow: config.REVEAL_WINDOW,
  };
}
