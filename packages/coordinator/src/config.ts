/**
 * Engine configuration.
 *
 * Three settings are tunable at runtime through bounded admin setters;
 * the rest are fixed when the engine is constructed.
 */

import { CoordinationError } from "./errors.js";

export interface EngineConfig {
  /** Seconds after requestedTime before a record expires */
  readonly coordinationWindow: number;

  /** Upper bound on payload size, in bytes */
  readonly maxPayloadSize: number;

  /** Failure count at which the breaker trips */
  readonly circuitBreakerThreshold: number;

  /** Seconds that must pass between breaker resets */
  readonly circuitBreakerCooldown: number;

  /** Buffer calls accepted per period across all submitters */
  readonly globalRateLimit: number;

  /** Buffer calls accepted per period from one submitter */
  readonly submitterRateLimit: number;

  /** Heights that must pass between creation and resolution */
  readonly minResolutionDelay: number;

  /** Heights after creation during which a reveal is accepted */
  readonly revealWindow: number;

  /** How far in the future requestedTime may be, in seconds */
  readonly maxFutureOffset: number;

  /** Maximum members in a swap group */
  readonly maxGroupSize: number;

  /** Rate-limit periods kept before eviction */
  readonly rateLimitRetainPeriods: number;
}

export type TunableSetting =
  | "coordinationWindow"
  | "maxPayloadSize"
  | "circuitBreakerThreshold";

/** Overrides accepted at construction. Fixed protocol limits are excluded. */
export type EngineConfigOverrides = Partial<
  Omit<EngineConfig, "maxFutureOffset" | "maxGroupSize">
>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  coordinationWindow: 30,
  maxPayloadSize: 2048,
  circuitBreakerThreshold: 50,
  circuitBreakerCooldown: 3600,
  globalRateLimit: 100,
  submitterRateLimit: 10,
  minResolutionDelay: 2,
  revealWindow: 50,
  maxFutureOffset: 86_400,
  maxGroupSize: 4,
  rateLimitRetainPeriods: 16,
};

export const TUNABLE_BOUNDS: Record<
  TunableSetting,
  { readonly min: number; readonly max: number }
> = {
  coordinationWindow: { min: 5, max: 300 },
  maxPayloadSize: { min: 32, max: 2048 },
  circuitBreakerThreshold: { min: 10, max: Number.MAX_SAFE_INTEGER },
};

/**
 * Check a tunable against its bounds.
 */
export function assertTunable(key: TunableSetting, value: number): void {
  const { min, max } = TUNABLE_BOUNDS[key];
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    throw new CoordinationError(
      "VALIDATION_ERROR",
      max === Number.MAX_SAFE_INTEGER
        ? `${key} must be an integer >= ${min}, got ${value}`
        : `${key} must be an integer in [${min}, ${max}], got ${value}`,
      { field: key, value },
    );
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };

  assertTunable("coordinationWindow", config.coordinationWindow);
  assertTunable("maxPayloadSize", config.maxPayloadSize);
  assertTunable("circuitBreakerThreshold", config.circuitBreakerThreshold);

  const fixed = [
    "circuitBreakerCooldown",
    "globalRateLimit",
    "submitterRateLimit",
    "revealWindow",
    "rateLimitRetainPeriods",
  ] as const;
  for (const key of fixed) {
    if (!Number.isSafeInteger(config[key]) || config[key] < 1) {
      throw new CoordinationError(
        "VALIDATION_ERROR",
        `${key} must be a positive integer, got ${config[key]}`,
        { field: key },
      );
    }
  }
  if (!Number.isSafeInteger(config.minResolutionDelay) || config.minResolutionDelay < 0) {
    throw new CoordinationError(
      "VALIDATION_ERROR",
      `minResolutionDelay must be a non-negative integer, got ${config.minResolutionDelay}`,
      { field: "minResolutionDelay" },
    );
  }

  return config;
}

/** Read access to the live configuration. */
export type ConfigSource = () => EngineConfig;
