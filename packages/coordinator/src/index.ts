/**
 * @meridian/coordinator — Cross-domain transaction coordination engine.
 *
 * Buffers transaction intents, resolves their dependency and timing
 * constraints, and marks them ready for settlement. Abuse resistance:
 * - Commit-reveal payload disclosure
 * - Minimum resolution delay (flash-loan guard)
 * - Bounded swap groups with all-or-nothing failure
 * - Per-period rate limits and a global circuit breaker
 *
 * The engine does not move assets or verify cross-domain proofs.
 */

// Engine
export { CoordinationEngine } from "./engine.js";
export type { CoordinationEngineOptions } from "./engine.js";

// Components
export { TransactionLedger } from "./ledger.js";
export type {
  BufferInput,
  BufferCommittedInput,
  ListRecordsFilter,
} from "./ledger.js";
export { CommitRevealVerifier } from "./commit-reveal.js";
export { DependencyResolver } from "./resolver.js";
export type { ResolverDeps } from "./resolver.js";
export { SwapGroupTracker } from "./swap-groups.js";
export { RoleRegistry } from "./role-registry.js";
export { RateLimiter } from "./rate-limiter.js";
export type { RateLimits, RateUsage } from "./rate-limiter.js";
export { CircuitBreaker } from "./circuit-breaker.js";
export type {
  CircuitBreakerStatus,
  CircuitBreakerOptions,
} from "./circuit-breaker.js";
export { ProcessingLocks } from "./processing-locks.js";
export type { OperationContext } from "./context.js";

// Lifecycle
export {
  VALID_TRANSITIONS,
  canTransition,
  assertTransition,
  isTerminal,
  isLive,
  toReady,
  toExecuted,
  toExpired,
  toFailed,
  toRefunded,
} from "./lifecycle.js";

// Configuration
export {
  DEFAULT_ENGINE_CONFIG,
  TUNABLE_BOUNDS,
  resolveEngineConfig,
  assertTunable,
} from "./config.js";
export type {
  EngineConfig,
  EngineConfigOverrides,
  TunableSetting,
  ConfigSource,
} from "./config.js";

// Time
export { ManualClock, SystemClock } from "./clock.js";
export type { Clock, SystemClockOptions } from "./clock.js";

// Encoding
export {
  parseHex32,
  parseNonZeroHex32,
  parseOptionalHex32,
  parseAddress,
  parseHexBytes,
  byteLength,
  computeCommitment,
} from "./encoding.js";

// Errors
export { CoordinationError, isCoordinationError } from "./errors.js";
export type { CoordinationErrorCode } from "./errors.js";
