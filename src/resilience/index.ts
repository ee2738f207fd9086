/**
 * Resilience layer: multi-window rate limiting, retries and circuit breaking
 * composed behind a single call gate
 */

// Type exports
export type {
  RateWindowConfig,
  RateLimiterConfig,
  TokenWindow,
  CircuitBreakerConfig,
  CircuitBreakerSnapshot,
  CircuitState,
  RetryPolicy,
  RetryablePredicate,
  RetryHook,
  CircuitBreakerHook,
  RateLimitHook,
} from './types.js';

// Clock exports
export type { Clock } from './clock.js';
export { systemClock, throwIfAborted } from './clock.js';

// Rate limiter exports
export type { QuotaWait } from './rate-limiter.js';
export {
  MultiWindowRateLimiter,
  RateLimitExceededError,
  validateRateLimiterConfig,
  createDefaultRateLimiterConfig,
} from './rate-limiter.js';

// Circuit breaker exports
export {
  CircuitBreaker,
  CircuitOpenError,
  validateCircuitBreakerConfig,
  createDefaultCircuitBreakerConfig,
} from './circuit-breaker.js';

// Retry exports
export type { RetryableOperation, ExecuteOptions } from './retry.js';
export {
  RetryExecutor,
  MaxRetriesExceededError,
  computeBackoffDelay,
  isRetryableByDefault,
  isTransientError,
  createRetryPolicy,
  createDefaultRetryPolicy,
  validateRetryPolicy,
} from './retry.js';

// Gate exports
export type { GateConfig, GateConfigInput } from './gate-config.js';
export {
  gateConfigSchema,
  validateGateConfig,
  resolveGateConfig,
  serializeGateConfig,
  parseGateConfig,
} from './gate-config.js';
export type { CallOptions, GuardedCall, GateFailure, CallGateDependencies } from './gate.js';
export { CallGate, PassthroughGate, classifyGateError } from './gate.js';
