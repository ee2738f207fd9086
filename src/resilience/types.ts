/**
 * Configuration interfaces and types for the resilience layer
 */

/**
 * One quota window of the multi-window rate limiter
 */
export interface RateWindowConfig {
  /** Window name, unique within a limiter (e.g. '15m', '1d') */
  name: string;
  /** Requests admitted per period; also the bucket capacity */
  maxRequests: number;
  /** Length of the period in seconds */
  periodSeconds: number;
}

/**
 * Configuration for the multi-window rate limiter
 */
export interface RateLimiterConfig {
  windows: readonly RateWindowConfig[];
}

/**
 * Live state of a single window
 */
export interface TokenWindow {
  readonly name: string;
  readonly capacity: number;
  readonly periodSeconds: number;
  tokens: number;
  lastRefill: number;
}

/**
 * Configuration for circuit breaker behavior
 */
export interface CircuitBreakerConfig {
  /** Consecutive failures before opening the circuit */
  failureThreshold: number;
  /** Milliseconds after the last failure before a probe is allowed */
  recoveryTimeoutMs: number;
}

/**
 * Circuit breaker states
 */
export type CircuitState = 'closed' | 'open' | 'half_open';

/**
 * Point-in-time view of a circuit breaker
 */
export interface CircuitBreakerSnapshot {
  state: CircuitState;
  consecutiveFailures: number;
  failureThreshold: number;
  lastFailureTime: number | undefined;
  recoveryTimeoutMs: number;
}

/**
 * Decides whether an error is transient
 */
export type RetryablePredicate = (error: unknown) => boolean;

/**
 * Retry behavior for one class of operation
 */
export interface RetryPolicy {
  /** Retries after the first attempt */
  readonly maxRetries: number;
  /** Delay before the first retry in milliseconds */
  readonly initialDelayMs: number;
  /** Upper bound on any single delay in milliseconds */
  readonly maxDelayMs: number;
  /** Multiplier applied to the delay after each retry */
  readonly backoffFactor: number;
  readonly retryable: RetryablePredicate;
}

/**
 * Hook for retry attempts
 */
export interface RetryHook {
  /**
   * Called before sleeping ahead of a retry
   * @param attempt - The attempt that just failed (1-indexed)
   */
  onRetry(attempt: number, error: unknown, delayMs: number): void;
}

/**
 * Hook for circuit breaker state changes
 */
export interface CircuitBreakerHook {
  onStateChange(from: CircuitState, to: CircuitState): void;
}

/**
 * Hook for rate limiting events
 */
export interface RateLimitHook {
  /**
   * Called when a request is refused by a window
   * @param window - Name of the exhausted window that frees up last
   * @param waitMs - Time until that window holds a whole token
   */
  onRateLimited(window: string, waitMs: number): void;
}
