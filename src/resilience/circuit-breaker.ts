/**
 * Circuit breaker implementation following the three-state pattern
 */

import { SocialError } from '../errors/error.js';
import { ConfigurationError } from '../errors/categories.js';
import { Clock, systemClock } from './clock.js';
import type {
  CircuitBreakerConfig,
  CircuitBreakerHook,
  CircuitBreakerSnapshot,
  CircuitState,
} from './types.js';

/**
 * Error thrown when the circuit breaker refuses a call
 */
export class CircuitOpenError extends SocialError {
  constructor(retryAfterMs: number) {
    super({
      type: 'circuit_open',
      message: `Circuit breaker is open, retry in ${retryAfterMs}ms`,
      retryAfterMs,
      isRetryable: false,
    });
    this.name = 'CircuitOpenError';
  }
}

/**
 * Circuit breaker that fails fast once an operation class keeps failing
 *
 * States:
 * - Closed: Normal operation, counts consecutive failures
 * - Open: Rejects calls until the recovery timeout has passed since the last failure
 * - Half-Open: Lets probe calls through; a success closes, a failure reopens
 *
 * Half-open does not limit how many probes run at once.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private lastFailureTime: number | undefined = undefined;
  private readonly config: CircuitBreakerConfig;
  private readonly hooks: CircuitBreakerHook[] = [];

  constructor(config: CircuitBreakerConfig, private readonly clock: Clock = systemClock) {
    validateCircuitBreakerConfig(config);
    this.config = { ...config };
  }

  /**
   * Add a hook to be called on state changes
   */
  addHook(hook: CircuitBreakerHook): void {
    this.hooks.push(hook);
  }

  /**
   * Whether a call may proceed.
   * An open circuit whose cooldown has elapsed moves to half-open and admits the call.
   */
  canExecute(): boolean {
    switch (this.state) {
      case 'closed':
        return true;
      case 'open':
        if (this.cooldownElapsed()) {
          this.transitionTo('half_open');
          return true;
        }
        return false;
      case 'half_open':
        return true;
    }
  }

  /**
   * Record a successful call
   */
  recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state !== 'closed') {
      this.transitionTo('closed');
    }
  }

  /**
   * Record a failed call
   */
  recordFailure(): void {
    this.consecutiveFailures++;
    this.lastFailureTime = this.clock.now();

    if (this.consecutiveFailures >= this.config.failureThreshold && this.state !== 'open') {
      this.transitionTo('open');
    }
  }

  /**
   * Milliseconds left before an open circuit admits a probe; zero otherwise
   */
  remainingCooldownMs(): number {
    if (this.state !== 'open' || this.lastFailureTime === undefined) {
      return 0;
    }
    const deadline = this.lastFailureTime + this.config.recoveryTimeoutMs;
    return Math.max(0, deadline - this.clock.now());
  }

  private cooldownElapsed(): boolean {
    if (this.lastFailureTime === undefined) return true;
    return this.clock.now() - this.lastFailureTime >= this.config.recoveryTimeoutMs;
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    this.state = newState;
    this.hooks.forEach(hook => hook.onStateChange(oldState, newState));
  }

  /**
   * Get the current state of the circuit breaker
   */
  getState(): CircuitState {
    return this.state;
  }

  /**
   * Get the number of failures since the last success
   */
  getFailureCount(): number {
    return this.consecutiveFailures;
  }

  getLastFailureTime(): number | undefined {
    return this.lastFailureTime;
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      failureThreshold: this.config.failureThreshold,
      lastFailureTime: this.lastFailureTime,
      recoveryTimeoutMs: this.config.recoveryTimeoutMs,
    };
  }

  /**
   * Reset the circuit breaker to closed state
   */
  reset(): void {
    this.consecutiveFailures = 0;
    this.lastFailureTime = undefined;
    if (this.state !== 'closed') {
      this.transitionTo('closed');
    }
  }
}

/**
 * Validates a circuit breaker configuration
 * @throws ConfigurationError
 */
export function validateCircuitBreakerConfig(config: CircuitBreakerConfig): void {
  if (!Number.isInteger(config.failureThreshold) || config.failureThreshold <= 0) {
    throw new ConfigurationError('failureThreshold must be a positive integer', {
      failureThreshold: config.failureThreshold,
    });
  }
  if (!Number.isFinite(config.recoveryTimeoutMs) || config.recoveryTimeoutMs < 0) {
    throw new ConfigurationError('recoveryTimeoutMs must be zero or more', {
      recoveryTimeoutMs: config.recoveryTimeoutMs,
    });
  }
}

/**
 * Create a default circuit breaker configuration
 */
export function createDefaultCircuitBreakerConfig(): CircuitBreakerConfig {
  return {
    failureThreshold: 5,
    recoveryTimeoutMs: 60_000,
  };
}
