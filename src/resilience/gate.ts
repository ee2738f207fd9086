/**
 * Call gate that combines the circuit breaker, the multi-window rate limiter and retries
 */

import { err, ok, Result } from 'neverthrow';
import { CancelledError } from '../errors/categories.js';
import { Clock, systemClock, throwIfAborted } from './clock.js';
import { CircuitBreaker, CircuitOpenError } from './circuit-breaker.js';
import { GateConfig, GateConfigInput, resolveGateConfig } from './gate-config.js';
import { MultiWindowRateLimiter, RateLimitExceededError } from './rate-limiter.js';
import {
  MaxRetriesExceededError,
  RetryableOperation,
  RetryExecutor,
  createRetryPolicy,
  isRetryableByDefault,
} from './retry.js';
import type { RetryablePredicate, RetryPolicy } from './types.js';

export interface CallOptions {
  /** Abandons the call between attempts */
  signal?: AbortSignal;
}

/**
 * The capability every call site depends on
 */
export interface GuardedCall {
  call<T>(operation: RetryableOperation<T>, options?: CallOptions): Promise<T>;
}

/**
 * Why a guarded call did not produce a value
 */
export type GateFailure =
  | { kind: 'rate_limited'; error: RateLimitExceededError }
  | { kind: 'circuit_open'; error: CircuitOpenError }
  | { kind: 'retries_exhausted'; error: MaxRetriesExceededError }
  | { kind: 'cancelled'; error: CancelledError }
  | { kind: 'failed'; error: unknown };

/**
 * Sorts an error thrown by CallGate.call into its failure variant
 */
export function classifyGateError(error: unknown): GateFailure {
  if (error instanceof RateLimitExceededError) return { kind: 'rate_limited', error };
  if (error instanceof CircuitOpenError) return { kind: 'circuit_open', error };
  if (error instanceof MaxRetriesExceededError) return { kind: 'retries_exhausted', error };
  if (error instanceof CancelledError) return { kind: 'cancelled', error };
  return { kind: 'failed', error };
}

/**
 * Collaborators a gate may be built over. Passing the same limiter or breaker
 * to several gates makes them share that quota or that health state.
 */
export interface CallGateDependencies {
  clock?: Clock;
  rateLimiter?: MultiWindowRateLimiter;
  circuitBreaker?: CircuitBreaker;
  retryExecutor?: RetryExecutor;
  retryable?: RetryablePredicate;
}

/**
 * Entry point for outbound calls to a rate-limited API
 *
 * Execution order:
 * 1. Circuit breaker - refuse with CircuitOpenError while open
 * 2. Rate limiter - refuse with RateLimitExceededError when any window is empty
 * 3. Retry executor - run the operation under the retry policy
 * 4. Record the overall outcome in the circuit breaker
 *
 * The gate performs no I/O of its own and does not log.
 */
export class CallGate implements GuardedCall {
  constructor(
    private readonly rateLimiter: MultiWindowRateLimiter,
    private readonly circuitBreaker: CircuitBreaker,
    private readonly retryExecutor: RetryExecutor,
    private readonly policy: RetryPolicy,
  ) {}

  /**
   * Run an operation through every guard
   * @throws CircuitOpenError, RateLimitExceededError, MaxRetriesExceededError,
   *   CancelledError, or the operation's own non-retryable error
   */
  async call<T>(operation: RetryableOperation<T>, options?: CallOptions): Promise<T> {
    const signal = options?.signal;
    throwIfAborted(signal);

    if (!this.circuitBreaker.canExecute()) {
      throw new CircuitOpenError(this.circuitBreaker.remainingCooldownMs());
    }

    if (!this.rateLimiter.tryAcquire()) {
      const wait = this.rateLimiter.timeUntilAvailable();
      throw new RateLimitExceededError(wait.window, wait.waitMs);
    }

    let result: T;
    try {
      result = await this.retryExecutor.execute(operation, this.policy, { signal });
    } catch (error) {
      // An abandoned call says nothing about the dependency's health
      if (!(error instanceof CancelledError)) {
        this.circuitBreaker.recordFailure();
      }
      throw error;
    }

    this.circuitBreaker.recordSuccess();
    return result;
  }

  /**
   * Same as call, with failures returned as values
   */
  async tryCall<T>(
    operation: RetryableOperation<T>,
    options?: CallOptions,
  ): Promise<Result<T, GateFailure>> {
    try {
      return ok(await this.call(operation, options));
    } catch (error) {
      return err(classifyGateError(error));
    }
  }

  /**
   * Configuration equivalent to this gate's current components
   */
  getConfig(): GateConfig {
    const breaker = this.circuitBreaker.snapshot();
    return {
      windows: this.rateLimiter.snapshot().map(window => ({
        name: window.name,
        maxRequests: window.capacity,
        periodSeconds: window.periodSeconds,
      })),
      failureThreshold: breaker.failureThreshold,
      recoveryTimeoutSeconds: breaker.recoveryTimeoutMs / 1000,
      maxRetries: this.policy.maxRetries,
      initialDelaySeconds: this.policy.initialDelayMs / 1000,
      maxDelaySeconds: this.policy.maxDelayMs / 1000,
      backoffFactor: this.policy.backoffFactor,
    };
  }

  getRateLimiter(): MultiWindowRateLimiter {
    return this.rateLimiter;
  }

  getCircuitBreaker(): CircuitBreaker {
    return this.circuitBreaker;
  }

  getRetryExecutor(): RetryExecutor {
    return this.retryExecutor;
  }

  getPolicy(): RetryPolicy {
    return this.policy;
  }

  /**
   * Build a gate from configuration
   * @throws ConfigurationError when the configuration is invalid
   */
  static create(input: GateConfigInput, deps: CallGateDependencies = {}): CallGate {
    const config = resolveGateConfig(input);
    const clock = deps.clock ?? systemClock;

    const rateLimiter =
      deps.rateLimiter ?? new MultiWindowRateLimiter({ windows: config.windows }, clock);
    const circuitBreaker =
      deps.circuitBreaker ??
      new CircuitBreaker(
        {
          failureThreshold: config.failureThreshold,
          recoveryTimeoutMs: config.recoveryTimeoutSeconds * 1000,
        },
        clock,
      );
    const retryExecutor = deps.retryExecutor ?? new RetryExecutor(clock);
    const policy = createRetryPolicy({
      maxRetries: config.maxRetries,
      initialDelayMs: config.initialDelaySeconds * 1000,
      maxDelayMs: config.maxDelaySeconds * 1000,
      backoffFactor: config.backoffFactor,
      retryable: deps.retryable ?? isRetryableByDefault,
    });

    return new CallGate(rateLimiter, circuitBreaker, retryExecutor, policy);
  }
}

/**
 * Gate that runs operations directly, without any guard.
 * Useful for testing or when resilience is not needed.
 */
export class PassthroughGate implements GuardedCall {
  async call<T>(operation: RetryableOperation<T>, options?: CallOptions): Promise<T> {
    return operation(options?.signal);
  }
}
