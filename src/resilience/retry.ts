/**
 * Retry executor with deterministic exponential backoff
 */

import { SocialError } from '../errors/error.js';
import { CancelledError, ConfigurationError } from '../errors/categories.js';
import { Clock, systemClock, throwIfAborted } from './clock.js';
import { CircuitOpenError } from './circuit-breaker.js';
import { RateLimitExceededError } from './rate-limiter.js';
import type { RetryHook, RetryPolicy } from './types.js';

/**
 * Error thrown when every attempt of an operation failed with a retryable error
 */
export class MaxRetriesExceededError extends SocialError {
  /** Total attempts made, the first one included */
  readonly attempts: number;

  constructor(cause: unknown, attempts: number) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({
      type: 'max_retries_exceeded',
      message: `Operation failed after ${attempts} attempts: ${reason}`,
      isRetryable: false,
      details: { attempts },
      cause,
    });
    this.name = 'MaxRetriesExceededError';
    this.attempts = attempts;
  }
}

/**
 * An operation the executor may call several times
 */
export type RetryableOperation<T> = (signal?: AbortSignal) => Promise<T>;

export interface ExecuteOptions {
  /** Checked before every attempt and every sleep */
  signal?: AbortSignal;
}

/**
 * Executes operations with retry logic and exponential backoff.
 * No jitter is added; callers running many clients against one API should add their own.
 */
export class RetryExecutor {
  private readonly hooks: RetryHook[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Add a hook to be called on retry attempts
   */
  addHook(hook: RetryHook): void {
    this.hooks.push(hook);
  }

  /**
   * Execute an operation with retry logic
   * @returns The result of the first successful attempt
   * @throws MaxRetriesExceededError wrapping the last error once attempts run out
   * @throws The original error, unchanged, when the policy does not retry it
   * @throws CancelledError when the signal aborts
   */
  async execute<T>(
    operation: RetryableOperation<T>,
    policy: RetryPolicy,
    options?: ExecuteOptions,
  ): Promise<T> {
    const signal = options?.signal;
    const totalAttempts = policy.maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= totalAttempts; attempt++) {
      throwIfAborted(signal);

      try {
        return await operation(signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error instanceof CancelledError ? error : new CancelledError();
        }
        if (!policy.retryable(error)) {
          throw error;
        }
        lastError = error;
        if (attempt === totalAttempts) {
          break;
        }

        const delay = computeBackoffDelay(policy, attempt);
        this.hooks.forEach(hook => hook.onRetry(attempt, error, delay));

        throwIfAborted(signal);
        await this.clock.sleep(delay, signal);
      }
    }

    throw new MaxRetriesExceededError(lastError, totalAttempts);
  }
}

/**
 * Delay before retry `retry` (1-indexed): initialDelay * factor^(retry-1), capped at maxDelay
 */
export function computeBackoffDelay(policy: RetryPolicy, retry: number): number {
  const exponentialDelay = policy.initialDelayMs * Math.pow(policy.backoffFactor, retry - 1);
  return Math.min(exponentialDelay, policy.maxDelayMs);
}

/**
 * Retries everything except the gate's own refusals and cancellation
 */
export function isRetryableByDefault(error: unknown): boolean {
  return !(
    error instanceof CircuitOpenError ||
    error instanceof RateLimitExceededError ||
    error instanceof MaxRetriesExceededError ||
    error instanceof CancelledError
  );
}

/**
 * Retries only errors that declare themselves transient.
 * Unknown errors (plain Error, TypeError) are treated as transient.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof SocialError) {
    return error.isRetryable;
  }
  return true;
}

/**
 * Build a frozen retry policy from defaults and overrides
 * @throws ConfigurationError for invalid values
 */
export function createRetryPolicy(overrides?: Partial<RetryPolicy>): RetryPolicy {
  const policy: RetryPolicy = {
    ...createDefaultRetryPolicy(),
    ...overrides,
  };
  validateRetryPolicy(policy);
  return Object.freeze(policy);
}

export function validateRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    throw new ConfigurationError('maxRetries must be a non-negative integer', {
      maxRetries: policy.maxRetries,
    });
  }
  if (!Number.isFinite(policy.initialDelayMs) || policy.initialDelayMs < 0) {
    throw new ConfigurationError('initialDelayMs must be zero or more', {
      initialDelayMs: policy.initialDelayMs,
    });
  }
  if (!Number.isFinite(policy.maxDelayMs) || policy.maxDelayMs < policy.initialDelayMs) {
    throw new ConfigurationError('maxDelayMs must be at least initialDelayMs', {
      maxDelayMs: policy.maxDelayMs,
    });
  }
  if (!Number.isFinite(policy.backoffFactor) || policy.backoffFactor <= 1) {
    throw new ConfigurationError('backoffFactor must be greater than 1', {
      backoffFactor: policy.backoffFactor,
    });
  }
}

/**
 * Create a default retry policy
 */
export function createDefaultRetryPolicy(): RetryPolicy {
  return {
    maxRetries: 3,
    initialDelayMs: 1000,
    maxDelayMs: 60_000,
    backoffFactor: 2,
    retryable: isRetryableByDefault,
  };
}
