/**
 * Multi-window token bucket rate limiter
 */

import { SocialError } from '../errors/error.js';
import { ConfigurationError } from '../errors/categories.js';
import { Clock, systemClock } from './clock.js';
import type { RateLimiterConfig, RateLimitHook, RateWindowConfig, TokenWindow } from './types.js';

/**
 * Error thrown when a request is refused by one or more quota windows.
 * This is a quota condition, not a health condition: the dependency is fine.
 */
export class RateLimitExceededError extends SocialError {
  /** The exhausted window that refills last */
  readonly window: string;

  constructor(window: string, retryAfterMs: number) {
    super({
      type: 'rate_limit_exceeded',
      message: `Rate limit exceeded for ${window} window, next token in ${retryAfterMs}ms`,
      retryAfterMs,
      isRetryable: false,
      details: { window },
    });
    this.name = 'RateLimitExceededError';
    this.window = window;
  }
}

/**
 * Wait needed before every window can admit a request
 */
export interface QuotaWait {
  window: string;
  waitMs: number;
}

/**
 * Token bucket limiter that tracks several independent quotas at once
 * (for example 50 per 15 minutes, 500 per day and 1000 per 30 days).
 *
 * - Each window refills continuously at capacity / period
 * - A request is admitted only if every window holds a whole token
 * - An admitted request costs one token in every window; a refused one costs nothing
 */
export class MultiWindowRateLimiter {
  private readonly windows = new Map<string, TokenWindow>();
  private readonly hooks: RateLimitHook[] = [];

  constructor(
    config: RateLimiterConfig,
    private readonly clock: Clock = systemClock,
  ) {
    validateRateLimiterConfig(config);

    const now = clock.now();
    for (const window of config.windows) {
      this.windows.set(window.name, {
        name: window.name,
        capacity: window.maxRequests,
        periodSeconds: window.periodSeconds,
        tokens: window.maxRequests,
        lastRefill: now,
      });
    }
  }

  /**
   * Add a hook to be called when a request is refused
   */
  addHook(hook: RateLimitHook): void {
    this.hooks.push(hook);
  }

  /**
   * Try to take one token from every window.
   * Runs without yielding, so two callers can never both spend the last token.
   * @returns true if the request is admitted
   */
  tryAcquire(): boolean {
    this.refillAll();

    for (const window of this.windows.values()) {
      if (window.tokens < 1) {
        const wait = this.longestWait();
        this.hooks.forEach(hook => hook.onRateLimited(wait.window, wait.waitMs));
        return false;
      }
    }

    for (const window of this.windows.values()) {
      window.tokens -= 1;
    }
    return true;
  }

  /**
   * Take a token, suspending until every window can admit the request
   * @throws CancelledError if the signal aborts while waiting
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    while (!this.tryAcquire()) {
      const { waitMs } = this.timeUntilAvailable();
      await this.clock.sleep(Math.max(waitMs, 1), signal);
    }
  }

  /**
   * Time until a request would be admitted, named after the window that refills last
   */
  timeUntilAvailable(): QuotaWait {
    this.refillAll();
    return this.longestWait();
  }

  /**
   * Current token count of a window
   * @throws ConfigurationError for an unknown window
   */
  getAvailableTokens(name: string): number {
    const window = this.windows.get(name);
    if (!window) {
      throw new ConfigurationError(`Unknown rate limit window: ${name}`);
    }
    this.refill(window, this.clock.now());
    return window.tokens;
  }

  /**
   * Copy of every window's state after refilling
   */
  snapshot(): TokenWindow[] {
    this.refillAll();
    return Array.from(this.windows.values(), window => ({ ...window }));
  }

  /**
   * Names of the configured windows
   */
  getWindowNames(): string[] {
    return Array.from(this.windows.keys());
  }

  /**
   * Refill every window to capacity
   */
  reset(): void {
    const now = this.clock.now();
    for (const window of this.windows.values()) {
      window.tokens = window.capacity;
      window.lastRefill = now;
    }
  }

  private refillAll(): void {
    const now = this.clock.now();
    for (const window of this.windows.values()) {
      this.refill(window, now);
    }
  }

  private refill(window: TokenWindow, now: number): void {
    // A clock that steps backwards adds nothing and does not move lastRefill back
    const elapsedSeconds = Math.max(0, now - window.lastRefill) / 1000;
    const tokensToAdd = (elapsedSeconds * window.capacity) / window.periodSeconds;

    window.tokens = Math.min(window.capacity, window.tokens + tokensToAdd);
    window.lastRefill = Math.max(window.lastRefill, now);
  }

  private longestWait(): QuotaWait {
    let longest: QuotaWait = { window: '', waitMs: 0 };

    for (const window of this.windows.values()) {
      if (window.tokens >= 1) continue;

      const tokensNeeded = 1 - window.tokens;
      const waitMs = Math.ceil((tokensNeeded * window.periodSeconds * 1000) / window.capacity);
      if (longest.window === '' || waitMs > longest.waitMs) {
        longest = { window: window.name, waitMs };
      }
    }

    return longest;
  }
}

/**
 * Validates a rate limiter configuration
 * @throws ConfigurationError describing the first problem found
 */
export function validateRateLimiterConfig(config: RateLimiterConfig): void {
  if (config.windows.length === 0) {
    throw new ConfigurationError('Rate limiter needs at least one window');
  }

  const seen = new Set<string>();
  for (const window of config.windows) {
    validateWindow(window);
    if (seen.has(window.name)) {
      throw new ConfigurationError(`Duplicate rate limit window: ${window.name}`);
    }
    seen.add(window.name);
  }
}

function validateWindow(window: RateWindowConfig): void {
  if (window.name.length === 0) {
    throw new ConfigurationError('Rate limit window name must not be empty');
  }
  if (!Number.isInteger(window.maxRequests) || window.maxRequests <= 0) {
    throw new ConfigurationError(
      `Window ${window.name}: maxRequests must be a positive integer`,
      { maxRequests: window.maxRequests },
    );
  }
  if (!Number.isFinite(window.periodSeconds) || window.periodSeconds <= 0) {
    throw new ConfigurationError(
      `Window ${window.name}: periodSeconds must be greater than zero`,
      { periodSeconds: window.periodSeconds },
    );
  }
}

/**
 * Default write quota of the X API free tier: 50 per 15 minutes, 500 per day, 1000 per 30 days
 */
export function createDefaultRateLimiterConfig(): RateLimiterConfig {
  return {
    windows: [
      { name: '15m', maxRequests: 50, periodSeconds: 900 },
      { name: '1d', maxRequests: 500, periodSeconds: 86_400 },
      { name: '30d', maxRequests: 1000, periodSeconds: 2_592_000 },
    ],
  };
}
