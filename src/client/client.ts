import { SocialAgentConfig, readGateConfig, validateConfig, writeGateConfig } from '../config/config.js';
import { BearerAuthManager } from '../auth/auth-manager.js';
import type { AuthManager } from '../auth/auth-manager.js';
import { FetchHttpTransport } from '../transport/http-transport.js';
import type { HttpTransport } from '../transport/http-transport.js';
import { CallGate } from '../resilience/gate.js';
import { isTransientError } from '../resilience/retry.js';
import type { Clock } from '../resilience/clock.js';
import { CancelledError } from '../errors/categories.js';
import { ConsoleLogger, type Logger } from '../observability/logging.js';
import { NoopMetricsCollector, type MetricsCollector } from '../observability/metrics.js';
import { attachLoggingHooks, attachMetricsHooks } from '../observability/hooks.js';
import { TweetsServiceImpl } from '../services/tweets/service.js';
import type { TweetsService } from '../services/tweets/service.js';
import type {
  EngagementOptions,
  MetricsOptions,
  PostOptions,
  PublicMetrics,
  SearchOptions,
  Tweet,
} from '../services/tweets/types.js';

export const USER_AGENT = 'x-social-gate/0.1.0';

/**
 * Collaborators the client builds for itself unless given
 */
export interface XClientDependencies {
  transport?: HttpTransport;
  /** Used by the default transport */
  fetch?: typeof fetch;
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * X API client. Every call passes through a call gate: writes through one
 * shared write quota, search through its own read quota.
 */
export interface XClient {
  readonly tweets: TweetsService;

  post(text: string, options?: PostOptions): Promise<string>;
  reply(tweetId: string, text: string, options?: PostOptions): Promise<string>;
  search(query: string, count?: number, options?: SearchOptions): Promise<Tweet[]>;
  like(tweetId: string, options?: EngagementOptions): Promise<boolean>;
  retweet(tweetId: string, options?: EngagementOptions): Promise<boolean>;
  getPublicMetrics(tweetId: string, options?: MetricsOptions): Promise<PublicMetrics>;

  getConfig(): Readonly<SocialAgentConfig>;
  getWriteGate(): CallGate;
  getReadGate(): CallGate;
  getTransport(): HttpTransport;
  getAuthManager(): AuthManager;

  /**
   * Cancels calls in flight and refuses new ones
   */
  close(): void;
}

export class XClientImpl implements XClient {
  readonly tweets: TweetsService;

  private readonly config: SocialAgentConfig;
  private readonly transport: HttpTransport;
  private readonly authManager: AuthManager;
  private readonly writeGate: CallGate;
  private readonly readGate: CallGate;
  private readonly logger: Logger;
  private readonly lifetime = new AbortController();

  constructor(config: SocialAgentConfig, deps: XClientDependencies = {}) {
    validateConfig(config);
    this.config = config;

    this.logger =
      deps.logger ??
      new ConsoleLogger({ level: config.logLevel, format: config.logFormat, target: 'x-client' });
    const metrics = deps.metrics ?? new NoopMetricsCollector();

    this.authManager = new BearerAuthManager({ token: config.bearerToken, userAgent: USER_AGENT });
    this.transport =
      deps.transport ??
      new FetchHttpTransport(
        config.baseUrl,
        { accept: 'application/json' },
        config.timeoutMs,
        deps.fetch ?? globalThis.fetch,
      );

    const gateDeps = { clock: deps.clock, retryable: isTransientError };
    this.writeGate = CallGate.create(writeGateConfig(config), gateDeps);
    this.readGate = CallGate.create(readGateConfig(config), gateDeps);

    attachLoggingHooks(this.writeGate, this.logger, 'write');
    attachLoggingHooks(this.readGate, this.logger, 'read');
    attachMetricsHooks(this.writeGate, metrics, 'write');
    attachMetricsHooks(this.readGate, metrics, 'read');

    this.tweets = new TweetsServiceImpl(
      this.transport,
      this.authManager,
      { write: this.writeGate, read: this.readGate },
      this.logger,
      metrics,
      { maxPostLength: config.maxPostLength, userId: config.userId },
    );
  }

  post(text: string, options?: PostOptions): Promise<string> {
    return this.guarded(options?.signal, signal => this.tweets.post(text, { ...options, signal }));
  }

  reply(tweetId: string, text: string, options?: PostOptions): Promise<string> {
    return this.guarded(options?.signal, signal =>
      this.tweets.reply(tweetId, text, { ...options, signal }),
    );
  }

  search(query: string, count?: number, options?: SearchOptions): Promise<Tweet[]> {
    return this.guarded(options?.signal, signal => this.tweets.search(query, count, { signal }));
  }

  like(tweetId: string, options?: EngagementOptions): Promise<boolean> {
    return this.guarded(options?.signal, signal => this.tweets.like(tweetId, { signal }));
  }

  retweet(tweetId: string, options?: EngagementOptions): Promise<boolean> {
    return this.guarded(options?.signal, signal => this.tweets.retweet(tweetId, { signal }));
  }

  getPublicMetrics(tweetId: string, options?: MetricsOptions): Promise<PublicMetrics> {
    return this.guarded(options?.signal, signal => this.tweets.getPublicMetrics(tweetId, { signal }));
  }

  getConfig(): Readonly<SocialAgentConfig> {
    return Object.freeze({ ...this.config });
  }

  getWriteGate(): CallGate {
    return this.writeGate;
  }

  getReadGate(): CallGate {
    return this.readGate;
  }

  getTransport(): HttpTransport {
    return this.transport;
  }

  getAuthManager(): AuthManager {
    return this.authManager;
  }

  close(): void {
    if (this.lifetime.signal.aborted) return;
    this.lifetime.abort();
    this.logger.info('Client closed');
  }

  /**
   * Runs a call under a signal that fires on the caller's abort or on close()
   */
  private async guarded<T>(
    callerSignal: AbortSignal | undefined,
    call: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    if (this.lifetime.signal.aborted) {
      throw new CancelledError('Client is closed');
    }

    const controller = new AbortController();
    const abort = (): void => controller.abort();
    this.lifetime.signal.addEventListener('abort', abort, { once: true });
    callerSignal?.addEventListener('abort', abort, { once: true });
    if (callerSignal?.aborted) {
      controller.abort();
    }

    try {
      return await call(controller.signal);
    } finally {
      this.lifetime.signal.removeEventListener('abort', abort);
      callerSignal?.removeEventListener('abort', abort);
    }
  }
}

/**
 * XClient namespace with factory methods.
 */
export const XClient = {
  /**
   * Creates a client from a configuration.
   * @throws ConfigurationError when the configuration is invalid
   */
  create(config: SocialAgentConfig, deps?: XClientDependencies): XClient {
    return new XClientImpl(config, deps);
  },

  /**
   * Creates a client from environment variables.
   *
   * Expected environment variables:
   * - X_BEARER_TOKEN (required)
   * - X_USER_ID (needed for likes and retweets)
   * - X_API_BASE_URL, X_TIMEOUT_MS, X_RATE_LIMIT_PER_15M, X_RATE_LIMIT_PER_DAY,
   *   X_RATE_LIMIT_PER_MONTH, X_READ_RATE_LIMIT_PER_15M, MAX_RETRIES,
   *   CIRCUIT_FAILURE_THRESHOLD, CIRCUIT_RECOVERY_TIMEOUT_SECS, LOG_LEVEL, LOG_FORMAT (optional)
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env, deps?: XClientDependencies): XClient {
    return new XClientImpl(SocialAgentConfig.fromEnv(env), deps);
  },
};
