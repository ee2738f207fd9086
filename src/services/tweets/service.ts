import type { z } from 'zod';
import type { HttpTransport } from '../../transport/http-transport.js';
import type { AuthManager } from '../../auth/auth-manager.js';
import type { GuardedCall } from '../../resilience/gate.js';
import { classifyGateError } from '../../resilience/gate.js';
import type { RetryableOperation } from '../../resilience/retry.js';
import { logError, type Logger } from '../../observability/logging.js';
import { MetricNames, type MetricsCollector } from '../../observability/metrics.js';
import {
  ConfigurationError,
  UnexpectedResponseError,
  ValidationError,
} from '../../errors/categories.js';
import { sanitizeText } from '../../utils/text.js';
import {
  MAX_MEDIA_PER_POST,
  MAX_SEARCH_RESULTS,
  MIN_SEARCH_RESULTS,
  createTweetResponseSchema,
  likeResponseSchema,
  publicMetricsResponseSchema,
  retweetResponseSchema,
  searchResponseSchema,
  type CreateTweetRequest,
  type EngagementOptions,
  type MetricsOptions,
  type PostOptions,
  type PublicMetrics,
  type SearchOptions,
  type Tweet,
} from './types.js';

export interface TweetsService {
  /** Publishes a post and returns its id */
  post(text: string, options?: PostOptions): Promise<string>;
  reply(tweetId: string, text: string, options?: PostOptions): Promise<string>;
  /** Recent posts matching the query, at most `count` of them */
  search(query: string, count?: number, options?: SearchOptions): Promise<Tweet[]>;
  like(tweetId: string, options?: EngagementOptions): Promise<boolean>;
  retweet(tweetId: string, options?: EngagementOptions): Promise<boolean>;
  /** Current engagement counts of a post, read through the read quota */
  getPublicMetrics(tweetId: string, options?: MetricsOptions): Promise<PublicMetrics>;
}

/**
 * Gates the service calls through. Writes share one quota; search has its own.
 */
export interface TweetsGates {
  write: GuardedCall;
  read: GuardedCall;
}

export interface TweetsServiceSettings {
  maxPostLength: number;
  userId?: string;
}

export class TweetsServiceImpl implements TweetsService {
  constructor(
    private readonly transport: HttpTransport,
    private readonly authManager: AuthManager,
    private readonly gates: TweetsGates,
    private readonly logger: Logger,
    private readonly metrics: MetricsCollector,
    private readonly settings: TweetsServiceSettings,
  ) {}

  async post(text: string, options?: PostOptions): Promise<string> {
    const request = this.buildCreateRequest(text, options);

    const response = await this.run('post', this.gates.write, signal =>
      this.send('POST', '/2/tweets', request, signal, createTweetResponseSchema),
      options?.signal,
    );

    this.logger.info('Posted', { tweetId: response.data.id, replyTo: options?.inReplyTo });
    return response.data.id;
  }

  async reply(tweetId: string, text: string, options?: PostOptions): Promise<string> {
    requireId(tweetId, 'tweetId');
    return this.post(text, { ...options, inReplyTo: tweetId });
  }

  async search(query: string, count = 10, options?: SearchOptions): Promise<Tweet[]> {
    if (query.trim().length === 0) {
      throw new ValidationError('Search query must not be empty');
    }
    if (!Number.isInteger(count) || count < 1) {
      throw new ValidationError(`Search count must be a positive integer, got ${count}`);
    }

    const wanted = Math.min(count, MAX_SEARCH_RESULTS);
    const params = new URLSearchParams({
      query,
      max_results: String(Math.max(wanted, MIN_SEARCH_RESULTS)),
      'tweet.fields': 'author_id,created_at',
    });

    const response = await this.run('search', this.gates.read, signal =>
      this.send('GET', `/2/tweets/search/recent?${params.toString()}`, undefined, signal, searchResponseSchema),
      options?.signal,
    );

    const tweets = (response.data ?? []).slice(0, wanted).map(item => ({
      id: item.id,
      text: item.text,
      authorId: item.author_id,
      createdAt: item.created_at,
    }));
    this.logger.debug('Search completed', { query, results: tweets.length });
    return tweets;
  }

  async like(tweetId: string, options?: EngagementOptions): Promise<boolean> {
    requireId(tweetId, 'tweetId');
    const path = `/2/users/${encodeURIComponent(this.requireUserId())}/likes`;

    const response = await this.run('like', this.gates.write, signal =>
      this.send('POST', path, { tweet_id: tweetId }, signal, likeResponseSchema),
      options?.signal,
    );

    this.logger.info('Liked', { tweetId, liked: response.data.liked });
    return response.data.liked;
  }

  async retweet(tweetId: string, options?: EngagementOptions): Promise<boolean> {
    requireId(tweetId, 'tweetId');
    const path = `/2/users/${encodeURIComponent(this.requireUserId())}/retweets`;

    const response = await this.run('retweet', this.gates.write, signal =>
      this.send('POST', path, { tweet_id: tweetId }, signal, retweetResponseSchema),
      options?.signal,
    );

    this.logger.info('Retweeted', { tweetId, retweeted: response.data.retweeted });
    return response.data.retweeted;
  }

  async getPublicMetrics(tweetId: string, options?: MetricsOptions): Promise<PublicMetrics> {
    requireId(tweetId, 'tweetId');
    const params = new URLSearchParams({ 'tweet.fields': 'public_metrics' });

    const response = await this.run('metrics', this.gates.read, signal =>
      this.send('GET', `/2/tweets/${tweetId}?${params.toString()}`, undefined, signal, publicMetricsResponseSchema),
      options?.signal,
    );

    const counts = response.data.public_metrics;
    const metrics: PublicMetrics = {
      impressionCount: counts.impression_count,
      likeCount: counts.like_count,
      retweetCount: counts.retweet_count,
      replyCount: counts.reply_count,
    };
    this.logger.debug('Fetched public metrics', { tweetId, ...metrics });
    return metrics;
  }

  private buildCreateRequest(text: string, options?: PostOptions): CreateTweetRequest {
    const sanitized = sanitizeText(text, this.settings.maxPostLength);
    if (sanitized.length === 0) {
      throw new ValidationError('Post text is empty after removing non-printable characters');
    }

    const request: CreateTweetRequest = { text: sanitized };

    const mediaIds = options?.mediaIds ?? [];
    if (mediaIds.length > MAX_MEDIA_PER_POST) {
      throw new ValidationError(`At most ${MAX_MEDIA_PER_POST} media ids per post, got ${mediaIds.length}`);
    }
    if (mediaIds.length > 0) {
      request.media = { media_ids: [...mediaIds] };
    }

    if (options?.inReplyTo !== undefined) {
      request.reply = { in_reply_to_tweet_id: options.inReplyTo };
    }

    return request;
  }

  private requireUserId(): string {
    if (!this.settings.userId) {
      throw new ConfigurationError('A user id is required to like and retweet');
    }
    return this.settings.userId;
  }

  private async send<T>(
    method: string,
    path: string,
    body: unknown,
    signal: AbortSignal | undefined,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const raw = await this.transport.request(method, path, body, {
      signal,
      headers: this.authManager.getHeaders(),
    });

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new UnexpectedResponseError(`Unexpected response from ${method} ${path.split('?')[0]}`, {
        issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return parsed.data;
  }

  /**
   * Runs one endpoint call through its gate, recording the outcome
   */
  private async run<T>(
    endpoint: string,
    gate: GuardedCall,
    operation: RetryableOperation<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await gate.call(operation, { signal });
      this.metrics.increment(MetricNames.REQUEST_COUNT, { endpoint, status: 'success' });
      this.metrics.observe(MetricNames.REQUEST_DURATION_MS, Date.now() - startTime, { endpoint });
      return result;
    } catch (error) {
      this.recordFailure(endpoint, error, startTime);
      throw error;
    }
  }

  private recordFailure(endpoint: string, error: unknown, startTime: number): void {
    const failure = classifyGateError(error);
    const message = error instanceof Error ? error.message : String(error);

    this.metrics.increment(MetricNames.REQUEST_COUNT, { endpoint, status: 'error' });
    this.metrics.increment(MetricNames.REQUEST_ERRORS, { endpoint, kind: failure.kind });
    this.metrics.observe(MetricNames.REQUEST_DURATION_MS, Date.now() - startTime, { endpoint });

    switch (failure.kind) {
      case 'rate_limited':
        this.logger.warn('Rate limit exceeded', {
          endpoint,
          window: failure.error.window,
          retryAfterMs: failure.error.retryAfterMs,
        });
        break;
      case 'circuit_open':
        this.metrics.increment(MetricNames.CIRCUIT_REJECTIONS, { endpoint });
        this.logger.warn('Circuit breaker is open', {
          endpoint,
          retryAfterMs: failure.error.retryAfterMs,
        });
        break;
      case 'cancelled':
        this.logger.info('Request cancelled', { endpoint });
        break;
      case 'retries_exhausted':
        this.logger.error('Request failed after retries', {
          endpoint,
          attempts: failure.error.attempts,
          error: message,
        });
        break;
      case 'failed':
        logError(this.logger, error, `tweets.${endpoint}`);
        break;
    }
  }
}

function requireId(value: string, name: string): void {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`${name} must be a numeric id, got "${value}"`);
  }
}
