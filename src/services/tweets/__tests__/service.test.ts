import { describe, it, expect, beforeEach } from 'vitest';
import { TweetsServiceImpl } from '../service.js';
import { createMockHttpTransport, mockHttpTransportError, mockHttpTransportResponse } from '../../../__mocks__/http-transport.mock.js';
import { createMockAuthManager } from '../../../__mocks__/auth-manager.mock.js';
import { createMockLogger, type MockLogger } from '../../../__mocks__/logger.mock.js';
import { ManualClock } from '../../../__mocks__/clock.mock.js';
import { CallGate, PassthroughGate } from '../../../resilience/gate.js';
import { CircuitOpenError } from '../../../resilience/circuit-breaker.js';
import { RateLimitExceededError } from '../../../resilience/rate-limiter.js';
import { MaxRetriesExceededError, isTransientError } from '../../../resilience/retry.js';
import { InMemoryMetricsCollector, MetricNames } from '../../../observability/metrics.js';
import {
  ConfigurationError,
  ServerError,
  UnexpectedResponseError,
  ValidationError,
} from '../../../errors/categories.js';

const AUTH_HEADERS = {
  authorization: 'Bearer test-secret',
  'content-type': 'application/json',
};

describe('TweetsServiceImpl', () => {
  let mockTransport: ReturnType<typeof createMockHttpTransport>;
  let mockAuth: ReturnType<typeof createMockAuthManager>;
  let logger: MockLogger;
  let metrics: InMemoryMetricsCollector;
  let service: TweetsServiceImpl;

  beforeEach(() => {
    mockTransport = createMockHttpTransport();
    mockAuth = createMockAuthManager();
    logger = createMockLogger();
    metrics = new InMemoryMetricsCollector();
    service = new TweetsServiceImpl(
      mockTransport,
      mockAuth,
      { write: new PassthroughGate(), read: new PassthroughGate() },
      logger,
      metrics,
      { maxPostLength: 280, userId: '42' },
    );
  });

  describe('post', () => {
    it('should post and return the new id', async () => {
      mockHttpTransportResponse(mockTransport, { data: { id: '1001', text: 'Hello world' } });

      const id = await service.post('Hello world');

      expect(id).toBe('1001');
      expect(mockAuth.getHeaders).toHaveBeenCalled();
      expect(mockTransport.request).toHaveBeenCalledWith(
        'POST',
        '/2/tweets',
        { text: 'Hello world' },
        { signal: undefined, headers: AUTH_HEADERS },
      );
      expect(metrics.count(MetricNames.REQUEST_COUNT, { endpoint: 'post', status: 'success' })).toBe(1);
      expect(metrics.observations(MetricNames.REQUEST_DURATION_MS, { endpoint: 'post' })).toHaveLength(1);
      expect(logger.info).toHaveBeenCalledWith('Posted', { tweetId: '1001', replyTo: undefined });
    });

    it('should sanitize and truncate the text', async () => {
      mockHttpTransportResponse(mockTransport, { data: { id: '1', text: 'x' } });

      await service.post('  Hi\u0000 there  ');
      await service.post('a'.repeat(300));

      expect(mockTransport.request.mock.calls[0]?.[2]).toEqual({ text: 'Hi there' });
      expect(mockTransport.request.mock.calls[1]?.[2]).toEqual({ text: 'a'.repeat(280) });
    });

    it('should attach media ids and the reply target', async () => {
      mockHttpTransportResponse(mockTransport, { data: { id: '1', text: 'x' } });

      await service.post('With pictures', { mediaIds: ['m1', 'm2'], inReplyTo: '900' });

      expect(mockTransport.request.mock.calls[0]?.[2]).toEqual({
        text: 'With pictures',
        media: { media_ids: ['m1', 'm2'] },
        reply: { in_reply_to_tweet_id: '900' },
      });
    });

    it('should reject text that is empty once sanitized', async () => {
      await expect(service.post('\u0000\n\t ')).rejects.toBeInstanceOf(ValidationError);
      expect(mockTransport.request).not.toHaveBeenCalled();
    });

    it('should reject more than four media ids', async () => {
      await expect(
        service.post('Too many', { mediaIds: ['1', '2', '3', '4', '5'] }),
      ).rejects.toThrow('At most 4 media ids per post, got 5');
    });

    it('should reject responses of the wrong shape', async () => {
      mockHttpTransportResponse(mockTransport, { data: { id: 1001 } });

      const error = await service.post('Hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnexpectedResponseError);
      expect(error).toHaveProperty('message', 'Unexpected response from POST /2/tweets');
    });

    it('should log, count and rethrow transport errors', async () => {
      mockHttpTransportError(mockTransport, new ServerError('Service unavailable', 503));

      await expect(service.post('Hello')).rejects.toThrow('Service unavailable');

      expect(metrics.count(MetricNames.REQUEST_COUNT, { endpoint: 'post', status: 'error' })).toBe(1);
      expect(metrics.count(MetricNames.REQUEST_ERRORS, { endpoint: 'post', kind: 'failed' })).toBe(1);
      expect(logger.error).toHaveBeenCalledWith('Error occurred', {
        context: 'tweets.post',
        errorName: 'ServerError',
        errorMessage: 'Service unavailable',
      });
    });
  });

  describe('reply', () => {
    it('should post in reply to the given id', async () => {
      mockHttpTransportResponse(mockTransport, { data: { id: '2002', text: 'Thanks' } });

      await expect(service.reply('123', 'Thanks')).resolves.toBe('2002');

      expect(mockTransport.request.mock.calls[0]?.[2]).toEqual({
        text: 'Thanks',
        reply: { in_reply_to_tweet_id: '123' },
      });
    });

    it('should reject malformed ids', async () => {
      await expect(service.reply('abc', 'Thanks')).rejects.toThrow('tweetId must be a numeric id, got "abc"');
    });
  });

  describe('search', () => {
    const items = Array.from({ length: 7 }, (_, i) => ({
      id: String(i + 1),
      text: `post ${i + 1}`,
      author_id: '77',
    }));

    it('should ask for at least ten results and trim to the count', async () => {
      mockHttpTransportResponse(mockTransport, { data: items, meta: { result_count: 7 } });

      const tweets = await service.search('typescript lang', 5);

      expect(mockTransport.request).toHaveBeenCalledWith(
        'GET',
        '/2/tweets/search/recent?query=typescript+lang&max_results=10&tweet.fields=author_id%2Ccreated_at',
        undefined,
        { signal: undefined, headers: AUTH_HEADERS },
      );
      expect(tweets).toHaveLength(5);
      expect(tweets[0]).toEqual({ id: '1', text: 'post 1', authorId: '77' });
    });

    it('should cap max_results at one hundred', async () => {
      mockHttpTransportResponse(mockTransport, { data: items });

      const tweets = await service.search('ts', 250);

      expect(mockTransport.request.mock.calls[0]?.[1]).toContain('max_results=100&');
      expect(tweets).toHaveLength(7);
    });

    it('should return an empty list when nothing matches', async () => {
      mockHttpTransportResponse(mockTransport, { meta: { result_count: 0 } });

      await expect(service.search('nothing')).resolves.toEqual([]);
    });

    it('should validate the query and count', async () => {
      await expect(service.search('   ')).rejects.toBeInstanceOf(ValidationError);
      await expect(service.search('ts', 0)).rejects.toThrow('Search count must be a positive integer, got 0');
      expect(mockTransport.request).not.toHaveBeenCalled();
    });
  });

  describe('like and retweet', () => {
    it('should like as the configured user', async () => {
      mockHttpTransportResponse(mockTransport, { data: { liked: true } });

      await expect(service.like('123')).resolves.toBe(true);

      expect(mockTransport.request).toHaveBeenCalledWith(
        'POST',
        '/2/users/42/likes',
        { tweet_id: '123' },
        { signal: undefined, headers: AUTH_HEADERS },
      );
    });

    it('should retweet as the configured user', async () => {
      mockHttpTransportResponse(mockTransport, { data: { retweeted: true } });

      await expect(service.retweet('123')).resolves.toBe(true);

      expect(mockTransport.request.mock.calls[0]?.[1]).toBe('/2/users/42/retweets');
    });

    it('should require a user id', async () => {
      const anonymous = new TweetsServiceImpl(
        mockTransport,
        mockAuth,
        { write: new PassthroughGate(), read: new PassthroughGate() },
        logger,
        metrics,
        { maxPostLength: 280 },
      );

      await expect(anonymous.like('123')).rejects.toBeInstanceOf(ConfigurationError);
      await expect(anonymous.retweet('123')).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe('getPublicMetrics', () => {
    it('should read the engagement counts of a post', async () => {
      mockHttpTransportResponse(mockTransport, {
        data: {
          id: '555',
          text: 'launch day',
          public_metrics: {
            impression_count: 1200,
            like_count: 40,
            retweet_count: 6,
            reply_count: 3,
            quote_count: 1,
          },
        },
      });

      const result = await service.getPublicMetrics('555');

      expect(result).toEqual({ impressionCount: 1200, likeCount: 40, retweetCount: 6, replyCount: 3 });
      expect(mockTransport.request).toHaveBeenCalledWith(
        'GET',
        '/2/tweets/555?tweet.fields=public_metrics',
        undefined,
        { signal: undefined, headers: AUTH_HEADERS },
      );
      expect(metrics.count(MetricNames.REQUEST_COUNT, { endpoint: 'metrics', status: 'success' })).toBe(1);
    });

    it('should read missing impressions as zero', async () => {
      mockHttpTransportResponse(mockTransport, {
        data: { id: '555', public_metrics: { like_count: 2, retweet_count: 0, reply_count: 1 } },
      });

      await expect(service.getPublicMetrics('555')).resolves.toEqual({
        impressionCount: 0,
        likeCount: 2,
        retweetCount: 0,
        replyCount: 1,
      });
    });

    it('should reject a response without public metrics', async () => {
      mockHttpTransportResponse(mockTransport, { data: { id: '555', text: 'no counts' } });

      await expect(service.getPublicMetrics('555')).rejects.toBeInstanceOf(UnexpectedResponseError);
      expect(metrics.count(MetricNames.REQUEST_ERRORS, { endpoint: 'metrics', kind: 'failed' })).toBe(1);
    });

    it('should reject a non-numeric id', async () => {
      await expect(service.getPublicMetrics('../2/users')).rejects.toBeInstanceOf(ValidationError);
      expect(mockTransport.request).not.toHaveBeenCalled();
    });
  });

  describe('with call gates', () => {
    let clock: ManualClock;

    beforeEach(() => {
      clock = new ManualClock();
    });

    function createGatedService(write: CallGate, read: CallGate): TweetsServiceImpl {
      return new TweetsServiceImpl(mockTransport, mockAuth, { write, read }, logger, metrics, {
        maxPostLength: 280,
        userId: '42',
      });
    }

    it('should spend one write quota across post, like and retweet', async () => {
      const write = CallGate.create(
        { windows: [{ name: '15m', maxRequests: 2, periodSeconds: 900 }] },
        { clock },
      );
      const read = CallGate.create(
        { windows: [{ name: '15m', maxRequests: 2, periodSeconds: 900 }] },
        { clock },
      );
      const gated = createGatedService(write, read);
      mockTransport.request
        .mockResolvedValueOnce({ data: { id: '1', text: 'a' } })
        .mockResolvedValueOnce({ data: { liked: true } })
        .mockResolvedValueOnce({ data: [] });

      await gated.post('first');
      await gated.like('1');
      await expect(gated.retweet('1')).rejects.toBeInstanceOf(RateLimitExceededError);
      await expect(gated.search('still allowed')).resolves.toEqual([]);

      expect(mockTransport.request).toHaveBeenCalledTimes(3);
      expect(metrics.count(MetricNames.REQUEST_ERRORS, { endpoint: 'retweet', kind: 'rate_limited' })).toBe(1);
      expect(metrics.total(MetricNames.QUOTA_REJECTIONS)).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith('Rate limit exceeded', {
        endpoint: 'retweet',
        window: '15m',
        retryAfterMs: 450_000,
      });
    });

    it('should spend the read quota on metrics lookups, not the write quota', async () => {
      const write = CallGate.create(
        { windows: [{ name: '15m', maxRequests: 5, periodSeconds: 900 }] },
        { clock },
      );
      const read = CallGate.create(
        { windows: [{ name: '15m', maxRequests: 1, periodSeconds: 900 }] },
        { clock },
      );
      const gated = createGatedService(write, read);
      mockHttpTransportResponse(mockTransport, {
        data: { id: '9', public_metrics: { like_count: 1, retweet_count: 0, reply_count: 0 } },
      });

      await gated.getPublicMetrics('9');
      await expect(gated.getPublicMetrics('9')).rejects.toBeInstanceOf(RateLimitExceededError);

      expect(mockTransport.request).toHaveBeenCalledTimes(1);
      expect(write.getRateLimiter().getAvailableTokens('15m')).toBe(5);
    });

    it('should fail fast once repeated failures open the circuit', async () => {
      const write = CallGate.create(
        {
          windows: [{ name: '15m', maxRequests: 50, periodSeconds: 900 }],
          failureThreshold: 1,
          maxRetries: 0,
        },
        { clock, retryable: isTransientError },
      );
      const gated = createGatedService(write, write);
      mockHttpTransportError(mockTransport, new ServerError('Service unavailable', 503));

      await expect(gated.post('one')).rejects.toBeInstanceOf(MaxRetriesExceededError);
      await expect(gated.post('two')).rejects.toBeInstanceOf(CircuitOpenError);

      expect(mockTransport.request).toHaveBeenCalledTimes(1);
      expect(metrics.count(MetricNames.CIRCUIT_REJECTIONS, { endpoint: 'post' })).toBe(1);
      expect(logger.error).toHaveBeenCalledWith('Request failed after retries', {
        endpoint: 'post',
        attempts: 1,
        error: 'Operation failed after 1 attempts: Service unavailable',
      });
      expect(logger.warn).toHaveBeenCalledWith('Circuit breaker is open', {
        endpoint: 'post',
        retryAfterMs: 60_000,
      });
    });
  });
});
