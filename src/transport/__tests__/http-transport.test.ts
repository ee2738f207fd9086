import { describe, it, expect, vi, assert } from 'vitest';
import { FetchHttpTransport, parseRetryAfterMs } from '../http-transport.js';
import {
  AuthenticationError,
  CancelledError,
  NetworkError,
  PermissionDeniedError,
  RateLimitError,
  ServerError,
  UnexpectedResponseError,
  ValidationError,
} from '../../errors/categories.js';

const BASE_URL = 'https://api.test';
const HEADERS = { authorization: 'Bearer test-secret', 'content-type': 'application/json' };

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), init);
}

function createTransport(fetchImpl: typeof fetch, timeout = 5000): FetchHttpTransport {
  return new FetchHttpTransport(BASE_URL, HEADERS, timeout, fetchImpl);
}

function hangingFetch(): typeof fetch {
  return (_input, init) =>
    new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
    });
}

describe('FetchHttpTransport', () => {
  describe('request', () => {
    it('sends JSON with the default headers and decodes the response', async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
        jsonResponse({ data: { id: '1', text: 'hi' } }, { status: 201 }),
      );
      const transport = createTransport(fetchImpl);

      const result = await transport.request('POST', '/2/tweets', { text: 'hi' }, {
        headers: { 'x-trace': 'abc' },
      });

      expect(result).toEqual({ data: { id: '1', text: 'hi' } });
      expect(fetchImpl).toHaveBeenCalledWith(
        'https://api.test/2/tweets',
        expect.objectContaining({
          method: 'POST',
          body: '{"text":"hi"}',
          headers: { ...HEADERS, 'x-trace': 'abc' },
        }),
      );
    });

    it('sends no body when none is given', async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ data: [] }));
      const transport = createTransport(fetchImpl);

      await transport.request('GET', '/2/tweets/search/recent?query=ts');

      expect(fetchImpl).toHaveBeenCalledWith(
        'https://api.test/2/tweets/search/recent?query=ts',
        expect.objectContaining({ method: 'GET', body: undefined }),
      );
    });

    it('returns undefined for an empty body', async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 204 }));

      await expect(createTransport(fetchImpl).request('DELETE', '/x')).resolves.toBeUndefined();
    });
  });

  describe('error mapping', () => {
    it('maps 401 with a problem body to AuthenticationError', async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
        jsonResponse(
          { title: 'Unauthorized', type: 'about:blank', status: 401, detail: 'Unauthorized' },
          { status: 401 },
        ),
      );

      const error = await createTransport(fetchImpl).request('GET', '/x').catch((e: unknown) => e);

      assert(error instanceof AuthenticationError);
      expect(error.message).toBe('Unauthorized');
      expect(error.status).toBe(401);
      expect(error.isRetryable).toBe(false);
    });

    it('maps 403 with an errors array to PermissionDeniedError', async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
        jsonResponse({ errors: [{ message: 'Status is a duplicate.', code: 187 }] }, { status: 403 }),
      );

      const error = await createTransport(fetchImpl).request('POST', '/x').catch((e: unknown) => e);

      assert(error instanceof PermissionDeniedError);
      expect(error.message).toBe('Status is a duplicate.');
      expect(error.details).toEqual({ errors: [{ message: 'Status is a duplicate.', code: 187 }] });
    });

    it('maps 400 and 422 to ValidationError', async () => {
      for (const status of [400, 422]) {
        const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
          jsonResponse({ detail: 'Invalid query' }, { status }),
        );

        const error = await createTransport(fetchImpl).request('GET', '/x').catch((e: unknown) => e);

        assert(error instanceof ValidationError);
        expect(error.status).toBe(status);
        expect(error.message).toBe('Invalid query');
      }
    });

    it('maps 429 to RateLimitError with the retry-after hint', async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
        jsonResponse({ title: 'Too Many Requests' }, { status: 429, headers: { 'retry-after': '15' } }),
      );

      const error = await createTransport(fetchImpl).request('POST', '/x').catch((e: unknown) => e);

      assert(error instanceof RateLimitError);
      expect(error.retryAfterMs).toBe(15_000);
      expect(error.isRetryable).toBe(true);
    });

    it('maps 5xx with a plain-text body to ServerError', async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
        new Response('upstream down', { status: 503 }),
      );

      const error = await createTransport(fetchImpl).request('GET', '/x').catch((e: unknown) => e);

      assert(error instanceof ServerError);
      expect(error.message).toBe('upstream down');
      expect(error.status).toBe(503);
      expect(error.isRetryable).toBe(true);
    });

    it('maps a failed fetch to NetworkError', async () => {
      const cause = new TypeError('fetch failed');
      const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(cause);

      const error = await createTransport(fetchImpl).request('GET', '/x').catch((e: unknown) => e);

      assert(error instanceof NetworkError);
      expect(error.message).toBe('Network request failed');
      expect(error.cause).toBe(cause);
    });

    it('rejects an unparseable success body as a non-retryable unexpected response', async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('<html>', { status: 201 }));

      const error = await createTransport(fetchImpl).request('POST', '/x', {}).catch((e: unknown) => e);

      assert(error instanceof UnexpectedResponseError);
      expect(error.message).toBe('Response body is not valid JSON');
      expect(error.isRetryable).toBe(false);
      expect(error.details?.status).toBe(201);
    });
  });

  describe('cancellation and timeouts', () => {
    it('does not call fetch with an aborted signal', async () => {
      const fetchImpl = vi.fn<typeof fetch>();
      const controller = new AbortController();
      controller.abort();

      await expect(
        createTransport(fetchImpl).request('GET', '/x', undefined, { signal: controller.signal }),
      ).rejects.toBeInstanceOf(CancelledError);
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('maps a caller abort during the request to CancelledError', async () => {
      const controller = new AbortController();
      const pending = createTransport(hangingFetch()).request('GET', '/x', undefined, {
        signal: controller.signal,
      });

      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });

    it('maps a timeout to NetworkError', async () => {
      const error = await createTransport(hangingFetch(), 10)
        .request('GET', '/x')
        .catch((e: unknown) => e);

      assert(error instanceof NetworkError);
      expect(error.message).toBe('Request timeout after 10ms');
    });
  });
});

describe('parseRetryAfterMs', () => {
  const now = Date.UTC(2024, 0, 1, 12, 0, 0);

  it('reads delta seconds', () => {
    expect(parseRetryAfterMs(new Headers({ 'retry-after': '2' }), now)).toBe(2000);
  });

  it('reads an HTTP date', () => {
    expect(
      parseRetryAfterMs(new Headers({ 'retry-after': 'Mon, 01 Jan 2024 12:00:30 GMT' }), now),
    ).toBe(30_000);
  });

  it('falls back to the reset epoch', () => {
    const reset = String(now / 1000 + 90);

    expect(parseRetryAfterMs(new Headers({ 'x-rate-limit-reset': reset }), now)).toBe(90_000);
  });

  it('never returns a negative wait', () => {
    expect(parseRetryAfterMs(new Headers({ 'x-rate-limit-reset': '1' }), now)).toBe(0);
  });

  it('returns undefined without hints', () => {
    expect(parseRetryAfterMs(new Headers(), now)).toBeUndefined();
  });
});
