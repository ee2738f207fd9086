import { z } from 'zod';
import {
  AuthenticationError,
  CancelledError,
  NetworkError,
  NotFoundError,
  PermissionDeniedError,
  RateLimitError,
  ServerError,
  UnexpectedResponseError,
  ValidationError,
} from '../errors/categories.js';
import { SocialError } from '../errors/error.js';

/**
 * Options for HTTP requests
 */
export interface RequestOptions {
  /**
   * Request timeout in milliseconds
   */
  timeout?: number;

  /**
   * Additional headers to include in the request
   */
  headers?: Record<string, string>;

  /**
   * Signal for request cancellation
   */
  signal?: AbortSignal;
}

/**
 * Interface for HTTP transport layer
 */
export interface HttpTransport {
  /**
   * Makes an HTTP request and returns the decoded JSON body, or undefined for an empty one
   */
  request(
    method: string,
    path: string,
    body?: unknown,
    options?: RequestOptions
  ): Promise<unknown>;
}

/**
 * Error bodies of v2 (problem details) and v1 (errors array) endpoints
 */
const errorBodySchema = z
  .object({
    title: z.string().optional(),
    detail: z.string().optional(),
    type: z.string().optional(),
    errors: z
      .array(z.object({ message: z.string().optional(), code: z.number().optional() }).passthrough())
      .optional(),
  })
  .passthrough();

/**
 * Reads how long to wait before retrying from `retry-after` (seconds or HTTP date)
 * or `x-rate-limit-reset` (epoch seconds)
 */
export function parseRetryAfterMs(headers: Headers, nowMs: number = Date.now()): number | undefined {
  const retryAfter = headers.get('retry-after');
  if (retryAfter) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) {
      return Math.max(0, seconds * 1000);
    }
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) {
      return Math.max(0, date - nowMs);
    }
  }

  const reset = headers.get('x-rate-limit-reset');
  if (reset) {
    const epochSeconds = Number(reset);
    if (Number.isFinite(epochSeconds)) {
      return Math.max(0, epochSeconds * 1000 - nowMs);
    }
  }

  return undefined;
}

/**
 * Implementation of HttpTransport using the Fetch API
 */
export class FetchHttpTransport implements HttpTransport {
  constructor(
    private readonly baseUrl: string,
    private readonly defaultHeaders: Record<string, string>,
    private readonly defaultTimeout: number,
    private readonly fetchImpl: typeof fetch = globalThis.fetch
  ) {}

  async request(
    method: string,
    path: string,
    body?: unknown,
    options?: RequestOptions
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const timeout = options?.timeout ?? this.defaultTimeout;
    const callerSignal = options?.signal;

    if (callerSignal?.aborted) {
      throw new CancelledError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const onAbort = (): void => controller.abort();
    callerSignal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: {
          ...this.defaultHeaders,
          ...options?.headers,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        await this.handleErrorResponse(response);
      }

      const text = await response.text();
      if (text.length === 0) {
        return undefined;
      }

      // The request succeeded, so a bad body must not be retried
      try {
        return JSON.parse(text);
      } catch (error) {
        throw new UnexpectedResponseError('Response body is not valid JSON', {
          status: response.status,
          cause: error instanceof Error ? error.message : String(error),
        });
      }
    } catch (error) {
      if (error instanceof SocialError) {
        throw error;
      }

      if (callerSignal?.aborted) {
        throw new CancelledError();
      }

      if (timedOut) {
        throw new NetworkError(`Request timeout after ${timeout}ms`, error);
      }

      // fetch rejects with a TypeError on DNS, connection and TLS failures
      if (error instanceof TypeError) {
        throw new NetworkError('Network request failed', error);
      }

      throw error;
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Handles error responses from the API
   */
  private async handleErrorResponse(response: Response): Promise<never> {
    const status = response.status;
    const text = await response.text();

    let errorDetails: Record<string, unknown> | undefined;
    let errorMessage = text.length > 0 ? text : `HTTP ${status} error`;

    if (text.length > 0) {
      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch {
        raw = undefined;
      }
      const parsed = errorBodySchema.safeParse(raw);
      if (parsed.success) {
        errorDetails = parsed.data;
        errorMessage =
          parsed.data.detail ?? parsed.data.errors?.[0]?.message ?? parsed.data.title ?? `HTTP ${status} error`;
      }
    }

    switch (status) {
      case 400:
      case 422:
        throw new ValidationError(errorMessage, status, errorDetails);
      case 401:
        throw new AuthenticationError(errorMessage, status, errorDetails);
      case 403:
        throw new PermissionDeniedError(errorMessage, errorDetails);
      case 404:
        throw new NotFoundError(errorMessage, errorDetails);
      case 429:
        throw new RateLimitError(errorMessage, parseRetryAfterMs(response.headers), errorDetails);
      default:
        if (status >= 500) {
          throw new ServerError(errorMessage, status, errorDetails);
        }
        throw new ValidationError(`Unexpected error: ${errorMessage}`, status, errorDetails);
    }
  }
}
