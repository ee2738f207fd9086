import { SocialError } from './error.js';

/**
 * Error thrown when the client or a gate is misconfigured
 */
export class ConfigurationError extends SocialError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'configuration_error',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the access token is rejected (401)
 */
export class AuthenticationError extends SocialError {
  constructor(message: string, status?: number, details?: Record<string, unknown>) {
    super({
      type: 'authentication_error',
      message,
      status: status ?? 401,
      isRetryable: false,
      details,
    });
    this.name = 'AuthenticationError';
  }
}

/**
 * Error thrown when the token lacks access to the resource (403)
 */
export class PermissionDeniedError extends SocialError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'permission_denied',
      message,
      status: 403,
      isRetryable: false,
      details,
    });
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Error thrown when a request is malformed or fails local validation
 */
export class ValidationError extends SocialError {
  constructor(message: string, status?: number, details?: Record<string, unknown>) {
    super({
      type: 'invalid_request',
      message,
      status: status ?? 400,
      isRetryable: false,
      details,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a post or user does not exist (404)
 */
export class NotFoundError extends SocialError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'not_found',
      message,
      status: 404,
      isRetryable: false,
      details,
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when the platform itself answers 429
 */
export class RateLimitError extends SocialError {
  constructor(message: string, retryAfterMs?: number, details?: Record<string, unknown>) {
    super({
      type: 'upstream_rate_limit',
      message,
      status: 429,
      retryAfterMs,
      isRetryable: true,
      details,
    });
    this.name = 'RateLimitError';
  }
}

/**
 * Error thrown when network-level failures occur (e.g., timeout, DNS failure)
 */
export class NetworkError extends SocialError {
  constructor(message: string, cause?: unknown, details?: Record<string, unknown>) {
    super({
      type: 'network_error',
      message,
      isRetryable: true,
      details,
      cause,
    });
    this.name = 'NetworkError';
  }
}

/**
 * Error thrown when the API answers with a 5xx status
 */
export class ServerError extends SocialError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super({
      type: 'server_error',
      message,
      status,
      isRetryable: true,
      details,
    });
    this.name = 'ServerError';
  }
}

/**
 * Error thrown when the caller abandons an operation through its AbortSignal
 */
export class CancelledError extends SocialError {
  constructor(message = 'Operation cancelled') {
    super({
      type: 'cancelled',
      message,
      isRetryable: false,
    });
    this.name = 'CancelledError';
  }
}

/**
 * Error thrown when a successful response does not have the expected shape
 */
export class UnexpectedResponseError extends SocialError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'unexpected_response',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'UnexpectedResponseError';
  }
}
