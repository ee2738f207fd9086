/**
 * Base error class for everything the client raises.
 * Carries a machine-readable type, the HTTP status where one applies,
 * whether the failure is worth retrying, and an optional retry-after hint.
 */
export interface SocialErrorOptions {
  type: string;
  message: string;
  status?: number;
  retryAfterMs?: number;
  isRetryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class SocialError extends Error {
  /**
   * The type of error (e.g., 'rate_limit_exceeded', 'authentication_error')
   */
  readonly type: string;

  /**
   * HTTP status code associated with the error, if applicable
   */
  readonly status?: number;

  /**
   * Milliseconds to wait before trying again, when known
   */
  readonly retryAfterMs?: number;

  /**
   * Indicates whether this error type can be retried
   */
  readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  constructor(options: SocialErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SocialError';
    this.type = options.type;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      retryAfterMs: this.retryAfterMs,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }
}
