/**
 * Configuration for the X client.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/categories.js';
import { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from '../observability/logging.js';
import type { GateConfigInput } from '../resilience/gate-config.js';

/**
 * Default X API base URL.
 */
export const DEFAULT_BASE_URL = 'https://api.twitter.com';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Longest post the API accepts, in code points.
 */
export const DEFAULT_MAX_POST_LENGTH = 280;

/**
 * Default maximum retry attempts.
 */
export const DEFAULT_MAX_RETRIES = 3;

const FIFTEEN_MINUTES_SECS = 15 * 60;
const ONE_DAY_SECS = 24 * 60 * 60;
const THIRTY_DAYS_SECS = 30 * ONE_DAY_SECS;

/**
 * Write quota shared by post, reply, like and retweet.
 */
export interface WriteLimits {
  readonly per15Minutes: number;
  readonly perDay: number;
  readonly perMonth: number;
}

/**
 * Default write quota.
 */
export const DEFAULT_WRITE_LIMITS: WriteLimits = {
  per15Minutes: 50,
  perDay: 500,
  perMonth: 1000,
};

/**
 * X client configuration.
 */
export interface SocialAgentConfig {
  /** API base URL */
  readonly baseUrl: string;
  /** OAuth 2.0 user access token */
  readonly bearerToken: string;
  /** Acting user, needed for likes and retweets */
  readonly userId?: string;
  /** Request timeout in milliseconds */
  readonly timeoutMs: number;
  readonly maxPostLength: number;
  readonly writeLimits: WriteLimits;
  /** Search requests allowed per 15 minutes */
  readonly readLimitPer15Minutes: number;
  readonly maxRetries: number;
  readonly circuitFailureThreshold: number;
  readonly circuitRecoveryTimeoutSecs: number;
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
}

const positiveInt = z.number().int().positive();

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  baseUrl: z.string().url(),
  bearerToken: z.string().min(1, 'Bearer token is required'),
  userId: z.string().min(1).optional(),
  timeoutMs: z.number().positive(),
  maxPostLength: positiveInt,
  writeLimits: z.object({
    per15Minutes: positiveInt,
    perDay: positiveInt,
    perMonth: positiveInt,
  }),
  readLimitPer15Minutes: positiveInt,
  maxRetries: z.number().int().nonnegative().max(10),
  circuitFailureThreshold: positiveInt,
  circuitRecoveryTimeoutSecs: z.number().nonnegative(),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']),
  logFormat: z.enum(['pretty', 'json', 'compact']),
});

/**
 * Creates the default configuration. It has no bearer token and does not pass validation.
 */
export function createDefaultConfig(): SocialAgentConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    bearerToken: '',
    timeoutMs: DEFAULT_TIMEOUT,
    maxPostLength: DEFAULT_MAX_POST_LENGTH,
    writeLimits: { ...DEFAULT_WRITE_LIMITS },
    readLimitPer15Minutes: 50,
    maxRetries: DEFAULT_MAX_RETRIES,
    circuitFailureThreshold: 5,
    circuitRecoveryTimeoutSecs: 60,
    logLevel: 'info',
    logFormat: 'pretty',
  };
}

/**
 * Validates a configuration.
 */
export function validateConfig(config: SocialAgentConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }
}

/**
 * Partial configuration for builder.
 */
export type PartialSocialAgentConfig = Partial<
  Omit<SocialAgentConfig, 'writeLimits'> & { writeLimits: Partial<WriteLimits> }
>;

/**
 * Configuration builder.
 */
export class SocialAgentConfigBuilder {
  private config: SocialAgentConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  baseUrl(value: string): this {
    this.config = { ...this.config, baseUrl: value };
    return this;
  }

  bearerToken(value: string): this {
    this.config = { ...this.config, bearerToken: value };
    return this;
  }

  userId(value: string): this {
    this.config = { ...this.config, userId: value };
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(value: number): this {
    this.config = { ...this.config, timeoutMs: value };
    return this;
  }

  maxPostLength(value: number): this {
    this.config = { ...this.config, maxPostLength: value };
    return this;
  }

  /**
   * Sets the write quota; unspecified windows keep their current values.
   */
  writeLimits(value: Partial<WriteLimits>): this {
    this.config = {
      ...this.config,
      writeLimits: { ...this.config.writeLimits, ...value },
    };
    return this;
  }

  readLimitPer15Minutes(value: number): this {
    this.config = { ...this.config, readLimitPer15Minutes: value };
    return this;
  }

  maxRetries(value: number): this {
    this.config = { ...this.config, maxRetries: value };
    return this;
  }

  circuitFailureThreshold(value: number): this {
    this.config = { ...this.config, circuitFailureThreshold: value };
    return this;
  }

  circuitRecoveryTimeoutSecs(value: number): this {
    this.config = { ...this.config, circuitRecoveryTimeoutSecs: value };
    return this;
  }

  logLevel(value: LogLevel): this {
    this.config = { ...this.config, logLevel: value };
    return this;
  }

  logFormat(value: LogFormat): this {
    this.config = { ...this.config, logFormat: value };
    return this;
  }

  /**
   * Builds and validates the configuration.
   */
  build(): SocialAgentConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find(l => l === value.toLowerCase());
  if (level === undefined) {
    throw new ConfigurationError(`Invalid LOG_LEVEL: ${value}`);
  }
  return level;
}

function parseLogFormat(value: string): LogFormat {
  const format = LOG_FORMATS.find(f => f === value.toLowerCase());
  if (format === undefined) {
    throw new ConfigurationError(`Invalid LOG_FORMAT: ${value}`);
  }
  return format;
}

/**
 * Gate configuration for the shared write quota.
 */
export function writeGateConfig(config: SocialAgentConfig): GateConfigInput {
  return {
    windows: [
      { name: '15m', maxRequests: config.writeLimits.per15Minutes, periodSeconds: FIFTEEN_MINUTES_SECS },
      { name: '1d', maxRequests: config.writeLimits.perDay, periodSeconds: ONE_DAY_SECS },
      { name: '30d', maxRequests: config.writeLimits.perMonth, periodSeconds: THIRTY_DAYS_SECS },
    ],
    failureThreshold: config.circuitFailureThreshold,
    recoveryTimeoutSeconds: config.circuitRecoveryTimeoutSecs,
    maxRetries: config.maxRetries,
  };
}

/**
 * Gate configuration for search.
 */
export function readGateConfig(config: SocialAgentConfig): GateConfigInput {
  return {
    windows: [
      { name: '15m', maxRequests: config.readLimitPer15Minutes, periodSeconds: FIFTEEN_MINUTES_SECS },
    ],
    failureThreshold: config.circuitFailureThreshold,
    recoveryTimeoutSeconds: config.circuitRecoveryTimeoutSecs,
    maxRetries: config.maxRetries,
  };
}

/**
 * SocialAgentConfig namespace with factory methods.
 */
export const SocialAgentConfig = {
  /**
   * Creates a new configuration builder.
   */
  builder(): SocialAgentConfigBuilder {
    return new SocialAgentConfigBuilder();
  },

  /**
   * Creates the default configuration.
   */
  default(): SocialAgentConfig {
    return createDefaultConfig();
  },

  /**
   * Creates configuration from environment variables.
   * Numbers are read whole, so `50abc` or `1.5` for a count fails validation.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): SocialAgentConfig {
    const builder = new SocialAgentConfigBuilder();

    if (env['X_API_BASE_URL']) {
      builder.baseUrl(env['X_API_BASE_URL']);
    }

    if (env['X_BEARER_TOKEN']) {
      builder.bearerToken(env['X_BEARER_TOKEN']);
    }

    if (env['X_USER_ID']) {
      builder.userId(env['X_USER_ID']);
    }

    if (env['X_TIMEOUT_MS']) {
      builder.timeout(Number(env['X_TIMEOUT_MS']));
    }

    if (env['X_RATE_LIMIT_PER_15M']) {
      builder.writeLimits({ per15Minutes: Number(env['X_RATE_LIMIT_PER_15M']) });
    }

    if (env['X_RATE_LIMIT_PER_DAY']) {
      builder.writeLimits({ perDay: Number(env['X_RATE_LIMIT_PER_DAY']) });
    }

    if (env['X_RATE_LIMIT_PER_MONTH']) {
      builder.writeLimits({ perMonth: Number(env['X_RATE_LIMIT_PER_MONTH']) });
    }

    if (env['X_READ_RATE_LIMIT_PER_15M']) {
      builder.readLimitPer15Minutes(Number(env['X_READ_RATE_LIMIT_PER_15M']));
    }

    if (env['MAX_RETRIES']) {
      builder.maxRetries(Number(env['MAX_RETRIES']));
    }

    if (env['CIRCUIT_FAILURE_THRESHOLD']) {
      builder.circuitFailureThreshold(Number(env['CIRCUIT_FAILURE_THRESHOLD']));
    }

    if (env['CIRCUIT_RECOVERY_TIMEOUT_SECS']) {
      builder.circuitRecoveryTimeoutSecs(Number(env['CIRCUIT_RECOVERY_TIMEOUT_SECS']));
    }

    if (env['LOG_LEVEL']) {
      builder.logLevel(parseLogLevel(env['LOG_LEVEL']));
    }

    if (env['LOG_FORMAT']) {
      builder.logFormat(parseLogFormat(env['LOG_FORMAT']));
    }

    return builder.build();
  },

  /**
   * Creates a validated configuration from a partial one, filling in defaults.
   */
  from(partial: PartialSocialAgentConfig): SocialAgentConfig {
    const defaults = createDefaultConfig();
    const config: SocialAgentConfig = {
      ...defaults,
      ...partial,
      writeLimits: { ...defaults.writeLimits, ...partial.writeLimits },
    };
    validateConfig(config);
    return config;
  },
};
