/**
 * x-social-gate
 *
 * X API client whose calls pass through a call gate: a multi-window rate
 * limiter, a circuit breaker and retries with exponential backoff.
 *
 * @example
 * ```typescript
 * import { XClient } from 'x-social-gate';
 *
 * const client = XClient.fromEnv();
 * const id = await client.post('Hello from the gate');
 * ```
 */

// Client exports
export { XClient, XClientImpl, USER_AGENT } from './client/client.js';
export type { XClientDependencies } from './client/client.js';

// Configuration exports
export {
  SocialAgentConfig,
  SocialAgentConfigBuilder,
  createDefaultConfig,
  validateConfig,
  writeGateConfig,
  readGateConfig,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  DEFAULT_MAX_POST_LENGTH,
  DEFAULT_MAX_RETRIES,
  DEFAULT_WRITE_LIMITS,
} from './config/index.js';
export type { WriteLimits, PartialSocialAgentConfig } from './config/index.js';

// Error exports
export * from './errors/index.js';

// Resilience exports
export * from './resilience/index.js';

// Observability exports
export * from './observability/index.js';

// Transport and auth exports
export { FetchHttpTransport, parseRetryAfterMs } from './transport/http-transport.js';
export type { HttpTransport, RequestOptions } from './transport/http-transport.js';
export { BearerAuthManager } from './auth/auth-manager.js';
export type { AuthManager } from './auth/auth-manager.js';

// Service exports
export * from './services/tweets/index.js';

// Utilities
export { sanitizeText } from './utils/text.js';
