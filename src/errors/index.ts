export { SocialError } from './error.js';
export type { SocialErrorOptions } from './error.js';
export {
  ConfigurationError,
  AuthenticationError,
  PermissionDeniedError,
  ValidationError,
  NotFoundError,
  RateLimitError,
  NetworkError,
  ServerError,
  CancelledError,
  UnexpectedResponseError,
} from './categories.js';
