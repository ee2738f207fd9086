import { AuthenticationError } from '../errors/categories.js';

/**
 * Interface for managing authentication headers
 */
export interface AuthManager {
  /**
   * Generates authentication headers for API requests
   */
  getHeaders(): Record<string, string>;

  /**
   * Validates the token
   */
  validateToken(): void;
}

/**
 * OAuth 2.0 bearer token authentication for the X API
 */
export class BearerAuthManager implements AuthManager {
  private readonly token: string;
  private readonly userAgent: string | undefined;

  constructor(options: { token: string; userAgent?: string }) {
    this.token = options.token;
    this.userAgent = options.userAgent;
    this.validateToken();
  }

  validateToken(): void {
    if (this.token.trim().length === 0) {
      throw new AuthenticationError('Bearer token cannot be empty or whitespace');
    }
  }

  getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      authorization: `Bearer ${this.token}`,
      'content-type': 'application/json',
    };

    if (this.userAgent) {
      headers['user-agent'] = this.userAgent;
    }

    return headers;
  }
}
