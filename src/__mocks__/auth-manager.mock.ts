import { vi, type Mock } from 'vitest';
import type { AuthManager } from '../auth/auth-manager.js';

export interface MockAuthManager extends AuthManager {
  getHeaders: Mock<AuthManager['getHeaders']>;
  validateToken: Mock<AuthManager['validateToken']>;
}

export function createMockAuthManager(): MockAuthManager {
  return {
    getHeaders: vi.fn<AuthManager['getHeaders']>().mockReturnValue({
      authorization: 'Bearer test-secret',
      'content-type': 'application/json',
    }),
    validateToken: vi.fn<AuthManager['validateToken']>(),
  };
}
