import { vi, type Mock } from 'vitest';
import type { HttpTransport } from '../transport/http-transport.js';

export interface MockHttpTransport extends HttpTransport {
  request: Mock<HttpTransport['request']>;
}

export function createMockHttpTransport(): MockHttpTransport {
  return {
    request: vi.fn<HttpTransport['request']>(),
  };
}

export function mockHttpTransportError(
  transport: MockHttpTransport,
  error: Error
): void {
  transport.request.mockRejectedValue(error);
}

export function mockHttpTransportResponse(
  transport: MockHttpTransport,
  response: unknown
): void {
  transport.request.mockResolvedValue(response);
}
