import { vi, type Mock } from 'vitest';
import type { Logger } from '../observability/logging.js';

type LogMethod = Logger['info'];

export interface MockLogger extends Logger {
  trace: Mock<LogMethod>;
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
}

export function createMockLogger(): MockLogger {
  return {
    trace: vi.fn<LogMethod>(),
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
  };
}
