import { vi, type Mock } from 'vitest';
import type { Logger } from '@repowarden/shared';

export type FakeLogger = { [K in keyof Logger]: Mock };

/** Logger whose methods are all spies; `child()` returns the same instance. */
export function fakeLogger(): FakeLogger {
  const logger: FakeLogger = {
    log: vi.fn(),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}
