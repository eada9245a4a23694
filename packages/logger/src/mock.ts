/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

type LogMethod = Logger['info'];

export interface MockLogger extends Logger {
  child: Mock<(metadata: Record<string, unknown>) => MockLogger>;
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
  fatal: Mock<LogMethod>;
  flush: Mock<() => Promise<void>>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@seqgen/logger/mock';
 *
 * const logger = createMockLogger();
 * await checkFiles(['fixtures'], { logger });
 *
 * expect(logger.info).toHaveBeenCalledWith('check_completed', { files: 1, failures: 0 });
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    child: vi.fn((_metadata: Record<string, unknown>) => createMockLogger()),
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
    fatal: vi.fn<LogMethod>(),
    flush: vi.fn(async () => {}),
  };
}
