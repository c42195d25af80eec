import { vi } from 'vitest';

/**
 * Global mock for the logger.
 *
 * Keeps console output out of test runs while still letting tests spy on
 * logger calls. Applied to every test file from vitest.config.ts.
 */

vi.mock('../src/utils/logger', () => {
  const SUPPORTED_LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'verbose', 'silly'] as const;

  const mockLogger = {
    level: 'info',
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    http: vi.fn(),
    verbose: vi.fn(),
    debug: vi.fn(),
    silly: vi.fn(),
  };

  return {
    SUPPORTED_LOG_LEVELS,
    getStartupLogLevel: () => 'info',
    logger: mockLogger,
    setLogLevel: vi.fn((level: string) => {
      mockLogger.level = level;
    }),
  };
});
