/**
 * Spy-backed Logger and LoggingService for unit tests.
 */

import { vi, type Mock } from "vitest";
import type { Logger, LoggerName, LoggingService, LogContext } from "./types";

type LogMethod = Mock<(message: string, context?: LogContext) => void>;

export interface MockLogger extends Logger {
  silly: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: Mock<(message: string, context?: LogContext, error?: Error) => void>;
}

/**
 * LoggingService that hands out one MockLogger per name.
 */
export interface MockLoggingService extends LoggingService {
  createLogger: Mock<(name: LoggerName) => Logger>;
  dispose: Mock<() => void>;
  /** Names passed to createLogger(), first request order */
  getCreatedLoggerNames(): LoggerName[];
  /** Logger handed out for `name`; undefined when none was requested */
  getLogger(name: LoggerName): MockLogger | undefined;
}

/**
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const cache = new BinaryCache({ ...deps, logger });
 *
 * await cache.pruneOtherVersions(descriptor, "v4.52.2");
 *
 * expect(logger.info).toHaveBeenCalledWith("Pruned cached version", expect.anything());
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    silly: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function createMockLoggingService(): MockLoggingService {
  const loggers = new Map<LoggerName, MockLogger>();

  return {
    createLogger: vi.fn((name: LoggerName): Logger => {
      let logger = loggers.get(name);
      if (logger === undefined) {
        logger = createMockLogger();
        loggers.set(name, logger);
      }
      return logger;
    }),
    dispose: vi.fn(),
    getCreatedLoggerNames: () => [...loggers.keys()],
    getLogger: (name) => loggers.get(name),
  };
}
