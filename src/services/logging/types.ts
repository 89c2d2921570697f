/**
 * Logging types and interfaces.
 *
 * Provides a testable logging abstraction over electron-log with:
 * - Type-safe logger names (scopes)
 * - Constrained context type (no nested objects, functions, symbols)
 * - Interface for dependency injection
 */

/**
 * Log levels in order of verbosity (most verbose to least).
 */
export const LogLevel = {
  silly: "silly",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Valid logger names (scopes).
 * Each name corresponds to a module or subsystem of the query core.
 */
export const LOGGER_NAMES = [
  "process", // ExecaProcessRunner - process spawning and tree kills
  "network", // DefaultNetworkLayer - HTTP
  "fs", // DefaultFileSystemLayer - filesystem operations
  "platform", // Platform resolution and path computation
  "binary-resolution", // BinaryLocator / BinaryResolver
  "binary-download", // BinaryFetcher - downloads and installs
  "query", // QueryBackend - yq invocations
  "pagination", // Paginator
  "config", // ConfigService
  "core", // QueryCore composition root
] as const;

export type LoggerName = (typeof LOGGER_NAMES)[number];

/**
 * Context data for log entries.
 * Constrained to primitive types for serialization safety:
 * - No nested objects (prevents circular references)
 * - No functions or symbols (not serializable)
 * - null allowed for explicit "no value" cases
 */
export type LogContext = Record<string, string | number | boolean | null>;

/**
 * Logger interface for dependency injection.
 * Services receive this interface via constructor injection.
 *
 * @example
 * ```typescript
 * class BinaryLocator {
 *   constructor(private readonly logger: Logger) {}
 *
 *   async locate(): Promise<void> {
 *     this.logger.debug("Checking candidate", { path: "/usr/bin/yq" });
 *   }
 * }
 * ```
 */
export interface Logger {
  /**
   * Log a silly message (most verbose).
   * Use for per-iteration details that would be overwhelming in normal debug output.
   */
  silly(message: string, context?: LogContext): void;

  /**
   * Log a debug message.
   * Use for detailed tracing information useful during development.
   */
  debug(message: string, context?: LogContext): void;

  /**
   * Log an info message.
   * Use for significant operations (downloads, installs, resolutions).
   */
  info(message: string, context?: LogContext): void;

  /**
   * Log a warning message.
   * Use for recoverable issues.
   */
  warn(message: string, context?: LogContext): void;

  /**
   * Log an error message.
   *
   * @param error - Optional Error object for stack trace inclusion
   */
  error(message: string, context?: LogContext, error?: Error): void;
}

/**
 * Logging service interface.
 * Creates named loggers.
 */
export interface LoggingService {
  /**
   * Create a logger with the specified name (scope).
   * The name appears in log output to identify the source.
   */
  createLogger(name: LoggerName): Logger;

  /**
   * Release cached loggers.
   */
  dispose(): void;
}

/**
 * Type guard for log level strings.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

/**
 * Type guard for logger names.
 */
export function isLoggerName(value: string): value is LoggerName {
  return LOGGER_NAMES.some((name) => name === value);
}

/**
 * Logger that discards everything.
 * Default for services constructed without a logger.
 */
export const SILENT_LOGGER: Logger = {
  silly: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
