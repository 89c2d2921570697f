/**
 * ElectronLogService - Logging implementation using electron-log's Node.js entry point.
 *
 * Features:
 * - Session-based log files: `<datetime>-<uuid>.log`
 * - Environment variable configuration for level and console output
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { PathProvider } from "../platform/path-provider";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types";
import { isLoggerName, isLogLevel } from "./types";

/**
 * Type for electron-log scope (log functions).
 */
type ElectronLogScope = ReturnType<typeof log.scope>;

/**
 * Options for ElectronLogService.
 */
export interface ElectronLogServiceOptions {
  /** Level used when CONFIGQ_LOGLEVEL is unset or invalid. Default: "warn" */
  readonly defaultLevel?: LogLevel;
  /** Source of the CONFIGQ_* logging variables. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Format context object as key=value pairs for log message.
 *
 * @returns Formatted string like "key1=value1 key2=value2"
 */
function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value === null) return `${key}=null`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
}

/**
 * Parse and validate CONFIGQ_LOGLEVEL.
 *
 * @returns Valid log level or undefined if invalid
 */
function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Generate session-based log filename.
 * Format: YYYY-MM-DDTHH-MM-SS-<uuid>.log
 */
function generateSessionFilename(): string {
  const timestamp = new Date()
    .toISOString()
    .replace(/[:.]/g, "-") // Replace : and . with -
    .slice(0, 19); // YYYY-MM-DDTHH-MM-SS
  const uuid = randomUUID().slice(0, 8);
  return `${timestamp}-${uuid}.log`;
}

/**
 * Parse CONFIGQ_LOGGER to get the set of allowed logger names.
 * Unknown names are ignored.
 *
 * @returns Set of allowed logger names, or undefined if not set (allow all)
 */
function parseLoggerFilter(envValue: string | undefined): Set<LoggerName> | undefined {
  if (!envValue) return undefined;
  const names = envValue
    .split(",")
    .map((name) => name.trim())
    .filter(isLoggerName);
  if (names.length === 0) return undefined;
  return new Set(names);
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ElectronLogLogger implements Logger {
  constructor(private readonly scope: ElectronLogScope) {}

  private format(message: string, context?: LogContext): string {
    const contextStr = formatContext(context);
    return contextStr ? `${message} ${contextStr}` : message;
  }

  silly(message: string, context?: LogContext): void {
    this.scope.silly(this.format(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(this.format(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(this.format(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(this.format(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (error) {
      this.scope.error(this.format(message, context), error);
    } else {
      this.scope.error(this.format(message, context));
    }
  }
}

/**
 * Logger that filters based on allowed logger names.
 * If the logger is not in the allowed set, all log methods are no-ops.
 */
class FilteredLogger implements Logger {
  private readonly enabled: boolean;

  constructor(
    private readonly inner: Logger,
    allowedLoggers: Set<LoggerName> | undefined,
    name: LoggerName
  ) {
    this.enabled = allowedLoggers === undefined || allowedLoggers.has(name);
  }

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.silly(message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.debug(message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (this.enabled) this.inner.error(message, context, error);
  }
}

/**
 * Logging service using electron-log.
 *
 * Configuration:
 * - Default level: WARN (override via options.defaultLevel)
 * - Override via CONFIGQ_LOGLEVEL environment variable
 * - Console output via CONFIGQ_PRINT_LOGS (any non-empty value)
 * - Logger filtering via CONFIGQ_LOGGER (comma-separated logger names)
 *
 * @example
 * ```typescript
 * const loggingService = new ElectronLogService(pathProvider);
 * const logger = loggingService.createLogger("binary-download");
 * logger.info("Installed", { version: "v4.52.2" });
 * // Output: [2026-01-16 10:30:00.123] [info] [binary-download] Installed version=v4.52.2
 * ```
 */
export class ElectronLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly logLevel: LogLevel;
  private readonly enableConsole: boolean;
  private readonly allowedLoggers: Set<LoggerName> | undefined;

  constructor(pathProvider: PathProvider, options: ElectronLogServiceOptions = {}) {
    const env = options.env ?? process.env;
    this.logLevel = parseLogLevel(env.CONFIGQ_LOGLEVEL) ?? options.defaultLevel ?? "warn";
    this.enableConsole = !!env.CONFIGQ_PRINT_LOGS;
    this.allowedLoggers = parseLoggerFilter(env.CONFIGQ_LOGGER);

    const filename = generateSessionFilename();
    log.transports.file.resolvePathFn = (): string => join(pathProvider.logsDir, filename);
    log.transports.file.level = this.logLevel;

    // Console output is opt-in; stdout may carry a protocol stream
    log.transports.console.level = this.enableConsole ? this.logLevel : false;

    log.transports.file.format = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";
    log.transports.console.format = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";
  }

  /**
   * Create a logger with the specified name (scope).
   * If CONFIGQ_LOGGER is set, only loggers in the list will actually log.
   */
  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const scope = log.scope(`[${name}]`);
    const logger = new FilteredLogger(new ElectronLogLogger(scope), this.allowedLoggers, name);
    this.loggers.set(name, logger);
    return logger;
  }

  dispose(): void {
    this.loggers.clear();
  }
}
