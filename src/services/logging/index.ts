/**
 * Logging module exports.
 */

export { ElectronLogService } from "./electron-log-service";
export type { ElectronLogServiceOptions } from "./electron-log-service";
export { LogLevel, LOGGER_NAMES, SILENT_LOGGER, isLogLevel, isLoggerName } from "./types";
export type { Logger, LoggerName, LoggingService, LogContext } from "./types";
