/**
 * Public API of the query core.
 */

// Composition root
export { createQueryCore } from "./query-core";
export type { EncodedPage, QueryCore, QueryCoreOptions, QueryOptions } from "./query-core";

// Error types
export {
  ServiceError,
  UnsupportedPlatformError,
  VersionParseError,
  ChecksumVerificationError,
  BinaryFetchError,
  BinaryNotFoundError,
  QueryExecutionError,
  InvalidCursorError,
  StaleCursorError,
  PaginationError,
  ConfigError,
  FileSystemError,
  isServiceError,
  getErrorMessage,
} from "./errors";
export type {
  SerializedError,
  QueryErrorKind,
  BinaryFetchErrorCode,
  ChecksumErrorCode,
  BinaryNotFoundErrorCode,
} from "./errors";

// Binary resolution and download
export * from "./binary-resolution";
export * from "./binary-download";

// Queries
export * from "./query";

// Pagination
export * from "./pagination";

// Configuration
export { ConfigService, DEFAULT_CORE_CONFIG } from "./config";
export type { ConfigServiceDeps, CoreConfig } from "./config";

// Logging
export {
  ElectronLogService,
  LogLevel,
  LOGGER_NAMES,
  SILENT_LOGGER,
  isLogLevel,
  isLoggerName,
} from "./logging";
export type { Logger, LoggerName, LoggingService, LogContext } from "./logging";

// Platform layers
export { createNodePlatformInfo } from "./platform/platform-info";
export type { PlatformInfo } from "./platform/platform-info";
export { DefaultPathProvider } from "./platform/path-provider";
export type { PathProvider, DefaultPathProviderOptions } from "./platform/path-provider";
export {
  ExecaProcessRunner,
  PROCESS_KILL_GRACEFUL_TIMEOUT_MS,
  PROCESS_KILL_FORCE_TIMEOUT_MS,
} from "./platform/process";
export type {
  KillResult,
  ProcessOptions,
  ProcessResult,
  ProcessRunner,
  SpawnedProcess,
} from "./platform/process";
export { PidtreeProvider } from "./platform/process-tree";
export type { ProcessTreeProvider } from "./platform/process-tree";
export { DefaultNetworkLayer } from "./platform/network";
export type { HttpClient, HttpRequestOptions, NetworkLayerConfig } from "./platform/network";
export { DefaultFileSystemLayer } from "./platform/filesystem";
export type {
  DirEntry,
  FileStat,
  FileSystemErrorCode,
  FileSystemLayer,
  MkdirOptions,
  RmOptions,
} from "./platform/filesystem";
