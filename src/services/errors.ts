/**
 * Service error definitions with JSON serialization for tool responses and logs.
 *
 * Every failure the core can surface has its own subclass so callers can
 * branch on `instanceof` or on the serialized `type`/`code` pair.
 */

import type { FileSystemErrorCode } from "./platform/filesystem";

/**
 * Failure categories of a query execution.
 * NON_ZERO_EXIT is the bucket for stderr the diagnostic table does not recognize.
 */
export type QueryErrorKind =
  | "BINARY_MISSING"
  | "TIMEOUT"
  | "NON_ZERO_EXIT"
  | "MALFORMED_EXPRESSION"
  | "UNSUPPORTED_FORMAT"
  | "INVALID_REQUEST";

/**
 * Error codes for binary fetch operations.
 */
export type BinaryFetchErrorCode = "NETWORK_ERROR" | "HTTP_ERROR" | "WRITE_FAILED";

/**
 * Error codes for checksum verification.
 */
export type ChecksumErrorCode = "CHECKSUM_MISMATCH" | "CHECKSUM_UNAVAILABLE";

/**
 * Error codes for binary lookup failures.
 */
export type BinaryNotFoundErrorCode = "BINARY_MISSING" | "OVERRIDE_MISSING" | "OFFLINE";

/**
 * Serialized error format.
 */
export interface SerializedError {
  readonly type:
    | "platform"
    | "version"
    | "checksum"
    | "binary-fetch"
    | "binary-not-found"
    | "query"
    | "cursor"
    | "pagination"
    | "filesystem"
    | "config";
  readonly message: string;
  readonly code?: string;
  readonly path?: string;
}

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: SerializedError["type"];
  readonly code: string | undefined;

  constructor(message: string, code?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize the error.
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      message: this.message,
    };
    if (this.code !== undefined) {
      return { ...result, code: this.code };
    }
    return result;
  }
}

/**
 * The host OS/architecture pair has no published binary.
 * Fatal: retrying cannot change the outcome.
 */
export class UnsupportedPlatformError extends ServiceError {
  readonly type = "platform" as const;

  constructor(
    readonly platform: string,
    readonly arch: string
  ) {
    super(`Unsupported platform: ${platform}-${arch}`, "UNSUPPORTED_PLATFORM");
    this.name = "UnsupportedPlatformError";
  }
}

/**
 * A version string contained no numeric version token.
 */
export class VersionParseError extends ServiceError {
  readonly type = "version" as const;

  constructor(readonly raw: string) {
    super(`Cannot parse version from: ${JSON.stringify(raw.slice(0, 200))}`, "VERSION_PARSE");
    this.name = "VersionParseError";
  }
}

/**
 * Downloaded or cached bytes do not hash to the pinned digest, or no digest is known.
 */
export class ChecksumVerificationError extends ServiceError {
  readonly type = "checksum" as const;

  constructor(
    message: string,
    readonly errorCode: ChecksumErrorCode,
    readonly expected?: string,
    readonly actual?: string
  ) {
    super(message, errorCode);
    this.name = "ChecksumVerificationError";
  }
}

/**
 * Downloading a binary failed after all retries.
 */
export class BinaryFetchError extends ServiceError {
  readonly type = "binary-fetch" as const;
  /** HTTP status when the server answered */
  readonly status: number | undefined;
  /** False for failures another attempt cannot fix (HTTP 4xx) */
  readonly retryable: boolean;

  constructor(
    message: string,
    readonly errorCode: BinaryFetchErrorCode,
    options?: {
      readonly cause?: unknown;
      readonly status?: number;
      readonly retryable?: boolean;
    }
  ) {
    super(message, errorCode, options?.cause);
    this.name = "BinaryFetchError";
    this.status = options?.status;
    this.retryable = options?.retryable ?? true;
  }
}

/**
 * No usable binary could be resolved.
 */
export class BinaryNotFoundError extends ServiceError {
  readonly type = "binary-not-found" as const;

  constructor(
    message: string,
    readonly errorCode: BinaryNotFoundErrorCode,
    cause?: unknown
  ) {
    super(message, errorCode, cause);
    this.name = "BinaryNotFoundError";
  }
}

/**
 * Running a query failed. `kind` tells callers which category it falls in.
 */
export class QueryExecutionError extends ServiceError {
  readonly type = "query" as const;
  /** Raw stderr of the failed run (empty when the binary never ran) */
  readonly stderr: string;
  readonly exitCode: number | null;

  constructor(
    readonly kind: QueryErrorKind,
    message: string,
    details?: {
      readonly stderr?: string;
      readonly exitCode?: number | null;
      readonly cause?: unknown;
    }
  ) {
    super(message, kind, details?.cause);
    this.name = "QueryExecutionError";
    this.stderr = details?.stderr ?? "";
    this.exitCode = details?.exitCode ?? null;
  }
}

/**
 * A cursor string is malformed or points outside the data.
 */
export class InvalidCursorError extends ServiceError {
  readonly type = "cursor" as const;

  constructor(message: string) {
    super(message, "INVALID_CURSOR");
    this.name = "InvalidCursorError";
  }
}

/**
 * A cursor was issued for data of a different size than the data being paged now.
 */
export class StaleCursorError extends ServiceError {
  readonly type = "cursor" as const;

  constructor(
    readonly expectedSize: number,
    readonly actualSize: number
  ) {
    super(
      `Cursor was issued for a result of ${expectedSize} bytes but the result is now ${actualSize} bytes; restart from the first page`,
      "STALE_CURSOR"
    );
    this.name = "StaleCursorError";
  }
}

/**
 * Invalid pagination arguments.
 */
export class PaginationError extends ServiceError {
  readonly type = "pagination" as const;
}

/**
 * Invalid configuration file or environment value.
 */
export class ConfigError extends ServiceError {
  readonly type = "config" as const;

  constructor(
    message: string,
    readonly issues: readonly string[] = []
  ) {
    super(message, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode, cause);
    this.name = "FileSystemError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      message: this.message,
      path: this.path,
      code: this.fsCode,
    };
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Extract a message string from an unknown error.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
