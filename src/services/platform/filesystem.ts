/**
 * FileSystemLayer - Abstraction over filesystem operations.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of services with an in-memory FileSystemLayer
 * - Boundary testing of DefaultFileSystemLayer against the real filesystem
 * - Consistent error handling via FileSystemError
 */

import * as fs from "node:fs/promises";
import { FileSystemError } from "../errors";
import { SILENT_LOGGER, type Logger } from "../logging/types";

/**
 * Directory entry returned by readdir.
 */
export interface DirEntry {
  /** Entry name (not full path) */
  readonly name: string;
  /** True if entry is a directory */
  readonly isDirectory: boolean;
  /** True if entry is a regular file */
  readonly isFile: boolean;
  /** True if entry is a symbolic link */
  readonly isSymbolicLink: boolean;
}

/**
 * Result of stat (follows symlinks).
 */
export interface FileStat {
  readonly isFile: boolean;
  readonly isDirectory: boolean;
  /** Size in bytes */
  readonly size: number;
}

/**
 * Options for mkdir operation.
 */
export interface MkdirOptions {
  /** Create parent directories if they don't exist (default: true) */
  readonly recursive?: boolean;
}

/**
 * Options for rm operation.
 */
export interface RmOptions {
  /** Remove directories and their contents recursively (default: false) */
  readonly recursive?: boolean;
  /** Ignore errors if path doesn't exist (default: false) */
  readonly force?: boolean;
}

/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "ENOENT" // File/directory not found
  | "EACCES" // Permission denied
  | "EEXIST" // File/directory already exists
  | "ENOTDIR" // Not a directory
  | "EISDIR" // Is a directory (when file expected)
  | "ENOTEMPTY" // Directory not empty
  | "UNKNOWN"; // Other errors (check originalCode)

/**
 * Abstraction over filesystem operations.
 *
 * All paths are absolute. All text operations use UTF-8 encoding.
 * Methods throw FileSystemError on failures.
 *
 * NOTE: No exists() method - use try/catch on actual operations to avoid TOCTOU races.
 */
export interface FileSystemLayer {
  /**
   * Read entire file as UTF-8 string.
   *
   * @throws FileSystemError with code ENOENT if file not found
   * @throws FileSystemError with code EISDIR if path is a directory
   */
  readFile(path: string): Promise<string>;

  /**
   * Read entire file as raw bytes.
   *
   * @throws FileSystemError with code ENOENT if file not found
   * @throws FileSystemError with code EISDIR if path is a directory
   */
  readFileBuffer(path: string): Promise<Buffer>;

  /**
   * Write content to file. Overwrites existing file.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   */
  writeFile(path: string, content: string): Promise<void>;

  /**
   * Write binary content to file. Overwrites existing file.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   */
  writeFileBuffer(path: string, content: Buffer): Promise<void>;

  /**
   * Create directory. Creates parent directories by default.
   * No-op if directory already exists.
   *
   * @throws FileSystemError with code EEXIST if path exists as a file
   */
  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  /**
   * List directory contents.
   *
   * @throws FileSystemError with code ENOENT if directory not found
   * @throws FileSystemError with code ENOTDIR if path is not a directory
   *
   * @example
   * const entries = await fs.readdir(platformDir);
   * const versions = entries.filter((e) => e.isDirectory).map((e) => e.name);
   */
  readdir(path: string): Promise<readonly DirEntry[]>;

  /**
   * Stat a path, following symlinks.
   *
   * @throws FileSystemError with code ENOENT if path not found
   */
  stat(path: string): Promise<FileStat>;

  /**
   * Delete file or directory.
   *
   * @throws FileSystemError with code ENOENT if path not found (unless force: true)
   * @throws FileSystemError with code ENOTEMPTY if directory not empty (unless recursive: true)
   *
   * @example Remove a stale version directory
   * await fs.rm(join(platformDir, "v4.40.1"), { recursive: true, force: true });
   */
  rm(path: string, options?: RmOptions): Promise<void>;

  /**
   * Make a file executable (sets mode 0o755).
   * On Windows, this is a no-op since executability is determined by file extension.
   *
   * @throws FileSystemError with code ENOENT if file not found
   */
  makeExecutable(path: string): Promise<void>;

  /**
   * Rename (move) a file or directory atomically.
   * This is the standard pattern for atomic file writes:
   * 1. Write to a temp file in the destination directory
   * 2. Rename temp file to target (atomic on the same filesystem)
   *
   * @throws FileSystemError with code ENOENT if oldPath doesn't exist
   */
  rename(oldPath: string, newPath: string): Promise<void>;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Known error codes that map to FileSystemErrorCode.
 */
const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<FileSystemErrorCode>([
  "ENOENT",
  "EACCES",
  "EEXIST",
  "ENOTDIR",
  "EISDIR",
  "ENOTEMPTY",
]);

function isKnownErrorCode(code: string): code is Exclude<FileSystemErrorCode, "UNKNOWN"> {
  return KNOWN_ERROR_CODES.has(code);
}

/**
 * Read a string property from an unknown error object.
 */
function readStringProperty(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null || !(key in value)) {
    return undefined;
  }
  const property: unknown = Reflect.get(value, key);
  return typeof property === "string" ? property : undefined;
}

/**
 * Extract the POSIX error code from a Node.js error.
 * fs.rm() reports SystemErrors with ERR_FS_* codes and the POSIX code in `info.code`.
 */
function extractErrorCode(error: Error): string | undefined {
  const info: unknown = "info" in error ? error.info : undefined;
  return readStringProperty(info, "code") ?? readStringProperty(error, "code");
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 */
function mapError(error: unknown, path: string): FileSystemError {
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = extractErrorCode(error);

  if (code !== undefined && isKnownErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error);
  }

  // Unknown error code - preserve original code
  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

// ============================================================================
// DefaultFileSystemLayer Implementation
// ============================================================================

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 * Maps Node.js errors to FileSystemError for consistent error handling.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger = SILENT_LOGGER) {}

  private fail(operation: string, path: string, error: unknown): FileSystemError {
    const fsError = mapError(error, path);
    this.logger.warn(`${operation} failed`, {
      path,
      code: fsError.fsCode,
      error: fsError.message,
    });
    return fsError;
  }

  async readFile(filePath: string): Promise<string> {
    this.logger.debug("Read", { path: filePath });
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw this.fail("Read", filePath, error);
    }
  }

  async readFileBuffer(filePath: string): Promise<Buffer> {
    this.logger.debug("ReadBuffer", { path: filePath });
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      throw this.fail("ReadBuffer", filePath, error);
    }
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    this.logger.debug("Write", { path: filePath });
    try {
      await fs.writeFile(filePath, content, "utf-8");
    } catch (error) {
      throw this.fail("Write", filePath, error);
    }
  }

  async writeFileBuffer(filePath: string, content: Buffer): Promise<void> {
    this.logger.debug("WriteBuffer", { path: filePath, size: content.length });
    try {
      await fs.writeFile(filePath, content);
    } catch (error) {
      throw this.fail("WriteBuffer", filePath, error);
    }
  }

  async mkdir(dirPath: string, options?: MkdirOptions): Promise<void> {
    const recursive = options?.recursive ?? true;
    this.logger.debug("Mkdir", { path: dirPath });
    try {
      await fs.mkdir(dirPath, { recursive });
    } catch (error) {
      throw this.fail("Mkdir", dirPath, error);
    }
  }

  async readdir(dirPath: string): Promise<readonly DirEntry[]> {
    try {
      const entries = await fs.readdir(dirPath, { withFileTypes: true });
      const result = entries.map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
        isFile: entry.isFile(),
        isSymbolicLink: entry.isSymbolicLink(),
      }));
      this.logger.debug("Readdir", { path: dirPath, count: result.length });
      return result;
    } catch (error) {
      throw this.fail("Readdir", dirPath, error);
    }
  }

  async stat(targetPath: string): Promise<FileStat> {
    try {
      const stats = await fs.stat(targetPath);
      return { isFile: stats.isFile(), isDirectory: stats.isDirectory(), size: stats.size };
    } catch (error) {
      // Missing paths are an expected answer here, not a warning
      throw mapError(error, targetPath);
    }
  }

  async rm(targetPath: string, options?: RmOptions): Promise<void> {
    const recursive = options?.recursive ?? false;
    const force = options?.force ?? false;
    this.logger.debug("Rm", { path: targetPath, recursive });
    try {
      if (recursive) {
        await fs.rm(targetPath, { recursive, force });
      } else {
        const stats = await fs.stat(targetPath);
        if (stats.isDirectory()) {
          // rmdir fails with ENOTEMPTY if not empty
          await fs.rmdir(targetPath);
        } else {
          await fs.rm(targetPath, { force });
        }
      }
    } catch (error) {
      const fsError = mapError(error, targetPath);
      if (force && fsError.fsCode === "ENOENT") {
        return;
      }
      throw this.fail("Rm", targetPath, error);
    }
  }

  async makeExecutable(filePath: string): Promise<void> {
    // On Windows, executability is determined by file extension, not permissions
    if (process.platform === "win32") {
      return;
    }

    try {
      await fs.chmod(filePath, 0o755);
    } catch (error) {
      throw this.fail("Chmod", filePath, error);
    }
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    this.logger.debug("Rename", { oldPath, newPath });
    try {
      await fs.rename(oldPath, newPath);
    } catch (error) {
      const fsError = mapError(error, oldPath);
      this.logger.warn("Rename failed", {
        oldPath,
        newPath,
        code: fsError.fsCode,
        error: fsError.message,
      });
      throw fsError;
    }
  }
}
