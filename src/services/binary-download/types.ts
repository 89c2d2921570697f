/**
 * Types for binary download operations.
 */

import type { PlatformKey } from "../binary-resolution/types";

/**
 * Expected SHA-256 of one release asset.
 */
export interface ChecksumRecord {
  /** Release tag, e.g. "v4.52.2" */
  readonly version: string;
  readonly platformKey: PlatformKey;
  /** Lowercase hex digest */
  readonly sha256: string;
}

/**
 * Progress information for binary downloads.
 */
export interface DownloadProgress {
  /** Number of bytes downloaded so far */
  bytesDownloaded: number;
  /** Total bytes to download, null if Content-Length not provided */
  totalBytes: number | null;
}

/**
 * Callback for download progress updates.
 */
export type DownloadProgressCallback = (progress: DownloadProgress) => void;
