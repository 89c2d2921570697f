/**
 * Binary download module public API.
 */

// Types
export type { ChecksumRecord, DownloadProgress, DownloadProgressCallback } from "./types";

// Release pinning
export {
  CHECKSUMS_ASSET_NAME,
  DEFAULT_YQ_VERSION,
  PINNED_CHECKSUMS,
  YQ_DOWNLOAD_URL_TEMPLATE,
  YQ_REPOSITORY,
} from "./versions";

// Checksums
export { ChecksumTable, parseChecksumsFile, sha256Hex } from "./checksums";

// Cache
export { BinaryCache, markerPathFor } from "./binary-cache";
export type { BinaryCacheDeps } from "./binary-cache";

// Fetcher
export { BinaryFetcher, USER_AGENT, buildRequestHeaders } from "./binary-fetcher";
export type { BinaryFetcherDeps } from "./binary-fetcher";

// Retry
export { retry } from "./retry";
export type { RetryOptions } from "./retry";
