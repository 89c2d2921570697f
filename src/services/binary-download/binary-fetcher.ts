/**
 * Downloads a pinned yq release into the binary cache.
 *
 * Nothing is renamed into place before its SHA-256 matches the expected digest.
 */

import {
  BinaryFetchError,
  ChecksumVerificationError,
  FileSystemError,
  getErrorMessage,
} from "../errors";
import type { HttpClient } from "../platform/network";
import type { FileSystemLayer } from "../platform/filesystem";
import type { Logger } from "../logging/types";
import type { BinaryDescriptor, ResolvedBinary } from "../binary-resolution/types";
import { buildDownloadUrl } from "../binary-resolution/platform-resolver";
import { normalizeVersionTag, parseVersion } from "../binary-resolution/version";
import { retry } from "./retry";
import { parseChecksumsFile, sha256Hex, type ChecksumTable } from "./checksums";
import { tempPathFor, type BinaryCache } from "./binary-cache";
import { CHECKSUMS_ASSET_NAME } from "./versions";
import type { ChecksumRecord, DownloadProgressCallback } from "./types";

export const USER_AGENT = "configq/0.1.0";

const DEFAULT_DOWNLOAD_TIMEOUT_MS = 120_000;
const DEFAULT_MAX_ATTEMPTS = 3;

export interface BinaryFetcherDeps {
  readonly httpClient: HttpClient;
  readonly fileSystem: FileSystemLayer;
  readonly cache: BinaryCache;
  readonly checksums: ChecksumTable;
  readonly logger: Logger;
  /** Per-download timeout covering headers and body. Default: 120000 */
  readonly timeoutMs?: number;
  /** Attempts per download, including the first. Default: 3 */
  readonly maxAttempts?: number;
  /** Source of GITHUB_TOKEN / GH_TOKEN. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
  /** Backoff sleep, injected by tests */
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Request headers for GitHub release downloads.
 */
export function buildRequestHeaders(env: NodeJS.ProcessEnv): Record<string, string> {
  const token = env["GITHUB_TOKEN"]?.trim() || env["GH_TOKEN"]?.trim();
  return token
    ? { "User-Agent": USER_AGENT, Authorization: `Bearer ${token}` }
    : { "User-Agent": USER_AGENT };
}

export class BinaryFetcher {
  private readonly httpClient: HttpClient;
  private readonly fileSystem: FileSystemLayer;
  private readonly cache: BinaryCache;
  private readonly checksums: ChecksumTable;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(deps: BinaryFetcherDeps) {
    this.httpClient = deps.httpClient;
    this.fileSystem = deps.fileSystem;
    this.cache = deps.cache;
    this.checksums = deps.checksums;
    this.logger = deps.logger;
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
    this.maxAttempts = deps.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.headers = buildRequestHeaders(deps.env ?? process.env);
    this.sleep = deps.sleep;
  }

  /**
   * Download, verify and install a release, then prune other cached versions.
   *
   * @throws ChecksumVerificationError when no digest is known or the download does not match it twice
   * @throws BinaryFetchError when the download fails after all retries or cannot be written
   */
  async fetch(
    descriptor: BinaryDescriptor,
    pinnedVersion: string,
    onProgress?: DownloadProgressCallback
  ): Promise<ResolvedBinary> {
    const version = normalizeVersionTag(pinnedVersion);
    const record = await this.resolveChecksum(descriptor, version);
    const url = buildDownloadUrl(descriptor, version);
    const targetPath = this.cache.binaryPath(descriptor, version);

    this.logger.info("Downloading", { url, version, platform: descriptor.platformKey });

    try {
      await this.fileSystem.mkdir(this.cache.versionDir(descriptor, version));
    } catch (error) {
      throw new BinaryFetchError(
        `Failed to create ${this.cache.versionDir(descriptor, version)}: ${getErrorMessage(error)}`,
        "WRITE_FAILED",
        { cause: error, retryable: false }
      );
    }

    try {
      await this.downloadAndInstall(url, record, targetPath, onProgress);
    } catch (error) {
      if (!(error instanceof ChecksumVerificationError)) throw error;
      this.logger.warn("Checksum mismatch, downloading once more", {
        url,
        expected: record.sha256,
        actual: error.actual ?? null,
      });
      await this.downloadAndInstall(url, record, targetPath, onProgress);
    }

    await this.cache.pruneOtherVersions(descriptor, version);

    this.logger.info("Installed", { path: targetPath, version });
    const installed: ResolvedBinary = {
      path: targetPath,
      version: parseVersion(version),
      source: "downloaded",
    };
    return Object.freeze(installed);
  }

  private async resolveChecksum(
    descriptor: BinaryDescriptor,
    version: string
  ): Promise<ChecksumRecord> {
    const pinned = this.checksums.lookup(version, descriptor.platformKey);
    if (pinned !== undefined) {
      return pinned;
    }

    const url = buildDownloadUrl({ ...descriptor, assetName: CHECKSUMS_ASSET_NAME }, version);
    this.logger.debug("No pinned checksum, fetching release checksums", { url, version });
    const content = (await this.downloadWithRetry(url)).toString("utf-8");

    const record = parseChecksumsFile(content, version, [descriptor])[0];
    if (record === undefined) {
      throw new ChecksumVerificationError(
        `No checksum for ${descriptor.assetName} in ${version}`,
        "CHECKSUM_UNAVAILABLE"
      );
    }
    return record;
  }

  private async downloadAndInstall(
    url: string,
    record: ChecksumRecord,
    targetPath: string,
    onProgress?: DownloadProgressCallback
  ): Promise<void> {
    const bytes = await this.downloadWithRetry(url, onProgress);
    const tempPath = tempPathFor(targetPath);

    await this.writeStep(tempPath, () => this.fileSystem.writeFileBuffer(tempPath, bytes));

    const actual = sha256Hex(bytes);
    if (actual !== record.sha256) {
      await this.removeTemp(tempPath);
      throw new ChecksumVerificationError(
        `Checksum mismatch for ${url}`,
        "CHECKSUM_MISMATCH",
        record.sha256,
        actual
      );
    }

    await this.writeStep(tempPath, async () => {
      await this.fileSystem.makeExecutable(tempPath);
      await this.fileSystem.rename(tempPath, targetPath);
    });

    try {
      await this.cache.writeMarker(targetPath, actual);
    } catch (error) {
      // Binary is installed; without a marker it is simply re-downloaded next time
      this.logger.warn("Failed to write checksum marker", {
        path: targetPath,
        error: getErrorMessage(error),
      });
    }
  }

  private async writeStep(tempPath: string, step: () => Promise<void>): Promise<void> {
    try {
      await step();
    } catch (error) {
      await this.removeTemp(tempPath);
      throw new BinaryFetchError(
        `Failed to install ${tempPath}: ${getErrorMessage(error)}`,
        "WRITE_FAILED",
        { cause: error, retryable: false }
      );
    }
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await this.fileSystem.rm(tempPath, { force: true });
    } catch (error) {
      if (!(error instanceof FileSystemError)) throw error;
      this.logger.warn("Failed to remove temp file", { path: tempPath, error: error.message });
    }
  }

  private downloadWithRetry(url: string, onProgress?: DownloadProgressCallback): Promise<Buffer> {
    return retry(() => this.download(url, onProgress), {
      maxAttempts: this.maxAttempts,
      shouldRetry: (error) => !(error instanceof BinaryFetchError) || error.retryable,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn("Download failed, retrying", {
          url,
          attempt: attempt + 1,
          delayMs: Math.round(delayMs),
          error: getErrorMessage(error),
        });
      },
      ...(this.sleep !== undefined ? { sleep: this.sleep } : {}),
    });
  }

  /**
   * One download attempt. The timeout covers the response headers and the body.
   */
  private async download(url: string, onProgress?: DownloadProgressCallback): Promise<Buffer> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.httpClient.fetch(url, {
          timeout: this.timeoutMs,
          signal: controller.signal,
          headers: this.headers,
        });
      } catch (error) {
        throw new BinaryFetchError(
          `Network error downloading ${url}: ${getErrorMessage(error)}`,
          "NETWORK_ERROR",
          { cause: error }
        );
      }

      if (!response.ok) {
        // Release the connection before a retry opens another
        await response.body?.cancel();
        throw new BinaryFetchError(`HTTP ${response.status} downloading ${url}`, "HTTP_ERROR", {
          status: response.status,
          retryable: response.status >= 500 || response.status === 429,
        });
      }

      return await this.readBody(response, url, controller.signal, onProgress);
    } finally {
      clearTimeout(timer);
    }
  }

  private async readBody(
    response: Response,
    url: string,
    signal: AbortSignal,
    onProgress?: DownloadProgressCallback
  ): Promise<Buffer> {
    if (!response.body) {
      throw new BinaryFetchError(`Empty response body from ${url}`, "NETWORK_ERROR");
    }

    const contentLength = response.headers.get("content-length");
    const totalBytes = contentLength ? parseInt(contentLength, 10) : null;
    const chunks: Uint8Array[] = [];
    let bytesDownloaded = 0;
    const reader = response.body.getReader();

    // Cancelling ends the pending read; the aborted signal is checked below
    const onAbort = (): void => {
      reader.cancel().catch((error: unknown) => {
        this.logger.debug("Cancel failed", { url, error: getErrorMessage(error) });
      });
    };
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        chunks.push(value);
        bytesDownloaded += value.byteLength;
        onProgress?.({ bytesDownloaded, totalBytes });
      }
    } catch (error) {
      throw new BinaryFetchError(
        `Failed to read download from ${url}: ${getErrorMessage(error)}`,
        "NETWORK_ERROR",
        { cause: error }
      );
    } finally {
      signal.removeEventListener("abort", onAbort);
    }

    if (signal.aborted) {
      throw new BinaryFetchError(
        `Download of ${url} timed out after ${this.timeoutMs}ms`,
        "NETWORK_ERROR"
      );
    }

    return Buffer.concat(chunks);
  }
}
