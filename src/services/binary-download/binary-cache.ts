/**
 * On-disk cache of downloaded yq binaries.
 *
 * Layout:
 *   {cacheDir}/{platformKey}/{version}/{filename}
 *   {cacheDir}/{platformKey}/{version}/{filename}.sha256   verified lowercase hex digest
 */

import { randomUUID } from "node:crypto";
import { join } from "node:path";
import { FileSystemError, getErrorMessage } from "../errors";
import type { FileSystemLayer } from "../platform/filesystem";
import type { Logger } from "../logging/types";
import type { BinaryDescriptor } from "../binary-resolution/types";
import { compareVersions, parseVersion } from "../binary-resolution/version";
import { sha256Hex, type ChecksumTable } from "./checksums";

const VERSION_DIR = /^v\d+(\.\d+){0,2}$/;

export interface BinaryCacheDeps {
  readonly fileSystem: FileSystemLayer;
  readonly checksums: ChecksumTable;
  readonly logger: Logger;
  /** Cache root */
  readonly cacheDir: string;
}

/**
 * Unique sibling path for staging a write that is then renamed into place.
 */
export function tempPathFor(path: string): string {
  return `${path}.tmp-${randomUUID().slice(0, 8)}`;
}

export function markerPathFor(binaryPath: string): string {
  return `${binaryPath}.sha256`;
}

export class BinaryCache {
  private readonly fileSystem: FileSystemLayer;
  private readonly checksums: ChecksumTable;
  private readonly logger: Logger;
  readonly cacheDir: string;

  constructor(deps: BinaryCacheDeps) {
    this.fileSystem = deps.fileSystem;
    this.checksums = deps.checksums;
    this.logger = deps.logger;
    this.cacheDir = deps.cacheDir;
  }

  platformDir(descriptor: BinaryDescriptor): string {
    return join(this.cacheDir, descriptor.platformKey);
  }

  versionDir(descriptor: BinaryDescriptor, version: string): string {
    return join(this.platformDir(descriptor), version);
  }

  binaryPath(descriptor: BinaryDescriptor, version: string): string {
    return join(this.versionDir(descriptor, version), descriptor.filename);
  }

  /**
   * Version directories present for a platform, highest version first.
   */
  async listVersions(descriptor: BinaryDescriptor): Promise<string[]> {
    let entries;
    try {
      entries = await this.fileSystem.readdir(this.platformDir(descriptor));
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        return [];
      }
      throw error;
    }

    return entries
      .filter((entry) => entry.isDirectory && VERSION_DIR.test(entry.name))
      .map((entry) => entry.name)
      .sort((a, b) => compareVersions(parseVersion(b), parseVersion(a)));
  }

  /**
   * Check a cached binary against its sidecar marker.
   *
   * - Marker equal to the pinned digest: trusted without hashing.
   * - Pinned digest differs from the marker: the binary is re-hashed and accepted
   *   only if it matches the pinned digest. The marker is then rewritten; a failed
   *   rewrite is logged and the binary still accepted.
   * - No pinned digest for the version: the binary is re-hashed against the marker.
   */
  async isValid(descriptor: BinaryDescriptor, version: string): Promise<boolean> {
    const binaryPath = this.binaryPath(descriptor, version);
    const marker = await this.readMarker(binaryPath);
    if (marker === null) {
      return false;
    }

    const record = this.checksums.lookup(version, descriptor.platformKey);
    if (record !== undefined && marker === record.sha256) {
      return true;
    }

    let actual: string;
    try {
      actual = sha256Hex(await this.fileSystem.readFileBuffer(binaryPath));
    } catch (error) {
      if (!(error instanceof FileSystemError)) throw error;
      this.logger.warn("Cached binary unreadable", { path: binaryPath, error: error.message });
      return false;
    }

    if (record !== undefined) {
      if (actual !== record.sha256) {
        this.logger.warn("Cached binary does not match pinned checksum", {
          path: binaryPath,
          expected: record.sha256,
          actual,
        });
        return false;
      }
      try {
        await this.writeMarker(binaryPath, actual);
      } catch (error) {
        if (!(error instanceof FileSystemError)) throw error;
        this.logger.warn("Failed to rewrite checksum marker", {
          path: binaryPath,
          error: error.message,
        });
      }
      return true;
    }

    if (actual !== marker) {
      this.logger.warn("Cached binary does not match its marker", { path: binaryPath });
      return false;
    }
    return true;
  }

  /**
   * Record a verified digest next to a binary (temp file + rename).
   */
  async writeMarker(binaryPath: string, sha256: string): Promise<void> {
    const markerPath = markerPathFor(binaryPath);
    const tempPath = tempPathFor(markerPath);
    try {
      await this.fileSystem.writeFile(tempPath, sha256);
      await this.fileSystem.rename(tempPath, markerPath);
    } catch (error) {
      await this.fileSystem.rm(tempPath, { force: true });
      throw error;
    }
  }

  /**
   * Delete every version directory of the platform except `keepVersion`.
   * Failures are logged, never thrown.
   */
  async pruneOtherVersions(descriptor: BinaryDescriptor, keepVersion: string): Promise<void> {
    let versions: string[];
    try {
      versions = await this.listVersions(descriptor);
    } catch (error) {
      this.logger.warn("Failed to list cached versions", { error: getErrorMessage(error) });
      return;
    }

    for (const version of versions) {
      if (version === keepVersion) continue;
      const dir = this.versionDir(descriptor, version);
      try {
        await this.fileSystem.rm(dir, { recursive: true, force: true });
        this.logger.info("Pruned cached version", { version, path: dir });
      } catch (error) {
        this.logger.warn("Failed to prune cached version", {
          version,
          path: dir,
          error: getErrorMessage(error),
        });
      }
    }
  }

  private async readMarker(binaryPath: string): Promise<string | null> {
    try {
      return (await this.fileSystem.readFile(markerPathFor(binaryPath))).trim().toLowerCase();
    } catch (error) {
      if (!(error instanceof FileSystemError)) throw error;
      this.logger.debug("No checksum marker", { path: binaryPath, code: error.fsCode });
      return null;
    }
  }
}
