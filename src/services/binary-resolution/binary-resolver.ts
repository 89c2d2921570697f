/**
 * Resolves the yq binary used for queries, once per instance.
 *
 * Order: configured override path, then the locator (system, cache, bundled),
 * then a verified download unless offline mode is on.
 */

import { BinaryNotFoundError, FileSystemError, getErrorMessage } from "../errors";
import type { FileSystemLayer } from "../platform/filesystem";
import type { PlatformInfo } from "../platform/platform-info";
import type { Logger } from "../logging/types";
import type { CoreConfig } from "../config/types";
import type { BinaryFetcher } from "../binary-download/binary-fetcher";
import type { BinaryLocator } from "./binary-locator";
import { resolvePlatform } from "./platform-resolver";
import { formatVersion, meetsMinimum, parseVersion } from "./version";
import type { BinaryValidation, ResolvedBinary, Version } from "./types";

const UNKNOWN_VERSION: Version = Object.freeze({ major: 0, minor: 0, patch: 0 });

export type BinaryResolverConfig = Pick<
  CoreConfig,
  "yqVersion" | "minimumVersion" | "binaryPath" | "offline"
>;

export interface BinaryResolverDeps {
  readonly locator: BinaryLocator;
  readonly fetcher: BinaryFetcher;
  readonly fileSystem: FileSystemLayer;
  readonly platformInfo: Pick<PlatformInfo, "platform" | "arch">;
  readonly config: BinaryResolverConfig;
  readonly logger: Logger;
}

export class BinaryResolver {
  private readonly locator: BinaryLocator;
  private readonly fetcher: BinaryFetcher;
  private readonly fileSystem: FileSystemLayer;
  private readonly platformInfo: Pick<PlatformInfo, "platform" | "arch">;
  private readonly config: BinaryResolverConfig;
  private readonly logger: Logger;

  private resolved: ResolvedBinary | null = null;
  private resolvePromise: Promise<ResolvedBinary> | null = null;

  constructor(deps: BinaryResolverDeps) {
    this.locator = deps.locator;
    this.fetcher = deps.fetcher;
    this.fileSystem = deps.fileSystem;
    this.platformInfo = deps.platformInfo;
    this.config = deps.config;
    this.logger = deps.logger;
  }

  /**
   * The binary resolved so far, or null before the first successful resolve().
   */
  get current(): ResolvedBinary | null {
    return this.resolved;
  }

  /**
   * Resolve the binary. Concurrent callers share one attempt; a success is kept for
   * the lifetime of the instance, a failure lets the next call try again.
   */
  async resolve(): Promise<ResolvedBinary> {
    if (this.resolved) {
      return this.resolved;
    }
    if (this.resolvePromise) {
      return this.resolvePromise;
    }

    this.resolvePromise = this.doResolve();
    try {
      this.resolved = await this.resolvePromise;
      return this.resolved;
    } finally {
      this.resolvePromise = null;
    }
  }

  /**
   * Resolve and run `--version` on the result.
   */
  async validate(): Promise<BinaryValidation> {
    let binary: ResolvedBinary;
    try {
      binary = await this.resolve();
    } catch (error) {
      return { valid: false, message: getErrorMessage(error) };
    }

    const probed = await this.locator.probe(binary.path);
    if (!probed.ok) {
      return { valid: false, message: `yq at ${binary.path} is unusable: ${probed.reason}` };
    }
    return {
      valid: true,
      message: `yq ${formatVersion(probed.version)} at ${binary.path} (${binary.source})`,
    };
  }

  private async doResolve(): Promise<ResolvedBinary> {
    if (this.config.binaryPath !== null) {
      return this.resolveOverride(this.config.binaryPath);
    }

    const descriptor = resolvePlatform(this.platformInfo);
    const minimum = parseVersion(this.config.minimumVersion);

    const located = await this.locator.locate(minimum, descriptor);
    if (located) {
      return located;
    }

    if (this.config.offline) {
      throw new BinaryNotFoundError(
        `No yq ${formatVersion(minimum)} or newer found and offline mode is enabled`,
        "OFFLINE"
      );
    }

    const target = parseVersion(this.config.yqVersion);
    if (!meetsMinimum(target, minimum)) {
      throw new BinaryNotFoundError(
        `No yq ${formatVersion(minimum)} or newer found and the download target ` +
          `${formatVersion(target)} is older`,
        "BINARY_MISSING"
      );
    }

    return this.fetcher.fetch(descriptor, this.config.yqVersion);
  }

  private async resolveOverride(path: string): Promise<ResolvedBinary> {
    try {
      const stat = await this.fileSystem.stat(path);
      if (!stat.isFile) {
        throw new BinaryNotFoundError(`Configured yq path is not a file: ${path}`, "OVERRIDE_MISSING");
      }
    } catch (error) {
      if (!(error instanceof FileSystemError)) throw error;
      throw new BinaryNotFoundError(
        `Configured yq path does not exist: ${path}`,
        "OVERRIDE_MISSING",
        error
      );
    }

    const probed = await this.locator.probe(path);
    if (!probed.ok) {
      this.logger.warn("Configured yq did not report a version", { path, reason: probed.reason });
    }

    this.logger.info("Using configured yq", { path });
    const resolved: ResolvedBinary = {
      path,
      version: probed.ok ? probed.version : UNKNOWN_VERSION,
      source: "override",
    };
    return Object.freeze(resolved);
  }
}
