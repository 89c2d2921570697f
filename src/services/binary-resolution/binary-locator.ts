/**
 * Finds an already-present yq binary.
 *
 * Candidates in strict priority order:
 * 1. system: every hit of `which -a yq` (`where yq` on Windows)
 * 2. cache: `{cacheDir}/{platformKey}/{version}/{filename}`, highest version first,
 *    only when its checksum marker validates
 * 3. bundled: `{bundledDir}/{platformKey}/{filename}`
 *
 * Each candidate must answer `--version` with the mikefarah/yq banner and a version
 * meeting the minimum. Rejected candidates are logged and skipped.
 */

import { join } from "node:path";
import { FileSystemError, getErrorMessage } from "../errors";
import type { FileSystemLayer } from "../platform/filesystem";
import type { ProcessRunner } from "../platform/process";
import type { Logger } from "../logging/types";
import type { BinaryCache } from "../binary-download/binary-cache";
import { YQ_REPOSITORY } from "../binary-download/versions";
import { formatVersion, meetsMinimum, tryParseVersion } from "./version";
import type { BinaryDescriptor, BinarySource, ResolvedBinary, Version } from "./types";

/**
 * Time allowed for `yq --version` and `which`.
 */
export const VERSION_CHECK_TIMEOUT_MS = 5000;

/**
 * Outcome of running `--version` on a candidate.
 */
export type ProbeResult =
  | { readonly ok: true; readonly version: Version; readonly output: string }
  | { readonly ok: false; readonly reason: string };

export interface BinaryLocatorDeps {
  readonly processRunner: ProcessRunner;
  readonly fileSystem: FileSystemLayer;
  readonly cache: BinaryCache;
  readonly logger: Logger;
  readonly platform: NodeJS.Platform;
  /** Directory of binaries shipped with the package, null to skip */
  readonly bundledDir: string | null;
}

export class BinaryLocator {
  private readonly processRunner: ProcessRunner;
  private readonly fileSystem: FileSystemLayer;
  private readonly cache: BinaryCache;
  private readonly logger: Logger;
  private readonly platform: NodeJS.Platform;
  private readonly bundledDir: string | null;

  constructor(deps: BinaryLocatorDeps) {
    this.processRunner = deps.processRunner;
    this.fileSystem = deps.fileSystem;
    this.cache = deps.cache;
    this.logger = deps.logger;
    this.platform = deps.platform;
    this.bundledDir = deps.bundledDir;
  }

  /**
   * First candidate meeting `minVersion`, or null when none does.
   */
  async locate(minVersion: Version, descriptor: BinaryDescriptor): Promise<ResolvedBinary | null> {
    for (const path of await this.findSystemBinaries()) {
      const found = await this.checkCandidate(path, "system", minVersion);
      if (found) return found;
    }

    for (const version of await this.listCachedVersions(descriptor)) {
      if (!(await this.cache.isValid(descriptor, version))) {
        this.logger.debug("Skipping cached binary with invalid marker", { version });
        continue;
      }
      const found = await this.checkCandidate(
        this.cache.binaryPath(descriptor, version),
        "cache",
        minVersion
      );
      if (found) return found;
    }

    const bundledPath = await this.findBundledBinary(descriptor);
    if (bundledPath !== null) {
      const found = await this.checkCandidate(bundledPath, "bundled", minVersion);
      if (found) return found;
    }

    this.logger.debug("No usable yq found", { minimum: formatVersion(minVersion) });
    return null;
  }

  /**
   * Run `--version` and check the identity banner.
   */
  async probe(path: string): Promise<ProbeResult> {
    const proc = this.processRunner.run(path, ["--version"]);
    const result = await proc.wait(VERSION_CHECK_TIMEOUT_MS);

    if (result.running) {
      await proc.kill(0, 1000);
      return { ok: false, reason: `--version timed out after ${VERSION_CHECK_TIMEOUT_MS}ms` };
    }
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${String(result.exitCode)}`;
      return { ok: false, reason: `--version failed: ${detail}` };
    }

    const output = result.stdout.trim();
    if (!output.includes(YQ_REPOSITORY)) {
      return { ok: false, reason: `not ${YQ_REPOSITORY}: ${output}` };
    }

    const version = tryParseVersion(output);
    if (version === null) {
      return { ok: false, reason: `unparseable version: ${output}` };
    }
    return { ok: true, version, output };
  }

  private async checkCandidate(
    path: string,
    source: BinarySource,
    minVersion: Version
  ): Promise<ResolvedBinary | null> {
    const probed = await this.probe(path);
    if (!probed.ok) {
      this.logger.debug("Rejected candidate", { path, source, reason: probed.reason });
      return null;
    }
    if (!meetsMinimum(probed.version, minVersion)) {
      this.logger.debug("Candidate below minimum version", {
        path,
        source,
        version: formatVersion(probed.version),
        minimum: formatVersion(minVersion),
      });
      return null;
    }

    this.logger.info("Found yq", { path, source, version: formatVersion(probed.version) });
    const resolved: ResolvedBinary = { path, version: probed.version, source };
    return Object.freeze(resolved);
  }

  private async findSystemBinaries(): Promise<string[]> {
    const [command, args]: [string, string[]] =
      this.platform === "win32" ? ["where", ["yq"]] : ["which", ["-a", "yq"]];

    const proc = this.processRunner.run(command, args);
    const result = await proc.wait(VERSION_CHECK_TIMEOUT_MS);
    if (result.running) {
      await proc.kill(0, 1000);
      this.logger.warn("System lookup timed out", { command });
      return [];
    }
    if (result.exitCode !== 0) {
      return [];
    }

    const paths = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    return [...new Set(paths)];
  }

  private async listCachedVersions(descriptor: BinaryDescriptor): Promise<string[]> {
    try {
      return await this.cache.listVersions(descriptor);
    } catch (error) {
      this.logger.warn("Failed to read binary cache", { error: getErrorMessage(error) });
      return [];
    }
  }

  private async findBundledBinary(descriptor: BinaryDescriptor): Promise<string | null> {
    if (this.bundledDir === null) {
      return null;
    }
    const path = join(this.bundledDir, descriptor.platformKey, descriptor.filename);
    try {
      const stat = await this.fileSystem.stat(path);
      return stat.isFile ? path : null;
    } catch (error) {
      if (!(error instanceof FileSystemError)) throw error;
      this.logger.debug("No bundled binary", { path, code: error.fsCode });
      return null;
    }
  }
}
