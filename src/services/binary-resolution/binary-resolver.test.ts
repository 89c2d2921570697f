import { describe, it, expect } from "vitest";
import { BinaryResolver, type BinaryResolverConfig } from "./binary-resolver";
import { BinaryLocator } from "./binary-locator";
import { BinaryFetcher } from "../binary-download/binary-fetcher";
import { BinaryCache } from "../binary-download/binary-cache";
import { ChecksumTable, sha256Hex } from "../binary-download/checksums";
import { BinaryNotFoundError, UnsupportedPlatformError } from "../errors";
import {
  createFileSystemMock,
  directory,
  file,
  type MockEntry,
} from "../platform/filesystem.state-mock";
import { createMockHttpClient } from "../platform/http-client.state-mock";
import { createMockProcessRunner, type SpawnConfig } from "../platform/process.state-mock";
import type { PlatformInfo } from "../platform/platform-info";
import { createMockLogger } from "../logging/logging.test-utils";

const BINARY = Buffer.from("downloaded-yq");
const BINARY_URL = "https://github.com/mikefarah/yq/releases/download/v4.52.2/yq_linux_amd64";
const DOWNLOADED_PATH = "/cache/bin/linux-amd64/v4.52.2/yq";

function banner(version: string): string {
  return `yq (https://github.com/mikefarah/yq/) version ${version}\n`;
}

interface HarnessOptions {
  readonly config?: Partial<BinaryResolverConfig>;
  readonly lookup?: SpawnConfig;
  readonly binaries?: Record<string, SpawnConfig>;
  readonly entries?: Record<string, MockEntry>;
  readonly platformInfo?: Pick<PlatformInfo, "platform" | "arch">;
}

function createHarness(options: HarnessOptions = {}) {
  const processRunner = createMockProcessRunner({
    onSpawn: (command) => {
      if (command === "which" || command === "where") {
        return options.lookup ?? { exitCode: 1 };
      }
      return options.binaries?.[command] ?? { exitCode: null, pid: undefined, stderr: "ENOENT" };
    },
  });
  const fileSystem = createFileSystemMock({ entries: options.entries ?? {} });
  const httpClient = createMockHttpClient();
  const logger = createMockLogger();
  const checksums = new ChecksumTable([
    { version: "v4.52.2", platformKey: "linux-amd64", sha256: sha256Hex(BINARY) },
  ]);
  const cache = new BinaryCache({ fileSystem, checksums, logger, cacheDir: "/cache/bin" });
  const locator = new BinaryLocator({
    processRunner,
    fileSystem,
    cache,
    logger,
    platform: options.platformInfo?.platform ?? "linux",
    bundledDir: null,
  });
  const fetcher = new BinaryFetcher({
    httpClient,
    fileSystem,
    cache,
    checksums,
    logger,
    env: {},
    sleep: async () => {},
  });
  const resolver = new BinaryResolver({
    locator,
    fetcher,
    fileSystem,
    platformInfo: options.platformInfo ?? { platform: "linux", arch: "x64" },
    config: {
      yqVersion: "v4.52.2",
      minimumVersion: "v4.52.2",
      binaryPath: null,
      offline: false,
      ...options.config,
    },
    logger,
  });
  return { resolver, processRunner, httpClient, fileSystem, logger };
}

describe("BinaryResolver.resolve", () => {
  describe("configured override", () => {
    it("uses the configured path without a version requirement", async () => {
      const { resolver, processRunner } = createHarness({
        config: { binaryPath: "/opt/yq/yq" },
        entries: { "/opt/yq/yq": file("yq", { executable: true }) },
        binaries: { "/opt/yq/yq": { stdout: banner("v4.20.0") } },
      });

      await expect(resolver.resolve()).resolves.toEqual({
        path: "/opt/yq/yq",
        version: { major: 4, minor: 20, patch: 0 },
        source: "override",
      });
      expect(processRunner.$.spawns.map((p) => p.$.command)).toEqual(["/opt/yq/yq"]);
    });

    it("reports version 0.0.0 when the override does not answer --version", async () => {
      const { resolver, logger } = createHarness({
        config: { binaryPath: "/opt/yq/yq" },
        entries: { "/opt/yq/yq": file("yq", { executable: true }) },
        binaries: { "/opt/yq/yq": { exitCode: 1, stderr: "boom" } },
      });

      const result = await resolver.resolve();

      expect(result.version).toEqual({ major: 0, minor: 0, patch: 0 });
      expect(logger.warn).toHaveBeenCalledWith("Configured yq did not report a version", {
        path: "/opt/yq/yq",
        reason: "--version failed: boom",
      });
    });

    it("fails when the configured path is missing", async () => {
      const { resolver, httpClient } = createHarness({ config: { binaryPath: "/opt/yq/yq" } });

      const error = await resolver.resolve().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BinaryNotFoundError);
      expect(error).toMatchObject({
        errorCode: "OVERRIDE_MISSING",
        message: "Configured yq path does not exist: /opt/yq/yq",
      });
      expect(httpClient.$.requests).toHaveLength(0);
    });

    it("fails when the configured path is a directory", async () => {
      const { resolver } = createHarness({
        config: { binaryPath: "/opt/yq" },
        entries: { "/opt/yq": directory() },
      });

      await expect(resolver.resolve()).rejects.toMatchObject({
        errorCode: "OVERRIDE_MISSING",
        message: "Configured yq path is not a file: /opt/yq",
      });
    });
  });

  it("rejects an unsupported platform", async () => {
    const { resolver } = createHarness({ platformInfo: { platform: "win32", arch: "arm64" } });

    await expect(resolver.resolve()).rejects.toBeInstanceOf(UnsupportedPlatformError);
  });

  it("returns a located binary without downloading", async () => {
    const { resolver, httpClient } = createHarness({
      lookup: { stdout: "/usr/bin/yq\n" },
      binaries: { "/usr/bin/yq": { stdout: banner("v4.52.2") } },
    });

    await expect(resolver.resolve()).resolves.toMatchObject({
      path: "/usr/bin/yq",
      source: "system",
    });
    expect(httpClient.$.requests).toHaveLength(0);
  });

  it("honours a lower configured minimum version", async () => {
    const { resolver } = createHarness({
      config: { minimumVersion: "v4.40.0" },
      lookup: { stdout: "/usr/bin/yq\n" },
      binaries: { "/usr/bin/yq": { stdout: banner("v4.45.1") } },
    });

    await expect(resolver.resolve()).resolves.toMatchObject({ source: "system" });
  });

  it("fails fast in offline mode when nothing is found", async () => {
    const { resolver, httpClient } = createHarness({ config: { offline: true } });

    const error = await resolver.resolve().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BinaryNotFoundError);
    expect(error).toMatchObject({
      errorCode: "OFFLINE",
      message: "No yq v4.52.2 or newer found and offline mode is enabled",
    });
    expect(httpClient.$.requests).toHaveLength(0);
  });

  it("does not download a release older than the minimum version", async () => {
    const { resolver, httpClient } = createHarness({ config: { minimumVersion: "v5.0.0" } });
    httpClient.setResponse(BINARY_URL, { body: BINARY });

    const error = await resolver.resolve().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BinaryNotFoundError);
    expect(error).toMatchObject({
      errorCode: "BINARY_MISSING",
      message: "No yq v5.0.0 or newer found and the download target v4.52.2 is older",
    });
    expect(httpClient.$.requests).toHaveLength(0);
  });

  it("downloads the pinned release when nothing is found", async () => {
    const { resolver, httpClient } = createHarness();
    httpClient.setResponse(BINARY_URL, { body: BINARY });

    await expect(resolver.resolve()).resolves.toEqual({
      path: DOWNLOADED_PATH,
      version: { major: 4, minor: 52, patch: 2 },
      source: "downloaded",
    });
  });

  it("shares one download between concurrent callers", async () => {
    const { resolver, httpClient } = createHarness();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    httpClient.setResponse(BINARY_URL, { body: BINARY, gate });

    const pending = [resolver.resolve(), resolver.resolve(), resolver.resolve()];
    release();
    const [first, second, third] = await Promise.all(pending);

    expect(httpClient.$.requestsTo(BINARY_URL)).toHaveLength(1);
    expect(second).toBe(first);
    expect(third).toBe(first);
  });

  it("keeps a successful result for later calls", async () => {
    const { resolver, processRunner } = createHarness({
      lookup: { stdout: "/usr/bin/yq\n" },
      binaries: { "/usr/bin/yq": { stdout: banner("v4.52.2") } },
    });

    const first = await resolver.resolve();
    const spawnCount = processRunner.$.spawns.length;
    const second = await resolver.resolve();

    expect(second).toBe(first);
    expect(resolver.current).toBe(first);
    expect(processRunner.$.spawns).toHaveLength(spawnCount);
  });

  it("retries resolution after a failure", async () => {
    const { resolver, httpClient } = createHarness();
    httpClient.setResponse(BINARY_URL, { status: 404 });

    await expect(resolver.resolve()).rejects.toMatchObject({ status: 404 });
    expect(resolver.current).toBeNull();

    httpClient.setResponse(BINARY_URL, { body: BINARY });
    await expect(resolver.resolve()).resolves.toMatchObject({ source: "downloaded" });
  });
});

describe("BinaryResolver.validate", () => {
  it("describes a working binary", async () => {
    const { resolver } = createHarness({
      lookup: { stdout: "/usr/bin/yq\n" },
      binaries: { "/usr/bin/yq": { stdout: banner("v4.52.2") } },
    });

    await expect(resolver.validate()).resolves.toEqual({
      valid: true,
      message: "yq v4.52.2 at /usr/bin/yq (system)",
    });
  });

  it("reports a resolution failure", async () => {
    const { resolver } = createHarness({ config: { offline: true } });

    await expect(resolver.validate()).resolves.toEqual({
      valid: false,
      message: "No yq v4.52.2 or newer found and offline mode is enabled",
    });
  });

  it("reports a binary that no longer runs", async () => {
    const { resolver } = createHarness({
      config: { binaryPath: "/opt/yq/yq" },
      entries: { "/opt/yq/yq": file("yq", { executable: true }) },
      binaries: { "/opt/yq/yq": { exitCode: 126, stderr: "permission denied" } },
    });

    await expect(resolver.validate()).resolves.toEqual({
      valid: false,
      message: "yq at /opt/yq/yq is unusable: --version failed: permission denied",
    });
  });
});
