/**
 * Tests for ConfigService.
 */
import { describe, it, expect } from "vitest";
import { ConfigService } from "./config-service";
import { DEFAULT_CORE_CONFIG } from "./types";
import { createMockPathProvider } from "../platform/path-provider.test-utils";
import { createFileSystemMock, file } from "../platform/filesystem.state-mock";
import { createMockLogger, type MockLogger } from "../logging/logging.test-utils";
import { ConfigError } from "../errors";

const pathProvider = createMockPathProvider({ configPath: "/test/config/configq/config.json" });

function createService(options: {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  logger?: MockLogger;
}): ConfigService {
  const fileSystem = createFileSystemMock({
    entries:
      options.configFile !== undefined ? { [pathProvider.configPath]: file(options.configFile) } : {},
  });
  return new ConfigService({
    fileSystem,
    pathProvider,
    logger: options.logger ?? createMockLogger(),
    env: options.env ?? {},
  });
}

describe("ConfigService", () => {
  describe("defaults", () => {
    it("returns defaults without a config file or environment", async () => {
      const config = await createService({}).load();

      expect(config).toEqual(DEFAULT_CORE_CONFIG);
      expect(config.minimumVersion).toBe("v4.52.2");
      expect(config.enabledFormats).toEqual(["json", "yaml", "toml"]);
    });
  });

  describe("config file", () => {
    it("reads values and normalizes version tags", async () => {
      const config = await createService({
        configFile: JSON.stringify({
          yqVersion: "4.50.0",
          offline: true,
          cacheDir: "/data/yq",
          queryTimeoutMs: 5000,
          fetchMaxAttempts: 5,
        }),
      }).load();

      expect(config).toMatchObject({
        yqVersion: "v4.50.0",
        minimumVersion: "v4.50.0",
        offline: true,
        cacheDir: "/data/yq",
        queryTimeoutMs: 5000,
        fetchMaxAttempts: 5,
        downloadTimeoutMs: 120_000,
      });
    });

    it("keeps an explicit minimum version", async () => {
      const config = await createService({
        configFile: JSON.stringify({ yqVersion: "v4.52.2", minimumVersion: "v4.30" }),
      }).load();

      expect(config.minimumVersion).toBe("v4.30");
    });

    it("warns when the minimum version is newer than the download target", async () => {
      const logger = createMockLogger();

      const config = await createService({
        configFile: JSON.stringify({ yqVersion: "v4.52.2", minimumVersion: "5" }),
        logger,
      }).load();

      expect(config.minimumVersion).toBe("v5");
      expect(logger.warn).toHaveBeenCalledWith("Minimum version is newer than the download target", {
        yqVersion: "v4.52.2",
        minimumVersion: "v5",
      });
    });

    it("drops unknown format names with a warning", async () => {
      const logger = createMockLogger();

      const config = await createService({
        configFile: JSON.stringify({ enabledFormats: ["json", "XML", "ini"] }),
        logger,
      }).load();

      expect(config.enabledFormats).toEqual(["json", "xml"]);
      expect(logger.warn).toHaveBeenCalledWith("Ignoring unknown formats", { formats: "ini" });
    });

    it("falls back to defaults when the file is not JSON", async () => {
      const logger = createMockLogger();

      const config = await createService({ configFile: "{ yqVersion: ", logger }).load();

      expect(config).toEqual(DEFAULT_CORE_CONFIG);
      expect(logger.warn).toHaveBeenCalledWith(
        "Config is not valid JSON, using defaults",
        expect.objectContaining({ path: pathProvider.configPath })
      );
    });

    it("falls back to defaults when the file fails validation", async () => {
      const logger = createMockLogger();

      const config = await createService({
        configFile: JSON.stringify({ queryTimeoutMs: -1, offline: true }),
        logger,
      }).load();

      expect(config).toEqual(DEFAULT_CORE_CONFIG);
      expect(logger.warn).toHaveBeenCalledWith(
        "Config validation failed, using defaults",
        expect.objectContaining({ error: expect.stringContaining("queryTimeoutMs") })
      );
    });
  });

  describe("environment", () => {
    it("overrides the config file", async () => {
      const config = await createService({
        configFile: JSON.stringify({ yqVersion: "v4.50.0", offline: true }),
        env: { YQ_VERSION: "4.45.1", CONFIGQ_OFFLINE: "no" },
      }).load();

      expect(config.yqVersion).toBe("v4.45.1");
      expect(config.minimumVersion).toBe("v4.45.1");
      expect(config.offline).toBe(false);
    });

    it("prefers CONFIGQ_ variables over their aliases", async () => {
      const config = await createService({
        env: {
          CONFIGQ_YQ_VERSION: "v4.48.0",
          YQ_VERSION: "v4.40.0",
          CONFIGQ_BINARY_PATH: "/opt/yq",
          YQ_BINARY_PATH: "/usr/bin/yq",
        },
      }).load();

      expect(config.yqVersion).toBe("v4.48.0");
      expect(config.binaryPath).toBe("/opt/yq");
    });

    it("ignores empty variables", async () => {
      const config = await createService({
        env: { CONFIGQ_YQ_VERSION: "  ", YQ_VERSION: "v4.40.0" },
      }).load();

      expect(config.yqVersion).toBe("v4.40.0");
    });

    it("parses comma-separated formats without duplicates", async () => {
      const config = await createService({
        env: { MCP_CONFIG_FORMATS: "json, YAML ,json" },
      }).load();

      expect(config.enabledFormats).toEqual(["json", "yaml"]);
    });

    it("falls back to default formats when none are known", async () => {
      const config = await createService({ env: { CONFIGQ_FORMATS: "ini,hcl" } }).load();

      expect(config.enabledFormats).toEqual(["json", "yaml", "toml"]);
    });

    it.each([
      ["1", true],
      ["TRUE", true],
      ["on", true],
      ["0", false],
      ["off", false],
    ])("parses CONFIGQ_OFFLINE=%s", async (value, expected) => {
      const config = await createService({ env: { CONFIGQ_OFFLINE: value } }).load();

      expect(config.offline).toBe(expected);
    });

    it("parses the query timeout", async () => {
      const config = await createService({ env: { CONFIGQ_QUERY_TIMEOUT_MS: "2500" } }).load();

      expect(config.queryTimeoutMs).toBe(2500);
    });

    it("throws ConfigError naming the variable for an invalid flag", async () => {
      const error = await createService({ env: { CONFIGQ_OFFLINE: "maybe" } })
        .load()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        code: "INVALID_CONFIG",
        issues: ["CONFIGQ_OFFLINE: must be one of 1, true, yes, on, 0, false, no, off"],
      });
    });

    it("throws ConfigError for an invalid version tag", async () => {
      const error = await createService({ env: { YQ_VERSION: "latest" } })
        .load()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        issues: ["YQ_VERSION: must be a release tag such as v4.52.2"],
      });
    });

    it("throws ConfigError for a non-numeric timeout", async () => {
      await expect(
        createService({ env: { CONFIGQ_QUERY_TIMEOUT_MS: "soon" } }).load()
      ).rejects.toThrow(/CONFIGQ_QUERY_TIMEOUT_MS/);
    });
  });
});
