/**
 * Configuration service for the query core.
 *
 * Reads the optional {configDir}/config.json through FileSystemLayer, overlays
 * environment variables and validates both with zod.
 */

import { z } from "zod";
import type { FileSystemLayer } from "../platform/filesystem";
import type { PathProvider } from "../platform/path-provider";
import type { Logger } from "../logging/types";
import { ConfigError, FileSystemError, getErrorMessage } from "../errors";
import { meetsMinimum, normalizeVersionTag, parseVersion } from "../binary-resolution/version";
import { DEFAULT_ENABLED_FORMATS, isQueryFormat, type QueryFormat } from "../query/types";
import { DEFAULT_CORE_CONFIG, type CoreConfig } from "./types";

// ============================================================================
// Schemas
// ============================================================================

const versionTagSchema = z
  .string()
  .trim()
  .regex(/^v?\d+(\.\d+){0,2}$/, "must be a release tag such as v4.52.2")
  .transform(normalizeVersionTag);

const positiveIntSchema = z.number().int().positive();

const fileConfigSchema = z.object({
  yqVersion: versionTagSchema.optional(),
  minimumVersion: versionTagSchema.optional(),
  binaryPath: z.string().min(1).nullable().optional(),
  offline: z.boolean().optional(),
  cacheDir: z.string().min(1).nullable().optional(),
  bundledDir: z.string().min(1).nullable().optional(),
  enabledFormats: z.array(z.string()).optional(),
  queryTimeoutMs: positiveIntSchema.optional(),
  downloadTimeoutMs: positiveIntSchema.optional(),
  fetchMaxAttempts: positiveIntSchema.max(10).optional(),
});

type FileConfig = z.infer<typeof fileConfigSchema>;

const FLAG_VALUES = new Map<string, boolean>([
  ["1", true],
  ["true", true],
  ["yes", true],
  ["on", true],
  ["0", false],
  ["false", false],
  ["no", false],
  ["off", false],
]);

const flagSchema = z.string().transform((raw, ctx) => {
  const value = FLAG_VALUES.get(raw.trim().toLowerCase());
  if (value === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must be one of 1, true, yes, on, 0, false, no, off",
    });
    return z.NEVER;
  }
  return value;
});

const envConfigSchema = z.object({
  yqVersion: versionTagSchema.optional(),
  binaryPath: z.string().optional(),
  offline: flagSchema.optional(),
  cacheDir: z.string().optional(),
  enabledFormats: z.string().optional(),
  queryTimeoutMs: z.coerce.number().int().positive().optional(),
});

type EnvConfig = z.infer<typeof envConfigSchema>;

/**
 * Environment variables per setting, in priority order.
 */
const ENV_VARIABLES = {
  yqVersion: ["CONFIGQ_YQ_VERSION", "YQ_VERSION"],
  binaryPath: ["CONFIGQ_BINARY_PATH", "YQ_BINARY_PATH"],
  offline: ["CONFIGQ_OFFLINE"],
  cacheDir: ["CONFIGQ_CACHE_DIR"],
  enabledFormats: ["CONFIGQ_FORMATS", "MCP_CONFIG_FORMATS"],
  queryTimeoutMs: ["CONFIGQ_QUERY_TIMEOUT_MS"],
} as const satisfies Record<keyof EnvConfig, readonly string[]>;

type EnvKey = keyof typeof ENV_VARIABLES;

function isEnvKey(key: PropertyKey): key is EnvKey {
  return typeof key === "string" && key in ENV_VARIABLES;
}

// ============================================================================
// Service
// ============================================================================

/**
 * Dependencies for ConfigService.
 */
export interface ConfigServiceDeps {
  readonly fileSystem: FileSystemLayer;
  readonly pathProvider: PathProvider;
  readonly logger: Logger;
  /** Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Service for loading the query core configuration.
 */
export class ConfigService {
  private readonly fileSystem: FileSystemLayer;
  private readonly pathProvider: PathProvider;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(deps: ConfigServiceDeps) {
    this.fileSystem = deps.fileSystem;
    this.pathProvider = deps.pathProvider;
    this.logger = deps.logger;
    this.env = deps.env ?? process.env;
  }

  /**
   * Load configuration: defaults, then config.json, then environment variables.
   *
   * A missing config file is normal. A corrupt one is logged and ignored.
   *
   * @throws ConfigError when an environment variable holds an invalid value
   */
  async load(): Promise<CoreConfig> {
    const fileConfig = await this.loadFile();
    const envConfig = this.loadEnv();

    const yqVersion = envConfig.yqVersion ?? fileConfig.yqVersion ?? DEFAULT_CORE_CONFIG.yqVersion;
    const formatNames = envConfig.enabledFormats?.split(",") ?? fileConfig.enabledFormats;

    const config: CoreConfig = {
      yqVersion,
      // Without an explicit minimum, local binaries must be at least the download target
      minimumVersion: fileConfig.minimumVersion ?? yqVersion,
      binaryPath: envConfig.binaryPath ?? fileConfig.binaryPath ?? null,
      offline: envConfig.offline ?? fileConfig.offline ?? DEFAULT_CORE_CONFIG.offline,
      cacheDir: envConfig.cacheDir ?? fileConfig.cacheDir ?? null,
      bundledDir: fileConfig.bundledDir ?? null,
      enabledFormats:
        formatNames !== undefined
          ? this.parseFormats(formatNames)
          : DEFAULT_CORE_CONFIG.enabledFormats,
      queryTimeoutMs:
        envConfig.queryTimeoutMs ??
        fileConfig.queryTimeoutMs ??
        DEFAULT_CORE_CONFIG.queryTimeoutMs,
      downloadTimeoutMs: fileConfig.downloadTimeoutMs ?? DEFAULT_CORE_CONFIG.downloadTimeoutMs,
      fetchMaxAttempts: fileConfig.fetchMaxAttempts ?? DEFAULT_CORE_CONFIG.fetchMaxAttempts,
    };

    if (!meetsMinimum(parseVersion(config.yqVersion), parseVersion(config.minimumVersion))) {
      this.logger.warn("Minimum version is newer than the download target", {
        yqVersion: config.yqVersion,
        minimumVersion: config.minimumVersion,
      });
    }

    this.logger.debug("Config loaded", {
      yqVersion: config.yqVersion,
      minimumVersion: config.minimumVersion,
      offline: config.offline,
      formats: config.enabledFormats.join(","),
    });
    return config;
  }

  private async loadFile(): Promise<FileConfig> {
    const configPath = this.pathProvider.configPath;

    let content: string;
    try {
      content = await this.fileSystem.readFile(configPath);
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        this.logger.debug("Config not found, using defaults", { path: configPath });
        return {};
      }
      this.logger.warn("Config load failed, using defaults", {
        path: configPath,
        error: getErrorMessage(error),
      });
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warn("Config is not valid JSON, using defaults", {
        path: configPath,
        error: getErrorMessage(error),
      });
      return {};
    }

    const result = fileConfigSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn("Config validation failed, using defaults", {
        path: configPath,
        error: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
      });
      return {};
    }
    return result.data;
  }

  private loadEnv(): EnvConfig {
    const raw: Partial<Record<EnvKey, string>> = {};
    const sources: Partial<Record<EnvKey, string>> = {};

    for (const key of Object.keys(ENV_VARIABLES)) {
      if (!isEnvKey(key)) continue;
      for (const name of ENV_VARIABLES[key]) {
        const value = this.env[name]?.trim();
        if (value) {
          raw[key] = value;
          sources[key] = name;
          break;
        }
      }
    }

    const result = envConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => {
        const key = issue.path[0];
        const name = key !== undefined && isEnvKey(key) ? (sources[key] ?? key) : "env";
        return `${name}: ${issue.message}`;
      });
      throw new ConfigError(`Invalid environment configuration: ${issues.join("; ")}`, issues);
    }
    return result.data;
  }

  /**
   * Keep known format names, in order and without duplicates.
   * Falls back to the defaults when nothing usable remains.
   */
  private parseFormats(names: readonly string[]): readonly QueryFormat[] {
    const formats: QueryFormat[] = [];
    const unknown: string[] = [];

    for (const rawName of names) {
      const name = rawName.trim().toLowerCase();
      if (name === "") continue;
      if (!isQueryFormat(name)) {
        unknown.push(name);
        continue;
      }
      if (!formats.includes(name)) {
        formats.push(name);
      }
    }

    if (unknown.length > 0) {
      this.logger.warn("Ignoring unknown formats", { formats: unknown.join(",") });
    }
    return formats.length > 0 ? formats : DEFAULT_ENABLED_FORMATS;
  }
}
