import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { PlatformInfo } from "./platform-info";

/**
 * Application path provider.
 * Abstracts platform-specific locations of the binary cache, logs and configuration.
 */
export interface PathProvider {
  /** Per-user cache root: `<cacheHome>/configq/` */
  readonly cacheDir: string;

  /** Root of the downloaded binary cache: `<cacheDir>/bin/` */
  readonly binaryCacheDir: string;

  /** Binaries shipped with the package: `<packageRoot>/binaries/` */
  readonly bundledBinDir: string;

  /** Directory for session log files: `<cacheDir>/logs/` */
  readonly logsDir: string;

  /** Per-user configuration directory: `<configHome>/configq/` */
  readonly configDir: string;

  /** Optional configuration file: `<configDir>/config.json` */
  readonly configPath: string;
}

export interface DefaultPathProviderOptions {
  /** Environment consulted for XDG_* / LOCALAPPDATA / APPDATA. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
  /** Override the bundled binaries directory */
  readonly bundledBinDir?: string;
}

const APP_DIR_NAME = "configq";

/** `binaries/` at the package root, next to `src/` */
const PACKAGE_BINARIES_DIR = fileURLToPath(new URL("../../../binaries", import.meta.url));

/**
 * Default PathProvider implementation.
 *
 * Path structure:
 * - Linux: `$XDG_CACHE_HOME/configq/` (else `~/.cache/configq/`),
 *   `$XDG_CONFIG_HOME/configq/` (else `~/.config/configq/`)
 * - macOS: `~/Library/Caches/configq/`, `~/Library/Application Support/configq/`
 * - Windows: `%LOCALAPPDATA%\configq\`, `%APPDATA%\configq\`
 */
export class DefaultPathProvider implements PathProvider {
  readonly cacheDir: string;
  readonly binaryCacheDir: string;
  readonly bundledBinDir: string;
  readonly logsDir: string;
  readonly configDir: string;
  readonly configPath: string;

  constructor(platformInfo: PlatformInfo, options: DefaultPathProviderOptions = {}) {
    const env = options.env ?? process.env;

    this.cacheDir = join(this.computeCacheHome(platformInfo, env), APP_DIR_NAME);
    this.binaryCacheDir = join(this.cacheDir, "bin");
    this.logsDir = join(this.cacheDir, "logs");
    this.configDir = join(this.computeConfigHome(platformInfo, env), APP_DIR_NAME);
    this.configPath = join(this.configDir, "config.json");
    this.bundledBinDir = options.bundledBinDir ?? PACKAGE_BINARIES_DIR;
  }

  private computeCacheHome(platformInfo: PlatformInfo, env: NodeJS.ProcessEnv): string {
    const { platform, homeDir } = platformInfo;
    switch (platform) {
      case "darwin":
        return join(homeDir, "Library", "Caches");
      case "win32":
        return env.LOCALAPPDATA || join(homeDir, "AppData", "Local");
      default:
        return env.XDG_CACHE_HOME || join(homeDir, ".cache");
    }
  }

  private computeConfigHome(platformInfo: PlatformInfo, env: NodeJS.ProcessEnv): string {
    const { platform, homeDir } = platformInfo;
    switch (platform) {
      case "darwin":
        return join(homeDir, "Library", "Application Support");
      case "win32":
        return env.APPDATA || join(homeDir, "AppData", "Roaming");
      default:
        return env.XDG_CONFIG_HOME || join(homeDir, ".config");
    }
  }
}
