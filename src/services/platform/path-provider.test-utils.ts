/**
 * Test utilities for PathProvider.
 */
import { join } from "node:path";
import type { PathProvider } from "./path-provider";

/**
 * Create a mock PathProvider.
 * Defaults to test paths under `/test/cache/configq/` and `/test/config/configq/`.
 */
export function createMockPathProvider(overrides?: Partial<PathProvider>): PathProvider {
  // join() keeps the defaults valid on Windows
  const cacheDir = overrides?.cacheDir ?? join("/test", "cache", "configq");
  const configDir = overrides?.configDir ?? join("/test", "config", "configq");

  return {
    cacheDir,
    binaryCacheDir: overrides?.binaryCacheDir ?? join(cacheDir, "bin"),
    bundledBinDir: overrides?.bundledBinDir ?? join("/test", "package", "binaries"),
    logsDir: overrides?.logsDir ?? join(cacheDir, "logs"),
    configDir,
    configPath: overrides?.configPath ?? join(configDir, "config.json"),
  };
}
