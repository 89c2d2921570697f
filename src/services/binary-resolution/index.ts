/**
 * Binary resolution module.
 */

export { BinaryResolver } from "./binary-resolver";
export type { BinaryResolverConfig, BinaryResolverDeps } from "./binary-resolver";
export { BinaryLocator, VERSION_CHECK_TIMEOUT_MS } from "./binary-locator";
export type { BinaryLocatorDeps, ProbeResult } from "./binary-locator";
export { buildDownloadUrl, listSupportedPlatforms, resolvePlatform } from "./platform-resolver";
export {
  compareVersions,
  formatVersion,
  meetsMinimum,
  normalizeVersionTag,
  parseVersion,
  tryParseVersion,
} from "./version";
export type {
  BinaryArch,
  BinaryDescriptor,
  BinaryOs,
  BinarySource,
  BinaryValidation,
  PlatformKey,
  ResolvedBinary,
  Version,
} from "./types";
