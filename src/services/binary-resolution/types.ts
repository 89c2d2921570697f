/**
 * Types for yq binary resolution.
 */

/**
 * Supported operating system / CPU pairs, in yq's release naming.
 */
export type PlatformKey =
  | "linux-amd64"
  | "linux-arm64"
  | "darwin-amd64"
  | "darwin-arm64"
  | "windows-amd64";

export type BinaryOs = "linux" | "darwin" | "windows";

export type BinaryArch = "amd64" | "arm64";

/**
 * How to obtain and name the yq binary on one platform.
 */
export interface BinaryDescriptor {
  readonly platformKey: PlatformKey;
  readonly os: BinaryOs;
  readonly arch: BinaryArch;
  /** Local executable name: `yq` or `yq.exe` */
  readonly filename: string;
  /** Release asset name, e.g. `yq_linux_amd64` */
  readonly assetName: string;
  /** Download URL with `{version}` and `{asset}` placeholders */
  readonly downloadUrlTemplate: string;
  /** Oldest release known to work */
  readonly minimumVersion: string;
}

/**
 * Numeric semantic version; pre-release and build suffixes are dropped.
 */
export interface Version {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

/**
 * Where a resolved binary came from.
 */
export type BinarySource = "override" | "system" | "cache" | "bundled" | "downloaded";

/**
 * A yq binary that passed identity and version checks (or was configured explicitly).
 */
export interface ResolvedBinary {
  readonly path: string;
  readonly version: Version;
  readonly source: BinarySource;
}

/**
 * Outcome of BinaryResolver.validate().
 */
export interface BinaryValidation {
  readonly valid: boolean;
  readonly message: string;
}
