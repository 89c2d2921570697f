/**
 * Pinned yq release and download URL configuration.
 */

import type { PlatformKey } from "../binary-resolution/types";
import type { ChecksumRecord } from "./types";

/**
 * GitHub repository of the Go yq.
 */
export const YQ_REPOSITORY = "mikefarah/yq";

/**
 * Release downloaded when no usable binary is found. Also the default minimum version.
 */
export const DEFAULT_YQ_VERSION = "v4.52.2";

/**
 * Release asset URL. `{version}` is the tag, `{asset}` the platform asset name.
 */
export const YQ_DOWNLOAD_URL_TEMPLATE = `https://github.com/${YQ_REPOSITORY}/releases/download/{version}/{asset}`;

/**
 * Name of the per-release checksums asset.
 */
export const CHECKSUMS_ASSET_NAME = "checksums";

function pinned(platformKey: PlatformKey, sha256: string): ChecksumRecord {
  return Object.freeze({ version: DEFAULT_YQ_VERSION, platformKey, sha256 });
}

/**
 * SHA-256 digests of the pinned release assets, checked before anything is installed.
 */
export const PINNED_CHECKSUMS: readonly ChecksumRecord[] = Object.freeze([
  pinned("darwin-amd64", "54a63555210e73abed09108097072e28bf82a6bb20439a72b55509c4dd42378d"),
  pinned("darwin-arm64", "34613ea97c4c77e1894a8978dbf72588d187a69a6292c10dab396c767a1ecde7"),
  pinned("linux-amd64", "a74bd266990339e0c48a2103534aef692abf99f19390d12c2b0ce6830385c459"),
  pinned("linux-arm64", "c82856ac30da522f50dcdd4f53065487b5a2927e9b87ff637956900986f1f7c2"),
  pinned("windows-amd64", "2b6cd8974004fa0511f6b6b359d2698214fadeb4599f0b00e8d85ae62b3922d4"),
]);
