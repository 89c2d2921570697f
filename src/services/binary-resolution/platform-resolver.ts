/**
 * Maps the host OS and CPU to the yq release asset for it.
 */

import { UnsupportedPlatformError } from "../errors";
import type { PlatformInfo } from "../platform/platform-info";
import { DEFAULT_YQ_VERSION, YQ_DOWNLOAD_URL_TEMPLATE } from "../binary-download/versions";
import { normalizeVersionTag } from "./version";
import type { BinaryArch, BinaryDescriptor, BinaryOs, PlatformKey } from "./types";

function descriptor(platformKey: PlatformKey, os: BinaryOs, arch: BinaryArch): BinaryDescriptor {
  const windows = os === "windows";
  return Object.freeze({
    platformKey,
    os,
    arch,
    filename: windows ? "yq.exe" : "yq",
    assetName: windows ? `yq_${os}_${arch}.exe` : `yq_${os}_${arch}`,
    downloadUrlTemplate: YQ_DOWNLOAD_URL_TEMPLATE,
    minimumVersion: DEFAULT_YQ_VERSION,
  });
}

/**
 * Supported platforms keyed by `${process.platform}-${process.arch}`.
 * There is no Windows arm64 build.
 */
const PLATFORM_TABLE: ReadonlyMap<string, BinaryDescriptor> = new Map([
  ["linux-x64", descriptor("linux-amd64", "linux", "amd64")],
  ["linux-arm64", descriptor("linux-arm64", "linux", "arm64")],
  ["darwin-x64", descriptor("darwin-amd64", "darwin", "amd64")],
  ["darwin-arm64", descriptor("darwin-arm64", "darwin", "arm64")],
  ["win32-x64", descriptor("windows-amd64", "windows", "amd64")],
]);

/**
 * Descriptor of the yq build for a platform.
 *
 * @throws UnsupportedPlatformError for any OS/architecture pair outside the table
 */
export function resolvePlatform(
  platformInfo: Pick<PlatformInfo, "platform" | "arch">
): BinaryDescriptor {
  const found = PLATFORM_TABLE.get(`${platformInfo.platform}-${platformInfo.arch}`);
  if (found === undefined) {
    throw new UnsupportedPlatformError(platformInfo.platform, platformInfo.arch);
  }
  return found;
}

/**
 * All supported platforms.
 */
export function listSupportedPlatforms(): readonly BinaryDescriptor[] {
  return [...PLATFORM_TABLE.values()];
}

/**
 * Release asset URL of a descriptor for a version. The tag always carries a leading `v`.
 *
 * @example
 * buildDownloadUrl(resolvePlatform({ platform: "linux", arch: "x64" }), "4.52.2")
 * // https://github.com/mikefarah/yq/releases/download/v4.52.2/yq_linux_amd64
 */
export function buildDownloadUrl(descriptor: BinaryDescriptor, version: string): string {
  return descriptor.downloadUrlTemplate
    .replace("{version}", normalizeVersionTag(version))
    .replace("{asset}", descriptor.assetName);
}
