/**
 * Platform information provider.
 * Abstracts process.platform, process.arch, and os.homedir() for testability.
 */

import { homedir } from "node:os";

export interface PlatformInfo {
  /** Operating system platform: 'linux', 'darwin', 'win32', ... */
  readonly platform: NodeJS.Platform;

  /** CPU architecture as Node reports it: 'x64', 'arm64', ... */
  readonly arch: NodeJS.Architecture;

  /** User's home directory */
  readonly homeDir: string;
}

/**
 * PlatformInfo of the running Node.js process.
 */
export function createNodePlatformInfo(): PlatformInfo {
  return {
    platform: process.platform,
    arch: process.arch,
    homeDir: homedir(),
  };
}
