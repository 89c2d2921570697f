/**
 * Configuration types for the query core.
 *
 * Values come from defaults, then the optional config.json, then environment
 * variables; later sources win.
 */

import type { QueryFormat } from "../query/types";
import { DEFAULT_ENABLED_FORMATS } from "../query/types";
import { DEFAULT_YQ_VERSION } from "../binary-download/versions";

/**
 * Resolved configuration of the query core.
 */
export interface CoreConfig {
  /** yq release to download when no usable binary is found (always "v"-prefixed) */
  readonly yqVersion: string;
  /** Oldest acceptable yq for system, cached and bundled binaries */
  readonly minimumVersion: string;
  /** Explicit binary; skips discovery and download when set */
  readonly binaryPath: string | null;
  /** Never download; fail when no local binary qualifies */
  readonly offline: boolean;
  /** Binary cache root. null = platform default */
  readonly cacheDir: string | null;
  /** Directory of binaries shipped alongside the package. null = package default */
  readonly bundledDir: string | null;
  /** Formats accepted for input and output */
  readonly enabledFormats: readonly QueryFormat[];
  /** Per-query timeout */
  readonly queryTimeoutMs: number;
  /** Timeout of a single binary download */
  readonly downloadTimeoutMs: number;
  /** Download attempts before giving up */
  readonly fetchMaxAttempts: number;
}

export const DEFAULT_CORE_CONFIG: CoreConfig = {
  yqVersion: DEFAULT_YQ_VERSION,
  minimumVersion: DEFAULT_YQ_VERSION,
  binaryPath: null,
  offline: false,
  cacheDir: null,
  bundledDir: null,
  enabledFormats: DEFAULT_ENABLED_FORMATS,
  queryTimeoutMs: 30_000,
  downloadTimeoutMs: 120_000,
  fetchMaxAttempts: 3,
};
