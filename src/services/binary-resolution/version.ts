/**
 * Version parsing and comparison for `yq --version` output and release tags.
 */

import { VersionParseError } from "../errors";
import type { Version } from "./types";

/** `version v4.52.2` as printed by `yq --version` */
const AFTER_VERSION_WORD = /\bversion\s+v?(\d+)(?:\.(\d+))?(?:\.(\d+))?/i;

/** First numeric token, optionally `v`-prefixed */
const FIRST_NUMERIC = /v?(\d+)(?:\.(\d+))?(?:\.(\d+))?/;

function toVersion(match: RegExpExecArray): Version {
  return {
    major: Number(match[1]),
    minor: Number(match[2] ?? 0),
    patch: Number(match[3] ?? 0),
  };
}

/**
 * Parse a version out of free-form text.
 *
 * Prefers the token following the word "version", else takes the first numeric
 * token. Missing minor/patch default to 0; suffixes such as `-rc1` are ignored.
 *
 * @throws VersionParseError when the text contains no numeric token
 *
 * @example
 * parseVersion("yq (https://github.com/mikefarah/yq/) version v4.52.2") // { 4, 52, 2 }
 * parseVersion("v4.40") // { 4, 40, 0 }
 */
export function parseVersion(raw: string): Version {
  const match = AFTER_VERSION_WORD.exec(raw) ?? FIRST_NUMERIC.exec(raw);
  if (match === null) {
    throw new VersionParseError(raw);
  }
  return toVersion(match);
}

/**
 * parseVersion that returns null instead of throwing.
 */
export function tryParseVersion(raw: string): Version | null {
  try {
    return parseVersion(raw);
  } catch (error) {
    if (error instanceof VersionParseError) return null;
    throw error;
  }
}

/**
 * Numeric comparison, left to right.
 * @returns negative if a < b, 0 if equal, positive if a > b
 */
export function compareVersions(a: Version, b: Version): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export function meetsMinimum(version: Version, minimum: Version): boolean {
  return compareVersions(version, minimum) >= 0;
}

/**
 * Render as a release tag: `v1.2.3`.
 */
export function formatVersion(version: Version): string {
  return `v${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Ensure a release tag carries its leading `v`.
 */
export function normalizeVersionTag(tag: string): string {
  const trimmed = tag.trim();
  return trimmed.startsWith("v") ? trimmed : `v${trimmed}`;
}
