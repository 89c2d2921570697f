/**
 * SHA-256 checksum lookup for yq release assets.
 */

import { createHash } from "node:crypto";
import type { BinaryDescriptor, PlatformKey } from "../binary-resolution/types";
import type { ChecksumRecord } from "./types";

/** Field holding the SHA-256 digest in a yq `checksums` line */
const SHA256_FIELD_INDEX = 18;
const MIN_FIELDS = SHA256_FIELD_INDEX + 1;

const SHA256_HEX = /^[0-9a-f]{64}$/;

export function sha256Hex(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Immutable lookup of expected digests by (version, platform).
 */
export class ChecksumTable {
  private readonly records: ReadonlyMap<string, ChecksumRecord>;

  constructor(records: readonly ChecksumRecord[]) {
    const map = new Map<string, ChecksumRecord>();
    for (const record of records) {
      map.set(ChecksumTable.key(record.version, record.platformKey), Object.freeze({ ...record }));
    }
    this.records = map;
  }

  private static key(version: string, platformKey: PlatformKey): string {
    return `${version}/${platformKey}`;
  }

  lookup(version: string, platformKey: PlatformKey): ChecksumRecord | undefined {
    return this.records.get(ChecksumTable.key(version, platformKey));
  }

  get size(): number {
    return this.records.size;
  }
}

/**
 * Parse a release's `checksums` file.
 *
 * Each line starts with the asset name followed by digests of several algorithms;
 * the SHA-256 digest is field 18. Shorter lines, unknown assets and malformed
 * digests are skipped.
 */
export function parseChecksumsFile(
  content: string,
  version: string,
  descriptors: readonly BinaryDescriptor[]
): ChecksumRecord[] {
  const byAsset = new Map(descriptors.map((d) => [d.assetName, d.platformKey]));
  const records: ChecksumRecord[] = [];

  for (const line of content.split("\n")) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < MIN_FIELDS) continue;

    const platformKey = byAsset.get(fields[0] ?? "");
    const sha256 = fields[SHA256_FIELD_INDEX]?.toLowerCase();
    if (platformKey === undefined || sha256 === undefined || !SHA256_HEX.test(sha256)) continue;

    records.push({ version, platformKey, sha256 });
  }
  return records;
}
