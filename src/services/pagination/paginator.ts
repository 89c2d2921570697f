/**
 * Byte-bounded pagination of query results.
 *
 * The value is serialized on every call and never cached, so a cursor carries the size
 * of the text it was issued for. A mismatch on resume means the data changed underneath
 * the caller, who has to start over.
 */

import { InvalidCursorError, PaginationError, StaleCursorError } from "../errors";
import { CURSOR_FORMAT_VERSION } from "./cursor";
import type { Cursor, PageResult } from "./types";

export const PAGE_SIZE_BYTES = 10_000;

/** Advisory is added when a result spans more pages than this */
export const ADVISORY_PAGE_THRESHOLD = 2;

/**
 * Text form of a result: strings verbatim, anything else as indented JSON.
 */
export function serializeResult(data: unknown): string {
  if (typeof data === "string") {
    return data;
  }
  const json: string | undefined = JSON.stringify(data, null, 2);
  return json ?? "null";
}

function isContinuationByte(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

function formatCount(count: number): string {
  return String(count).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

/**
 * Query hint matching the shape of the result, null for scalars.
 */
export function paginationHint(data: unknown): string | null {
  if (Array.isArray(data)) {
    return "Result is a list. Use '.[start:end]' to slice or '. | length' to count.";
  }
  if (typeof data === "object" && data !== null) {
    return "Result is an object. Use '.key' to select or '. | keys' to list keys.";
  }
  return null;
}

function buildAdvisory(data: unknown, totalSize: number, pageSizeBytes: number): string | null {
  const totalPages = Math.ceil(totalSize / pageSizeBytes);
  if (totalPages <= ADVISORY_PAGE_THRESHOLD) {
    return null;
  }
  const base =
    `Result spans ${totalPages} pages (${formatCount(totalSize)} bytes). ` +
    "Consider querying for specific keys (e.g., '.data | keys') or counts " +
    "(e.g., '.items | length') to reduce result size.";
  const hint = paginationHint(data);
  return hint ? `${base} ${hint}` : base;
}

/**
 * Return the page of `data` starting at `cursor` (the first page for null).
 *
 * @throws PaginationError INVALID_PAGE_SIZE for a page size that is not a positive integer
 * @throws StaleCursorError when the serialized size differs from the cursor's
 * @throws InvalidCursorError for an unknown format version, or an offset that is negative,
 *   fractional, past the end or inside a character
 */
export function paginate(
  data: unknown,
  cursor: Cursor | null,
  pageSizeBytes: number = PAGE_SIZE_BYTES
): PageResult {
  if (!Number.isInteger(pageSizeBytes) || pageSizeBytes <= 0) {
    throw new PaginationError(
      `Page size must be a positive integer, got ${pageSizeBytes}`,
      "INVALID_PAGE_SIZE"
    );
  }

  const bytes = Buffer.from(serializeResult(data), "utf-8");
  const totalSize = bytes.length;

  let offset = 0;
  if (cursor !== null) {
    if (cursor.formatVersion !== CURSOR_FORMAT_VERSION) {
      throw new InvalidCursorError(
        `Cursor format version ${cursor.formatVersion} is not supported`
      );
    }
    if (cursor.totalSize !== totalSize) {
      throw new StaleCursorError(cursor.totalSize, totalSize);
    }
    if (!Number.isInteger(cursor.offset) || cursor.offset < 0) {
      throw new InvalidCursorError(
        `Cursor offset ${cursor.offset} is not a non-negative integer`
      );
    }
    if (cursor.offset > totalSize) {
      throw new InvalidCursorError(
        `Cursor offset ${cursor.offset} exceeds result size ${totalSize}`
      );
    }
    if (isContinuationByte(bytes[cursor.offset])) {
      throw new InvalidCursorError(
        `Cursor offset ${cursor.offset} is not on a character boundary`
      );
    }
    offset = cursor.offset;
  }

  let end = Math.min(offset + pageSizeBytes, totalSize);
  if (end < totalSize) {
    while (end > offset && isContinuationByte(bytes[end])) {
      end--;
    }
    if (end === offset) {
      // Page size is smaller than the character at offset: emit that one character
      end = offset + 1;
      while (end < totalSize && isContinuationByte(bytes[end])) {
        end++;
      }
    }
  }

  const chunk = bytes.subarray(offset, end);
  const isLast = end >= totalSize;
  const advisory = isLast ? null : buildAdvisory(data, totalSize, pageSizeBytes);

  return {
    chunk,
    text: chunk.toString("utf-8"),
    nextCursor: isLast
      ? null
      : { offset: end, totalSize, formatVersion: CURSOR_FORMAT_VERSION },
    isLast,
    totalSize,
    ...(advisory !== null ? { advisory } : {}),
  };
}
