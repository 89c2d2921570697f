/**
 * Cursor encoding. A cursor travels as base64url JSON and is validated on the way back.
 */

import { z } from "zod";
import { InvalidCursorError } from "../errors";
import type { Cursor } from "./types";

export const CURSOR_FORMAT_VERSION = 1;

const BASE64URL = /^[A-Za-z0-9_-]+$/;

const cursorSchema = z
  .object({
    offset: z.number().int().nonnegative(),
    totalSize: z.number().int().nonnegative(),
    formatVersion: z.number().int(),
  })
  .strict();

export function encodeCursor(cursor: Cursor): string {
  const payload = JSON.stringify({
    offset: cursor.offset,
    totalSize: cursor.totalSize,
    formatVersion: cursor.formatVersion,
  });
  return Buffer.from(payload, "utf-8").toString("base64url");
}

/**
 * @throws InvalidCursorError for anything encodeCursor() could not have produced
 */
export function decodeCursor(token: string): Cursor {
  if (!BASE64URL.test(token)) {
    throw new InvalidCursorError("Invalid cursor: not a base64url token");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(token, "base64url").toString("utf-8"));
  } catch {
    throw new InvalidCursorError("Invalid cursor: payload is not JSON");
  }

  const result = cursorSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new InvalidCursorError(`Invalid cursor: ${issues.join("; ")}`);
  }

  const cursor = result.data;
  if (cursor.formatVersion !== CURSOR_FORMAT_VERSION) {
    throw new InvalidCursorError(
      `Invalid cursor: unsupported format version ${cursor.formatVersion}`
    );
  }
  if (cursor.offset > cursor.totalSize) {
    throw new InvalidCursorError(
      `Invalid cursor: offset ${cursor.offset} exceeds total size ${cursor.totalSize}`
    );
  }
  return Object.freeze(cursor);
}
