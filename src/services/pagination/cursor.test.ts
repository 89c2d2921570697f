import { describe, it, expect } from "vitest";
import { CURSOR_FORMAT_VERSION, decodeCursor, encodeCursor } from "./cursor";
import { InvalidCursorError } from "../errors";

function token(payload: unknown): string {
  return Buffer.from(JSON.stringify(payload), "utf-8").toString("base64url");
}

describe("encodeCursor", () => {
  it("encodes the cursor fields as base64url JSON", () => {
    expect(encodeCursor({ offset: 1, totalSize: 2, formatVersion: 1 })).toBe(
      token({ offset: 1, totalSize: 2, formatVersion: 1 })
    );
  });

  it("round-trips through decodeCursor", () => {
    const cursor = { offset: 10_000, totalSize: 25_000, formatVersion: CURSOR_FORMAT_VERSION };
    const encoded = encodeCursor(cursor);

    expect(decodeCursor(encoded)).toEqual(cursor);
    expect(encodeCursor(decodeCursor(encoded))).toBe(encoded);
  });
});

describe("decodeCursor", () => {
  it("accepts an offset equal to the total size", () => {
    expect(decodeCursor(token({ offset: 5, totalSize: 5, formatVersion: 1 }))).toEqual({
      offset: 5,
      totalSize: 5,
      formatVersion: 1,
    });
  });

  it.each([
    ["empty string", ""],
    ["characters outside base64url", "not a cursor!"],
    ["payload that is not JSON", Buffer.from("hello").toString("base64url")],
    ["missing fields", token({ offset: 0 })],
    ["negative offset", token({ offset: -1, totalSize: 10, formatVersion: 1 })],
    ["fractional offset", token({ offset: 1.5, totalSize: 10, formatVersion: 1 })],
    ["unknown field", token({ offset: 0, totalSize: 10, formatVersion: 1, extra: true })],
    ["JSON that is not an object", token([0, 10, 1])],
  ])("rejects %s", (_label, value) => {
    expect(() => decodeCursor(value)).toThrow(InvalidCursorError);
  });

  it("rejects an unsupported format version", () => {
    expect(() => decodeCursor(token({ offset: 0, totalSize: 1, formatVersion: 2 }))).toThrow(
      "Invalid cursor: unsupported format version 2"
    );
  });

  it("rejects an offset beyond the total size", () => {
    expect(() => decodeCursor(token({ offset: 11, totalSize: 10, formatVersion: 1 }))).toThrow(
      "Invalid cursor: offset 11 exceeds total size 10"
    );
  });
});
