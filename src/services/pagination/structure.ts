/**
 * Structure summaries for navigating a result before fetching it in full.
 */

import type { DescribeOptions, StructureOutline, StructureSummary } from "./types";

/** Primitive values longer than this are truncated in outlines */
export const MAX_PRIMITIVE_DISPLAY_LENGTH = 100;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * JSON-flavoured type name: object, list, string, number, boolean or null.
 */
export function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  return typeof value;
}

function listSummary(length: number): string {
  return `<list with ${length} items>`;
}

/**
 * Top level only: keys of an object, item count of a list, type of a scalar.
 */
export function summarizeStructure(data: unknown): StructureSummary {
  if (Array.isArray(data)) {
    return { kind: "array", length: data.length };
  }
  if (isRecord(data)) {
    return { kind: "object", keys: Object.keys(data) };
  }
  return { kind: "scalar", type: typeName(data) };
}

function describeBeyondDepth(data: unknown): StructureOutline {
  if (isRecord(data)) {
    const outline: { [key: string]: StructureOutline } = {};
    for (const [key, value] of Object.entries(data)) {
      outline[key] = describeBeyondDepth(value);
    }
    return outline;
  }
  if (Array.isArray(data)) {
    return listSummary(data.length);
  }
  return typeName(data);
}

function describePrimitive(data: unknown, fullKeys: boolean): string {
  if (fullKeys) {
    return typeName(data);
  }
  const text = String(data);
  if (text.length <= MAX_PRIMITIVE_DISPLAY_LENGTH) {
    return text;
  }
  return `${text.slice(0, MAX_PRIMITIVE_DISPLAY_LENGTH - 3)}...`;
}

function describeAt(
  data: unknown,
  depth: number,
  maxDepth: number,
  fullKeys: boolean
): StructureOutline {
  if (!fullKeys && depth > maxDepth) {
    return describeBeyondDepth(data);
  }

  if (isRecord(data)) {
    const outline: { [key: string]: StructureOutline } = {};
    for (const [key, value] of Object.entries(data)) {
      outline[key] = describeAt(value, depth + 1, maxDepth, fullKeys);
    }
    return outline;
  }

  if (Array.isArray(data)) {
    const first: unknown = data[0];
    if (data.length === 0) {
      return [];
    }
    if (fullKeys) {
      // Lists are assumed homogeneous; the first item stands for all
      const shape =
        typeof first === "object" && first !== null
          ? describeAt(first, depth + 1, maxDepth, fullKeys)
          : typeName(first);
      return [shape];
    }
    return {
      __summary__: listSummary(data.length),
      first_item_sample: describeAt(first, depth + 1, maxDepth, fullKeys),
    };
  }

  return describePrimitive(data, fullKeys);
}

/**
 * Outline of nested data. Values are shown up to `maxDepth`, deeper levels keep only
 * keys and type names, and lists are reduced to their length plus a sample of the
 * first item.
 *
 * @example
 * describeStructure({ a: { b: [1, 2] } }, { maxDepth: 0 })
 * // { a: { b: "<list with 2 items>" } }
 */
export function describeStructure(data: unknown, options: DescribeOptions = {}): StructureOutline {
  return describeAt(data, 0, options.maxDepth ?? 1, options.fullKeys ?? false);
}
