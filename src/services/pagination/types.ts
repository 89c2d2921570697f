/**
 * Pagination types.
 */

/**
 * Resumable position within a serialized result. Offsets and sizes are UTF-8 bytes.
 */
export interface Cursor {
  readonly offset: number;
  /** Size of the serialized result the cursor was issued for */
  readonly totalSize: number;
  readonly formatVersion: number;
}

export interface PageResult {
  /** Bytes of this page, never split inside a character */
  readonly chunk: Buffer;
  /** `chunk` decoded as UTF-8 */
  readonly text: string;
  readonly nextCursor: Cursor | null;
  readonly isLast: boolean;
  readonly totalSize: number;
  /** Set on non-final pages of results spanning more than two pages */
  readonly advisory?: string;
}

/**
 * Type-only outline of nested data, as produced by describeStructure().
 */
export type StructureOutline = string | StructureOutline[] | { [key: string]: StructureOutline };

export type StructureSummary =
  | { readonly kind: "object"; readonly keys: readonly string[] }
  | { readonly kind: "array"; readonly length: number }
  | { readonly kind: "scalar"; readonly type: string };

export interface DescribeOptions {
  /** Levels shown with values before only keys and types remain. Default: 1 */
  readonly maxDepth?: number;
  /** Show the complete key tree with type names instead of values, ignoring maxDepth */
  readonly fullKeys?: boolean;
}
