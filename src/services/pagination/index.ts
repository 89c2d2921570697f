/**
 * Pagination module public API.
 */

export { CURSOR_FORMAT_VERSION, decodeCursor, encodeCursor } from "./cursor";
export {
  ADVISORY_PAGE_THRESHOLD,
  PAGE_SIZE_BYTES,
  paginate,
  paginationHint,
  serializeResult,
} from "./paginator";
export {
  MAX_PRIMITIVE_DISPLAY_LENGTH,
  describeStructure,
  summarizeStructure,
  typeName,
} from "./structure";
export type {
  Cursor,
  DescribeOptions,
  PageResult,
  StructureOutline,
  StructureSummary,
} from "./types";
