/**
 * Query module public API.
 */

export { DEFAULT_ENABLED_FORMATS, QUERY_FORMATS, isQueryFormat } from "./types";
export type { QueryBackend, QueryFormat, QueryRequest, QueryResult } from "./types";
export {
  DEFAULT_QUERY_TIMEOUT_MS,
  YqQueryBackend,
  buildQueryArgs,
  validateQueryRequest,
} from "./query-backend";
export type { BinaryProvider, YqQueryBackendDeps } from "./query-backend";
export { YQ_DIAGNOSTICS, classifyStderr, cleanStderr } from "./diagnostics";
export type { Diagnosis, DiagnosticRule, DiagnosticTag } from "./diagnostics";
export { decodeJsonOutput, queryWithFormatFallback } from "./format-fallback";
export type { DecodedOutput, FallbackQueryResult, FormatFallbackOptions } from "./format-fallback";
