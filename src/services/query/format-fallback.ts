/**
 * Helpers around QueryBackend results.
 */

import { QueryExecutionError } from "../errors";
import { classifyStderr } from "./diagnostics";
import type { QueryBackend, QueryFormat, QueryRequest, QueryResult } from "./types";

export interface FormatFallbackOptions {
  /** True when the caller asked for the output format; false when it was inferred from the input */
  readonly outputFormatExplicit: boolean;
}

export interface FallbackQueryResult extends QueryResult {
  /** Format the bytes are actually in */
  readonly outputFormat: QueryFormat;
  readonly fellBack: boolean;
}

function canFallBackToJson(
  error: unknown,
  request: QueryRequest,
  options: FormatFallbackOptions
): boolean {
  return (
    !options.outputFormatExplicit &&
    request.inputFormat === "toml" &&
    request.outputFormat === "toml" &&
    error instanceof QueryExecutionError &&
    error.kind === "UNSUPPORTED_FORMAT" &&
    classifyStderr(error.stderr).tag === "toml-scalars-only"
  );
}

/**
 * Execute a query; when TOML output was only implied by TOML input and yq cannot
 * encode the result as TOML, run it once more with JSON output.
 */
export async function queryWithFormatFallback(
  backend: QueryBackend,
  request: QueryRequest,
  options: FormatFallbackOptions
): Promise<FallbackQueryResult> {
  try {
    const result = await backend.execute(request);
    return { ...result, outputFormat: request.outputFormat, fellBack: false };
  } catch (error) {
    if (!canFallBackToJson(error, request, options)) {
      throw error;
    }
    const result = await backend.execute({ ...request, outputFormat: "json" });
    return { ...result, outputFormat: "json", fellBack: true };
  }
}

export interface DecodedOutput {
  /** Parsed value; null for empty output or output that is not valid JSON */
  readonly data: unknown;
  /** Set when the output could not be parsed */
  readonly warning: string | null;
}

/**
 * Parse JSON output. Parse failures are reported as a warning, not thrown.
 */
export function decodeJsonOutput(result: QueryResult): DecodedOutput {
  const text = result.rawBytes.toString("utf-8").trim();
  if (text === "") {
    return { data: null, warning: null };
  }
  try {
    const data: unknown = JSON.parse(text);
    return { data, warning: null };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { data: null, warning: `Failed to parse JSON output: ${reason}` };
  }
}
