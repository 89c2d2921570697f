/**
 * Query types shared by the backend, the configuration and callers.
 */

/**
 * Document formats yq reads and writes, by their `-p` / `-o` names.
 */
export const QUERY_FORMATS = ["json", "yaml", "toml", "xml", "csv", "tsv", "props"] as const;

export type QueryFormat = (typeof QUERY_FORMATS)[number];

/** Formats enabled when configuration names none */
export const DEFAULT_ENABLED_FORMATS: readonly QueryFormat[] = ["json", "yaml", "toml"];

export function isQueryFormat(value: string): value is QueryFormat {
  return QUERY_FORMATS.some((format) => format === value);
}

/**
 * One yq invocation.
 *
 * Exactly one of `inputPath` and `inputData` is set, unless `nullInput` is true,
 * in which case neither is.
 */
export interface QueryRequest {
  /** File passed to yq as its last argument */
  readonly inputPath?: string;
  /** Document written to yq's stdin */
  readonly inputData?: string | Buffer;
  /** yq expression, passed as a single argv element */
  readonly expression: string;
  readonly inputFormat: QueryFormat;
  readonly outputFormat: QueryFormat;
  /** Overrides the backend default */
  readonly timeoutMs?: number;
  /** Run with `-n`: evaluate the expression without reading input */
  readonly nullInput?: boolean;
}

/**
 * Successful yq output. stdout is kept as raw bytes; decoding is the caller's choice.
 */
export interface QueryResult {
  readonly rawBytes: Buffer;
  readonly exitCode: number;
  /** Warnings yq printed while still succeeding */
  readonly stderrText: string;
}

/**
 * Executes yq queries.
 */
export interface QueryBackend {
  /**
   * Run a query.
   * @throws QueryExecutionError classified by kind
   */
  execute(request: QueryRequest): Promise<QueryResult>;
}
