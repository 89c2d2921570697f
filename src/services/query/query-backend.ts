/**
 * Runs yq as a subprocess.
 *
 * The argument vector is passed as discrete elements, never through a shell.
 * On POSIX the child leads its own process group so a timeout can kill everything
 * it started.
 */

import { QueryExecutionError, getErrorMessage } from "../errors";
import {
  PROCESS_KILL_FORCE_TIMEOUT_MS,
  PROCESS_KILL_GRACEFUL_TIMEOUT_MS,
  type ProcessOptions,
  type ProcessRunner,
} from "../platform/process";
import type { Logger } from "../logging/types";
import type { ResolvedBinary } from "../binary-resolution/types";
import { classifyStderr, cleanStderr } from "./diagnostics";
import type { QueryBackend, QueryFormat, QueryRequest, QueryResult } from "./types";

export const DEFAULT_QUERY_TIMEOUT_MS = 30_000;

/**
 * Source of the yq binary, satisfied by BinaryResolver.
 */
export interface BinaryProvider {
  resolve(): Promise<ResolvedBinary>;
}

export interface YqQueryBackendDeps {
  readonly binaryProvider: BinaryProvider;
  readonly processRunner: ProcessRunner;
  readonly logger: Logger;
  readonly enabledFormats: readonly QueryFormat[];
  /** Default: 30000 */
  readonly defaultTimeoutMs?: number;
  /** Default: process.platform */
  readonly platform?: NodeJS.Platform;
}

/**
 * Reject requests that cannot be run before anything is spawned.
 *
 * @throws QueryExecutionError INVALID_REQUEST or UNSUPPORTED_FORMAT
 */
export function validateQueryRequest(
  request: QueryRequest,
  enabledFormats: readonly QueryFormat[]
): void {
  const hasPath = request.inputPath !== undefined;
  const hasData = request.inputData !== undefined;

  if (hasPath && hasData) {
    throw new QueryExecutionError("INVALID_REQUEST", "Cannot specify both inputPath and inputData");
  }
  if (request.nullInput && (hasPath || hasData)) {
    throw new QueryExecutionError(
      "INVALID_REQUEST",
      "nullInput cannot be used with inputPath or inputData"
    );
  }
  if (!request.nullInput && !hasPath && !hasData) {
    throw new QueryExecutionError(
      "INVALID_REQUEST",
      "One of inputPath, inputData or nullInput is required"
    );
  }
  if (
    request.timeoutMs !== undefined &&
    (!Number.isInteger(request.timeoutMs) || request.timeoutMs <= 0)
  ) {
    throw new QueryExecutionError(
      "INVALID_REQUEST",
      `timeoutMs must be a positive integer, got ${request.timeoutMs}`
    );
  }

  const formats = request.nullInput
    ? [request.outputFormat]
    : [request.inputFormat, request.outputFormat];
  for (const format of formats) {
    if (!enabledFormats.includes(format)) {
      throw new QueryExecutionError(
        "UNSUPPORTED_FORMAT",
        `Format '${format}' is not enabled (enabled: ${enabledFormats.join(", ")})`
      );
    }
  }
}

/**
 * yq arguments: `[-p <in>] -o <out> [-n] -- <expression> [<inputPath>]`.
 * After `--`, an expression or path starting with `-` is never read as a flag.
 */
export function buildQueryArgs(request: QueryRequest): string[] {
  const args: string[] = [];
  if (!request.nullInput) {
    args.push("-p", request.inputFormat);
  }
  args.push("-o", request.outputFormat);
  if (request.nullInput) {
    args.push("-n");
  }
  args.push("--", request.expression);
  if (request.inputPath !== undefined) {
    args.push(request.inputPath);
  }
  return args;
}

export class YqQueryBackend implements QueryBackend {
  private readonly binaryProvider: BinaryProvider;
  private readonly processRunner: ProcessRunner;
  private readonly logger: Logger;
  private readonly enabledFormats: readonly QueryFormat[];
  private readonly defaultTimeoutMs: number;
  private readonly platform: NodeJS.Platform;

  constructor(deps: YqQueryBackendDeps) {
    this.binaryProvider = deps.binaryProvider;
    this.processRunner = deps.processRunner;
    this.logger = deps.logger;
    this.enabledFormats = deps.enabledFormats;
    this.defaultTimeoutMs = deps.defaultTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
    this.platform = deps.platform ?? process.platform;
  }

  async execute(request: QueryRequest): Promise<QueryResult> {
    validateQueryRequest(request, this.enabledFormats);

    let binary: ResolvedBinary;
    try {
      binary = await this.binaryProvider.resolve();
    } catch (error) {
      throw new QueryExecutionError(
        "BINARY_MISSING",
        `yq binary unavailable: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }

    const args = buildQueryArgs(request);
    const timeoutMs = request.timeoutMs ?? this.defaultTimeoutMs;
    const options: ProcessOptions = {
      detached: this.platform !== "win32",
      ...(request.inputData !== undefined ? { input: request.inputData } : {}),
    };

    this.logger.debug("Running yq", {
      binary: binary.path,
      expression: request.expression,
      inputFormat: request.nullInput ? null : request.inputFormat,
      outputFormat: request.outputFormat,
      timeoutMs,
    });

    const proc = this.processRunner.run(binary.path, args, options);
    if (proc.pid === undefined) {
      const result = await proc.wait();
      throw new QueryExecutionError(
        "BINARY_MISSING",
        `Failed to execute yq binary at ${binary.path}: ${result.stderr.trim()}`,
        { stderr: result.stderr }
      );
    }

    const result = await proc.wait(timeoutMs);

    if (result.running) {
      const killed = await proc.kill(
        PROCESS_KILL_GRACEFUL_TIMEOUT_MS,
        PROCESS_KILL_FORCE_TIMEOUT_MS
      );
      this.logger.warn("yq timed out", {
        pid: proc.pid,
        timeoutMs,
        killed: killed.success,
        signal: killed.reason ?? null,
      });
      throw new QueryExecutionError("TIMEOUT", `yq timed out after ${timeoutMs}ms`);
    }

    if (result.exitCode === null) {
      throw new QueryExecutionError(
        "NON_ZERO_EXIT",
        `yq was terminated by ${result.signal ?? "an unknown signal"}`,
        { stderr: result.stderr }
      );
    }

    if (result.exitCode !== 0) {
      const diagnosis = classifyStderr(result.stderr);
      this.logger.debug("yq failed", {
        exitCode: result.exitCode,
        kind: diagnosis.kind,
        diagnostic: diagnosis.tag,
      });
      throw new QueryExecutionError(diagnosis.kind, cleanStderr(result.stderr), {
        stderr: result.stderr,
        exitCode: result.exitCode,
      });
    }

    return {
      rawBytes: result.stdoutBuffer,
      exitCode: result.exitCode,
      stderrText: result.stderr,
    };
  }
}
