import { describe, it, expect } from "vitest";
import { YqQueryBackend, buildQueryArgs, validateQueryRequest, type BinaryProvider } from "./query-backend";
import type { QueryFormat, QueryRequest } from "./types";
import { BinaryNotFoundError, QueryExecutionError } from "../errors";
import { createMockProcessRunner, type SpawnConfig } from "../platform/process.state-mock";
import { createMockLogger } from "../logging/logging.test-utils";

const YQ = "/cache/bin/linux-amd64/v4.52.2/yq";

const provider: BinaryProvider = {
  resolve: async () => ({
    path: YQ,
    version: { major: 4, minor: 52, patch: 2 },
    source: "cache",
  }),
};

function createBackend(
  spawn: SpawnConfig = {},
  options: {
    binaryProvider?: BinaryProvider;
    enabledFormats?: readonly QueryFormat[];
    platform?: NodeJS.Platform;
  } = {}
) {
  const processRunner = createMockProcessRunner({ defaultResult: spawn });
  const logger = createMockLogger();
  const backend = new YqQueryBackend({
    binaryProvider: options.binaryProvider ?? provider,
    processRunner,
    logger,
    enabledFormats: options.enabledFormats ?? ["json", "yaml", "toml"],
    platform: options.platform ?? "linux",
  });
  return { backend, processRunner, logger };
}

const fileRequest: QueryRequest = {
  inputPath: "/data/config.yaml",
  expression: ".server.port",
  inputFormat: "yaml",
  outputFormat: "json",
};

function thrownBy(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

async function executionError(promise: Promise<unknown>): Promise<QueryExecutionError> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof QueryExecutionError)) {
    throw new Error(`Expected QueryExecutionError, got ${String(error)}`);
  }
  return error;
}

describe("buildQueryArgs", () => {
  it("builds file queries", () => {
    expect(buildQueryArgs(fileRequest)).toEqual([
      "-p",
      "yaml",
      "-o",
      "json",
      "--",
      ".server.port",
      "/data/config.yaml",
    ]);
  });

  it("omits -p and adds -n for null input", () => {
    expect(
      buildQueryArgs({
        expression: '{"a": 1}',
        inputFormat: "yaml",
        outputFormat: "yaml",
        nullInput: true,
      })
    ).toEqual(["-o", "yaml", "-n", "--", '{"a": 1}']);
  });

  it("keeps shell metacharacters inside single elements", () => {
    const args = buildQueryArgs({
      ...fileRequest,
      expression: '.a | select(. == "$(rm -rf /)")',
      inputPath: "/data/my file; echo pwned.yaml",
    });

    expect(args.slice(-2)).toEqual([
      '.a | select(. == "$(rm -rf /)")',
      "/data/my file; echo pwned.yaml",
    ]);
  });

  it("ends option parsing before an expression that looks like a flag", () => {
    const args = buildQueryArgs({ ...fileRequest, expression: "-i", inputPath: "-config.yaml" });

    expect(args).toEqual(["-p", "yaml", "-o", "json", "--", "-i", "-config.yaml"]);
  });
});

describe("validateQueryRequest", () => {
  const enabled: readonly QueryFormat[] = ["json", "yaml", "toml"];

  it.each<[string, QueryRequest, string]>([
    [
      "both inputs",
      { ...fileRequest, inputData: "a: 1" },
      "Cannot specify both inputPath and inputData",
    ],
    [
      "null input with a file",
      { ...fileRequest, nullInput: true },
      "nullInput cannot be used with inputPath or inputData",
    ],
    [
      "no input at all",
      { expression: ".", inputFormat: "yaml", outputFormat: "json" },
      "One of inputPath, inputData or nullInput is required",
    ],
    ["a zero timeout", { ...fileRequest, timeoutMs: 0 }, "timeoutMs must be a positive integer, got 0"],
  ])("rejects %s", (_name, request, message) => {
    const error = thrownBy(() => validateQueryRequest(request, enabled));

    expect(error).toBeInstanceOf(QueryExecutionError);
    expect(error).toMatchObject({ kind: "INVALID_REQUEST", message });
  });

  it("rejects formats that are not enabled", () => {
    const error = thrownBy(() =>
      validateQueryRequest({ ...fileRequest, outputFormat: "xml" }, enabled)
    );

    expect(error).toMatchObject({
      kind: "UNSUPPORTED_FORMAT",
      message: "Format 'xml' is not enabled (enabled: json, yaml, toml)",
    });
  });

  it("ignores the input format of null-input queries", () => {
    expect(() =>
      validateQueryRequest(
        { expression: "1", inputFormat: "xml", outputFormat: "json", nullInput: true },
        enabled
      )
    ).not.toThrow();
  });
});

describe("YqQueryBackend.execute", () => {
  it("returns raw stdout bytes", async () => {
    const stdout = Buffer.from([0x38, 0x30, 0x38, 0x30, 0x0a, 0xe2, 0x82, 0xac]);
    const { backend, processRunner } = createBackend({ stdout, stderr: "warning\n" });

    const result = await backend.execute(fileRequest);

    expect(result.rawBytes).toEqual(stdout);
    expect(result.exitCode).toBe(0);
    expect(result.stderrText).toBe("warning\n");
    const spawned = processRunner.$.spawned(0);
    expect(spawned.$.command).toBe(YQ);
    expect(spawned.$.args).toEqual(["-p", "yaml", "-o", "json", "--", ".server.port", "/data/config.yaml"]);
    expect(spawned.$.options).toEqual({ detached: true });
    expect(spawned.$.waitCalls).toEqual([30_000]);
  });

  it("writes inline data to stdin", async () => {
    const { backend, processRunner } = createBackend({ stdout: "1\n" });

    await backend.execute({
      inputData: "a: 1\n",
      expression: ".a",
      inputFormat: "yaml",
      outputFormat: "json",
      timeoutMs: 500,
    });

    const spawned = processRunner.$.spawned(0);
    expect(spawned.$.args).toEqual(["-p", "yaml", "-o", "json", "--", ".a"]);
    expect(spawned.$.options).toEqual({ detached: true, input: "a: 1\n" });
    expect(spawned.$.waitCalls).toEqual([500]);
  });

  it("does not start a process group on Windows", async () => {
    const { backend, processRunner } = createBackend({}, { platform: "win32" });

    await backend.execute(fileRequest);

    expect(processRunner.$.spawned(0).$.options).toEqual({ detached: false });
  });

  it("wraps resolver failures as BINARY_MISSING", async () => {
    const cause = new BinaryNotFoundError("No yq v4.52.2 or newer found and offline mode is enabled", "OFFLINE");
    const { backend, processRunner } = createBackend(
      {},
      { binaryProvider: { resolve: async () => Promise.reject(cause) } }
    );

    const error = await executionError(backend.execute(fileRequest));

    expect(error.kind).toBe("BINARY_MISSING");
    expect(error.message).toBe(
      "yq binary unavailable: No yq v4.52.2 or newer found and offline mode is enabled"
    );
    expect(error.cause).toBe(cause);
    expect(processRunner.$.spawns).toHaveLength(0);
  });

  it("reports a binary that cannot be spawned as BINARY_MISSING", async () => {
    const { backend } = createBackend({
      pid: undefined,
      exitCode: null,
      stderr: "spawn /cache/bin/linux-amd64/v4.52.2/yq ENOENT",
    });

    const error = await executionError(backend.execute(fileRequest));

    expect(error.kind).toBe("BINARY_MISSING");
    expect(error.message).toBe(
      `Failed to execute yq binary at ${YQ}: spawn /cache/bin/linux-amd64/v4.52.2/yq ENOENT`
    );
  });

  it("kills the process tree and reports TIMEOUT", async () => {
    const { backend, processRunner } = createBackend({ hang: true });

    const error = await executionError(backend.execute({ ...fileRequest, timeoutMs: 50 }));

    expect(error.kind).toBe("TIMEOUT");
    expect(error.message).toBe("yq timed out after 50ms");
    expect(processRunner.$.spawned(0).$.killCalls).toEqual([
      { termTimeout: 1000, killTimeout: 1000 },
    ]);
  });

  it("classifies a malformed expression", async () => {
    const { backend } = createBackend({
      exitCode: 1,
      stderr: 'Error: 1:3: lexer: invalid input text "!!!"\n',
    });

    const error = await executionError(backend.execute({ ...fileRequest, expression: ".a!!!" }));

    expect(error.kind).toBe("MALFORMED_EXPRESSION");
    expect(error.message).toBe('1:3: lexer: invalid input text "!!!"');
    expect(error.exitCode).toBe(1);
    expect(error.stderr).toBe('Error: 1:3: lexer: invalid input text "!!!"\n');
  });

  it("leaves a missing input file in the unclassified bucket", async () => {
    const { backend } = createBackend({
      exitCode: 1,
      stderr: "Error: open /data/config.yaml: no such file or directory\n",
    });

    const error = await executionError(backend.execute(fileRequest));

    expect(error.kind).toBe("NON_ZERO_EXIT");
    expect(error.message).toBe("open /data/config.yaml: no such file or directory");
  });

  it("reports termination by a signal", async () => {
    const { backend } = createBackend({ exitCode: null, signal: "SIGSEGV" });

    const error = await executionError(backend.execute(fileRequest));

    expect(error.kind).toBe("NON_ZERO_EXIT");
    expect(error.message).toBe("yq was terminated by SIGSEGV");
  });

  it("validates before resolving the binary", async () => {
    let resolved = false;
    const { backend } = createBackend(
      {},
      {
        binaryProvider: {
          resolve: async () => {
            resolved = true;
            return provider.resolve();
          },
        },
      }
    );

    const error = await executionError(backend.execute({ ...fileRequest, inputFormat: "csv" }));

    expect(error.kind).toBe("UNSUPPORTED_FORMAT");
    expect(resolved).toBe(false);
  });
});
