/**
 * Unit tests for ElectronLogService.
 *
 * electron-log is mocked to verify configuration logic.
 */

import { join, sep } from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createMockPathProvider } from "../platform/path-provider.test-utils";

const mockScope = vi.fn();
const mockTransports = {
  file: {
    resolvePathFn: undefined as ((variables: unknown) => string) | undefined,
    level: undefined as string | false | undefined,
    format: undefined as string | undefined,
  },
  console: {
    level: undefined as string | false | undefined,
    format: undefined as string | undefined,
  },
};

vi.mock("electron-log/node", () => ({
  default: {
    scope: mockScope,
    transports: mockTransports,
  },
}));

function createScopeMock(): Record<"silly" | "debug" | "info" | "warn" | "error", ReturnType<typeof vi.fn>> {
  return {
    silly: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe("ElectronLogService", () => {
  const originalEnv = process.env;
  let scopeMock: ReturnType<typeof createScopeMock>;

  beforeEach(() => {
    vi.resetAllMocks();
    process.env = { ...originalEnv };
    delete process.env.CONFIGQ_LOGLEVEL;
    delete process.env.CONFIGQ_PRINT_LOGS;
    delete process.env.CONFIGQ_LOGGER;

    mockTransports.file.resolvePathFn = undefined;
    mockTransports.file.level = undefined;
    mockTransports.file.format = undefined;
    mockTransports.console.level = undefined;
    mockTransports.console.format = undefined;

    scopeMock = createScopeMock();
    mockScope.mockReturnValue(scopeMock);
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  async function createService(options?: {
    logsDir?: string;
    defaultLevel?: "debug" | "warn";
    env?: NodeJS.ProcessEnv;
  }) {
    const { ElectronLogService } = await import("./electron-log-service");
    const pathProvider = createMockPathProvider({
      logsDir: options?.logsDir ?? "/test/state/logs",
    });
    return new ElectronLogService(pathProvider, {
      ...(options?.defaultLevel ? { defaultLevel: options.defaultLevel } : {}),
      ...(options?.env ? { env: options.env } : {}),
    });
  }

  function resolveLogPath(): string {
    const pathFn = mockTransports.file.resolvePathFn;
    if (!pathFn) throw new Error("resolvePathFn was not configured");
    return pathFn({});
  }

  describe("log level configuration", () => {
    it("uses WARN level by default", async () => {
      await createService();
      expect(mockTransports.file.level).toBe("warn");
    });

    it("uses the configured default level", async () => {
      await createService({ defaultLevel: "debug" });
      expect(mockTransports.file.level).toBe("debug");
    });

    it("respects CONFIGQ_LOGLEVEL env var", async () => {
      process.env.CONFIGQ_LOGLEVEL = "info";
      await createService({ defaultLevel: "debug" });
      expect(mockTransports.file.level).toBe("info");
    });

    it("handles uppercase CONFIGQ_LOGLEVEL", async () => {
      process.env.CONFIGQ_LOGLEVEL = "ERROR";
      await createService();
      expect(mockTransports.file.level).toBe("error");
    });

    it("falls back to the default for an invalid CONFIGQ_LOGLEVEL", async () => {
      process.env.CONFIGQ_LOGLEVEL = "verbose";
      await createService();
      expect(mockTransports.file.level).toBe("warn");
    });

    it("reads the variables from an injected environment instead of process.env", async () => {
      process.env.CONFIGQ_LOGLEVEL = "error";
      await createService({ env: { CONFIGQ_LOGLEVEL: "debug", CONFIGQ_PRINT_LOGS: "1" } });
      expect(mockTransports.file.level).toBe("debug");
      expect(mockTransports.console.level).toBe("debug");
    });

    it("respects CONFIGQ_LOGLEVEL=silly", async () => {
      process.env.CONFIGQ_LOGLEVEL = "silly";
      await createService();
      expect(mockTransports.file.level).toBe("silly");
    });
  });

  describe("console transport configuration", () => {
    it("disables console by default", async () => {
      await createService();
      expect(mockTransports.console.level).toBe(false);
    });

    it("enables console at the file level when CONFIGQ_PRINT_LOGS is set", async () => {
      process.env.CONFIGQ_PRINT_LOGS = "1";
      await createService({ defaultLevel: "debug" });
      expect(mockTransports.console.level).toBe("debug");
    });
  });

  describe("file path configuration", () => {
    it("writes into the logs directory", async () => {
      await createService({ logsDir: "/test/state/logs" });
      const logPath = resolveLogPath();
      expect(logPath.startsWith(join("/test/state/logs") + sep)).toBe(true);
      expect(logPath).toMatch(/\.log$/);
    });

    it("uses session-based filename format", async () => {
      await createService();
      const filename = resolveLogPath().split(sep).pop();
      expect(filename).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-[a-f0-9]{8}\.log$/);
    });
  });

  describe("log format configuration", () => {
    it("configures file and console formats", async () => {
      await createService();
      const format = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";
      expect(mockTransports.file.format).toBe(format);
      expect(mockTransports.console.format).toBe(format);
    });
  });

  describe("createLogger", () => {
    it("creates a bracketed scope and caches the logger", async () => {
      const service = await createService();
      const first = service.createLogger("query");
      const second = service.createLogger("query");
      expect(first).toBe(second);
      expect(mockScope).toHaveBeenCalledTimes(1);
      expect(mockScope).toHaveBeenCalledWith("[query]");
    });

    it("appends context as key=value pairs", async () => {
      const service = await createService();
      service.createLogger("binary-download").info("Installed", {
        version: "v4.52.2",
        retried: false,
        status: null,
      });
      expect(scopeMock.info).toHaveBeenCalledWith(
        "Installed version=v4.52.2 retried=false status=null"
      );
    });

    it("passes errors through to the error transport", async () => {
      const service = await createService();
      const error = new Error("boom");
      service.createLogger("query").error("Failed", undefined, error);
      expect(scopeMock.error).toHaveBeenCalledWith("Failed", error);
    });

    it("silences loggers outside CONFIGQ_LOGGER", async () => {
      process.env.CONFIGQ_LOGGER = "query, pagination";
      const service = await createService();
      service.createLogger("network").warn("dropped");
      service.createLogger("query").warn("kept");
      expect(scopeMock.warn).toHaveBeenCalledTimes(1);
      expect(scopeMock.warn).toHaveBeenCalledWith("kept");
    });

    it("ignores a filter made only of unknown names", async () => {
      process.env.CONFIGQ_LOGGER = "git,ui";
      const service = await createService();
      service.createLogger("network").warn("kept");
      expect(scopeMock.warn).toHaveBeenCalledWith("kept");
    });
  });
});
