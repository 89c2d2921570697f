/**
 * Composition root of the query core.
 *
 * Wires the platform layers, configuration, binary resolution and the query backend.
 * Every layer can be replaced through QueryCoreOptions; tests pass in-memory mocks.
 */

import { DefaultFileSystemLayer, type FileSystemLayer } from "./platform/filesystem";
import { DefaultNetworkLayer, type HttpClient } from "./platform/network";
import { ExecaProcessRunner, type ProcessRunner } from "./platform/process";
import { createNodePlatformInfo, type PlatformInfo } from "./platform/platform-info";
import { DefaultPathProvider, type PathProvider } from "./platform/path-provider";
import { ElectronLogService } from "./logging/electron-log-service";
import type { Logger, LoggingService } from "./logging/types";
import { ConfigService } from "./config/config-service";
import type { CoreConfig } from "./config/types";
import { BinaryCache } from "./binary-download/binary-cache";
import { BinaryFetcher } from "./binary-download/binary-fetcher";
import { ChecksumTable } from "./binary-download/checksums";
import { PINNED_CHECKSUMS } from "./binary-download/versions";
import { BinaryLocator } from "./binary-resolution/binary-locator";
import { BinaryResolver } from "./binary-resolution/binary-resolver";
import type { BinaryValidation, ResolvedBinary } from "./binary-resolution/types";
import { YqQueryBackend } from "./query/query-backend";
import { queryWithFormatFallback, type FallbackQueryResult } from "./query/format-fallback";
import type { QueryRequest, QueryResult } from "./query/types";
import { decodeCursor, encodeCursor } from "./pagination/cursor";
import { paginate } from "./pagination/paginator";
import type { PageResult } from "./pagination/types";
import { isServiceError } from "./errors";

export interface QueryCoreOptions {
  readonly platformInfo?: PlatformInfo;
  readonly pathProvider?: PathProvider;
  readonly loggingService?: LoggingService;
  readonly fileSystem?: FileSystemLayer;
  readonly httpClient?: HttpClient;
  readonly processRunner?: ProcessRunner;
  /** Environment for configuration and download tokens. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
  /** Backoff sleep between download attempts */
  readonly sleep?: (ms: number) => Promise<void>;
}

export interface QueryOptions {
  /** False when the output format was inferred from the input; enables the JSON fallback */
  readonly outputFormatExplicit?: boolean;
}

/**
 * A page with its continuation as an opaque token.
 */
export interface EncodedPage extends Omit<PageResult, "nextCursor"> {
  readonly nextCursor: string | null;
}

export interface QueryCore {
  readonly config: CoreConfig;
  /** Resolve the yq binary, downloading it if necessary */
  resolveBinary(): Promise<ResolvedBinary>;
  validateBinary(): Promise<BinaryValidation>;
  /** Run a single query; failures are QueryExecutionError */
  execute(request: QueryRequest): Promise<QueryResult>;
  /** Run a query with the TOML-to-JSON output fallback */
  query(request: QueryRequest, options?: QueryOptions): Promise<FallbackQueryResult>;
  /** Page of `data` at a cursor token from a previous page, or the first page for null */
  page(data: unknown, cursor: string | null, pageSizeBytes?: number): EncodedPage;
  dispose(): void;
}

class DefaultQueryCore implements QueryCore {
  constructor(
    readonly config: CoreConfig,
    private readonly resolver: BinaryResolver,
    private readonly backend: YqQueryBackend,
    private readonly paginationLogger: Logger,
    private readonly loggingService: LoggingService
  ) {}

  resolveBinary(): Promise<ResolvedBinary> {
    return this.resolver.resolve();
  }

  validateBinary(): Promise<BinaryValidation> {
    return this.resolver.validate();
  }

  execute(request: QueryRequest): Promise<QueryResult> {
    return this.backend.execute(request);
  }

  query(request: QueryRequest, options: QueryOptions = {}): Promise<FallbackQueryResult> {
    return queryWithFormatFallback(this.backend, request, {
      outputFormatExplicit: options.outputFormatExplicit ?? true,
    });
  }

  page(data: unknown, cursor: string | null, pageSizeBytes?: number): EncodedPage {
    let result: PageResult;
    try {
      result = paginate(data, cursor === null ? null : decodeCursor(cursor), pageSizeBytes);
    } catch (error) {
      if (isServiceError(error)) {
        this.paginationLogger.debug("Page request rejected", {
          code: error.code ?? null,
          error: error.message,
        });
      }
      throw error;
    }
    return {
      ...result,
      nextCursor: result.nextCursor === null ? null : encodeCursor(result.nextCursor),
    };
  }

  dispose(): void {
    this.loggingService.dispose();
  }
}

/**
 * Load configuration and build the query core.
 *
 * @throws ConfigError when the environment holds invalid configuration
 */
export async function createQueryCore(options: QueryCoreOptions = {}): Promise<QueryCore> {
  const platformInfo = options.platformInfo ?? createNodePlatformInfo();
  const env = options.env ?? process.env;
  const pathProvider = options.pathProvider ?? new DefaultPathProvider(platformInfo, { env });
  const loggingService = options.loggingService ?? new ElectronLogService(pathProvider, { env });
  const coreLogger = loggingService.createLogger("core");

  const fileSystem =
    options.fileSystem ?? new DefaultFileSystemLayer(loggingService.createLogger("fs"));
  const httpClient =
    options.httpClient ?? new DefaultNetworkLayer(loggingService.createLogger("network"));
  const processRunner =
    options.processRunner ?? new ExecaProcessRunner(loggingService.createLogger("process"));

  const configService = new ConfigService({
    fileSystem,
    pathProvider,
    logger: loggingService.createLogger("config"),
    env,
  });
  const config = await configService.load();

  const checksums = new ChecksumTable(PINNED_CHECKSUMS);
  const cache = new BinaryCache({
    fileSystem,
    checksums,
    logger: loggingService.createLogger("binary-download"),
    cacheDir: config.cacheDir ?? pathProvider.binaryCacheDir,
  });

  const resolutionLogger = loggingService.createLogger("binary-resolution");
  const locator = new BinaryLocator({
    processRunner,
    fileSystem,
    cache,
    logger: resolutionLogger,
    platform: platformInfo.platform,
    bundledDir: config.bundledDir ?? pathProvider.bundledBinDir,
  });
  const fetcher = new BinaryFetcher({
    httpClient,
    fileSystem,
    cache,
    checksums,
    logger: loggingService.createLogger("binary-download"),
    timeoutMs: config.downloadTimeoutMs,
    maxAttempts: config.fetchMaxAttempts,
    env,
    ...(options.sleep !== undefined ? { sleep: options.sleep } : {}),
  });
  const resolver = new BinaryResolver({
    locator,
    fetcher,
    fileSystem,
    platformInfo,
    config,
    logger: resolutionLogger,
  });

  const backend = new YqQueryBackend({
    binaryProvider: resolver,
    processRunner,
    logger: loggingService.createLogger("query"),
    enabledFormats: config.enabledFormats,
    defaultTimeoutMs: config.queryTimeoutMs,
    platform: platformInfo.platform,
  });

  coreLogger.info("Query core ready", {
    yqVersion: config.yqVersion,
    offline: config.offline,
    formats: config.enabledFormats.join(","),
  });

  return new DefaultQueryCore(
    config,
    resolver,
    backend,
    loggingService.createLogger("pagination"),
    loggingService
  );
}
