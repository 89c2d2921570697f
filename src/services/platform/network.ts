/**
 * Network layer interface and implementation.
 *
 * HttpClient wraps the global fetch with a per-request timeout so services can
 * be tested against an in-memory client.
 */

import { SILENT_LOGGER, type Logger } from "../logging/types";

// ============================================================================
// HTTP Client Interface
// ============================================================================

/**
 * Options for HTTP requests.
 */
export interface HttpRequestOptions {
  /** Timeout in milliseconds. Default: 5000 */
  readonly timeout?: number;
  /** External abort signal to cancel the request */
  readonly signal?: AbortSignal;
  /** Extra request headers */
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * HTTP client for making fetch requests with timeout support.
 */
export interface HttpClient {
  /**
   * HTTP GET request with timeout support.
   *
   * @throws DOMException with name "AbortError" on timeout or abort
   * @throws TypeError on network error (connection refused, DNS failure)
   *
   * @example
   * const response = await httpClient.fetch(url, {
   *   timeout: 120_000,
   *   headers: { "User-Agent": "configq" },
   * });
   * if (response.ok) {
   *   const bytes = Buffer.from(await response.arrayBuffer());
   * }
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<Response>;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Configuration for DefaultNetworkLayer.
 */
export interface NetworkLayerConfig {
  /** Default timeout for HTTP requests in ms. Default: 5000 */
  readonly defaultTimeout?: number;
}

// ============================================================================
// Default Implementation
// ============================================================================

/**
 * Default implementation of HttpClient using the global fetch.
 */
export class DefaultNetworkLayer implements HttpClient {
  private readonly config: Required<NetworkLayerConfig>;

  constructor(
    private readonly logger: Logger = SILENT_LOGGER,
    config: NetworkLayerConfig = {}
  ) {
    this.config = {
      defaultTimeout: config.defaultTimeout ?? 5000,
    };
  }

  async fetch(url: string, options?: HttpRequestOptions): Promise<Response> {
    const timeout = options?.timeout ?? this.config.defaultTimeout;
    const externalSignal = options?.signal;

    this.logger.debug("Fetch", { url, method: "GET", timeout });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }, timeout);

    const onExternalAbort = (): void => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    };

    if (externalSignal) {
      if (externalSignal.aborted) {
        controller.abort();
      } else {
        externalSignal.addEventListener("abort", onExternalAbort);
      }
    }

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        redirect: "follow",
        ...(options?.headers !== undefined ? { headers: { ...options.headers } } : {}),
      });
      this.logger.debug("Fetch complete", { url, status: response.status });
      return response;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.warn("Fetch failed", { url, error: errorMessage });
      throw error;
    } finally {
      clearTimeout(timeoutId);
      if (externalSignal) {
        externalSignal.removeEventListener("abort", onExternalAbort);
      }
    }
  }
}
