/**
 * Behavioral mock for HttpClient with request recording.
 *
 * Responses are configured per exact URL, either as a single response that is
 * returned every time or as a sequence consumed one request at a time (the
 * last entry repeats), which lets tests script retry scenarios.
 *
 * @example
 * const http = createMockHttpClient();
 * http.setResponse(url, [{ status: 503 }, { body: binaryBytes }]);
 *
 * await fetcher.fetch(descriptor, "v4.52.2");
 * expect(http.$.requestsTo(url)).toHaveLength(2);
 */

import type { HttpClient, HttpRequestOptions } from "./network";

// =============================================================================
// Type Definitions
// =============================================================================

/** Record of an HTTP request made through the mock. */
export interface HttpRequestRecord {
  readonly url: string;
  readonly options: HttpRequestOptions | undefined;
}

/** Configured response for a URL. */
export interface ConfiguredResponse {
  readonly body?: string | Buffer;
  /** Default: 200 */
  readonly status?: number;
  readonly headers?: Record<string, string>;
  /** Throw this instead of returning a response */
  readonly error?: Error;
  /** Hold the response until this promise settles */
  readonly gate?: Promise<void>;
}

export interface HttpClientMockState {
  readonly requests: readonly HttpRequestRecord[];
  /** Requests made to one URL */
  requestsTo(url: string): readonly HttpRequestRecord[];
}

/** Mock type with state access and setup methods. */
export interface MockHttpClient extends HttpClient {
  readonly $: HttpClientMockState;
  setResponse(url: string, config: ConfiguredResponse | readonly ConfiguredResponse[]): void;
  simulateNetworkDown(): void;
  simulateNetworkUp(): void;
}

/** Factory options. */
export interface MockHttpClientOptions {
  /** Pre-configured responses by exact URL. */
  readonly responses?: Record<string, ConfiguredResponse | readonly ConfiguredResponse[]>;
  /** Default for unconfigured URLs. Default: { status: 404 } */
  readonly defaultResponse?: ConfiguredResponse;
}

// =============================================================================
// Factory Implementation
// =============================================================================

function isSequence(
  config: ConfiguredResponse | readonly ConfiguredResponse[]
): config is readonly ConfiguredResponse[] {
  return Array.isArray(config);
}

function toQueue(config: ConfiguredResponse | readonly ConfiguredResponse[]): ConfiguredResponse[] {
  return isSequence(config) ? [...config] : [config];
}

/**
 * Create a behavioral HttpClient mock.
 */
export function createMockHttpClient(options?: MockHttpClientOptions): MockHttpClient {
  const requests: HttpRequestRecord[] = [];
  const queues = new Map<string, ConfiguredResponse[]>();
  for (const [url, config] of Object.entries(options?.responses ?? {})) {
    queues.set(url, toQueue(config));
  }
  let networkError: Error | null = null;

  const defaultResponse: ConfiguredResponse = options?.defaultResponse ?? { status: 404 };

  function nextResponse(url: string): ConfiguredResponse {
    const queue = queues.get(url);
    if (!queue || queue.length === 0) {
      return defaultResponse;
    }
    // Last configured response repeats
    const next = queue.length > 1 ? queue.shift() : queue[0];
    return next ?? defaultResponse;
  }

  const state: HttpClientMockState = {
    get requests(): readonly HttpRequestRecord[] {
      return requests;
    },
    requestsTo(url: string): readonly HttpRequestRecord[] {
      return requests.filter((r) => r.url === url);
    },
  };

  return {
    $: state,

    async fetch(url: string, fetchOptions?: HttpRequestOptions): Promise<Response> {
      requests.push({ url, options: fetchOptions });

      if (networkError) {
        throw networkError;
      }
      if (fetchOptions?.signal?.aborted) {
        throw new DOMException("The operation was aborted.", "AbortError");
      }

      const config = nextResponse(url);
      if (config.gate) {
        await config.gate;
      }
      if (config.error) {
        throw config.error;
      }

      const status = config.status ?? 200;
      const init: ResponseInit =
        config.headers !== undefined ? { status, headers: config.headers } : { status };
      if (config.body === undefined || typeof config.body === "string") {
        return new Response(config.body ?? null, init);
      }
      return new Response(new Uint8Array(config.body), init);
    },

    setResponse(url, config): void {
      queues.set(url, toQueue(config));
    },

    simulateNetworkDown(): void {
      networkError = new TypeError("fetch failed");
    },

    simulateNetworkUp(): void {
      networkError = null;
    },
  };
}
