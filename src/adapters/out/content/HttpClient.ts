import { errAsync, ResultAsync } from "neverthrow";
import { Agent, fetch } from "undici";
import { networkError, type TransportError } from "../../../domain/models/errors.ts";

/**
 * The parts of a fetch Response the content adapter reads
 */
export interface HttpResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  readonly headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export interface HttpRequestInit {
  method: "GET";
  headers: Record<string, string>;
}

export type FetchFunction = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export interface PooledHttpClientOptions {
  readonly connectTimeoutMs?: number;
  readonly headersTimeoutMs?: number;
  readonly bodyTimeoutMs?: number;
  readonly keepAliveTimeoutMs?: number;
  readonly fetch?: never;
}

/**
 * Replaces the pooled undici fetch, e.g. with an in-process server in tests.
 * The pool's timeouts cannot be set alongside it.
 */
export interface CustomFetchHttpClientOptions {
  readonly fetch: FetchFunction;
  readonly connectTimeoutMs?: never;
  readonly headersTimeoutMs?: never;
  readonly bodyTimeoutMs?: never;
  readonly keepAliveTimeoutMs?: never;
}

export type HttpClientOptions = PooledHttpClientOptions | CustomFetchHttpClientOptions;

/**
 * Connection pool shared by every request made with one configuration.
 * Create it once and close it when the owner is done.
 */
export class HttpClient {
  private readonly agent?: Agent;
  private readonly fetchFn: FetchFunction;
  private closed = false;

  constructor(options: HttpClientOptions = {}) {
    const customFetch = options.fetch;
    if (customFetch) {
      this.fetchFn = customFetch;
      return;
    }

    const agent = new Agent({
      connect: { timeout: options.connectTimeoutMs },
      headersTimeout: options.headersTimeoutMs,
      bodyTimeout: options.bodyTimeoutMs,
      keepAliveTimeout: options.keepAliveTimeoutMs,
    });
    this.agent = agent;
    this.fetchFn = (url, init) => fetch(url, { ...init, dispatcher: agent });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get(url: URL, headers: Record<string, string> = {}): ResultAsync<HttpResponse, TransportError> {
    if (this.closed) {
      return errAsync(networkError("HTTP client is closed"));
    }

    return ResultAsync.fromPromise(
      this.fetchFn(url.toString(), { method: "GET", headers }),
      (e) => networkError(describeFetchFailure(e), e),
    );
  }

  /**
   * Releases pooled connections. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    if (this.agent) {
      await this.agent.close();
    }
  }
}

// undici reports "fetch failed" and keeps the socket-level reason in `cause`
function describeFetchFailure(e: unknown): string {
  if (!(e instanceof Error)) {
    return "Unknown network error";
  }

  if (e.cause instanceof Error && e.cause.message) {
    return `${e.message}: ${e.cause.message}`;
  }

  return e.message;
}
