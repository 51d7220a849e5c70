import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import { HttpClient, type HttpClientOptions } from "../adapters/out/content/HttpClient.ts";
import type { ConfigError } from "../domain/models/errors.ts";
import { error } from "./logger.ts";

export const DEFAULT_ENDPOINT = "http://content.guardianapis.com";

/**
 * Everything a content API call needs. Passed explicitly to each call and
 * shared read-only between concurrent calls.
 */
export interface ApiConfig {
  readonly endpoint: string;
  readonly apiKey?: string;
  readonly http: HttpClient;
}

interface ApiConfigBaseOptions {
  readonly endpoint?: string;
  readonly apiKey?: string;
}

/** Shares an existing pool, so no pool options can be given. */
interface SharedPoolOptions extends ApiConfigBaseOptions {
  readonly http: HttpClient;
  readonly fetch?: never;
  readonly connectTimeoutMs?: never;
  readonly headersTimeoutMs?: never;
  readonly bodyTimeoutMs?: never;
  readonly keepAliveTimeoutMs?: never;
}

type OwnedPoolOptions = ApiConfigBaseOptions & HttpClientOptions & { readonly http?: never };

export type ApiConfigOptions = SharedPoolOptions | OwnedPoolOptions;

const apiConfigSchema = z.object({
  endpoint: z.string().url(),
  apiKey: z.string().min(1).optional(),
});

export function defaultApiConfig(apiKey?: string): ApiConfig {
  return {
    endpoint: DEFAULT_ENDPOINT,
    apiKey,
    http: new HttpClient(),
  };
}

export function createApiConfig(options: ApiConfigOptions = {}): Result<ApiConfig, ConfigError> {
  const parsed = apiConfigSchema.safeParse({
    endpoint: options.endpoint ?? DEFAULT_ENDPOINT,
    apiKey: options.apiKey,
  });

  if (!parsed.success) {
    return err({
      type: "invalidConfig",
      message: "Invalid content API configuration",
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  return ok({
    endpoint: parsed.data.endpoint,
    apiKey: parsed.data.apiKey,
    http: resolveHttpClient(options),
  });
}

function resolveHttpClient(options: ApiConfigOptions): HttpClient {
  if (options.http) {
    return options.http;
  }
  if (options.fetch) {
    return new HttpClient({ fetch: options.fetch });
  }
  return new HttpClient({
    connectTimeoutMs: options.connectTimeoutMs,
    headersTimeoutMs: options.headersTimeoutMs,
    bodyTimeoutMs: options.bodyTimeoutMs,
    keepAliveTimeoutMs: options.keepAliveTimeoutMs,
  });
}

export function closeApiConfig(config: ApiConfig): Promise<void> {
  return config.http.close();
}

/**
 * Runs `fn` and closes the configuration afterwards, whether `fn` resolves or throws.
 * When `fn` throws, a failed close is logged and the error from `fn` is rethrown.
 */
export async function withContentApi<T>(
  config: ApiConfig,
  fn: (config: ApiConfig) => PromiseLike<T>,
): Promise<T> {
  let result: T;
  try {
    result = await fn(config);
  } catch (e) {
    await closeApiConfig(config).catch((closeError: unknown) => {
      error("Failed to close content API configuration", { err: closeError });
    });
    throw e;
  }

  await closeApiConfig(config);
  return result;
}
