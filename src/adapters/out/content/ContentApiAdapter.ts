import { err, Result, ResultAsync } from "neverthrow";
import type { TagSearchRepository } from "../../../application/ports/out/TagSearchRepository.ts";
import { type ApiConfig, closeApiConfig } from "../../../config/ApiConfig.ts";
import { debug, warn } from "../../../config/logger.ts";
import {
  type ContentApiError,
  INVALID_API_KEY_ERROR_CODE,
  invalidApiKeyError,
  MASHERY_ERROR_CODE_HEADER,
  networkError,
  otherApiError,
  parseError,
  type TagSearchError,
} from "../../../domain/models/errors.ts";
import type { TagSearchQuery, TagSearchResult } from "../../../domain/models/tags.ts";
import type { HttpResponse } from "./HttpClient.ts";
import { decodeTagSearchResult } from "./TagSearchDecoder.ts";
import { buildTagSearchUrl } from "./TagSearchRequestBuilder.ts";

const buildUrl = Result.fromThrowable(
  buildTagSearchUrl,
  (e): TagSearchError =>
    networkError(`Invalid endpoint: ${e instanceof Error ? e.message : String(e)}`, e),
);

/**
 * Maps an error response to the API error taxonomy using the gateway's error-code header.
 */
export function classifyErrorResponse(
  response: Pick<HttpResponse, "status" | "statusText" | "headers">,
): ContentApiError {
  if (response.headers.get(MASHERY_ERROR_CODE_HEADER) === INVALID_API_KEY_ERROR_CODE) {
    return invalidApiKeyError();
  }
  return otherApiError(response.status, response.statusText);
}

function readBody(response: HttpResponse): ResultAsync<string, TagSearchError> {
  return ResultAsync.fromPromise(
    response.text(),
    (e) =>
      networkError(
        `Failed to read response body: ${e instanceof Error ? e.message : String(e)}`,
        e,
      ),
  );
}

function handleErrorResponse(response: HttpResponse): ResultAsync<TagSearchResult, TagSearchError> {
  const apiError = classifyErrorResponse(response);
  warn("Content API returned an error", { status: response.status, error: apiError });

  // The body is read so the pooled connection can be reused; its content does not affect the error
  const drained = response.text().then(
    (body) => debug("Error response body", { body }),
    (e) => debug("Could not read error response body", { err: e }),
  );

  return ResultAsync.fromSafePromise(drained).andThen(() =>
    err<TagSearchResult, TagSearchError>(apiError)
  );
}

function handleSuccessResponse(
  response: HttpResponse,
): ResultAsync<TagSearchResult, TagSearchError> {
  return readBody(response).andThen((body) =>
    decodeTagSearchResult(body)
      .map((result) => {
        debug("Decoded tags", { count: result.results.length, total: result.totalResults });
        return result;
      })
      .mapErr((decodeError): TagSearchError => {
        debug(decodeError.message, { issues: decodeError.issues });
        return parseError();
      })
  );
}

/**
 * Searches tags with a single GET request. API errors, parse failures and
 * network failures all come back as values; nothing is retried.
 */
export function tagSearch(
  query: TagSearchQuery,
  config: ApiConfig,
): ResultAsync<TagSearchResult, TagSearchError> {
  return buildUrl(query, config)
    .asyncAndThen((url) => {
      debug("Searching tags", { path: url.pathname, q: query.q });
      return config.http.get(url, { "Accept": "application/json" });
    })
    .mapErr((e) => {
      debug("Tag search request failed", { error: e });
      return e;
    })
    .andThen((response) =>
      response.ok ? handleSuccessResponse(response) : handleErrorResponse(response)
    );
}

/**
 * Repository over one configuration, which it owns and closes
 */
export class ContentApiAdapter implements TagSearchRepository {
  constructor(private readonly config: ApiConfig) {}

  search(query: TagSearchQuery): ResultAsync<TagSearchResult, TagSearchError> {
    return tagSearch(query, this.config);
  }

  close(): Promise<void> {
    return closeApiConfig(this.config);
  }
}
