export {
  type ApiConfig,
  type ApiConfigOptions,
  closeApiConfig,
  createApiConfig,
  DEFAULT_ENDPOINT,
  defaultApiConfig,
  withContentApi,
} from "./config/ApiConfig.ts";
export {
  classifyErrorResponse,
  ContentApiAdapter,
  tagSearch,
} from "./adapters/out/content/ContentApiAdapter.ts";
export {
  type CustomFetchHttpClientOptions,
  type FetchFunction,
  HttpClient,
  type HttpClientOptions,
  type HttpRequestInit,
  type HttpResponse,
  type PooledHttpClientOptions,
} from "./adapters/out/content/HttpClient.ts";
export { combineSection, decodeTagSearchResult } from "./adapters/out/content/TagSearchDecoder.ts";
export {
  buildTagSearchUrl,
  encodeQueryComponent,
  TAGS_RESOURCE,
  TagSearchRequestBuilder,
} from "./adapters/out/content/TagSearchRequestBuilder.ts";
export type { TagSearchRepository } from "./application/ports/out/TagSearchRepository.ts";
export {
  type ConfigError,
  type ContentApiError,
  type DecodeError,
  INVALID_API_KEY_ERROR_CODE,
  MASHERY_ERROR_CODE_HEADER,
  PARSE_ERROR_MESSAGE,
  PARSE_ERROR_STATUS_CODE,
  type QueryError,
  type TagSearchError,
  type TransportError,
} from "./domain/models/errors.ts";
export {
  createTagSearchQuery,
  type Reference,
  type ReferenceType,
  type ResourceUrl,
  type Section,
  type Tag,
  type TagId,
  type TagSearchQuery,
  type TagSearchResult,
  toReferenceType,
  toResourceUrl,
  toTagId,
} from "./domain/models/tags.ts";
export {
  ContentApiException,
  describeTagSearchError,
  isContentApiError,
  unwrapTagSearch,
} from "./utils/errors.ts";
