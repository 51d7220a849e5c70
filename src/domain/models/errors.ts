/**
 * Response header the API gateway uses to explain a rejected request
 */
export const MASHERY_ERROR_CODE_HEADER = "X-Mashery-Error-Code";

/**
 * Header value sent when the API key is unknown or deactivated
 */
export const INVALID_API_KEY_ERROR_CODE = "ERR_403_DEVELOPER_INACTIVE";

// Client-side parse failures reuse otherApiError with a status no HTTP response can carry
export const PARSE_ERROR_STATUS_CODE = -1;
export const PARSE_ERROR_MESSAGE = "Parse Error";

/**
 * Errors reported by the content API itself
 */
export type ContentApiError =
  | { type: "invalidApiKey"; message: string }
  | { type: "otherApiError"; statusCode: number; message: string };

/**
 * Failures below HTTP: refused connections, DNS, timeouts, malformed endpoints
 */
export type TransportError = { type: "network"; message: string; cause?: unknown };

export type TagSearchError = ContentApiError | TransportError;

export type DecodeError = { type: "decode"; message: string; issues: string[] };

export type ConfigError = { type: "invalidConfig"; message: string; issues: string[] };

export type QueryError = { type: "invalidQuery"; message: string; issues: string[] };

export function invalidApiKeyError(): ContentApiError {
  return { type: "invalidApiKey", message: "API key is invalid or inactive" };
}

export function otherApiError(statusCode: number, message: string): ContentApiError {
  return { type: "otherApiError", statusCode, message };
}

export function parseError(): ContentApiError {
  return otherApiError(PARSE_ERROR_STATUS_CODE, PARSE_ERROR_MESSAGE);
}

export function networkError(message: string, cause?: unknown): TransportError {
  return cause === undefined ? { type: "network", message } : { type: "network", message, cause };
}
