import type { Result } from "neverthrow";
import type {
  ConfigError,
  ContentApiError,
  QueryError,
  TagSearchError,
} from "../domain/models/errors.ts";

export function isContentApiError(error: TagSearchError): error is ContentApiError {
  return error.type === "invalidApiKey" || error.type === "otherApiError";
}

export function describeTagSearchError(error: TagSearchError): string {
  switch (error.type) {
    case "invalidApiKey":
      return `Invalid API key: ${error.message}`;
    case "otherApiError":
      return `Content API error ${error.statusCode}: ${error.message}`;
    case "network":
      return `Network error: ${error.message}`;
  }
}

export function describeSetupError(error: ConfigError | QueryError): string {
  return `${error.message}: ${error.issues.join(", ")}`;
}

/**
 * Thrown form of a tag search error, for callers that prefer exceptions
 */
export class ContentApiException extends Error {
  readonly error: TagSearchError;

  constructor(error: TagSearchError) {
    super(describeTagSearchError(error));
    this.name = "ContentApiException";
    this.error = error;
  }
}

export function unwrapTagSearch<T>(result: Result<T, TagSearchError>): T {
  if (result.isErr()) {
    throw new ContentApiException(result.error);
  }
  return result.value;
}
