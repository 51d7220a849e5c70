import { err, Result } from "neverthrow";
import type { TagSearchRepository } from "../../../application/ports/out/TagSearchRepository.ts";
import { createApiConfig } from "../../../config/ApiConfig.ts";
import type { Env } from "../../../config/env.ts";
import type { TagSearchError } from "../../../domain/models/errors.ts";
import { createTagSearchQuery } from "../../../domain/models/tags.ts";
import { describeSetupError, describeTagSearchError } from "../../../utils/errors.ts";
import { ContentApiAdapter } from "../../out/content/ContentApiAdapter.ts";
import type { HttpClient } from "../../out/content/HttpClient.ts";

export const DEFAULT_SEARCH_TERM = "video";

export interface TagSearchCommandOptions {
  apiKey?: string;
  endpoint?: string;
}

export type CliError =
  | { type: "setup"; message: string }
  | { type: "search"; error: TagSearchError };

/**
 * Builds the repository for one CLI run. Command-line options win over the environment.
 */
export function createTagSearchRepository(
  options: TagSearchCommandOptions,
  env: Env,
  http?: HttpClient,
): Result<TagSearchRepository, CliError> {
  const base = {
    endpoint: options.endpoint ?? env.endpoint,
    apiKey: options.apiKey ?? env.apiKey,
  };

  return createApiConfig(http ? { ...base, http } : base)
    .map((config) => new ContentApiAdapter(config))
    .mapErr((error): CliError => ({ type: "setup", message: describeSetupError(error) }));
}

/**
 * Runs one search and returns the lines to print. The repository is closed on every path.
 */
export async function runTagSearchCommand(
  term: string,
  repository: TagSearchRepository,
): Promise<Result<string[], CliError>> {
  try {
    const query = createTagSearchQuery(term);
    if (query.isErr()) {
      return err<string[], CliError>({ type: "setup", message: describeSetupError(query.error) });
    }

    const result = await repository.search(query.value);
    return result
      .map((response) => ["Found tags:", ...response.results.map((tag) => tag.tagId)])
      .mapErr((error): CliError => ({ type: "search", error }));
  } finally {
    await repository.close();
  }
}

export function getCliErrorMessage(error: CliError): string {
  switch (error.type) {
    case "setup":
      return error.message;
    case "search":
      return describeTagSearchError(error.error);
  }
}
