import type { ResultAsync } from "neverthrow";
import type { TagSearchError } from "../../../domain/models/errors.ts";
import type { TagSearchQuery, TagSearchResult } from "../../../domain/models/tags.ts";

/**
 * Output port for tag search
 * Defines what the application needs from the remote content API
 */
export interface TagSearchRepository {
  search(query: TagSearchQuery): ResultAsync<TagSearchResult, TagSearchError>;

  close(): Promise<void>;
}
