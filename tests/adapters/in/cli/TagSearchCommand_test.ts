import { Hono } from "hono";
import { errAsync, okAsync, ResultAsync } from "neverthrow";
import { describe, expect, it } from "vitest";
import {
  createTagSearchRepository,
  getCliErrorMessage,
  runTagSearchCommand,
} from "../../../../src/adapters/in/cli/TagSearchCommand.ts";
import { HttpClient } from "../../../../src/adapters/out/content/HttpClient.ts";
import type { TagSearchRepository } from "../../../../src/application/ports/out/TagSearchRepository.ts";
import type { TagSearchError } from "../../../../src/domain/models/errors.ts";
import {
  type TagSearchQuery,
  type TagSearchResult,
  toResourceUrl,
  toTagId,
} from "../../../../src/domain/models/tags.ts";
import { createFakeFetch } from "../../../helpers/fakeContentApi.ts";
import { sampleTagSearchBody } from "../../../helpers/tagSearchFixtures.ts";

const twoTags: TagSearchResult = {
  status: "ok",
  totalResults: 2,
  startIndex: 1,
  pageSize: 10,
  currentPage: 1,
  pages: 1,
  results: [
    {
      tagId: toTagId("film/documentary"),
      tagType: "keyword",
      webTitle: "Documentary",
      webUrl: toResourceUrl("https://www.example.test/film/documentary"),
      apiUrl: toResourceUrl("https://api.example.test/film/documentary"),
    },
    {
      tagId: toTagId("tone/reviews"),
      tagType: "tone",
      webTitle: "Reviews",
      webUrl: toResourceUrl("https://www.example.test/tone/reviews"),
      apiUrl: toResourceUrl("https://api.example.test/tone/reviews"),
    },
  ],
};

// Mock implementation of TagSearchRepository
class MockTagSearchRepository implements TagSearchRepository {
  readonly queries: TagSearchQuery[] = [];
  closed = false;

  constructor(private readonly result: ResultAsync<TagSearchResult, TagSearchError>) {}

  search(query: TagSearchQuery): ResultAsync<TagSearchResult, TagSearchError> {
    this.queries.push(query);
    return this.result;
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }
}

describe("runTagSearchCommand", () => {
  it("lists the tag ids and closes the repository", async () => {
    const repository = new MockTagSearchRepository(okAsync(twoTags));

    const result = await runTagSearchCommand("film", repository);

    expect(result._unsafeUnwrap()).toEqual(["Found tags:", "film/documentary", "tone/reviews"]);
    expect(repository.queries).toEqual([{ q: "film" }]);
    expect(repository.closed).toBe(true);
  });

  it("returns search errors and still closes the repository", async () => {
    const repository = new MockTagSearchRepository(
      errAsync<TagSearchResult, TagSearchError>({
        type: "invalidApiKey",
        message: "API key is invalid or inactive",
      }),
    );

    const result = await runTagSearchCommand("film", repository);

    expect(getCliErrorMessage(result._unsafeUnwrapErr()))
      .toBe("Invalid API key: API key is invalid or inactive");
    expect(repository.closed).toBe(true);
  });

  it("rejects a blank term without searching", async () => {
    const repository = new MockTagSearchRepository(okAsync(twoTags));

    const result = await runTagSearchCommand("  ", repository);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "setup",
      message: "Invalid tag search query: Search term must not be empty",
    });
    expect(repository.queries).toEqual([]);
    expect(repository.closed).toBe(true);
  });
});

describe("createTagSearchRepository", () => {
  it("prefers command-line options over the environment", async () => {
    const app = new Hono();
    app.get("/tags", (c) => c.json(sampleTagSearchBody));
    const { fetch, requestedUrls } = createFakeFetch(app);

    const repository = createTagSearchRepository(
      { apiKey: "option-key" },
      { apiKey: "env-key", endpoint: "http://env.example.test" },
      new HttpClient({ fetch }),
    )._unsafeUnwrap();
    const result = await runTagSearchCommand("video", repository);

    expect(result._unsafeUnwrap()).toEqual([
      "Found tags:",
      "football/world-cup",
      "profile/jane-doe",
    ]);
    expect(requestedUrls).toEqual(["http://env.example.test/tags?q=video&api-key=option-key"]);
  });

  it("reports an invalid endpoint as a setup error", () => {
    const error = createTagSearchRepository({ endpoint: "nowhere" }, {})._unsafeUnwrapErr();

    expect(error).toEqual({
      type: "setup",
      message: "Invalid content API configuration: endpoint: Invalid url",
    });
  });
});
