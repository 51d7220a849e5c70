import type { ApiConfig } from "../../../config/ApiConfig.ts";
import type { TagSearchQuery } from "../../../domain/models/tags.ts";

export const TAGS_RESOURCE = "tags";

interface TagSearchParams {
  q: string;
  "api-key"?: string;
}

/**
 * RFC 3986 percent-encoding: only `A-Z a-z 0-9 - _ . ~` stay as they are.
 * Unlike form encoding, a space becomes `%20` rather than `+`.
 */
export function encodeQueryComponent(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

export class TagSearchRequestBuilder {
  private readonly params: TagSearchParams = { q: "" };

  constructor(private readonly endpoint: string) {}

  withQuery(query: TagSearchQuery): TagSearchRequestBuilder {
    this.params.q = query.q;
    return this;
  }

  withApiKey(apiKey?: string): TagSearchRequestBuilder {
    if (apiKey !== undefined) {
      this.params["api-key"] = apiKey;
    }
    return this;
  }

  /**
   * Throws a TypeError when the endpoint is not an absolute URL.
   */
  build(): URL {
    const url = new URL(this.endpoint);
    url.pathname = `${url.pathname.replace(/\/+$/, "")}/${TAGS_RESOURCE}`;

    const pairs: string[] = [];
    Object.entries(this.params).forEach(([key, value]) => {
      if (value !== undefined) {
        pairs.push(`${key}=${encodeQueryComponent(String(value))}`);
      }
    });

    const existing = url.search.slice(1);
    url.search = (existing ? [existing, ...pairs] : pairs).join("&");
    return url;
  }
}

export function buildTagSearchUrl(query: TagSearchQuery, config: ApiConfig): URL {
  return new TagSearchRequestBuilder(config.endpoint)
    .withQuery(query)
    .withApiKey(config.apiKey)
    .build();
}
