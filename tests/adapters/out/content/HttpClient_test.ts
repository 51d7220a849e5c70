import { describe, expect, expectTypeOf, it } from "vitest";
import {
  type FetchFunction,
  HttpClient,
  type HttpClientOptions,
  type HttpRequestInit,
} from "../../../../src/adapters/out/content/HttpClient.ts";

describe("HttpClient", () => {
  it("issues a GET with the given headers through the configured fetch", async () => {
    const calls: Array<{ url: string; init: HttpRequestInit }> = [];
    const fetch: FetchFunction = (url, init) => {
      calls.push({ url, init });
      return Promise.resolve(new Response("{}", { status: 200 }));
    };
    const client = new HttpClient({ fetch });

    const result = await client.get(new URL("http://content.example.test/tags?q=video"), {
      "Accept": "application/json",
    });

    expect(result.isOk()).toBe(true);
    expect(calls).toEqual([
      {
        url: "http://content.example.test/tags?q=video",
        init: { method: "GET", headers: { "Accept": "application/json" } },
      },
    ]);
  });

  it("describes a rejection that is not an Error", async () => {
    const client = new HttpClient({ fetch: () => Promise.reject("socket hang up") });

    const result = await client.get(new URL("http://content.example.test/tags"));

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "network",
      message: "Unknown network error",
      cause: "socket hang up",
    });
  });

  it("uses the error message when there is no underlying cause", async () => {
    const client = new HttpClient({
      fetch: () => Promise.reject(new Error("Headers Timeout Error")),
    });

    const result = await client.get(new URL("http://content.example.test/tags"));

    expect(result._unsafeUnwrapErr().message).toBe("Headers Timeout Error");
  });

  it("can be closed more than once", async () => {
    const client = new HttpClient();

    await client.close();
    await client.close();

    expect(client.isClosed).toBe(true);
  });

  it("refuses requests after close without calling fetch", async () => {
    let calls = 0;
    const client = new HttpClient({
      fetch: () => {
        calls += 1;
        return Promise.resolve(new Response("{}"));
      },
    });
    await client.close();

    const result = await client.get(new URL("http://content.example.test/tags"));

    expect(result._unsafeUnwrapErr().message).toBe("HTTP client is closed");
    expect(calls).toBe(0);
  });

  it("takes either pool timeouts or a custom fetch, not both", () => {
    expectTypeOf<{ headersTimeoutMs: number }>().toMatchTypeOf<HttpClientOptions>();
    expectTypeOf<{ fetch: FetchFunction }>().toMatchTypeOf<HttpClientOptions>();
    expectTypeOf<{
      fetch: FetchFunction;
      headersTimeoutMs: number;
    }>().not.toMatchTypeOf<HttpClientOptions>();
  });
});
