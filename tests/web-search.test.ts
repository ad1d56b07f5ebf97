import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { Cache } from "../src/cache/cache.js";
import { MemoryCacheBackend } from "../src/cache/memory.js";
import { NetworkError, RetryExhaustedError, SearchError } from "../src/core/errors.js";
import { SearchService } from "../src/tools/web-search/search-service.js";
import { TavilySearchClient } from "../src/tools/web-search/tavily.js";
import { formatSearchResults, type IWebSearchClient, type SearchResult } from "../src/tools/web-search/types.js";
import { FAST_RETRY, captureLogs } from "./helpers.js";

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("TavilySearchClient", () => {
  it("posts the query and maps results", async () => {
    const fetchFn = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(200, {
        query: "meal kits",
        results: [
          { title: "Meal kit market", url: "https://example.com/a", content: "Growing fast", score: 0.9 },
          { title: null, url: "https://example.com/b", content: null },
        ],
      })
    );
    const client = new TavilySearchClient({ apiKey: "test-secret", baseUrl: "https://search.test", fetchFn });

    const results = await client.search("meal kits", { maxResults: 2, topic: "news" });

    expect(results).toEqual([
      { title: "Meal kit market", url: "https://example.com/a", snippet: "Growing fast", score: 0.9 },
      { title: "meal kits", url: "https://example.com/b", snippet: "" },
    ]);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://search.test/search");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-secret");
    expect(JSON.parse(String(init?.body))).toEqual({
      query: "meal kits",
      search_depth: "advanced",
      max_results: 2,
      topic: "news",
    });
  });

  it("classifies rate limits as transient and bad requests as fatal", async () => {
    const limited = new TavilySearchClient({
      apiKey: "test-secret",
      fetchFn: async () => new Response("slow down", { status: 429 }),
    });
    const invalid = new TavilySearchClient({
      apiKey: "test-secret",
      fetchFn: async () => new Response("bad query", { status: 400 }),
    });

    const rateLimited = await limited.search("q", { maxResults: 1 }).catch((error: unknown) => error);
    const rejected = await invalid.search("q", { maxResults: 1 }).catch((error: unknown) => error);

    expect(rateLimited).toBeInstanceOf(SearchError);
    expect(rejected).toBeInstanceOf(SearchError);
    if (rateLimited instanceof SearchError && rejected instanceof SearchError) {
      expect(rateLimited.message).toBe("Tavily 429: slow down");
      expect(rateLimited.transient).toBe(true);
      expect(rejected.transient).toBe(false);
    }
  });

  it("wraps connection failures as NetworkError", async () => {
    const client = new TavilySearchClient({
      apiKey: "test-secret",
      fetchFn: async () => {
        throw new TypeError("fetch failed");
      },
    });

    await expect(client.search("q", { maxResults: 1 })).rejects.toBeInstanceOf(NetworkError);
  });

  it("rejects a body that is not JSON as a SearchError", async () => {
    const client = new TavilySearchClient({
      apiKey: "test-secret",
      fetchFn: async () => new Response("<html>gateway</html>", { status: 200 }),
    });

    const error = await client.search("q", { maxResults: 1 }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SearchError);
    if (error instanceof SearchError) {
      expect(error.message).toBe("Tavily returned a non-JSON body");
      expect(error.transient).toBe(false);
    }
  });
});

describe("formatSearchResults", () => {
  it("numbers each result", () => {
    expect(
      formatSearchResults([
        { title: "A", url: "https://a.test", snippet: "first" },
        { title: "B", url: "https://b.test", snippet: "second" },
      ])
    ).toBe("[1] A\nURL: https://a.test\nSummary: first\n---\n[2] B\nURL: https://b.test\nSummary: second");
  });

  it("says when there is nothing", () => {
    expect(formatSearchResults([])).toBe("No search results found.");
  });
});

describe("SearchService", () => {
  let logs: ReturnType<typeof captureLogs>;
  beforeAll(() => {
    logs = captureLogs();
  });
  afterAll(() => logs.restore());

  const hit: SearchResult = { title: "Hit", url: "https://hit.test", snippet: "snippet" };

  function stubClient(search: IWebSearchClient["search"]): IWebSearchClient {
    return { name: "stub", search };
  }

  it("retries a transient failure", async () => {
    const search = vi
      .fn<IWebSearchClient["search"]>()
      .mockRejectedValueOnce(new NetworkError("reset"))
      .mockResolvedValueOnce([hit]);
    const service = new SearchService(stubClient(search), { maxResults: 3, timeoutMs: 1_000, retry: FAST_RETRY });

    await expect(service.search("q")).resolves.toEqual([hit]);
    expect(search).toHaveBeenCalledTimes(2);
    expect(search.mock.calls[0][1].maxResults).toBe(3);
  });

  it("surfaces exhaustion to the caller", async () => {
    const search = vi.fn<IWebSearchClient["search"]>().mockRejectedValue(new NetworkError("down"));
    const service = new SearchService(stubClient(search), { maxResults: 3, timeoutMs: 1_000, retry: FAST_RETRY });

    await expect(service.search("q")).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(search).toHaveBeenCalledTimes(3);
  });

  it("caches per query and topic", async () => {
    const search = vi.fn<IWebSearchClient["search"]>().mockResolvedValue([hit]);
    const cache = new Cache(new MemoryCacheBackend(), { defaultTtlSeconds: 60 });
    const service = new SearchService(stubClient(search), {
      maxResults: 3,
      timeoutMs: 1_000,
      retry: FAST_RETRY,
      cache,
    });

    await service.search("q");
    await service.search("q");
    await service.search("q", { topic: "news" });

    expect(search).toHaveBeenCalledTimes(2);
  });
});
