/**
 * Tavily Search Client
 * POST /search over fetch, response validated with zod
 */

import { z } from "zod";
import { CancelledError, NetworkError, SearchError } from "../../core/errors.js";
import type { IWebSearchClient, SearchOptions, SearchResult } from "./types.js";

const TAVILY_BASE_URL = "https://api.tavily.com";
const MAX_SNIPPET_LENGTH = 500;

const TavilySearchResponseSchema = z.object({
  query: z.string().optional(),
  results: z.array(
    z.object({
      title: z.string().nullish(),
      url: z.string(),
      content: z.string().nullish(),
      score: z.number().nullish(),
    })
  ),
});

export interface TavilyClientOptions {
  apiKey: string;
  baseUrl?: string;
  searchDepth?: "basic" | "advanced";
  fetchFn?: typeof fetch;
}

export class TavilySearchClient implements IWebSearchClient {
  readonly name = "tavily";
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: TavilyClientOptions) {
    this.baseUrl = options.baseUrl ?? TAVILY_BASE_URL;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async search(query: string, options: SearchOptions): Promise<SearchResult[]> {
    const body: Record<string, unknown> = {
      query,
      search_depth: this.options.searchDepth ?? "advanced",
      max_results: options.maxResults,
    };
    if (options.topic) body.topic = options.topic;

    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}/search`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: options.signal,
      });
    } catch (error) {
      if (options.signal?.aborted) {
        throw new CancelledError("Search aborted");
      }
      throw new NetworkError(`Tavily request failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }

    if (!response.ok) {
      const errText = await response.text().catch(() => "");
      throw new SearchError(`Tavily ${response.status}: ${errText.slice(0, 300)}`, { statusCode: response.status });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new SearchError("Tavily returned a non-JSON body", { cause: error });
    }

    const parsed = TavilySearchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SearchError(`Unexpected Tavily response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
    }

    return parsed.data.results.map((result) => ({
      title: result.title || query,
      url: result.url,
      snippet: (result.content ?? "").slice(0, MAX_SNIPPET_LENGTH),
      ...(typeof result.score === "number" ? { score: result.score } : {}),
    }));
  }
}
