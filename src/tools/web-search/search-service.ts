/**
 * Search Service
 * Cache + per-call timeout + retry over any web search client
 */

import type { Cache } from "../../cache/cache.js";
import { fingerprint } from "../../cache/fingerprint.js";
import { withTimeout } from "../../core/abort.js";
import { logger, type Logger } from "../../core/logger.js";
import { DEFAULT_RETRY_POLICY, retryOrThrow, type RetryPolicy } from "../../core/retry.js";
import { SearchResultsSchema, type IWebSearchClient, type SearchResult, type SearchTopic } from "./types.js";

export interface SearchServiceOptions {
  maxResults: number;
  timeoutMs: number;
  retry?: RetryPolicy;
  cache?: Cache;
  log?: Logger;
}

export interface SearchRequestOptions {
  topic?: SearchTopic;
  signal?: AbortSignal;
}

/**
 * What agents depend on for live web data
 */
export interface ISearchService {
  search(query: string, options?: SearchRequestOptions): Promise<SearchResult[]>;
}

export class SearchService implements ISearchService {
  private readonly log: Logger;

  constructor(
    private readonly client: IWebSearchClient,
    private readonly options: SearchServiceOptions
  ) {
    this.log = options.log ?? logger.child({ component: "search", provider: client.name });
  }

  /**
   * Search the web. Throws once retries are exhausted or on a fatal failure;
   * callers decide whether to degrade.
   */
  async search(query: string, request: SearchRequestOptions = {}): Promise<SearchResult[]> {
    const cache = this.options.cache;
    if (!cache) {
      return this.fetchResults(query, request.topic, request.signal);
    }

    const key = fingerprint("search", {
      provider: this.client.name,
      query,
      maxResults: this.options.maxResults,
      topic: request.topic ?? "general",
    });
    return cache.getOrCompute(key, SearchResultsSchema, (signal) => this.fetchResults(query, request.topic, signal), {
      signal: request.signal,
    });
  }

  private async fetchResults(query: string, topic: SearchTopic | undefined, signal?: AbortSignal): Promise<SearchResult[]> {
    this.log.info("Performing web search", { query: query.slice(0, 80), maxResults: this.options.maxResults });

    const results = await retryOrThrow(
      (_attempt, attemptSignal) =>
        withTimeout(
          "web search",
          this.options.timeoutMs,
          (callSignal) =>
            this.client.search(query, {
              maxResults: this.options.maxResults,
              topic,
              signal: callSignal,
            }),
          attemptSignal
        ),
      this.options.retry ?? DEFAULT_RETRY_POLICY,
      { operation: "web_search", signal, log: this.log }
    );

    this.log.metric("web_search_results", results.length, { provider: this.client.name });
    return results;
  }
}
