/**
 * Web Search Types
 */

import { z } from "zod";

export const SearchResultSchema = z.object({
  title: z.string(),
  url: z.string(),
  snippet: z.string(),
  /** Provider relevance, when it reports one */
  score: z.number().optional(),
});

export const SearchResultsSchema = z.array(SearchResultSchema);

export type SearchResult = z.infer<typeof SearchResultSchema>;

export type SearchTopic = "general" | "news";

export interface SearchOptions {
  maxResults: number;
  topic?: SearchTopic;
  signal?: AbortSignal;
}

/**
 * Web search collaborator. Failures may be transient (network, 429, 5xx).
 */
export interface IWebSearchClient {
  readonly name: string;
  search(query: string, options: SearchOptions): Promise<SearchResult[]>;
}

/**
 * Render results as a numbered block for a user prompt
 */
export function formatSearchResults(results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return "No search results found.";
  }
  return results
    .map((result, index) => `[${index + 1}] ${result.title}\nURL: ${result.url}\nSummary: ${result.snippet}`)
    .join("\n---\n");
}
