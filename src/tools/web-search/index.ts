export { SearchService, type ISearchService, type SearchRequestOptions, type SearchServiceOptions } from "./search-service.js";
export { TavilySearchClient, type TavilyClientOptions } from "./tavily.js";
export {
  SearchResultSchema,
  SearchResultsSchema,
  formatSearchResults,
  type IWebSearchClient,
  type SearchOptions,
  type SearchResult,
  type SearchTopic,
} from "./types.js";
