/**
 * Composition Root
 * Builds every collaborator from one immutable Config value.
 *
 *   Config
 *     ├─ Cache (memory | supabase)
 *     ├─ ClaudeModelClient ── agents, model reranker, model policy matcher
 *     ├─ SearchService(Tavily) when TAVILY_API_KEY is set
 *     ├─ RetrievalEngine over Supabase pgvector, or a local passage file
 *     ├─ StrategyConstraintMatcher (rules | model)
 *     ├─ DecisionStore when Supabase is configured
 *     └─ DecisionWorkflow
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import {
  createCacheRepository,
  createDecisionRepository,
  createStrategyRepository,
  createSupabaseClient,
  isSupabaseConfigured,
} from "@ideagate/db";
import { createAgents } from "./agents/index.js";
import { Cache, MemoryCacheBackend, SupabaseCacheBackend, type ICacheBackend } from "./cache/index.js";
import type { Config } from "./core/config.js";
import { ConfigError } from "./core/errors.js";
import { logger, type Logger } from "./core/logger.js";
import { ClaudeModelClient, type IModelClient } from "./core/model-client.js";
import {
  DecisionWorkflow,
  ModelConstraintMatcher,
  RuleConstraintMatcher,
  SupabaseDecisionStore,
  type IDecisionStore,
  type IStrategyConstraintMatcher,
} from "./pipeline/index.js";
import {
  InMemoryVectorStore,
  KeywordReranker,
  ModelReranker,
  OpenAIEmbedder,
  RetrievalEngine,
  SupabaseVectorStore,
  loadStrategyDocuments,
  type IReranker,
  type IVectorStore,
} from "./retrieval/index.js";
import { SearchService, TavilySearchClient, type ISearchService } from "./tools/web-search/index.js";

export interface IdeaGate {
  readonly config: Readonly<Config>;
  readonly workflow: DecisionWorkflow;
  /** Absent when Supabase is not configured */
  readonly store?: IDecisionStore;
  readonly cache: Cache;
  /** Strategy passages behind the retrieval engine */
  readonly vectorStore: IVectorStore;
}

/**
 * Collaborators a caller may supply instead of the configured defaults
 */
export interface IdeaGateOverrides {
  modelClient?: IModelClient;
  search?: ISearchService | null;
  vectorStore?: IVectorStore;
  store?: IDecisionStore | null;
  cacheBackend?: ICacheBackend;
  log?: Logger;
}

export async function createIdeaGate(
  config: Readonly<Config>,
  overrides: IdeaGateOverrides = {}
): Promise<IdeaGate> {
  const log = overrides.log ?? logger.child({ component: "app" });

  const supabase: SupabaseClient | undefined = isSupabaseConfigured(config.supabase)
    ? createSupabaseClient(config.supabase)
    : undefined;

  // ============================================================
  // CACHE
  // ============================================================
  const cache = new Cache(overrides.cacheBackend ?? createCacheBackend(config, supabase), {
    defaultTtlSeconds: config.cache.ttlSeconds,
    backendTimeoutMs: config.cache.timeoutMs,
  });

  // ============================================================
  // EXTERNAL COLLABORATORS
  // ============================================================
  const modelClient =
    overrides.modelClient ??
    new ClaudeModelClient({
      apiKey: config.anthropic.apiKey,
      timeoutMs: config.timeouts.modelMs,
      retry: config.retry,
      cache,
    });

  const search = overrides.search === null ? undefined : (overrides.search ?? createSearchService(config, cache));
  if (!search) {
    log.warn("Web search is not configured; the market agent will report INCONCLUSIVE");
  }

  const vectorStore = overrides.vectorStore ?? (await createVectorStore(config, supabase, log));

  const reranker: IReranker =
    config.retrieval.reranker === "model"
      ? new ModelReranker(modelClient, config.profiles.decision.model)
      : new KeywordReranker();

  const retrieval = new RetrievalEngine(vectorStore, {
    topK: config.retrieval.topK,
    candidateCount: config.retrieval.candidateCount,
    minRelevance: config.retrieval.minRelevance,
    rerank: config.retrieval.rerank,
    reranker,
    timeoutMs: config.timeouts.retrievalMs,
    retry: config.retry,
    cache,
  });

  const matcher: IStrategyConstraintMatcher =
    config.policy.matcher === "model"
      ? new ModelConstraintMatcher(modelClient, config.profiles.decision.model)
      : new RuleConstraintMatcher();

  const store =
    overrides.store === null
      ? undefined
      : (overrides.store ?? (supabase ? new SupabaseDecisionStore(createDecisionRepository(supabase)) : undefined));

  // ============================================================
  // WORKFLOW
  // ============================================================
  const agents = createAgents({
    modelClient,
    search,
    profiles: {
      market: config.profiles.market,
      tech: config.profiles.tech,
      risk: config.profiles.risk,
      user_feedback: config.profiles.user_feedback,
    },
  });

  const workflow = new DecisionWorkflow({ agents, retrieval, matcher, store });

  log.debug("IdeaGate ready", {
    cache: cache.backendName,
    vectorStore: vectorStore.name,
    reranker: reranker.name,
    matcher: config.policy.matcher,
    search: search !== undefined,
    archive: store !== undefined,
  });

  return { config, workflow, store, cache, vectorStore };
}

function createCacheBackend(config: Readonly<Config>, supabase: SupabaseClient | undefined): ICacheBackend {
  if (config.cache.backend === "supabase") {
    if (!supabase) {
      throw new ConfigError("CACHE_BACKEND=supabase requires SUPABASE_URL and SUPABASE_KEY", {
        variable: "CACHE_BACKEND",
      });
    }
    return new SupabaseCacheBackend(createCacheRepository(supabase));
  }
  return new MemoryCacheBackend({ maxEntries: config.cache.maxEntries });
}

function createSearchService(config: Readonly<Config>, cache: Cache): ISearchService | undefined {
  if (!config.tavily.apiKey) {
    return undefined;
  }
  return new SearchService(new TavilySearchClient({ apiKey: config.tavily.apiKey }), {
    maxResults: config.tavily.maxResults,
    timeoutMs: config.timeouts.searchMs,
    retry: config.retry,
    cache,
  });
}

async function createVectorStore(
  config: Readonly<Config>,
  supabase: SupabaseClient | undefined,
  log: Logger
): Promise<IVectorStore> {
  if (supabase && config.openai.apiKey) {
    const embedder = new OpenAIEmbedder({ apiKey: config.openai.apiKey, model: config.openai.embeddingModel });
    return new SupabaseVectorStore(embedder, createStrategyRepository(supabase));
  }

  if (config.retrieval.passagesFile) {
    const documents = await loadStrategyDocuments(config.retrieval.passagesFile);
    log.info(`Loaded ${documents.length} strategy passages from ${config.retrieval.passagesFile}`);
    return new InMemoryVectorStore(documents);
  }

  log.warn("No strategy store configured; decisions will not be checked against strategy passages");
  return new InMemoryVectorStore([]);
}
