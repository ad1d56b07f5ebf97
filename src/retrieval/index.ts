export { RetrievalEngine, type RetrievalEngineOptions } from "./engine.js";
export { KeywordReranker, ModelReranker } from "./rerank.js";
export { OpenAIEmbedder, type IEmbedder, type OpenAIEmbedderOptions } from "./embedder.js";
export { SupabaseVectorStore, type StrategyPassageSource } from "./supabase-store.js";
export type { IReranker, IRetrievalEngine, IVectorStore, RetrievalQueryOptions, VectorMatch } from "./types.js";
export {
  InMemoryVectorStore,
  StrategyDocumentSchema,
  loadStrategyDocuments,
  type StrategyDocument,
} from "./memory-store.js";
