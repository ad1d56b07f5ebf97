/**
 * Retrieval Types
 * Collaborator contracts consumed by the retrieval engine
 */

import type { RetrievedPassage } from "../schemas/passage.js";

// ============================================
// VECTOR STORE
// ============================================

/**
 * One nearest-neighbour hit, most similar first
 */
export interface VectorMatch {
  text: string;
  documentId: string;
  /** Similarity in [0, 1] */
  score: number;
}

export interface IVectorStore {
  readonly name: string;
  similaritySearch(text: string, k: number, options?: { signal?: AbortSignal }): Promise<VectorMatch[]>;
}

// ============================================
// RERANKER
// ============================================

/**
 * Second-pass relevance model. Returns one score in [0, 1] per candidate,
 * in candidate order.
 */
export interface IReranker {
  readonly name: string;
  rerank(query: string, candidates: readonly RetrievedPassage[], options?: { signal?: AbortSignal }): Promise<number[]>;
}

// ============================================
// ENGINE
// ============================================

export interface RetrievalQueryOptions {
  topK?: number;
  minRelevance?: number;
  rerank?: boolean;
  signal?: AbortSignal;
}

export interface IRetrievalEngine {
  query(text: string, options?: RetrievalQueryOptions): Promise<RetrievedPassage[]>;
}
