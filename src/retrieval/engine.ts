/**
 * Retrieval Engine
 * Two-stage retrieve-then-rerank over strategy passages.
 *
 *   similaritySearch(N candidates)
 *     └─ rerank (optional) ─ reranker failure keeps similarity order
 *         └─ sort by effective score ─ drop < minRelevance ─ take topK
 *
 * "No passage cleared the cutoff" is an empty result, never an error.
 * A vector store outage that survives retries is a RetrievalError.
 */

import { z } from "zod";
import type { Cache } from "../cache/cache.js";
import { fingerprint } from "../cache/fingerprint.js";
import { withTimeout } from "../core/abort.js";
import { CancelledError, RetrievalError, ValidationError } from "../core/errors.js";
import { logger, type Logger } from "../core/logger.js";
import { DEFAULT_RETRY_POLICY, executeWithRetry, type RetryPolicy } from "../core/retry.js";
import {
  RetrievedPassageSchema,
  effectiveScore,
  sortByEffectiveScore,
  type RetrievedPassage,
} from "../schemas/passage.js";
import type { IReranker, IRetrievalEngine, IVectorStore, RetrievalQueryOptions } from "./types.js";

const PassagesSchema = z.array(RetrievedPassageSchema);

export interface RetrievalEngineOptions {
  /** Default number of passages returned */
  topK: number;
  /** Candidates fetched before reranking (raised to topK when smaller) */
  candidateCount: number;
  minRelevance: number;
  /** Default for the per-query rerank flag */
  rerank: boolean;
  reranker?: IReranker;
  timeoutMs: number;
  retry?: RetryPolicy;
  cache?: Cache;
  log?: Logger;
}

/**
 * Carries a result that fell back to similarity order past the cache,
 * so a degraded ranking is never stored under the reranked key
 */
class DegradedRetrieval extends Error {
  constructor(readonly passages: RetrievedPassage[]) {
    super("Reranking degraded");
    this.name = "DegradedRetrieval";
  }
}

interface RetrievalResult {
  passages: RetrievedPassage[];
  /** The reranker failed and similarity order was kept */
  degraded: boolean;
}

function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

export class RetrievalEngine implements IRetrievalEngine {
  private readonly log: Logger;

  constructor(
    private readonly store: IVectorStore,
    private readonly options: RetrievalEngineOptions
  ) {
    this.log = options.log ?? logger.child({ component: "retrieval", store: store.name });
  }

  async query(text: string, options: RetrievalQueryOptions = {}): Promise<RetrievedPassage[]> {
    const topK = options.topK ?? this.options.topK;
    const minRelevance = options.minRelevance ?? this.options.minRelevance;
    const rerank = (options.rerank ?? this.options.rerank) && this.options.reranker !== undefined;

    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`, { field: "topK" });
    }
    if (!(minRelevance >= 0 && minRelevance <= 1)) {
      throw new ValidationError(`minRelevance must be within [0, 1], got ${minRelevance}`, { field: "minRelevance" });
    }

    const cache = this.options.cache;
    if (!cache) {
      const result = await this.retrieve(text, topK, minRelevance, rerank, options.signal);
      return result.passages;
    }

    const key = fingerprint("retrieval", { store: this.store.name, text, topK, minRelevance, rerank });
    try {
      return await cache.getOrCompute(
        key,
        PassagesSchema,
        async (signal) => {
          const result = await this.retrieve(text, topK, minRelevance, rerank, signal);
          if (result.degraded) {
            throw new DegradedRetrieval(result.passages);
          }
          return result.passages;
        },
        { signal: options.signal }
      );
    } catch (error) {
      if (error instanceof DegradedRetrieval) {
        return error.passages;
      }
      throw error;
    }
  }

  private async retrieve(
    text: string,
    topK: number,
    minRelevance: number,
    rerank: boolean,
    signal?: AbortSignal
  ): Promise<RetrievalResult> {
    const candidateCount = Math.max(this.options.candidateCount, topK);

    // --------------------------------------------------------
    // STAGE 1: candidate retrieval
    // --------------------------------------------------------
    const result = await executeWithRetry(
      (_attempt, attemptSignal) =>
        withTimeout(
          "vector search",
          this.options.timeoutMs,
          (callSignal) => this.store.similaritySearch(text, candidateCount, { signal: callSignal }),
          attemptSignal
        ),
      this.options.retry ?? DEFAULT_RETRY_POLICY,
      { operation: "vector_search", signal, log: this.log }
    );

    if (!result.ok) {
      if (result.kind === "cancelled") {
        throw new CancelledError("Retrieval cancelled");
      }
      throw new RetrievalError(`Vector store unavailable: ${result.error.message}`, {
        cause: result.error,
        transient: result.kind === "exhausted",
      });
    }

    let passages: RetrievedPassage[] = result.value.slice(0, candidateCount).map((match) => ({
      text: match.text,
      sourceDocumentId: match.documentId,
      relevanceScore: clampScore(match.score),
    }));
    this.log.metric("retrieval_candidates", passages.length);

    // --------------------------------------------------------
    // STAGE 2: reranking
    // --------------------------------------------------------
    let degraded = false;
    if (rerank && this.options.reranker && passages.length > 0) {
      const reranked = await this.applyRerank(this.options.reranker, text, passages, signal);
      degraded = reranked === undefined;
      passages = reranked ?? passages;
    }

    const ranked = sortByEffectiveScore(passages)
      .filter((passage) => effectiveScore(passage) >= minRelevance)
      .slice(0, topK);

    this.log.metric("retrieval_results", ranked.length);
    if (ranked.length === 0) {
      this.log.info("No strategy passage cleared the relevance cutoff", { minRelevance });
    }
    return { passages: ranked, degraded };
  }

  /**
   * Rescored candidates, or undefined when the reranker failed
   */
  private async applyRerank(
    reranker: IReranker,
    query: string,
    passages: RetrievedPassage[],
    signal?: AbortSignal
  ): Promise<RetrievedPassage[] | undefined> {
    try {
      const scores = await withTimeout(
        "rerank",
        this.options.timeoutMs,
        (callSignal) => reranker.rerank(query, passages, { signal: callSignal }),
        signal
      );
      if (scores.length !== passages.length) {
        throw new RetrievalError(`Reranker returned ${scores.length} scores for ${passages.length} candidates`);
      }
      return passages.map((passage, index) => ({ ...passage, rerankScore: clampScore(scores[index]) }));
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      this.log.warn("Reranking failed, keeping similarity order", {
        reranker: reranker.name,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}
