/**
 * Rerankers
 * Second-pass relevance scoring over retrieval candidates
 */

import { z } from "zod";
import { RetrievalError } from "../core/errors.js";
import type { IModelClient } from "../core/model-client.js";
import { significantStems } from "../core/text.js";
import type { RetrievedPassage } from "../schemas/passage.js";
import type { IReranker } from "./types.js";

const SIMILARITY_WEIGHT = 0.7;
const KEYWORD_WEIGHT = 0.3;

/**
 * Blend of vector similarity and query-term coverage:
 * 0.7 * relevanceScore + 0.3 * (query terms present / query terms)
 */
export class KeywordReranker implements IReranker {
  readonly name = "keyword";

  async rerank(query: string, candidates: readonly RetrievedPassage[]): Promise<number[]> {
    const terms = significantStems(query);
    if (terms.length === 0) {
      return candidates.map((candidate) => candidate.relevanceScore);
    }

    return candidates.map((candidate) => {
      const present = new Set(significantStems(candidate.text));
      const matched = terms.filter((term) => present.has(term)).length;
      const coverage = Math.min(matched / terms.length, 1);
      return SIMILARITY_WEIGHT * candidate.relevanceScore + KEYWORD_WEIGHT * coverage;
    });
  }
}

const RerankOutputSchema = z.object({
  scores: z.array(
    z.object({
      index: z.number().int().min(0),
      relevance: z.number().min(0).max(1),
    })
  ),
});

const RERANK_SYSTEM_PROMPT = `You judge how relevant internal strategy passages are to a query.
Score each passage from 0 (unrelated) to 1 (directly governs the query).
Respond with ONLY a JSON object: {"scores": [{"index": <passage number>, "relevance": <0..1>}]}`;

/**
 * Cross-encoder style scoring by the language model
 */
export class ModelReranker implements IReranker {
  readonly name = "model";

  constructor(
    private readonly modelClient: IModelClient,
    private readonly model: string
  ) {}

  async rerank(
    query: string,
    candidates: readonly RetrievedPassage[],
    options: { signal?: AbortSignal } = {}
  ): Promise<number[]> {
    const passages = candidates.map((candidate, index) => `[${index}] ${candidate.text}`).join("\n\n");

    const output = await this.modelClient.complete({
      systemPrompt: RERANK_SYSTEM_PROMPT,
      prompt: `Query: ${query}\n\nPassages:\n${passages}`,
      schema: RerankOutputSchema,
      schemaName: "RerankScores",
      model: this.model,
      signal: options.signal,
    });

    const byIndex = new Map(output.scores.map((entry) => [entry.index, entry.relevance]));
    return candidates.map((_, index) => {
      const score = byIndex.get(index);
      if (score === undefined) {
        throw new RetrievalError(`Reranker omitted passage ${index}`);
      }
      return score;
    });
  }
}
