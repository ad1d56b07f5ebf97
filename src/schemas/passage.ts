/**
 * Retrieved Passage Schema
 */

import { z } from "zod";

export const RetrievedPassageSchema = z.object({
  text: z.string(),
  sourceDocumentId: z.string(),
  /** Vector similarity in [0, 1] */
  relevanceScore: z.number().min(0).max(1),
  /** Second-pass score, present when the passage was reranked */
  rerankScore: z.number().min(0).max(1).optional(),
});

export type RetrievedPassage = z.infer<typeof RetrievedPassageSchema>;

/**
 * Score a passage is ordered and filtered by
 */
export function effectiveScore(passage: RetrievedPassage): number {
  return passage.rerankScore ?? passage.relevanceScore;
}

/**
 * Stable sort by descending effective score
 */
export function sortByEffectiveScore(passages: readonly RetrievedPassage[]): RetrievedPassage[] {
  return [...passages].sort((a, b) => effectiveScore(b) - effectiveScore(a));
}
