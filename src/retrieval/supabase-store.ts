/**
 * Vector store over the Supabase `match_strategy_passages` RPC
 */

import type { IEmbedder } from "./embedder.js";
import type { IVectorStore, VectorMatch } from "./types.js";

/**
 * The slice of the strategy repository this store needs
 */
export interface StrategyPassageSource {
  match(
    embedding: number[],
    count: number,
    signal?: AbortSignal
  ): Promise<Array<{ document_id: string; content: string; similarity: number }>>;
}

export class SupabaseVectorStore implements IVectorStore {
  readonly name = "supabase";

  constructor(
    private readonly embedder: IEmbedder,
    private readonly source: StrategyPassageSource
  ) {}

  async similaritySearch(text: string, k: number, options: { signal?: AbortSignal } = {}): Promise<VectorMatch[]> {
    const embedding = await this.embedder.embed(text, { signal: options.signal });
    const rows = await this.source.match(embedding, k, options.signal);

    return rows.map((row) => ({
      text: row.content,
      documentId: row.document_id,
      score: row.similarity,
    }));
  }
}
