/**
 * Strategy Passage Repository
 * Nearest-neighbour search over embedded strategy passages (pgvector)
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { DatabaseError, toDatabaseError } from "../errors.js";
import { StrategyMatchRowSchema, type StrategyMatchRow } from "../types.js";

export function createStrategyRepository(client: SupabaseClient) {
  /**
   * The `count` passages closest to the embedding, most similar first
   */
  async function match(embedding: number[], count: number, signal?: AbortSignal): Promise<StrategyMatchRow[]> {
    let request = client.rpc("match_strategy_passages", {
      query_embedding: embedding,
      match_count: count,
    });
    if (signal) request = request.abortSignal(signal);

    const { data, error } = await request;

    if (error) {
      throw toDatabaseError("match_strategy_passages", error);
    }
    if (!Array.isArray(data)) {
      throw new DatabaseError("match_strategy_passages returned no rows array", "match_strategy_passages");
    }
    return data.map((row) => StrategyMatchRowSchema.parse(row));
  }

  return { match };
}

export type StrategyRepository = ReturnType<typeof createStrategyRepository>;
