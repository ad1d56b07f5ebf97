/**
 * Database Types
 * Row schemas for the decision archive, cache and strategy passage tables.
 * Rows are parsed on the way out so callers never see untyped data.
 */

import { z } from "zod";

// ============================================================
// DECISIONS
// ============================================================

export const DecisionRowSchema = z.object({
  id: z.string(),
  run_id: z.string(),
  idea: z.string(),
  verdict: z.string(),
  confidence: z.number(),
  schema_version: z.number().int(),
  /** The full decision record */
  decision: z.unknown(),
  created_at: z.string(),
});

export type DecisionRow = z.infer<typeof DecisionRowSchema>;

export interface DecisionInsert {
  run_id: string;
  idea: string;
  verdict: string;
  confidence: number;
  schema_version: number;
  decision: unknown;
}

// ============================================================
// CACHE ENTRIES
// ============================================================

export const CacheEntryRowSchema = z.object({
  key: z.string(),
  value: z.unknown(),
  expires_at: z.string(),
});

export type CacheEntryRow = z.infer<typeof CacheEntryRowSchema>;

// ============================================================
// STRATEGY PASSAGES
// ============================================================

/**
 * One row of the match_strategy_passages RPC
 */
export const StrategyMatchRowSchema = z.object({
  id: z.union([z.string(), z.number()]),
  document_id: z.string(),
  content: z.string(),
  similarity: z.number(),
});

export type StrategyMatchRow = z.infer<typeof StrategyMatchRowSchema>;
