/**
 * Decision Repository
 * Insert and read operations for the decisions table
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { DatabaseError, toDatabaseError } from "../errors.js";
import { DecisionRowSchema, type DecisionInsert, type DecisionRow } from "../types.js";

export interface DecisionListOptions {
  limit?: number;
  verdict?: string;
}

export function createDecisionRepository(client: SupabaseClient) {
  async function create(data: DecisionInsert): Promise<DecisionRow> {
    const { data: row, error } = await client.from("decisions").insert(data).select().single();

    if (error) {
      throw toDatabaseError("decisions.create", error);
    }
    return DecisionRowSchema.parse(row);
  }

  async function get(id: string): Promise<DecisionRow | null> {
    const { data, error } = await client.from("decisions").select().eq("id", id).maybeSingle();

    if (error) {
      throw toDatabaseError("decisions.get", error);
    }
    return data ? DecisionRowSchema.parse(data) : null;
  }

  async function list(options: DecisionListOptions = {}): Promise<DecisionRow[]> {
    let query = client
      .from("decisions")
      .select()
      .order("created_at", { ascending: false })
      .limit(options.limit ?? 20);

    if (options.verdict) query = query.eq("verdict", options.verdict);

    const { data, error } = await query;

    if (error) {
      throw toDatabaseError("decisions.list", error);
    }
    if (!Array.isArray(data)) {
      throw new DatabaseError("decisions.list returned no rows array", "decisions.list");
    }
    return data.map((row) => DecisionRowSchema.parse(row));
  }

  return { create, get, list };
}

export type DecisionRepository = ReturnType<typeof createDecisionRepository>;
