/**
 * Cache Entry Repository
 * Key/value rows with an expiry, upserted last-writer-wins
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { toDatabaseError } from "../errors.js";
import { CacheEntryRowSchema } from "../types.js";

export function createCacheRepository(client: SupabaseClient) {
  /**
   * Live entry for a key, or null when absent or expired
   */
  async function find(key: string, now: Date): Promise<{ value: unknown } | null> {
    const { data, error } = await client
      .from("cache_entries")
      .select("key, value, expires_at")
      .eq("key", key)
      .gt("expires_at", now.toISOString())
      .maybeSingle();

    if (error) {
      throw toDatabaseError("cache_entries.find", error);
    }
    if (!data) {
      return null;
    }
    const row = CacheEntryRowSchema.parse(data);
    return { value: row.value };
  }

  async function upsert(key: string, value: unknown, expiresAt: Date): Promise<void> {
    const { error } = await client
      .from("cache_entries")
      .upsert({ key, value, expires_at: expiresAt.toISOString() }, { onConflict: "key" });

    if (error) {
      throw toDatabaseError("cache_entries.upsert", error);
    }
  }

  return { find, upsert };
}

export type CacheRepository = ReturnType<typeof createCacheRepository>;
