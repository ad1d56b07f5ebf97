/**
 * Networked cache backend over the Supabase `cache_entries` table.
 *
 * Writes are last-writer-wins upserts and two processes may compute the
 * same key concurrently; the Cache wrapper bypasses this backend whenever
 * it errors.
 */

import { systemClock, type Clock, type ICacheBackend } from "./types.js";

/**
 * The slice of the cache-entry repository this backend needs
 */
export interface CacheEntryStore {
  find(key: string, now: Date): Promise<{ value: unknown } | null>;
  upsert(key: string, value: unknown, expiresAt: Date): Promise<void>;
}

export class SupabaseCacheBackend implements ICacheBackend {
  readonly name = "supabase";

  constructor(
    private readonly store: CacheEntryStore,
    private readonly clock: Clock = systemClock
  ) {}

  async get(key: string): Promise<unknown | undefined> {
    const row = await this.store.find(key, new Date(this.clock()));
    return row ? row.value : undefined;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    await this.store.upsert(key, value, new Date(this.clock() + ttlSeconds * 1000));
  }
}
