/**
 * In-process cache backend with TTL expiry and least-recently-used eviction
 */

import { systemClock, type CacheEntry, type Clock, type ICacheBackend } from "./types.js";

export interface MemoryCacheOptions {
  /** Capacity before the least recently used entry is evicted */
  maxEntries?: number;
  clock?: Clock;
}

export class MemoryCacheBackend implements ICacheBackend {
  readonly name = "memory";

  // Map iteration order doubles as recency order: oldest first
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly clock: Clock;

  constructor(options: MemoryCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 1000);
    this.clock = options.clock ?? systemClock;
  }

  async get(key: string): Promise<unknown | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return undefined;
    }

    // Refresh recency
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.entries.delete(key);
    this.entries.set(key, {
      key,
      value,
      expiresAt: this.clock() + ttlSeconds * 1000,
    });
    this.evict();
  }

  get size(): number {
    return this.entries.size;
  }

  private evict(): void {
    const now = this.clock();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }
}
