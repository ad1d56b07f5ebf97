export { Cache, type CacheOptions } from "./cache.js";
export { MemoryCacheBackend, type MemoryCacheOptions } from "./memory.js";
export { SupabaseCacheBackend, type CacheEntryStore } from "./supabase.js";
export { fingerprint } from "./fingerprint.js";
export { systemClock, type CacheEntry, type Clock, type ICacheBackend } from "./types.js";
