/**
 * Cache Types
 * Backend contract shared by the in-process and networked caches
 */

// ============================================
// BACKEND INTERFACE
// ============================================

/**
 * Cache backend - a key/value store with per-entry TTL.
 * Values are opaque JSON-serializable payloads.
 */
export interface ICacheBackend {
  /** Backend name for logs and metrics */
  readonly name: string;

  /**
   * Read a live entry. Expired entries are reported as absent.
   */
  get(key: string): Promise<unknown | undefined>;

  /**
   * Write (or overwrite) an entry expiring `ttlSeconds` from now
   */
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
}

// ============================================
// ENTRIES
// ============================================

export interface CacheEntry {
  key: string;
  value: unknown;
  /** Epoch milliseconds */
  expiresAt: number;
}

/**
 * Millisecond clock, injectable for tests
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
