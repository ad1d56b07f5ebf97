/**
 * Cache
 * Performance layer in front of retrieval queries, web search and model calls.
 *
 * - get / set / getOrCompute over a pluggable backend
 * - concurrent getOrCompute calls for one key share a single computation,
 *   so with the memory backend a key is computed at most once while live
 * - the shared computation runs under a signal the cache owns; a caller's
 *   cancellation releases only that caller, and the computation is aborted
 *   once no caller is left waiting
 * - a failing or hung backend is logged and bypassed: callers get the
 *   computed value, never a cache error
 */

import { randomUUID } from "node:crypto";
import type { ZodType } from "zod";
import { raceAbort, throwIfAborted, withTimeout } from "../core/abort.js";
import { CancelledError, PersistenceError } from "../core/errors.js";
import { logger, type Logger } from "../core/logger.js";
import type { ICacheBackend } from "./types.js";

export const DEFAULT_BACKEND_TIMEOUT_MS = 2_000;

export interface CacheOptions {
  /** TTL used when a call does not pass one */
  defaultTtlSeconds: number;
  /** Deadline for each backend read or write */
  backendTimeoutMs?: number;
  log?: Logger;
}

export interface ComputeOptions {
  ttlSeconds?: number;
  /** The caller's cancellation; never shared with other callers */
  signal?: AbortSignal;
}

interface InflightComputation {
  readonly promise: Promise<unknown>;
  readonly controller: AbortController;
  waiters: number;
}

export class Cache {
  private readonly inflight = new Map<string, InflightComputation>();
  private readonly log: Logger;

  constructor(
    private readonly backend: ICacheBackend,
    private readonly options: CacheOptions
  ) {
    this.log = options.log ?? logger.child({ component: "cache", backend: backend.name });
  }

  get backendName(): string {
    return this.backend.name;
  }

  /**
   * Read a value, validating its shape. A payload that no longer matches
   * the schema is treated as a miss.
   */
  async get<T>(key: string, schema: ZodType<T>): Promise<T | undefined> {
    const raw = await this.readBackend(key);
    if (raw === undefined) {
      return undefined;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn("Discarding cached value with unexpected shape", { key });
      return undefined;
    }
    return parsed.data;
  }

  /**
   * Write a value. Backend failures are logged, not raised.
   */
  async set(key: string, value: unknown, ttlSeconds = this.options.defaultTtlSeconds): Promise<void> {
    try {
      await withTimeout("cache write", this.backendTimeoutMs, () => this.backend.set(key, value, ttlSeconds));
    } catch (error) {
      this.log.warn("Cache write failed, continuing uncached", {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      this.log.metric("cache_backend_error", 1, { operation: "set" });
    }
  }

  /**
   * Return the cached value for `key`, or compute, store and return it.
   * Errors from `compute` propagate and are never cached.
   */
  async getOrCompute<T>(
    key: string,
    schema: ZodType<T>,
    compute: (signal: AbortSignal) => Promise<T>,
    options: ComputeOptions = {}
  ): Promise<T> {
    const { signal } = options;
    throwIfAborted(signal);

    const cached = await raceAbort(this.get(key, schema), signal);
    if (cached !== undefined) {
      this.log.metric("cache_hit", 1, { key });
      return cached;
    }

    // A computation abandoned by every other caller rejects with CancelledError;
    // a caller still live starts a fresh one, once.
    for (let attempt = 0; ; attempt++) {
      let entry = this.inflight.get(key);
      if (entry) {
        this.log.debug("Joining in-flight computation", { key });
      } else {
        this.log.metric("cache_miss", 1, { key });
        entry = this.start(key, compute, options.ttlSeconds ?? this.options.defaultTtlSeconds);
      }

      entry.waiters++;
      try {
        const value = await raceAbort(entry.promise, signal);
        return schema.parse(value);
      } catch (error) {
        if (error instanceof CancelledError && !signal?.aborted && attempt === 0) {
          continue;
        }
        throw error;
      } finally {
        entry.waiters--;
        if (entry.waiters === 0 && signal?.aborted) {
          this.abandon(key, entry);
        }
      }
    }
  }

  /**
   * Write a short-lived entry and read it back. Unlike get and set, backend
   * failures are raised.
   */
  async verify(signal?: AbortSignal): Promise<void> {
    const key = `health:${randomUUID()}`;
    const token = randomUUID();

    await withTimeout("cache write", this.backendTimeoutMs, () => this.backend.set(key, token, 5), signal);
    const value = await withTimeout("cache read", this.backendTimeoutMs, () => this.backend.get(key), signal);
    if (value !== token) {
      throw new PersistenceError(`${this.backend.name} cache did not return the value just written`);
    }
  }

  private get backendTimeoutMs(): number {
    return this.options.backendTimeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS;
  }

  private start<T>(key: string, compute: (signal: AbortSignal) => Promise<T>, ttlSeconds: number): InflightComputation {
    const controller = new AbortController();
    const promise = (async () => {
      const value = await compute(controller.signal);
      await this.set(key, value, ttlSeconds);
      return value;
    })();

    const entry: InflightComputation = { promise, controller, waiters: 0 };
    this.inflight.set(key, entry);

    const settle = (): void => {
      if (this.inflight.get(key) === entry) {
        this.inflight.delete(key);
      }
    };
    promise.then(settle, settle);
    return entry;
  }

  private abandon(key: string, entry: InflightComputation): void {
    if (this.inflight.get(key) === entry) {
      this.inflight.delete(key);
    }
    entry.controller.abort();
    this.log.debug("Abandoned in-flight computation", { key });
  }

  private async readBackend(key: string): Promise<unknown | undefined> {
    try {
      return await withTimeout("cache read", this.backendTimeoutMs, () => this.backend.get(key));
    } catch (error) {
      this.log.warn("Cache read failed, computing directly", {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      this.log.metric("cache_backend_error", 1, { operation: "get" });
      return undefined;
    }
  }
}
