import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { Cache } from "../src/cache/cache.js";
import { MemoryCacheBackend } from "../src/cache/memory.js";
import { SupabaseCacheBackend, type CacheEntryStore } from "../src/cache/supabase.js";
import type { ICacheBackend } from "../src/cache/types.js";
import { CancelledError } from "../src/core/errors.js";
import { captureLogs } from "./helpers.js";

function manualClock(start = 1_000_000): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

class BrokenBackend implements ICacheBackend {
  readonly name = "broken";
  async get(): Promise<unknown> {
    throw new Error("connection refused");
  }
  async set(): Promise<void> {
    throw new Error("connection refused");
  }
}

class HungBackend implements ICacheBackend {
  readonly name = "hung";
  get(): Promise<unknown> {
    return new Promise(() => undefined);
  }
  set(): Promise<void> {
    return new Promise(() => undefined);
  }
}

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(new CancelledError()), { once: true });
  });
}

describe("MemoryCacheBackend", () => {
  it("returns a value set moments ago", async () => {
    const clock = manualClock();
    const backend = new MemoryCacheBackend({ clock: clock.now });

    await backend.set("k", { answer: 42 }, 60);

    expect(await backend.get("k")).toEqual({ answer: 42 });
  });

  it("reports an entry absent once its TTL has elapsed", async () => {
    const clock = manualClock();
    const backend = new MemoryCacheBackend({ clock: clock.now });
    await backend.set("k", "v", 10);

    clock.advance(9_999);
    expect(await backend.get("k")).toBe("v");

    clock.advance(1);
    expect(await backend.get("k")).toBeUndefined();
  });

  it("evicts the least recently used entry beyond capacity", async () => {
    const backend = new MemoryCacheBackend({ maxEntries: 2, clock: manualClock().now });
    await backend.set("a", 1, 60);
    await backend.set("b", 2, 60);
    await backend.get("a");
    await backend.set("c", 3, 60);

    expect(backend.size).toBe(2);
    expect(await backend.get("a")).toBe(1);
    expect(await backend.get("b")).toBeUndefined();
    expect(await backend.get("c")).toBe(3);
  });
});

describe("Cache", () => {
  let logs: ReturnType<typeof captureLogs>;
  beforeAll(() => {
    logs = captureLogs();
  });
  afterAll(() => logs.restore());

  const schema = z.object({ value: z.number() });

  it("computes once and serves later calls from the backend", async () => {
    const cache = new Cache(new MemoryCacheBackend(), { defaultTtlSeconds: 60 });
    const compute = vi.fn(async () => ({ value: 1 }));

    expect(await cache.getOrCompute("k", schema, compute)).toEqual({ value: 1 });
    expect(await cache.getOrCompute("k", schema, compute)).toEqual({ value: 1 });
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("shares one computation between concurrent callers", async () => {
    const cache = new Cache(new MemoryCacheBackend(), { defaultTtlSeconds: 60 });
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const compute = vi.fn(async () => {
      await gate;
      return { value: 2 };
    });

    const first = cache.getOrCompute("k", schema, compute);
    const second = cache.getOrCompute("k", schema, compute);
    // Both lookups must miss before the computation finishes
    await new Promise((resolve) => setTimeout(resolve, 0));
    release();

    expect(await Promise.all([first, second])).toEqual([{ value: 2 }, { value: 2 }]);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("does not cache a failed computation", async () => {
    const cache = new Cache(new MemoryCacheBackend(), { defaultTtlSeconds: 60 });
    const compute = vi
      .fn<() => Promise<{ value: number }>>()
      .mockRejectedValueOnce(new Error("upstream down"))
      .mockResolvedValueOnce({ value: 3 });

    await expect(cache.getOrCompute("k", schema, compute)).rejects.toThrow("upstream down");
    expect(await cache.getOrCompute("k", schema, compute)).toEqual({ value: 3 });
  });

  it("treats a payload of the wrong shape as a miss", async () => {
    const backend = new MemoryCacheBackend();
    await backend.set("k", { value: "not a number" }, 60);
    const cache = new Cache(backend, { defaultTtlSeconds: 60 });

    expect(await cache.get("k", schema)).toBeUndefined();
    expect(await cache.getOrCompute("k", schema, async () => ({ value: 4 }))).toEqual({ value: 4 });
  });

  it("falls back to computing when the backend is unavailable", async () => {
    const cache = new Cache(new BrokenBackend(), { defaultTtlSeconds: 60 });
    const compute = vi.fn(async () => ({ value: 5 }));

    expect(await cache.getOrCompute("k", schema, compute)).toEqual({ value: 5 });
    expect(logs.entries.some((entry) => entry.message === "Cache read failed, computing directly")).toBe(true);
    expect(logs.entries.some((entry) => entry.message === "Cache write failed, continuing uncached")).toBe(true);
  });

  it("gives up on a backend that never answers", async () => {
    const cache = new Cache(new HungBackend(), { defaultTtlSeconds: 60, backendTimeoutMs: 10 });

    expect(await cache.getOrCompute("hung", schema, async () => ({ value: 7 }))).toEqual({ value: 7 });

    const read = logs.entries.find(
      (entry) => entry.message === "Cache read failed, computing directly" && entry.context?.key === "hung"
    );
    const write = logs.entries.find(
      (entry) => entry.message === "Cache write failed, continuing uncached" && entry.context?.key === "hung"
    );
    expect(read?.context?.error).toBe("cache read timed out after 10ms");
    expect(write?.context?.error).toBe("cache write timed out after 10ms");
  });

  it("keeps serving a joined caller after the first caller cancels", async () => {
    const cache = new Cache(new MemoryCacheBackend(), { defaultTtlSeconds: 60 });
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const signals: AbortSignal[] = [];
    const compute = vi.fn(async (signal: AbortSignal) => {
      signals.push(signal);
      await gate;
      return { value: 8 };
    });
    const first = new AbortController();

    const cancelled = cache.getOrCompute("k", schema, compute, { signal: first.signal });
    const joined = cache.getOrCompute("k", schema, compute);
    await new Promise((resolve) => setTimeout(resolve, 0));
    first.abort();

    await expect(cancelled).rejects.toBeInstanceOf(CancelledError);
    release();
    expect(await joined).toEqual({ value: 8 });
    expect(compute).toHaveBeenCalledTimes(1);
    expect(signals[0]?.aborted).toBe(false);
  });

  it("aborts the computation once its last caller cancels", async () => {
    const cache = new Cache(new MemoryCacheBackend(), { defaultTtlSeconds: 60 });
    const signals: AbortSignal[] = [];
    const caller = new AbortController();

    const pending = cache.getOrCompute(
      "k",
      schema,
      (signal) => {
        signals.push(signal);
        return untilAborted(signal);
      },
      { signal: caller.signal }
    );
    await new Promise((resolve) => setTimeout(resolve, 0));
    caller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(signals[0]?.aborted).toBe(true);
    expect(await cache.getOrCompute("k", schema, async () => ({ value: 9 }))).toEqual({ value: 9 });
  });

  it("rejects at once for a caller already cancelled", async () => {
    const cache = new Cache(new MemoryCacheBackend(), { defaultTtlSeconds: 60 });
    const compute = vi.fn(async () => ({ value: 10 }));

    await expect(cache.getOrCompute("k", schema, compute, { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(compute).not.toHaveBeenCalled();
  });
});

describe("SupabaseCacheBackend", () => {
  it("writes the absolute expiry and reads through the store", async () => {
    const clock = manualClock(0);
    const rows = new Map<string, { value: unknown; expiresAt: Date }>();
    const store: CacheEntryStore = {
      find: async (key, now) => {
        const row = rows.get(key);
        return row && row.expiresAt > now ? { value: row.value } : null;
      },
      upsert: async (key, value, expiresAt) => {
        rows.set(key, { value, expiresAt });
      },
    };
    const backend = new SupabaseCacheBackend(store, clock.now);

    await backend.set("k", ["a"], 30);

    expect(rows.get("k")?.expiresAt.toISOString()).toBe(new Date(30_000).toISOString());
    expect(await backend.get("k")).toEqual(["a"]);
    clock.advance(30_000);
    expect(await backend.get("k")).toBeUndefined();
  });
});
