import { describe, expect, it } from "vitest";
import { loadConfig, requireSecret } from "../src/core/config.js";
import { ConfigError } from "../src/core/errors.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.anthropic.apiKey).toBeUndefined();
    expect(config.cache).toEqual({ backend: "memory", ttlSeconds: 3600, maxEntries: 1000, timeoutMs: 2000 });
    expect(config.retrieval).toEqual({
      topK: 5,
      candidateCount: 20,
      minRelevance: 0.35,
      rerank: true,
      reranker: "keyword",
      passagesFile: undefined,
    });
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500, multiplier: 2, maxDelayMs: 8000, jitter: 0.2 });
    expect(config.policy.matcher).toBe("rules");
    expect(config.profiles.market).toEqual({ model: "claude-sonnet-4-20250514", maxTurns: 1 });
  });

  it("parses overrides and treats blank secrets as unset", () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: "  ",
      TAVILY_API_KEY: "test-secret",
      SUPABASE_URL: "",
      RAG_TOP_K: "3",
      RAG_RERANK: "false",
      ANALYSIS_MODEL: "analysis-model",
      DECISION_MODEL: "decision-model",
      LOG_FORMAT: "json",
    });

    expect(config.anthropic.apiKey).toBeUndefined();
    expect(config.tavily.apiKey).toBe("test-secret");
    expect(config.supabase.url).toBeUndefined();
    expect(config.retrieval.topK).toBe(3);
    expect(config.retrieval.rerank).toBe(false);
    expect(config.profiles.tech.model).toBe("analysis-model");
    expect(config.profiles.decision.model).toBe("decision-model");
    expect(config.logging.format).toBe("json");
  });

  it("returns a deeply frozen value", () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.retrieval)).toBe(true);
    expect(Object.isFrozen(config.profiles.risk)).toBe(true);
  });

  it("lists every invalid variable", () => {
    expect(() => loadConfig({ RAG_MIN_RELEVANCE: "1.5", RETRY_JITTER: "1", SUPABASE_URL: "not-a-url" })).toThrow(
      ConfigError
    );

    try {
      loadConfig({ RAG_MIN_RELEVANCE: "1.5", RETRY_JITTER: "1" });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.context?.variables).toEqual(["RAG_MIN_RELEVANCE", "RETRY_JITTER"]);
      }
    }
  });

  it("requires at least as many candidates as results", () => {
    expect(() => loadConfig({ RAG_TOP_K: "10", RAG_CANDIDATES: "5" })).toThrow(
      "RAG_CANDIDATES: RAG_CANDIDATES must be greater than or equal to RAG_TOP_K"
    );
  });
});

describe("requireSecret", () => {
  it("returns a present value and names a missing one", () => {
    expect(requireSecret("test-secret", "TAVILY_API_KEY")).toBe("test-secret");
    expect(() => requireSecret(undefined, "TAVILY_API_KEY")).toThrow("TAVILY_API_KEY is required for this command");
  });
});
