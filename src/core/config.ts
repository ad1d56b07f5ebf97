import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogFormat, LogLevel } from "./logger.js";
import type { RetryPolicy } from "./retry.js";

/**
 * Configuration Management
 * Validates environment variables into an immutable Config value. Nothing
 * here is global: the composition root loads it once and hands each
 * component the slice it needs.
 */

const DEFAULT_MODEL = "claude-sonnet-4-20250514";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

// Blank assignments in .env files count as unset
const blankAsUnset = (value: unknown): unknown =>
  typeof value === "string" && value.trim().length === 0 ? undefined : value;

// Schema for environment validation
const envSchema = z
  .object({
    // Providers
    ANTHROPIC_API_KEY: optionalSecret,
    OPENAI_API_KEY: optionalSecret,
    TAVILY_API_KEY: optionalSecret,

    // Supabase
    SUPABASE_URL: z.preprocess(blankAsUnset, z.string().url("SUPABASE_URL must be a valid URL").optional()),
    SUPABASE_KEY: optionalSecret,

    // Models
    ANALYSIS_MODEL: z.string().min(1).default(DEFAULT_MODEL),
    DECISION_MODEL: z.string().min(1).default(DEFAULT_MODEL),
    EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),

    // Logging
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),

    // Cache
    CACHE_BACKEND: z.enum(["memory", "supabase"]).default("memory"),
    CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
    CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),
    CACHE_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),

    // Retrieval
    RAG_TOP_K: z.coerce.number().int().positive().default(5),
    RAG_CANDIDATES: z.coerce.number().int().positive().default(20),
    RAG_MIN_RELEVANCE: z.coerce.number().min(0).max(1).default(0.35),
    RAG_RERANK: booleanFlag.default("true"),
    RAG_RERANKER: z.enum(["keyword", "model"]).default("keyword"),
    STRATEGY_PASSAGES_FILE: z.preprocess(blankAsUnset, z.string().optional()),

    // Strategy policy
    POLICY_MATCHER: z.enum(["rules", "model"]).default("rules"),

    // Retry
    RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
    RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(8000),
    RETRY_JITTER: z.coerce.number().min(0).lt(1).default(0.2),

    // Per-call timeouts
    MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
    SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    RETRIEVAL_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

    // Web search
    SEARCH_MAX_RESULTS: z.coerce.number().int().positive().max(20).default(5),
  })
  .refine((env) => env.RAG_CANDIDATES >= env.RAG_TOP_K, {
    message: "RAG_CANDIDATES must be greater than or equal to RAG_TOP_K",
    path: ["RAG_CANDIDATES"],
  })
  .refine((env) => env.RETRY_MAX_DELAY_MS >= env.RETRY_BASE_DELAY_MS, {
    message: "RETRY_MAX_DELAY_MS must be greater than or equal to RETRY_BASE_DELAY_MS",
    path: ["RETRY_MAX_DELAY_MS"],
  });

// Agent profile configuration
export interface AgentProfile {
  model: string;
  maxTurns: number;
}

export interface Config {
  anthropic: {
    apiKey?: string;
  };

  openai: {
    apiKey?: string;
    embeddingModel: string;
  };

  tavily: {
    apiKey?: string;
    maxResults: number;
  };

  supabase: {
    url?: string;
    key?: string;
  };

  cache: {
    backend: "memory" | "supabase";
    ttlSeconds: number;
    maxEntries: number;
    /** Deadline for each cache backend read or write */
    timeoutMs: number;
  };

  retrieval: {
    topK: number;
    candidateCount: number;
    minRelevance: number;
    rerank: boolean;
    reranker: "keyword" | "model";
    /** Local passage file used when no Supabase store is configured */
    passagesFile?: string;
  };

  policy: {
    matcher: "rules" | "model";
  };

  retry: RetryPolicy;

  timeouts: {
    modelMs: number;
    searchMs: number;
    retrievalMs: number;
  };

  logging: {
    level: LogLevel;
    format: LogFormat;
  };

  // ============================================================
  // AGENT PROFILES
  // The four analysts share the analysis model; synthesis-side model
  // calls (model reranker, model policy matcher) use the decision model.
  // ============================================================
  profiles: {
    market: AgentProfile;
    tech: AgentProfile;
    risk: AgentProfile;
    user_feedback: AgentProfile;
    decision: AgentProfile;
  };
}

/**
 * Load and validate configuration from an environment map
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Readonly<Config> {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const errors = parseResult.error.errors
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`, {
      variables: parseResult.error.errors.map((e) => e.path.join(".")),
    });
  }

  const parsed = parseResult.data;

  const analysis: AgentProfile = { model: parsed.ANALYSIS_MODEL, maxTurns: 1 };

  const config: Config = {
    anthropic: { apiKey: parsed.ANTHROPIC_API_KEY },
    openai: { apiKey: parsed.OPENAI_API_KEY, embeddingModel: parsed.EMBEDDING_MODEL },
    tavily: { apiKey: parsed.TAVILY_API_KEY, maxResults: parsed.SEARCH_MAX_RESULTS },
    supabase: { url: parsed.SUPABASE_URL, key: parsed.SUPABASE_KEY },

    cache: {
      backend: parsed.CACHE_BACKEND,
      ttlSeconds: parsed.CACHE_TTL_SECONDS,
      maxEntries: parsed.CACHE_MAX_ENTRIES,
      timeoutMs: parsed.CACHE_TIMEOUT_MS,
    },

    retrieval: {
      topK: parsed.RAG_TOP_K,
      candidateCount: parsed.RAG_CANDIDATES,
      minRelevance: parsed.RAG_MIN_RELEVANCE,
      rerank: parsed.RAG_RERANK,
      reranker: parsed.RAG_RERANKER,
      passagesFile: parsed.STRATEGY_PASSAGES_FILE,
    },

    policy: { matcher: parsed.POLICY_MATCHER },

    retry: {
      maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      multiplier: parsed.RETRY_MULTIPLIER,
      maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
      jitter: parsed.RETRY_JITTER,
    },

    timeouts: {
      modelMs: parsed.MODEL_TIMEOUT_MS,
      searchMs: parsed.SEARCH_TIMEOUT_MS,
      retrievalMs: parsed.RETRIEVAL_TIMEOUT_MS,
    },

    logging: { level: parsed.LOG_LEVEL, format: parsed.LOG_FORMAT },

    profiles: {
      market: { ...analysis },
      tech: { ...analysis },
      risk: { ...analysis },
      user_feedback: { ...analysis },
      decision: { model: parsed.DECISION_MODEL, maxTurns: 1 },
    },
  };

  return deepFreeze(config);
}

/**
 * Require a provider secret, failing with the variable name when absent
 */
export function requireSecret(value: string | undefined, variable: string): string {
  if (!value) {
    throw new ConfigError(`${variable} is required for this command`, { variable });
  }
  return value;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
