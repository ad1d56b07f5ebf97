/**
 * Model Client - Claude Agent SDK Wrapper
 * Structured completions: prompt in, schema-validated object out.
 *
 * EXECUTION FLOW:
 * ===============
 * complete(request)
 *   ├─ Cache lookup (when a cache is wired)
 *   ├─ RETRY LOOP (retry executor, transient failures only):
 *   │   └─ runQuery() under the per-call timeout - calls SDK query()
 *   ├─ Extract the JSON object from the final text and validate it
 *   ├─ If malformed → one repair re-prompt carrying the validation errors
 *   └─ Still malformed → fatal ModelError
 */

import { query, type Options } from "@anthropic-ai/claude-agent-sdk";
import type { ZodType } from "zod";
import type { Cache } from "../cache/cache.js";
import { fingerprint } from "../cache/fingerprint.js";
import { linkedController, withTimeout } from "./abort.js";
import { CancelledError, ModelError, classifyFailure, isIdeaGateError } from "./errors.js";
import { logger, type Logger } from "./logger.js";
import { DEFAULT_RETRY_POLICY, retryOrThrow, type RetryPolicy } from "./retry.js";

/**
 * A structured completion request
 */
export interface CompletionRequest<T> {
  systemPrompt: string;
  prompt: string;
  /** Shape the model output must satisfy */
  schema: ZodType<T>;
  /** Name used in logs, cache keys and errors */
  schemaName: string;
  model: string;
  maxTurns?: number;
  signal?: AbortSignal;
}

/**
 * Language-model inference collaborator
 */
export interface IModelClient {
  complete<T>(request: CompletionRequest<T>): Promise<T>;
}

/**
 * The parts of an SDK stream message this client reads
 */
export interface ModelStreamMessage {
  type: string;
  subtype?: string;
  result?: string;
}

export type QueryFn = (params: { prompt: string; options?: Options }) => AsyncIterable<ModelStreamMessage>;

export interface ClaudeModelClientOptions {
  /** Passed to the SDK process; falls back to its own environment lookup */
  apiKey?: string;
  /** Per-call deadline */
  timeoutMs: number;
  retry?: RetryPolicy;
  cache?: Cache;
  log?: Logger;
  /** SDK entry point, replaceable in tests */
  queryFn?: QueryFn;
}

// ============================================================
// JSON EXTRACTION
// ============================================================

/**
 * Pull the JSON object out of a model reply that may wrap it in prose or
 * a fenced code block
 */
export function extractJson(text: string): unknown {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const body = fenced ? fenced[1] : text;

  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new ModelError("Model reply contains no JSON object", { transient: false });
  }

  try {
    return JSON.parse(body.slice(start, end + 1));
  } catch (error) {
    throw new ModelError("Model reply is not valid JSON", { cause: error, transient: false });
  }
}

function describeIssues(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================
// CLIENT
// ============================================================

export class ClaudeModelClient implements IModelClient {
  private readonly log: Logger;
  private readonly queryFn: QueryFn;
  private readonly retry: RetryPolicy;

  constructor(private readonly options: ClaudeModelClientOptions) {
    this.log = options.log ?? logger.child({ component: "model" });
    this.queryFn = options.queryFn ?? query;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  async complete<T>(request: CompletionRequest<T>): Promise<T> {
    const cache = this.options.cache;
    if (!cache) {
      return this.completeUncached(request);
    }

    const key = fingerprint("model", {
      model: request.model,
      schemaName: request.schemaName,
      systemPrompt: request.systemPrompt,
      prompt: request.prompt,
    });
    return cache.getOrCompute(key, request.schema, (signal) => this.completeUncached({ ...request, signal }), {
      signal: request.signal,
    });
  }

  private async completeUncached<T>(request: CompletionRequest<T>): Promise<T> {
    const text = await this.call(request, request.prompt);

    let firstProblem: unknown;
    try {
      return this.parse(request, text);
    } catch (error) {
      firstProblem = error;
    }

    // Repair re-prompt
    this.log.warn(`Malformed ${request.schemaName} output, asking for a corrected reply`, {
      error: describeIssues(firstProblem),
    });
    const repaired = await this.call(request, buildRepairPrompt(request.prompt, text, firstProblem));

    try {
      return this.parse(request, repaired);
    } catch (error) {
      throw new ModelError(`Model returned malformed ${request.schemaName} output after repair`, {
        cause: error,
        transient: false,
        context: { schemaName: request.schemaName },
      });
    }
  }

  private parse<T>(request: CompletionRequest<T>, text: string): T {
    const result = request.schema.safeParse(extractJson(text));
    if (!result.success) {
      throw new ModelError(
        result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; "),
        { transient: false }
      );
    }
    return result.data;
  }

  /**
   * One prompt, retried on transient failures, each attempt under the deadline
   */
  private call<T>(request: CompletionRequest<T>, prompt: string): Promise<string> {
    return retryOrThrow(
      (_attempt, signal) =>
        withTimeout(
          `model call (${request.schemaName})`,
          this.options.timeoutMs,
          (callSignal) => this.runQuery(request, prompt, callSignal),
          signal
        ),
      this.retry,
      { operation: `model:${request.schemaName}`, signal: request.signal, log: this.log }
    );
  }

  /**
   * Execute a single SDK query (no retries)
   */
  private async runQuery<T>(request: CompletionRequest<T>, prompt: string, signal: AbortSignal): Promise<string> {
    const startTime = Date.now();
    const { controller, release } = linkedController(signal);

    const options: Options = {
      systemPrompt: request.systemPrompt,
      model: request.model,
      maxTurns: request.maxTurns ?? 1,
      allowedTools: [],
      abortController: controller,
    };
    if (this.options.apiKey) {
      options.env = { ...definedEnv(), ANTHROPIC_API_KEY: this.options.apiKey };
    }

    let output = "";
    try {
      for await (const message of this.queryFn({ prompt, options })) {
        if (message.type !== "result") {
          continue;
        }

        if (message.subtype === "success" && typeof message.result === "string") {
          output = message.result;
        } else if (message.subtype === "error_max_turns") {
          throw new ModelError(`Max turns exceeded: ${options.maxTurns}`, { transient: false });
        } else {
          throw new ModelError(`Model run ended with ${message.subtype ?? "unknown status"}`, {
            transient: message.subtype === "error_during_execution",
          });
        }
      }
    } catch (error) {
      if (signal.aborted && !isIdeaGateError(error)) {
        throw new CancelledError("Model call aborted");
      }
      throw isIdeaGateError(error)
        ? error
        : new ModelError(error instanceof Error ? error.message : String(error), {
            cause: error,
            transient: classifyFailure(error) === "transient",
          });
    } finally {
      release();
    }

    this.log.debug("Model call completed", {
      schemaName: request.schemaName,
      model: request.model,
      durationMs: Date.now() - startTime,
    });

    if (output.trim().length === 0) {
      throw new ModelError("Model returned an empty reply", { transient: true });
    }
    return output;
  }
}

function definedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [name, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[name] = value;
    }
  }
  return env;
}

function buildRepairPrompt(originalPrompt: string, reply: string, problem: unknown): string {
  return `${originalPrompt}

Your previous reply could not be used:
---
${reply.slice(0, 4000)}
---
Problem: ${describeIssues(problem)}

Reply again with ONLY the corrected JSON object, no prose and no code fences.`;
}
