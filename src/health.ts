/**
 * Health Check
 * One pass over the collaborators an evaluation depends on.
 *
 *   config    web search credentials present
 *   archive   latest decision readable (warn when Supabase is not configured)
 *   strategy  one similarity search against the vector store
 *   cache     write and read back a short-lived entry
 *
 * A "warn" leaves the gate usable in a degraded mode; any "failed" check
 * makes the report unhealthy.
 */

import type { IdeaGate } from "./app.js";
import { withTimeout } from "./core/abort.js";
import { CancelledError } from "./core/errors.js";
import { logger } from "./core/logger.js";

export const DEFAULT_HEALTH_TIMEOUT_MS = 5_000;

export type HealthStatus = "ok" | "warn" | "failed";

export interface HealthCheckResult {
  name: string;
  status: HealthStatus;
  message: string;
  durationMs: number;
}

export interface HealthReport {
  healthy: boolean;
  checks: HealthCheckResult[];
}

export interface HealthCheckOptions {
  /** Deadline for each check */
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface HealthCheck {
  name: string;
  run: (signal: AbortSignal) => Promise<{ status: HealthStatus; message: string }>;
}

function checksFor(gate: IdeaGate): HealthCheck[] {
  return [
    {
      name: "config",
      run: async () =>
        gate.config.tavily.apiKey
          ? { status: "ok", message: `cache ${gate.config.cache.backend}, policy matcher ${gate.config.policy.matcher}` }
          : { status: "warn", message: "TAVILY_API_KEY is not set; the market agent will report INCONCLUSIVE" },
    },
    {
      name: "archive",
      run: async () => {
        if (!gate.store) {
          return { status: "warn", message: "not configured; set SUPABASE_URL and SUPABASE_KEY" };
        }
        const latest = await gate.store.list(1);
        return { status: "ok", message: latest.length === 0 ? "reachable, no decisions yet" : "reachable" };
      },
    },
    {
      name: "strategy",
      run: async (signal) => {
        const matches = await gate.vectorStore.similaritySearch("health check", 1, { signal });
        return {
          status: "ok",
          message: `${gate.vectorStore.name} store answered with ${matches.length} passage(s)`,
        };
      },
    },
    {
      name: "cache",
      run: async (signal) => {
        await gate.cache.verify(signal);
        return { status: "ok", message: `${gate.cache.backendName} round trip succeeded` };
      },
    },
  ];
}

/**
 * Run every check in order. Only cancellation is raised; a failing check
 * is reported in its result.
 */
export async function checkHealth(gate: IdeaGate, options: HealthCheckOptions = {}): Promise<HealthReport> {
  const log = logger.child({ component: "health" });
  const timeoutMs = options.timeoutMs ?? DEFAULT_HEALTH_TIMEOUT_MS;
  const checks: HealthCheckResult[] = [];

  for (const check of checksFor(gate)) {
    const startTime = Date.now();
    try {
      const outcome = await withTimeout(`${check.name} health check`, timeoutMs, check.run, options.signal);
      checks.push({ name: check.name, ...outcome, durationMs: Date.now() - startTime });
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      log.warn("Health check failed", { check: check.name, error: message });
      checks.push({ name: check.name, status: "failed", message, durationMs: Date.now() - startTime });
    }
  }

  return { healthy: checks.every((check) => check.status !== "failed"), checks };
}
