import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createIdeaGate, type IdeaGateOverrides } from "../src/app.js";
import type { ICacheBackend } from "../src/cache/types.js";
import { loadConfig } from "../src/core/config.js";
import { CancelledError, NetworkError } from "../src/core/errors.js";
import { checkHealth, type HealthReport } from "../src/health.js";
import type { IDecisionStore } from "../src/pipeline/decision-store.js";
import type { IVectorStore, VectorMatch } from "../src/retrieval/types.js";
import { FakeModelClient, answerBySchema, captureLogs } from "./helpers.js";

const emptyArchive: IDecisionStore = {
  save: async () => "rec-1",
  list: async () => [],
};

function storeAnswering(search: IVectorStore["similaritySearch"]): IVectorStore {
  return { name: "fixed", similaritySearch: search };
}

const oneMatch = storeAnswering(async (): Promise<VectorMatch[]> => [
  { documentId: "focus", text: "We focus on small businesses", score: 0.4 },
]);

function summary(report: HealthReport): Array<{ name: string; status: string; message: string }> {
  return report.checks.map(({ name, status, message }) => ({ name, status, message }));
}

async function gateWith(env: Record<string, string>, overrides: IdeaGateOverrides) {
  return createIdeaGate(loadConfig(env), { modelClient: new FakeModelClient(answerBySchema), ...overrides });
}

describe("checkHealth", () => {
  let logs: ReturnType<typeof captureLogs>;
  beforeAll(() => {
    logs = captureLogs();
  });
  afterAll(() => logs.restore());

  it("reports every collaborator of a working gate", async () => {
    const gate = await gateWith({}, { store: emptyArchive, vectorStore: oneMatch });

    const report = await checkHealth(gate);

    expect(report.healthy).toBe(true);
    expect(summary(report)).toEqual([
      { name: "config", status: "warn", message: "TAVILY_API_KEY is not set; the market agent will report INCONCLUSIVE" },
      { name: "archive", status: "ok", message: "reachable, no decisions yet" },
      { name: "strategy", status: "ok", message: "fixed store answered with 1 passage(s)" },
      { name: "cache", status: "ok", message: "memory round trip succeeded" },
    ]);
  });

  it("reports each failing collaborator without stopping", async () => {
    const brokenCache: ICacheBackend = {
      name: "broken",
      get: async () => {
        throw new Error("connection refused");
      },
      set: async () => {
        throw new Error("connection refused");
      },
    };
    const gate = await gateWith(
      { TAVILY_API_KEY: "test-secret" },
      {
        store: null,
        vectorStore: storeAnswering(async () => {
          throw new NetworkError("vector db down");
        }),
        cacheBackend: brokenCache,
      }
    );

    const report = await checkHealth(gate);

    expect(report.healthy).toBe(false);
    expect(summary(report)).toEqual([
      { name: "config", status: "ok", message: "cache memory, policy matcher rules" },
      { name: "archive", status: "warn", message: "not configured; set SUPABASE_URL and SUPABASE_KEY" },
      { name: "strategy", status: "failed", message: "vector db down" },
      { name: "cache", status: "failed", message: "connection refused" },
    ]);
  });

  it("fails a cache that loses what was written", async () => {
    const lossy: ICacheBackend = { name: "lossy", get: async () => undefined, set: async () => undefined };
    const gate = await gateWith({}, { store: emptyArchive, vectorStore: oneMatch, cacheBackend: lossy });

    const report = await checkHealth(gate);

    expect(report.checks[3]).toMatchObject({
      name: "cache",
      status: "failed",
      message: "lossy cache did not return the value just written",
    });
  });

  it("times out a check that never answers", async () => {
    const hung = storeAnswering(() => new Promise<VectorMatch[]>(() => undefined));
    const gate = await gateWith({}, { store: emptyArchive, vectorStore: hung });

    const report = await checkHealth(gate, { timeoutMs: 10 });

    expect(report.checks[2]).toMatchObject({
      name: "strategy",
      status: "failed",
      message: "strategy health check timed out after 10ms",
    });
    expect(report.checks[3].status).toBe("ok");
  });

  it("raises cancellation instead of reporting it", async () => {
    const gate = await gateWith({}, { store: emptyArchive, vectorStore: oneMatch });

    await expect(checkHealth(gate, { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(CancelledError);
  });
});
