import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createIdeaGate } from "../src/app.js";
import { loadConfig } from "../src/core/config.js";
import { ConfigError } from "../src/core/errors.js";
import type { IDecisionStore } from "../src/pipeline/decision-store.js";
import type { FinalDecision } from "../src/schemas/decision.js";
import { FakeModelClient, answerBySchema, captureLogs } from "./helpers.js";

function recordingStore(): IDecisionStore & { saved: FinalDecision[] } {
  const saved: FinalDecision[] = [];
  return {
    saved,
    save: async (decision) => {
      saved.push(decision);
      return `rec-${saved.length}`;
    },
    list: async (limit) => saved.slice(0, limit),
  };
}

describe("createIdeaGate", () => {
  let logs: ReturnType<typeof captureLogs>;
  beforeAll(() => {
    logs = captureLogs();
  });
  afterAll(() => logs.restore());

  it("wires a working workflow from defaults", async () => {
    const store = recordingStore();
    const model = new FakeModelClient(answerBySchema);
    const gate = await createIdeaGate(loadConfig({}), { modelClient: model, store });

    const outcome = await gate.workflow.run("A booking app for independent dog walkers");

    expect(gate.cache.backendName).toBe("memory");
    expect(outcome.status).toBe("done");
    if (outcome.status !== "done") return;
    expect(outcome.decision.verdict).toBe("GO");
    expect(outcome.decision.contributingReports.market.rationale).toBe(
      "market analysis unavailable: Web search is not configured"
    );
    expect(outcome.decision.strategyCitations).toEqual([]);
    expect(model.requests.map((request) => request.schemaName).sort()).toEqual([
      "RiskAnalysis",
      "TechAnalysis",
      "UserFeedbackAnalysis",
    ]);
    expect(store.saved).toHaveLength(1);
    expect(logs.entries.map((entry) => entry.message)).toContain(
      "Web search is not configured; the market agent will report INCONCLUSIVE"
    );
  });

  it("leaves the archive out without Supabase", async () => {
    const gate = await createIdeaGate(loadConfig({}), { modelClient: new FakeModelClient(answerBySchema) });
    expect(gate.store).toBeUndefined();
  });

  it("loads strategy passages from a local file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "ideagate-"));
    const file = join(dir, "strategy.json");
    await writeFile(file, JSON.stringify([{ documentId: "focus", text: "We focus on small businesses" }]));

    await createIdeaGate(loadConfig({ STRATEGY_PASSAGES_FILE: file }), {
      modelClient: new FakeModelClient(answerBySchema),
    });

    expect(logs.entries.map((entry) => entry.message)).toContain(`Loaded 1 strategy passages from ${file}`);
  });

  it("refuses the shared cache without Supabase", async () => {
    await expect(
      createIdeaGate(loadConfig({ CACHE_BACKEND: "supabase" }), { modelClient: new FakeModelClient(answerBySchema) })
    ).rejects.toBeInstanceOf(ConfigError);
  });
});
