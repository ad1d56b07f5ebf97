import { describe, expect, it } from "vitest";
import type { ConstraintViolation } from "../src/pipeline/policy.js";
import {
  aggregateVerdict,
  deriveActionItems,
  synthesizeDecision,
  tallyVotes,
  type SynthesisInput,
} from "../src/pipeline/synthesis.js";
import { validateFinalDecision } from "../src/schemas/decision.js";
import { passage, report, reports } from "./helpers.js";

const TIMESTAMP = "2026-03-01T12:00:00.000Z";

function input(overrides: Partial<SynthesisInput> = {}): SynthesisInput {
  return {
    runId: "run-1",
    idea: "A shared calendar for dog walkers",
    reports: reports(report("GO"), report("GO"), report("GO"), report("NO_GO", 0.6)),
    passages: [],
    violations: [],
    timestamp: TIMESTAMP,
    ...overrides,
  };
}

describe("aggregateVerdict", () => {
  it("takes the majority of three GO against one NO_GO", () => {
    const result = aggregateVerdict(reports(report("GO"), report("GO"), report("GO"), report("NO_GO", 0.6)));
    expect(result.verdict).toBe("GO");
    expect(result.confidence).toBeCloseTo(0.75);
  });

  it("leaves INCONCLUSIVE out of the vote and penalizes confidence", () => {
    const result = aggregateVerdict(
      reports(report("GO"), report("GO"), report("NO_GO"), report("INCONCLUSIVE"))
    );

    expect(result.verdict).toBe("GO");
    // mean 0.8 over three conclusive agents, times 1 - 0.25 * 1/4
    expect(result.confidence).toBeCloseTo(0.75);
    expect(result.tally).toEqual({ GO: 2, NO_GO: 1, PIVOT: 0, inconclusive: ["user_feedback"] });
  });

  it("lets a single conclusive agent decide", () => {
    const result = aggregateVerdict(
      reports(report("INCONCLUSIVE"), report("PIVOT", 0.9), report("INCONCLUSIVE"), report("INCONCLUSIVE"))
    );
    expect(result.verdict).toBe("PIVOT");
    expect(result.confidence).toBeCloseTo(0.9 * (1 - 0.25 * 0.75));
  });

  it("is INCONCLUSIVE with zero confidence when every agent is", () => {
    const all = reports(report("INCONCLUSIVE"), report("INCONCLUSIVE"), report("INCONCLUSIVE"), report("INCONCLUSIVE"));
    expect(aggregateVerdict(all)).toEqual({
      verdict: "INCONCLUSIVE",
      confidence: 0,
      tally: { GO: 0, NO_GO: 0, PIVOT: 0, inconclusive: ["market", "tech", "risk", "user_feedback"] },
    });
  });

  it.each([
    [["GO", "GO", "NO_GO", "NO_GO"], "NO_GO"],
    [["GO", "PIVOT", "GO", "PIVOT"], "PIVOT"],
    [["NO_GO", "PIVOT", "PIVOT", "NO_GO"], "PIVOT"],
    [["GO", "NO_GO", "PIVOT", "INCONCLUSIVE"], "NO_GO"],
  ] as const)("breaks the tie %j as %s", (verdicts, expected) => {
    const [a, b, c, d] = verdicts;
    expect(aggregateVerdict(reports(report(a), report(b), report(c), report(d))).verdict).toBe(expected);
  });
});

describe("tallyVotes", () => {
  it("counts each verdict", () => {
    expect(tallyVotes(reports(report("PIVOT"), report("GO"), report("PIVOT"), report("NO_GO")))).toEqual({
      GO: 1,
      NO_GO: 1,
      PIVOT: 2,
      inconclusive: [],
    });
  });
});

describe("deriveActionItems", () => {
  it("lists conflicts, then inconclusive re-runs and dissent in agent order", () => {
    const violated = passage("policy-1", "Never build ad tech", 0.7);
    const violations: ConstraintViolation[] = [{ passage: violated, constraint: "Never build ad tech", reason: "r" }];

    const items = deriveActionItems(
      reports(report("GO"), report("INCONCLUSIVE"), report("NO_GO", 0.7, "Licensing exposure"), report("GO")),
      "GO",
      violations
    );

    expect(items).toEqual([
      "Resolve strategy conflict: Never build ad tech [policy-1]",
      "Re-run the tech analysis once its data sources are available",
      "Address risk dissent (NO_GO): Licensing exposure",
    ]);
  });
});

describe("synthesizeDecision", () => {
  it("produces a valid majority decision", () => {
    const decision = synthesizeDecision(input());

    expect(decision.verdict).toBe("GO");
    expect(decision.confidence).toBeCloseTo(0.75);
    expect(decision.schemaVersion).toBe(1);
    expect(decision.strategyConflicts).toEqual([]);
    expect(decision.actionItems).toEqual(["Address user_feedback dissent (NO_GO): NO_GO rationale"]);
    expect(decision.rationale.split("\n")[0]).toBe(
      "Majority verdict GO from 4 of 4 conclusive analyses (GO 3, NO_GO 1, PIVOT 0)."
    );
    expect(Object.keys(decision.contributingReports)).toEqual(["market", "tech", "risk", "user_feedback"]);
    expect(() => validateFinalDecision(decision)).not.toThrow();
  });

  it("vetoes unanimous GO at full confidence when a constraint is violated", () => {
    const unanimous = reports(report("GO", 1), report("GO", 1), report("GO", 1), report("GO", 1));
    const strong = passage("policy-a", "We will not build gambling products", 0.6, 0.7);
    const weak = passage("policy-b", "Never target minors", 0.5);

    const decision = synthesizeDecision(
      input({
        reports: unanimous,
        passages: [weak, strong],
        violations: [
          { passage: strong, constraint: "We will not build gambling products", reason: "matched terms: gambl" },
          { passage: weak, constraint: "Never target minors", reason: "matched terms: minor" },
        ],
      })
    );

    expect(decision.verdict).toBe("NO_GO");
    expect(decision.confidence).toBe(0.7);
    expect(decision.strategyConflicts).toEqual([
      "We will not build gambling products [policy-a]",
      "Never target minors [policy-b]",
    ]);
    expect(decision.rationale.startsWith("Vetoed by internal strategy: ")).toBe(true);
    expect(decision.rationale).toContain("Agents alone would have reached GO.");
    expect(decision.actionItems.slice(0, 2)).toEqual([
      "Resolve strategy conflict: We will not build gambling products [policy-a]",
      "Resolve strategy conflict: Never target minors [policy-b]",
    ]);
    expect(decision.actionItems).toHaveLength(6);
    expect(decision.strategyCitations.map((p) => p.sourceDocumentId)).toEqual(["policy-a", "policy-b"]);
  });

  it("reports INCONCLUSIVE with zero confidence when every agent degraded", () => {
    const decision = synthesizeDecision(
      input({
        reports: reports(report("INCONCLUSIVE"), report("INCONCLUSIVE"), report("INCONCLUSIVE"), report("INCONCLUSIVE")),
      })
    );

    expect(decision.verdict).toBe("INCONCLUSIVE");
    expect(decision.confidence).toBe(0);
    expect(decision.rationale.split("\n")[0]).toBe("Every analysis was inconclusive, so no verdict can be drawn.");
  });

  it("cites passages by descending effective score", () => {
    const decision = synthesizeDecision(
      input({
        passages: [passage("low", "low", 0.4), passage("reranked", "reranked", 0.3, 0.9), passage("mid", "mid", 0.6)],
      })
    );

    expect(decision.strategyCitations.map((p) => p.sourceDocumentId)).toEqual(["reranked", "mid", "low"]);
  });

  it("is deterministic for identical input", () => {
    const first = synthesizeDecision(input({ passages: [passage("a", "a", 0.5)] }));
    const second = synthesizeDecision(input({ passages: [passage("a", "a", 0.5)] }));
    expect(second).toEqual(first);
  });
});
