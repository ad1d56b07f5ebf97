import { describe, expect, it } from "vitest";
import { SchemaViolationError } from "../src/core/errors.js";
import { createProductIdea } from "../src/schemas/idea.js";
import { formatDecisionSummary, validateFinalDecision, type FinalDecision } from "../src/schemas/decision.js";
import { inconclusiveReport } from "../src/schemas/report.js";
import { passage, report, reports } from "./helpers.js";

function validDecision(): FinalDecision {
  return {
    schemaVersion: 1,
    runId: "run-1",
    idea: "A shared calendar for dog walkers",
    verdict: "GO",
    confidence: 0.75,
    rationale: "Majority verdict GO",
    contributingReports: reports(report("GO"), report("GO"), report("GO"), report("NO_GO")),
    strategyCitations: [passage("a", "first", 0.9), passage("b", "second", 0.3, 0.8)],
    strategyConflicts: [],
    actionItems: [],
    timestamp: "2026-03-01T12:00:00.000Z",
  };
}

function issuesOf(candidate: unknown): string[] {
  try {
    validateFinalDecision(candidate);
  } catch (error) {
    if (error instanceof SchemaViolationError) {
      return error.issues.map((issue) => issue.path.join("."));
    }
    throw error;
  }
  return [];
}

describe("validateFinalDecision", () => {
  it("accepts a well-formed decision", () => {
    expect(validateFinalDecision(validDecision())).toEqual(validDecision());
  });

  it("rejects a decision missing one agent's report", () => {
    const { user_feedback: _dropped, ...three } = validDecision().contributingReports;
    expect(issuesOf({ ...validDecision(), contributingReports: three })).toEqual(["contributingReports.user_feedback"]);
  });

  it("rejects reports from unknown agents", () => {
    const decision = validDecision();
    const extra = { ...decision.contributingReports, pricing: report("GO") };
    expect(issuesOf({ ...decision, contributingReports: extra })).toEqual(["contributingReports"]);
  });

  it("rejects confidence outside [0, 1]", () => {
    expect(issuesOf({ ...validDecision(), confidence: 1.2 })).toEqual(["confidence"]);
  });

  it("rejects a blank rationale", () => {
    expect(issuesOf({ ...validDecision(), rationale: "   " })).toEqual(["rationale"]);
  });

  it("rejects citations out of effective-score order", () => {
    const decision = validDecision();
    expect(issuesOf({ ...decision, strategyCitations: [passage("b", "second", 0.3), passage("a", "first", 0.9)] })).toEqual([
      "strategyCitations.1",
    ]);
  });

  it("rejects another schema version", () => {
    expect(issuesOf({ ...validDecision(), schemaVersion: 2 })).toEqual(["schemaVersion"]);
  });

  it("names the schema in the error", () => {
    expect(() => validateFinalDecision({ ...validDecision(), verdict: "MAYBE" })).toThrow(
      /^FinalDecision failed validation: verdict: /
    );
  });
});

describe("formatDecisionSummary", () => {
  it("renders one aligned line", () => {
    expect(formatDecisionSummary(validDecision())).toBe(
      "2026-03-01T12:00:00.000Z  GO            75%  A shared calendar for dog walkers"
    );
  });

  it("truncates long ideas", () => {
    const line = formatDecisionSummary({ ...validDecision(), idea: "x".repeat(80) });
    expect(line.endsWith(`${"x".repeat(57)}...`)).toBe(true);
  });
});

describe("idea and report helpers", () => {
  it("trims idea text", () => {
    expect(createProductIdea("  Pet sitting marketplace  ").text).toBe("Pet sitting marketplace");
  });

  it("builds a frozen inconclusive report", () => {
    const degraded = inconclusiveReport("market analysis unavailable: timeout");
    expect(degraded).toEqual({
      verdict: "INCONCLUSIVE",
      confidence: 0,
      rationale: "market analysis unavailable: timeout",
      evidence: [],
    });
    expect(Object.isFrozen(degraded)).toBe(true);
  });
});
