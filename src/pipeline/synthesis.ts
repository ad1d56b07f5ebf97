/**
 * Decision Synthesis
 * Deterministic merge of four agent reports, the retrieved strategy
 * passages and any constraint violations into a FinalDecision candidate.
 *
 * 1. Hard veto: any violated constraint forces NO_GO.
 * 2. Otherwise majority vote over non-INCONCLUSIVE verdicts.
 *    Ties: GO vs NO_GO → NO_GO; PIVOT vs either → PIVOT; three-way → NO_GO.
 * 3. All four INCONCLUSIVE → INCONCLUSIVE with confidence 0.
 */

import { DECISION_SCHEMA_VERSION, type ContributingReports, type FinalDecision } from "../schemas/decision.js";
import { effectiveScore, sortByEffectiveScore, type RetrievedPassage } from "../schemas/passage.js";
import { AGENT_NAMES, type AgentName, type DecisiveVerdict, type Verdict } from "../schemas/report.js";
import type { ConstraintViolation } from "./policy.js";

/**
 * Confidence lost per unit fraction of INCONCLUSIVE agents
 */
export const INCONCLUSIVE_PENALTY = 0.25;

export interface SynthesisInput {
  runId: string;
  idea: string;
  reports: ContributingReports;
  passages: readonly RetrievedPassage[];
  violations: readonly ConstraintViolation[];
  /** ISO timestamp stamped on the decision */
  timestamp: string;
}

export interface VoteTally {
  GO: number;
  NO_GO: number;
  PIVOT: number;
  inconclusive: AgentName[];
}

export interface AggregateResult {
  verdict: Verdict;
  confidence: number;
  tally: VoteTally;
}

// ============================================================
// VOTING
// ============================================================

export function tallyVotes(reports: ContributingReports): VoteTally {
  const tally: VoteTally = { GO: 0, NO_GO: 0, PIVOT: 0, inconclusive: [] };
  for (const name of AGENT_NAMES) {
    const verdict = reports[name].verdict;
    if (verdict === "INCONCLUSIVE") {
      tally.inconclusive.push(name);
    } else {
      tally[verdict]++;
    }
  }
  return tally;
}

function breakTie(tied: DecisiveVerdict[]): DecisiveVerdict {
  if (tied.length === 1) {
    return tied[0];
  }
  if (tied.includes("GO") && tied.includes("NO_GO")) {
    return "NO_GO";
  }
  return "PIVOT";
}

/**
 * Majority verdict and penalized mean confidence, ignoring the strategy veto
 */
export function aggregateVerdict(reports: ContributingReports): AggregateResult {
  const tally = tallyVotes(reports);
  const conclusive = AGENT_NAMES.filter((name) => reports[name].verdict !== "INCONCLUSIVE");

  if (conclusive.length === 0) {
    return { verdict: "INCONCLUSIVE", confidence: 0, tally };
  }

  const candidates: DecisiveVerdict[] = ["GO", "NO_GO", "PIVOT"];
  const top = Math.max(...candidates.map((verdict) => tally[verdict]));
  const verdict = breakTie(candidates.filter((candidate) => tally[candidate] === top));

  const meanConfidence = conclusive.reduce((sum, name) => sum + reports[name].confidence, 0) / conclusive.length;
  const inconclusiveFraction = tally.inconclusive.length / AGENT_NAMES.length;
  const confidence = meanConfidence * (1 - INCONCLUSIVE_PENALTY * inconclusiveFraction);

  return { verdict, confidence: clampUnit(confidence), tally };
}

// ============================================================
// DECISION
// ============================================================

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function describeConflict(violation: ConstraintViolation): string {
  return `${violation.constraint} [${violation.passage.sourceDocumentId}]`;
}

function buildRationale(input: SynthesisInput, aggregate: AggregateResult): string {
  const { tally } = aggregate;
  const perAgent = AGENT_NAMES.map((name) => {
    const report = input.reports[name];
    return `- ${name} (${report.verdict}, ${report.confidence.toFixed(2)}): ${report.rationale}`;
  }).join("\n");

  let headline: string;
  if (aggregate.verdict === "INCONCLUSIVE") {
    headline = "Every analysis was inconclusive, so no verdict can be drawn.";
  } else {
    const conclusive = AGENT_NAMES.length - tally.inconclusive.length;
    headline =
      `Majority verdict ${aggregate.verdict} from ${conclusive} of ${AGENT_NAMES.length} conclusive analyses ` +
      `(GO ${tally.GO}, NO_GO ${tally.NO_GO}, PIVOT ${tally.PIVOT}).`;
    if (tally.inconclusive.length > 0) {
      headline += ` Inconclusive: ${tally.inconclusive.join(", ")}.`;
    }
  }

  return `${headline}\n${perAgent}`;
}

/**
 * Follow-ups implied by the decision, in a fixed order
 */
export function deriveActionItems(
  reports: ContributingReports,
  verdict: Verdict,
  violations: readonly ConstraintViolation[]
): string[] {
  const items: string[] = violations.map((violation) => `Resolve strategy conflict: ${describeConflict(violation)}`);

  for (const name of AGENT_NAMES) {
    const report = reports[name];
    if (report.verdict === "INCONCLUSIVE") {
      items.push(`Re-run the ${name} analysis once its data sources are available`);
    } else if (report.verdict !== verdict) {
      items.push(`Address ${name} dissent (${report.verdict}): ${report.rationale}`);
    }
  }

  return items;
}

/**
 * Build the decision candidate. Pure: identical inputs give identical output.
 */
export function synthesizeDecision(input: SynthesisInput): FinalDecision {
  const citations = sortByEffectiveScore(input.passages);
  const base = {
    schemaVersion: DECISION_SCHEMA_VERSION,
    runId: input.runId,
    idea: input.idea,
    contributingReports: input.reports,
    strategyCitations: citations,
    timestamp: input.timestamp,
  };

  // Hard policy veto
  if (input.violations.length > 0) {
    const confidence = Math.max(...input.violations.map((violation) => effectiveScore(violation.passage)));
    const conflicts = input.violations.map(describeConflict);
    const aggregate = aggregateVerdict(input.reports);

    return {
      ...base,
      verdict: "NO_GO",
      confidence: clampUnit(confidence),
      rationale:
        `Vetoed by internal strategy: ${conflicts.join("; ")}. ` +
        `Agents alone would have reached ${aggregate.verdict}.\n${buildRationale(input, aggregate)}`,
      strategyConflicts: conflicts,
      actionItems: deriveActionItems(input.reports, "NO_GO", input.violations),
    };
  }

  const aggregate = aggregateVerdict(input.reports);
  return {
    ...base,
    verdict: aggregate.verdict,
    confidence: aggregate.confidence,
    rationale: buildRationale(input, aggregate),
    strategyConflicts: [],
    actionItems: deriveActionItems(input.reports, aggregate.verdict, []),
  };
}
