/**
 * Final Decision Schema
 * The versioned decision record: the only artifact that leaves the core.
 * Every record is validated here before it is returned or persisted.
 */

import { z } from "zod";
import { SchemaViolationError } from "../core/errors.js";
import { effectiveScore, RetrievedPassageSchema } from "./passage.js";
import { AgentReportSchema, ConfidenceSchema, VerdictSchema } from "./report.js";

export const DECISION_SCHEMA_VERSION = 1 as const;

/**
 * Exactly one report per dispatched agent, no extras
 */
export const ContributingReportsSchema = z
  .object({
    market: AgentReportSchema,
    tech: AgentReportSchema,
    risk: AgentReportSchema,
    user_feedback: AgentReportSchema,
  })
  .strict();

export const FinalDecisionSchema = z
  .object({
    schemaVersion: z.literal(DECISION_SCHEMA_VERSION),
    runId: z.string().min(1),
    idea: z.string().min(1),

    // Outcome
    verdict: VerdictSchema,
    confidence: ConfidenceSchema,
    rationale: z.string().refine((value) => value.trim().length > 0, "rationale must not be empty"),

    // Provenance
    contributingReports: ContributingReportsSchema,
    strategyCitations: z.array(RetrievedPassageSchema),
    strategyConflicts: z.array(z.string()),
    actionItems: z.array(z.string()),

    timestamp: z.string().datetime(),
  })
  .strict()
  .superRefine((decision, ctx) => {
    decision.strategyCitations.forEach((passage, index) => {
      const previous = decision.strategyCitations[index - 1];
      if (previous && effectiveScore(passage) > effectiveScore(previous)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["strategyCitations", index],
          message: "citations must be ordered by descending effective score",
        });
      }
    });
  });

export type ContributingReports = z.infer<typeof ContributingReportsSchema>;
export type FinalDecision = z.infer<typeof FinalDecisionSchema>;

/**
 * Validate a candidate decision record. A failure is a defect in the
 * synthesis step and surfaces as SchemaViolationError.
 */
export function validateFinalDecision(candidate: unknown): FinalDecision {
  const result = FinalDecisionSchema.safeParse(candidate);
  if (!result.success) {
    throw new SchemaViolationError("FinalDecision", result.error.issues);
  }
  return result.data;
}

/**
 * One-line human summary, used by the CLI history listing
 */
export function formatDecisionSummary(decision: FinalDecision): string {
  const idea = decision.idea.length > 60 ? `${decision.idea.slice(0, 57)}...` : decision.idea;
  return `${decision.timestamp}  ${decision.verdict.padEnd(12)} ${(decision.confidence * 100).toFixed(0).padStart(3)}%  ${idea}`;
}
