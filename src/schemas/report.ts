/**
 * Agent Report Schema
 * The uniform verdict every analysis agent produces
 */

import { z } from "zod";

/**
 * Analysis agents, a closed set. Adding an agent means adding it here.
 */
export const AGENT_NAMES = ["market", "tech", "risk", "user_feedback"] as const;

export const AgentNameSchema = z.enum(AGENT_NAMES);
export type AgentName = z.infer<typeof AgentNameSchema>;

export const VERDICTS = ["GO", "NO_GO", "PIVOT", "INCONCLUSIVE"] as const;

export const VerdictSchema = z.enum(VERDICTS);
export type Verdict = z.infer<typeof VerdictSchema>;

/**
 * Verdicts an agent can reach from evidence (INCONCLUSIVE is reserved for degradation)
 */
export const DecisiveVerdictSchema = z.enum(["GO", "NO_GO", "PIVOT"]);
export type DecisiveVerdict = z.infer<typeof DecisiveVerdictSchema>;

export const ConfidenceSchema = z.number().min(0).max(1);

export const AgentReportSchema = z.object({
  verdict: VerdictSchema,
  confidence: ConfidenceSchema,
  rationale: z.string().min(1),
  evidence: z.array(z.string()),
});

export type AgentReport = Readonly<z.infer<typeof AgentReportSchema>>;

/**
 * Report for an agent that could not reach a verdict
 */
export function inconclusiveReport(rationale: string, evidence: string[] = []): AgentReport {
  const report: AgentReport = { verdict: "INCONCLUSIVE", confidence: 0, rationale, evidence: [...evidence] };
  return Object.freeze(report);
}
