/**
 * Analysis Output Schemas
 * What each analysis agent asks the model to return, before it is folded
 * into the uniform AgentReport
 */

import { z } from "zod";
import { ConfidenceSchema, DecisiveVerdictSchema } from "./report.js";

const ScoreSchema = z.number().int().min(1).max(10);

/**
 * Fields every analysis carries
 */
const AnalysisBaseSchema = z.object({
  verdict: DecisiveVerdictSchema,
  confidence: ConfidenceSchema,
  summary: z.string().min(1),
});

/**
 * Market demand and competition
 */
export const MarketAnalysisSchema = AnalysisBaseSchema.extend({
  keyFindings: z.array(z.string()),
  competitors: z.array(z.string()),
  marketSizeEstimate: z.string(),
  score: ScoreSchema,
});

/**
 * Technical feasibility
 */
export const TechAnalysisSchema = AnalysisBaseSchema.extend({
  requiredStack: z.array(z.string()),
  challenges: z.array(z.string()),
  feasibility: z.enum(["HIGH", "MEDIUM", "LOW"]),
  score: ScoreSchema,
});

/**
 * Legal, ethical and regulatory exposure. Score 10 is the highest risk.
 */
export const RiskAnalysisSchema = AnalysisBaseSchema.extend({
  legalConcerns: z.array(z.string()),
  ethicalRisks: z.array(z.string()),
  mitigations: z.array(z.string()),
  score: ScoreSchema,
});

/**
 * User sentiment from reviews and forums
 */
export const UserFeedbackAnalysisSchema = AnalysisBaseSchema.extend({
  painPoints: z.array(z.string()),
  positiveSignals: z.array(z.string()),
  sentiment: z.enum(["POSITIVE", "NEGATIVE", "MIXED"]),
  score: ScoreSchema,
});

export type MarketAnalysis = z.infer<typeof MarketAnalysisSchema>;
export type TechAnalysis = z.infer<typeof TechAnalysisSchema>;
export type RiskAnalysis = z.infer<typeof RiskAnalysisSchema>;
export type UserFeedbackAnalysis = z.infer<typeof UserFeedbackAnalysisSchema>;
