/**
 * Schema Exports
 * Re-exports all schemas and utilities
 */

// Agent reports
export {
  AGENT_NAMES,
  AgentNameSchema,
  VERDICTS,
  VerdictSchema,
  DecisiveVerdictSchema,
  ConfidenceSchema,
  AgentReportSchema,
  inconclusiveReport,
  type AgentName,
  type Verdict,
  type DecisiveVerdict,
  type AgentReport,
} from "./report.js";

// Per-agent model outputs
export {
  MarketAnalysisSchema,
  TechAnalysisSchema,
  RiskAnalysisSchema,
  UserFeedbackAnalysisSchema,
  type MarketAnalysis,
  type TechAnalysis,
  type RiskAnalysis,
  type UserFeedbackAnalysis,
} from "./analysis.js";

// Retrieval
export {
  RetrievedPassageSchema,
  effectiveScore,
  sortByEffectiveScore,
  type RetrievedPassage,
} from "./passage.js";

// Input
export { ProductIdeaSchema, createProductIdea, type ProductIdea } from "./idea.js";

// Decision record
export {
  DECISION_SCHEMA_VERSION,
  ContributingReportsSchema,
  FinalDecisionSchema,
  validateFinalDecision,
  formatDecisionSummary,
  type ContributingReports,
  type FinalDecision,
} from "./decision.js";
