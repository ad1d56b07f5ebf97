/**
 * Agent Exports
 * Re-exports all agent implementations and prompts
 */

export { BaseAnalysisAgent, type AnalysisCore } from "./base.js";
export { MarketAgent } from "./market.js";
export { TechAgent } from "./tech.js";
export { RiskAgent } from "./risk.js";
export { UserFeedbackAgent } from "./user-feedback.js";
export { createAgents, listAgents, type AgentSet } from "./registry.js";
export type { AgentContext, AgentDependencies, IAnalysisAgent } from "./types.js";

// Prompts
export {
  MARKET_SYSTEM_PROMPT,
  TECH_SYSTEM_PROMPT,
  RISK_SYSTEM_PROMPT,
  USER_FEEDBACK_SYSTEM_PROMPT,
} from "./prompts.js";
