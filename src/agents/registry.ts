/**
 * Agent Registry
 * The closed set of analysts, one factory per name
 */

import { AGENT_NAMES, type AgentName } from "../schemas/report.js";
import { MarketAgent } from "./market.js";
import { RiskAgent } from "./risk.js";
import { TechAgent } from "./tech.js";
import type { AgentDependencies, IAnalysisAgent } from "./types.js";
import { UserFeedbackAgent } from "./user-feedback.js";

export type AgentSet = Readonly<Record<AgentName, IAnalysisAgent>>;

const AGENT_FACTORIES: { [K in AgentName]: (deps: AgentDependencies) => IAnalysisAgent } = {
  market: (deps) => new MarketAgent(deps),
  tech: (deps) => new TechAgent(deps),
  risk: (deps) => new RiskAgent(deps),
  user_feedback: (deps) => new UserFeedbackAgent(deps),
};

/**
 * Build exactly one agent of each kind
 */
export function createAgents(deps: AgentDependencies): AgentSet {
  return Object.freeze({
    market: AGENT_FACTORIES.market(deps),
    tech: AGENT_FACTORIES.tech(deps),
    risk: AGENT_FACTORIES.risk(deps),
    user_feedback: AGENT_FACTORIES.user_feedback(deps),
  });
}

/**
 * Agents in dispatch order
 */
export function listAgents(agents: AgentSet): IAnalysisAgent[] {
  return AGENT_NAMES.map((name) => agents[name]);
}
