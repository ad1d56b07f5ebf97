/**
 * Tech Agent
 * Feasibility from the idea text alone (plus strategy passages when given)
 */

import { TechAnalysisSchema, type TechAnalysis } from "../schemas/analysis.js";
import type { ProductIdea } from "../schemas/idea.js";
import { BaseAnalysisAgent } from "./base.js";
import { TECH_SYSTEM_PROMPT, ideaSection, joinSections, strategySection } from "./prompts.js";
import type { AgentContext } from "./types.js";

export class TechAgent extends BaseAnalysisAgent<TechAnalysis> {
  readonly name = "tech";
  protected readonly schema = TechAnalysisSchema;
  protected readonly schemaName = "TechAnalysis";
  protected readonly systemPrompt = TECH_SYSTEM_PROMPT;

  protected async buildPrompt(idea: ProductIdea, context: AgentContext): Promise<string> {
    return joinSections(ideaSection(idea.text), strategySection(context.strategyPassages));
  }

  protected toEvidence(analysis: TechAnalysis): string[] {
    return [
      `Feasibility: ${analysis.feasibility}`,
      ...analysis.requiredStack.map((item) => `Stack: ${item}`),
      ...analysis.challenges.map((challenge) => `Challenge: ${challenge}`),
      `Feasibility score: ${analysis.score}/10`,
    ];
  }
}
