/**
 * Risk Agent
 * Legal, ethical and compliance exposure. Searches legal news when it can.
 */

import type { Logger } from "../core/logger.js";
import { RiskAnalysisSchema, type RiskAnalysis } from "../schemas/analysis.js";
import type { ProductIdea } from "../schemas/idea.js";
import { BaseAnalysisAgent } from "./base.js";
import { RISK_SYSTEM_PROMPT, ideaSection, joinSections, strategySection, webResearchSection } from "./prompts.js";
import type { AgentContext } from "./types.js";

export class RiskAgent extends BaseAnalysisAgent<RiskAnalysis> {
  readonly name = "risk";
  protected readonly schema = RiskAnalysisSchema;
  protected readonly schemaName = "RiskAnalysis";
  protected readonly systemPrompt = RISK_SYSTEM_PROMPT;

  protected async buildPrompt(idea: ProductIdea, context: AgentContext, log: Logger): Promise<string> {
    const research = await this.optionalSearch(
      `${idea.text} legal risks lawsuit regulation compliance`,
      context,
      log,
      "news"
    );

    return joinSections(
      ideaSection(idea.text),
      webResearchSection("Legal & News Research Data", research),
      strategySection(context.strategyPassages)
    );
  }

  protected toEvidence(analysis: RiskAnalysis): string[] {
    return [
      ...analysis.legalConcerns.map((concern) => `Legal: ${concern}`),
      ...analysis.ethicalRisks.map((risk) => `Ethical: ${risk}`),
      ...analysis.mitigations.map((mitigation) => `Mitigation: ${mitigation}`),
      `Risk score: ${analysis.score}/10`,
    ];
  }
}
