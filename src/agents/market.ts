/**
 * Market Agent
 * Demand, competition and market size. Needs live web research: without it
 * the report is INCONCLUSIVE.
 */

import { MarketAnalysisSchema, type MarketAnalysis } from "../schemas/analysis.js";
import type { ProductIdea } from "../schemas/idea.js";
import { BaseAnalysisAgent } from "./base.js";
import { MARKET_SYSTEM_PROMPT, ideaSection, joinSections, strategySection, webResearchSection } from "./prompts.js";
import type { AgentContext } from "./types.js";

export class MarketAgent extends BaseAnalysisAgent<MarketAnalysis> {
  readonly name = "market";
  protected readonly schema = MarketAnalysisSchema;
  protected readonly schemaName = "MarketAnalysis";
  protected readonly systemPrompt = MARKET_SYSTEM_PROMPT;

  protected async buildPrompt(idea: ProductIdea, context: AgentContext): Promise<string> {
    const research = await this.requiredSearch(`${idea.text} market size competitors trends pricing`, context);

    return joinSections(
      ideaSection(idea.text),
      webResearchSection("Web Research Data", research),
      strategySection(context.strategyPassages)
    );
  }

  protected toEvidence(analysis: MarketAnalysis): string[] {
    return [
      ...analysis.keyFindings.map((finding) => `Finding: ${finding}`),
      ...analysis.competitors.map((competitor) => `Competitor: ${competitor}`),
      `Market size: ${analysis.marketSizeEstimate}`,
      `Market score: ${analysis.score}/10`,
    ];
  }
}
