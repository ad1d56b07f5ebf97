/**
 * User Feedback Agent
 * Sentiment from reviews and forums. Proceeds without search when it must.
 */

import type { Logger } from "../core/logger.js";
import { UserFeedbackAnalysisSchema, type UserFeedbackAnalysis } from "../schemas/analysis.js";
import type { ProductIdea } from "../schemas/idea.js";
import { BaseAnalysisAgent } from "./base.js";
import { USER_FEEDBACK_SYSTEM_PROMPT, ideaSection, joinSections, strategySection, webResearchSection } from "./prompts.js";
import type { AgentContext } from "./types.js";

export class UserFeedbackAgent extends BaseAnalysisAgent<UserFeedbackAnalysis> {
  readonly name = "user_feedback";
  protected readonly schema = UserFeedbackAnalysisSchema;
  protected readonly schemaName = "UserFeedbackAnalysis";
  protected readonly systemPrompt = USER_FEEDBACK_SYSTEM_PROMPT;

  protected async buildPrompt(idea: ProductIdea, context: AgentContext, log: Logger): Promise<string> {
    const research = await this.optionalSearch(
      `${idea.text} user reviews reddit complaints wishlist sentiment`,
      context,
      log
    );

    return joinSections(
      ideaSection(idea.text),
      webResearchSection("Social & Review Research Data", research),
      strategySection(context.strategyPassages)
    );
  }

  protected toEvidence(analysis: UserFeedbackAnalysis): string[] {
    return [
      `Sentiment: ${analysis.sentiment}`,
      ...analysis.painPoints.map((pain) => `Pain point: ${pain}`),
      ...analysis.positiveSignals.map((signal) => `Positive signal: ${signal}`),
      `Enthusiasm score: ${analysis.score}/10`,
    ];
  }
}
