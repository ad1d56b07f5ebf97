/**
 * Base Analysis Agent
 * Shared run loop: build prompt → structured completion → uniform report,
 * with graceful degradation to INCONCLUSIVE.
 */

import type { ZodType } from "zod";
import { CancelledError, SearchError, isIdeaGateError } from "../core/errors.js";
import { logger, type Logger } from "../core/logger.js";
import type { ProductIdea } from "../schemas/idea.js";
import { AgentReportSchema, inconclusiveReport, type AgentName, type AgentReport } from "../schemas/report.js";
import { formatSearchResults, type SearchTopic } from "../tools/web-search/types.js";
import type { AgentContext, AgentDependencies, IAnalysisAgent } from "./types.js";

/**
 * Fields every model analysis carries
 */
export interface AnalysisCore {
  verdict: "GO" | "NO_GO" | "PIVOT";
  confidence: number;
  summary: string;
}

export abstract class BaseAnalysisAgent<TAnalysis extends AnalysisCore> implements IAnalysisAgent {
  abstract readonly name: AgentName;
  protected abstract readonly schema: ZodType<TAnalysis>;
  protected abstract readonly schemaName: string;
  protected abstract readonly systemPrompt: string;

  constructor(protected readonly deps: AgentDependencies) {}

  /**
   * User prompt for this idea. Throwing an IdeaGateError here degrades the
   * report to INCONCLUSIVE.
   */
  protected abstract buildPrompt(idea: ProductIdea, context: AgentContext, log: Logger): Promise<string>;

  /**
   * Dimension findings, in a fixed order
   */
  protected abstract toEvidence(analysis: TAnalysis): string[];

  async analyze(idea: ProductIdea, context: AgentContext): Promise<AgentReport> {
    const log = (this.deps.log ?? logger).child({ runId: context.runId, agent: this.name });
    const profile = this.deps.profiles[this.name];
    const startTime = Date.now();

    log.info("Agent started", { model: profile.model });

    try {
      const prompt = await this.buildPrompt(idea, context, log);
      const analysis = await this.deps.modelClient.complete({
        systemPrompt: this.systemPrompt,
        prompt,
        schema: this.schema,
        schemaName: this.schemaName,
        model: profile.model,
        maxTurns: profile.maxTurns,
        signal: context.signal,
      });

      const report = AgentReportSchema.parse({
        verdict: analysis.verdict,
        confidence: analysis.confidence,
        rationale: analysis.summary,
        evidence: this.toEvidence(analysis),
      });

      log.info("Agent completed", { verdict: report.verdict, confidence: report.confidence });
      return Object.freeze(report);
    } catch (error) {
      if (error instanceof CancelledError || context.signal?.aborted) {
        throw error instanceof CancelledError ? error : new CancelledError();
      }
      if (!isIdeaGateError(error)) {
        throw error;
      }

      log.warn("Agent degraded to INCONCLUSIVE", { error: error.message, code: error.code });
      return inconclusiveReport(`${this.name} analysis unavailable: ${error.message}`);
    } finally {
      log.metric("agent_duration_ms", Date.now() - startTime);
    }
  }

  // ============================================================
  // WEB SEARCH HELPERS
  // ============================================================

  /**
   * Search results the analysis cannot proceed without. Failures degrade the report.
   */
  protected async requiredSearch(query: string, context: AgentContext, topic?: SearchTopic): Promise<string> {
    const search = this.deps.search;
    if (!search) {
      throw new SearchError("Web search is not configured");
    }
    const results = await search.search(query, { topic, signal: context.signal });
    return formatSearchResults(results);
  }

  /**
   * Search results the analysis can do without; a failure is noted in the prompt
   */
  protected async optionalSearch(
    query: string,
    context: AgentContext,
    log: Logger,
    topic?: SearchTopic
  ): Promise<string> {
    try {
      return await this.requiredSearch(query, context, topic);
    } catch (error) {
      if (error instanceof CancelledError || context.signal?.aborted) {
        throw error;
      }
      if (!isIdeaGateError(error)) {
        throw error;
      }
      log.warn("Web search failed, continuing without it", { error: error.message });
      return `Web search unavailable (${error.message}). Base your assessment on the idea alone and say what evidence is missing.`;
    }
  }
}
