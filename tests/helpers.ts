/**
 * Shared test fixtures
 */

import { logger, type LogEntry } from "../src/core/logger.js";
import type { CompletionRequest, IModelClient } from "../src/core/model-client.js";
import type { RetryPolicy } from "../src/core/retry.js";
import type { ContributingReports } from "../src/schemas/decision.js";
import type { RetrievedPassage } from "../src/schemas/passage.js";
import type { AgentReport, Verdict } from "../src/schemas/report.js";

export const FAST_RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 0, multiplier: 2, maxDelayMs: 0, jitter: 0 };

/**
 * Route log output into an array instead of the console
 */
export function captureLogs(): { entries: LogEntry[]; restore: () => void } {
  const entries: LogEntry[] = [];
  logger.silence();
  logger.setLevel("debug");
  logger.addHandler((entry) => entries.push(entry));
  return {
    entries,
    restore: () => {
      logger.resetHandlers();
      logger.setLevel("info");
    },
  };
}

export function report(verdict: Verdict, confidence = 0.8, rationale = `${verdict} rationale`): AgentReport {
  return { verdict, confidence: verdict === "INCONCLUSIVE" ? 0 : confidence, rationale, evidence: [] };
}

export function reports(
  market: AgentReport,
  tech: AgentReport,
  risk: AgentReport,
  user_feedback: AgentReport
): ContributingReports {
  return { market, tech, risk, user_feedback };
}

export function passage(
  sourceDocumentId: string,
  text: string,
  relevanceScore: number,
  rerankScore?: number
): RetrievedPassage {
  return rerankScore === undefined
    ? { sourceDocumentId, text, relevanceScore }
    : { sourceDocumentId, text, relevanceScore, rerankScore };
}

export interface RecordedRequest {
  schemaName: string;
  systemPrompt: string;
  prompt: string;
  model: string;
  maxTurns?: number;
}

/**
 * Model client that answers from a script and validates against the request schema
 */
export class FakeModelClient implements IModelClient {
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly respond: (request: RecordedRequest) => unknown) {}

  async complete<T>(request: CompletionRequest<T>): Promise<T> {
    const recorded: RecordedRequest = {
      schemaName: request.schemaName,
      systemPrompt: request.systemPrompt,
      prompt: request.prompt,
      model: request.model,
      maxTurns: request.maxTurns,
    };
    this.requests.push(recorded);
    const value = await this.respond(recorded);
    return request.schema.parse(value);
  }
}

/**
 * One valid model output per analysis schema
 */
export const SAMPLE_ANALYSES: Record<string, unknown> = {
  MarketAnalysis: {
    verdict: "GO",
    confidence: 0.7,
    summary: "Healthy demand with fragmented competition",
    keyFindings: ["Demand grows with pet ownership"],
    competitors: ["Rover"],
    marketSizeEstimate: "$2B",
    score: 7,
  },
  TechAnalysis: {
    verdict: "GO",
    confidence: 0.9,
    summary: "Standard booking stack",
    requiredStack: ["React Native", "Postgres"],
    challenges: ["Calendar sync"],
    feasibility: "HIGH",
    score: 8,
  },
  RiskAnalysis: {
    verdict: "PIVOT",
    confidence: 0.6,
    summary: "Insurance liability needs a plan",
    legalConcerns: ["Walker liability"],
    ethicalRisks: [],
    mitigations: ["Partner with an insurer"],
    score: 6,
  },
  UserFeedbackAnalysis: {
    verdict: "GO",
    confidence: 0.5,
    summary: "Owners want vetted walkers",
    painPoints: ["Last-minute cancellations"],
    positiveSignals: ["Willing to pay for trust"],
    sentiment: "MIXED",
    score: 6,
  },
};

export function answerBySchema(request: RecordedRequest): unknown {
  return SAMPLE_ANALYSES[request.schemaName];
}
