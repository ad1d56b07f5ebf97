/**
 * Strategy Constraint Matching
 * Decides which retrieved strategy passages encode a hard constraint the
 * idea violates. Pluggable: rule-based stem overlap or a model judgment.
 */

import { z } from "zod";
import { CancelledError, isIdeaGateError } from "../core/errors.js";
import { logger, type Logger } from "../core/logger.js";
import type { IModelClient } from "../core/model-client.js";
import { significantStems, stem } from "../core/text.js";
import type { RetrievedPassage } from "../schemas/passage.js";

export interface ConstraintViolation {
  passage: RetrievedPassage;
  /** The constraint sentence that was violated */
  constraint: string;
  /** Why it matched (matched terms or the model's reason) */
  reason: string;
}

export interface IStrategyConstraintMatcher {
  readonly name: string;
  findViolations(
    idea: string,
    passages: readonly RetrievedPassage[],
    options?: { signal?: AbortSignal }
  ): Promise<ConstraintViolation[]>;
}

// ============================================================
// HARD CONSTRAINT EXTRACTION
// ============================================================

const CONSTRAINT_MARKER =
  /\b(must not|mustn't|never|prohibited|do not|don't|will not|won't|not permitted|forbidden|no longer)\b/i;

// Marker vocabulary is never a significant term
const MARKER_STEMS = new Set(["prohibited", "forbidden", "permitted", "longer", "mustn", "don", "won"].map(stem));

export interface HardConstraint {
  passage: RetrievedPassage;
  sentence: string;
}

/**
 * Sentences that read as hard constraints ("must not", "never", ...)
 */
export function extractHardConstraints(passages: readonly RetrievedPassage[]): HardConstraint[] {
  const constraints: HardConstraint[] = [];
  for (const passage of passages) {
    for (const raw of passage.text.split(/[.!?;\n]+/)) {
      const sentence = raw.trim();
      if (sentence.length > 0 && CONSTRAINT_MARKER.test(sentence)) {
        constraints.push({ passage, sentence });
      }
    }
  }
  return constraints;
}

// ============================================================
// RULE MATCHER
// ============================================================

/**
 * Flags a constraint when at least half of its significant terms appear
 * in the idea, compared by shared stem
 */
export class RuleConstraintMatcher implements IStrategyConstraintMatcher {
  readonly name = "rules";

  constructor(private readonly threshold = 0.5) {}

  async findViolations(idea: string, passages: readonly RetrievedPassage[]): Promise<ConstraintViolation[]> {
    const ideaStems = new Set(significantStems(idea));
    const violations: ConstraintViolation[] = [];

    for (const { passage, sentence } of extractHardConstraints(passages)) {
      const terms = significantStems(sentence).filter((term) => !MARKER_STEMS.has(term));
      if (terms.length === 0) {
        continue;
      }

      const matched = terms.filter((term) => ideaStems.has(term));
      if (matched.length / terms.length >= this.threshold) {
        violations.push({ passage, constraint: sentence, reason: `matched terms: ${matched.join(", ")}` });
      }
    }

    return violations;
  }
}

// ============================================================
// MODEL MATCHER
// ============================================================

const ViolationJudgmentSchema = z.object({
  violations: z.array(
    z.object({
      index: z.number().int().min(0),
      reason: z.string(),
    })
  ),
});

const POLICY_SYSTEM_PROMPT = `You check product ideas against a company's hard strategy constraints.
A constraint is violated only when the idea clearly does what the constraint forbids.
Respond with ONLY a JSON object: {"violations": [{"index": <constraint number>, "reason": "<one sentence>"}]}
Return an empty list when nothing is violated.`;

/**
 * Asks the model to judge each hard-constraint sentence. Falls back to the
 * rule matcher when the model is unavailable.
 */
export class ModelConstraintMatcher implements IStrategyConstraintMatcher {
  readonly name = "model";
  private readonly log: Logger;

  constructor(
    private readonly modelClient: IModelClient,
    private readonly model: string,
    private readonly fallback: IStrategyConstraintMatcher = new RuleConstraintMatcher(),
    log?: Logger
  ) {
    this.log = log ?? logger.child({ component: "policy" });
  }

  async findViolations(
    idea: string,
    passages: readonly RetrievedPassage[],
    options: { signal?: AbortSignal } = {}
  ): Promise<ConstraintViolation[]> {
    const constraints = extractHardConstraints(passages);
    if (constraints.length === 0) {
      return [];
    }

    try {
      const judgment = await this.modelClient.complete({
        systemPrompt: POLICY_SYSTEM_PROMPT,
        prompt: `## Product Idea\n${idea}\n\n## Hard Constraints\n${constraints
          .map((constraint, index) => `[${index}] ${constraint.sentence}`)
          .join("\n")}`,
        schema: ViolationJudgmentSchema,
        schemaName: "ConstraintJudgment",
        model: this.model,
        signal: options.signal,
      });

      const violations: ConstraintViolation[] = [];
      const seen = new Set<number>();
      for (const entry of judgment.violations) {
        const constraint = constraints[entry.index];
        if (constraint && !seen.has(entry.index)) {
          seen.add(entry.index);
          violations.push({ passage: constraint.passage, constraint: constraint.sentence, reason: entry.reason });
        }
      }
      return violations;
    } catch (error) {
      if (error instanceof CancelledError || !isIdeaGateError(error)) {
        throw error;
      }
      this.log.warn("Model constraint check failed, using rule matcher", { error: error.message });
      return this.fallback.findViolations(idea, passages, options);
    }
  }
}
