/**
 * Decision Store
 * Persistence collaborator for validated decisions
 */

import type { DecisionInsert } from "@ideagate/db";
import { PersistenceError } from "../core/errors.js";
import { logger, type Logger } from "../core/logger.js";
import { FinalDecisionSchema, type FinalDecision } from "../schemas/decision.js";

export interface IDecisionStore {
  /**
   * Archive a decision, returning its record id. Called at most once per run;
   * idempotency is the store's concern.
   */
  save(decision: FinalDecision): Promise<string>;
  /** Archived decisions, newest first */
  list(limit: number): Promise<FinalDecision[]>;
}

/**
 * The slice of the decision repository this store needs
 */
export interface DecisionRecordSource {
  create(data: DecisionInsert): Promise<{ id: string }>;
  list(options?: { limit?: number }): Promise<Array<{ id: string; decision?: unknown }>>;
}

export class SupabaseDecisionStore implements IDecisionStore {
  private readonly log: Logger;

  constructor(
    private readonly source: DecisionRecordSource,
    log?: Logger
  ) {
    this.log = log ?? logger.child({ component: "decision-store" });
  }

  async save(decision: FinalDecision): Promise<string> {
    try {
      const row = await this.source.create({
        run_id: decision.runId,
        idea: decision.idea,
        verdict: decision.verdict,
        confidence: decision.confidence,
        schema_version: decision.schemaVersion,
        decision,
      });
      return row.id;
    } catch (error) {
      throw new PersistenceError(
        `Failed to archive decision for run ${decision.runId}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  async list(limit: number): Promise<FinalDecision[]> {
    let rows: Array<{ id: string; decision?: unknown }>;
    try {
      rows = await this.source.list({ limit });
    } catch (error) {
      throw new PersistenceError(
        `Failed to list decisions: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }

    const decisions: FinalDecision[] = [];
    for (const row of rows) {
      const parsed = FinalDecisionSchema.safeParse(row.decision);
      if (parsed.success) {
        decisions.push(parsed.data);
      } else {
        this.log.warn("Skipping archived decision with unexpected shape", { recordId: row.id });
      }
    }
    return decisions;
  }
}
