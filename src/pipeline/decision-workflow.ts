/**
 * Decision Workflow - Main Orchestrator
 * Evaluates one product idea per run: Agents → Strategy Retrieval → Synthesis
 *
 * PIPELINE PHASES:
 * ================
 * START
 *   - Validate the idea (an invalid idea fails the run here)
 *
 * AGENTS_RUNNING (parallel)
 *   - Dispatch market, tech, risk and user_feedback against the same idea
 *   - Join on all four; degraded agents report INCONCLUSIVE
 *   - Anything an agent could not absorb fails the run
 *
 * STRATEGY_RETRIEVAL
 *   - One retrieval query for governing strategy passages
 *   - A retrieval outage fails the run; no passages is a valid result
 *
 * SYNTHESIZING
 *   - Constraint matching, deterministic merge, schema validation
 *
 * DONE
 *   - Persist once (a store failure is reported, not fatal) and return
 *
 * Cancellation from the caller's signal reaches every in-flight agent,
 * retry and external call of this run only, and resolves the run as cancelled.
 */

import { randomUUID } from "node:crypto";
import { linkedController, raceAbort, throwIfAborted } from "../core/abort.js";
import {
  CancelledError,
  IdeaGateError,
  PersistenceError,
  SchemaViolationError,
  ValidationError,
  WorkflowError,
  toError,
} from "../core/errors.js";
import { logger, type Logger } from "../core/logger.js";
import { listAgents, type AgentSet } from "../agents/registry.js";
import type { IRetrievalEngine, RetrievalQueryOptions } from "../retrieval/types.js";
import { validateFinalDecision, type ContributingReports, type FinalDecision } from "../schemas/decision.js";
import { ProductIdeaSchema, type ProductIdea } from "../schemas/idea.js";
import type { RetrievedPassage } from "../schemas/passage.js";
import { AgentReportSchema, type AgentName, type AgentReport } from "../schemas/report.js";
import type { IDecisionStore } from "./decision-store.js";
import type { IStrategyConstraintMatcher } from "./policy.js";
import { createWorkflowState, transition, type PhaseRecord, type WorkflowPhase, type WorkflowState } from "./state.js";
import { synthesizeDecision } from "./synthesis.js";

// ============================================================
// OUTCOMES
// ============================================================

interface OutcomeBase {
  runId: string;
  history: PhaseRecord[];
}

export type WorkflowOutcome =
  | (OutcomeBase & {
      status: "done";
      decision: FinalDecision;
      /** Present when the decision was archived */
      recordId?: string;
      persistenceError?: PersistenceError;
    })
  | (OutcomeBase & { status: "failed"; error: WorkflowError })
  | (OutcomeBase & { status: "cancelled"; stage: WorkflowPhase });

export interface DecisionWorkflowDeps {
  agents: AgentSet;
  retrieval: IRetrievalEngine;
  matcher: IStrategyConstraintMatcher;
  /** Omit to skip persistence */
  store?: IDecisionStore;
  /** Defaults for the strategy retrieval query */
  retrievalOptions?: Omit<RetrievalQueryOptions, "signal">;
  clock?: () => Date;
  log?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
  runId?: string;
  /** Per-run overrides for the strategy retrieval query */
  retrieval?: Omit<RetrievalQueryOptions, "signal">;
  /** Called on every phase entry */
  onPhase?: (phase: WorkflowPhase, runId: string) => void;
}

// ============================================================
// DECISION WORKFLOW CLASS
// ============================================================

export class DecisionWorkflow {
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: DecisionWorkflowDeps) {
    this.log = deps.log ?? logger.child({ component: "workflow" });
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Run the workflow for one idea. Never throws: every outcome is a value.
   */
  async run(input: ProductIdea | string, options: RunOptions = {}): Promise<WorkflowOutcome> {
    const runId = options.runId ?? randomUUID();
    const log = this.log.child({ runId });
    const startTime = Date.now();
    const { controller, release } = linkedController(options.signal);
    const signal = controller.signal;

    const parsed = ProductIdeaSchema.safeParse(typeof input === "string" ? { text: input } : input);
    const idea: ProductIdea = parsed.success ? parsed.data : { text: typeof input === "string" ? input : input.text };
    const state = createWorkflowState(runId, idea, this.clock());

    const enter = (phase: WorkflowPhase): void => {
      transition(state, phase, this.clock());
      log.debug(`Phase: ${phase}`, { stage: phase });
      options.onPhase?.(phase, runId);
    };

    log.info("Workflow started", { idea: idea.text.slice(0, 80) });

    try {
      // ========================================================
      // START
      // ========================================================
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join("; "), { field: "idea" });
      }
      throwIfAborted(signal);

      // ========================================================
      // AGENTS_RUNNING
      // ========================================================
      enter("AGENTS_RUNNING");
      const reports = await this.runAgents(state, signal, log);

      // ========================================================
      // STRATEGY_RETRIEVAL
      // ========================================================
      enter("STRATEGY_RETRIEVAL");
      const passages = await raceAbort(
        this.deps.retrieval.query(idea.text, {
          ...this.deps.retrievalOptions,
          ...options.retrieval,
          signal,
        }),
        signal
      );
      state.strategyPassages = passages;
      log.info(`Retrieved ${passages.length} strategy passages`);

      // ========================================================
      // SYNTHESIZING
      // ========================================================
      enter("SYNTHESIZING");
      const decision = await this.synthesize(state, reports, passages, signal);
      state.finalDecision = decision;

      // Last point at which cancellation wins over completion
      throwIfAborted(signal);

      // ========================================================
      // DONE
      // ========================================================
      enter("DONE");
      log.info("Workflow completed", { verdict: decision.verdict, confidence: decision.confidence });

      return { status: "done", runId, history: state.history, decision, ...(await this.persist(decision, log)) };
    } catch (error) {
      const stage = state.phase;

      if (error instanceof CancelledError || signal.aborted) {
        enter("CANCELLED");
        log.info("Workflow cancelled", { stage });
        return { status: "cancelled", runId, history: state.history, stage };
      }

      const failure = new WorkflowError(stage, error);
      enter("FAILED");
      log.error("Workflow failed", toError(error), { stage, causeClass: failure.causeClass });
      return { status: "failed", runId, history: state.history, error: failure };
    } finally {
      release();
      log.metric("workflow_duration_ms", Date.now() - startTime, { phase: state.phase });
    }
  }

  /**
   * Fan out to every agent and join. Reports land in the state only after
   * all four settle.
   */
  private async runAgents(state: WorkflowState, signal: AbortSignal, log: Logger): Promise<ContributingReports> {
    const agents = listAgents(this.deps.agents);
    const context = { runId: state.runId, signal };

    const settled = await raceAbort(
      Promise.allSettled(agents.map((agent) => agent.analyze(state.idea, context))),
      signal
    );

    const collected: Partial<Record<AgentName, AgentReport>> = {};
    for (const [index, outcome] of settled.entries()) {
      const name = agents[index].name;
      if (outcome.status === "rejected") {
        if (outcome.reason instanceof CancelledError) {
          throw outcome.reason;
        }
        log.error(`Agent ${name} failed outside its degradation path`, outcome.reason, { agent: name });
        throw outcome.reason;
      }

      const report = AgentReportSchema.safeParse(outcome.value);
      if (!report.success) {
        throw new SchemaViolationError(`AgentReport(${name})`, report.error.issues);
      }
      collected[name] = Object.freeze(report.data);
    }

    const { market, tech, risk, user_feedback } = collected;
    if (!market || !tech || !risk || !user_feedback) {
      throw new IdeaGateError("Agent join completed without four reports", "INCOMPLETE_JOIN");
    }

    state.reports = collected;
    return { market, tech, risk, user_feedback };
  }

  private async synthesize(
    state: WorkflowState,
    reports: ContributingReports,
    passages: readonly RetrievedPassage[],
    signal: AbortSignal
  ): Promise<FinalDecision> {
    const violations = await raceAbort(this.deps.matcher.findViolations(state.idea.text, passages, { signal }), signal);

    const candidate = synthesizeDecision({
      runId: state.runId,
      idea: state.idea.text,
      reports,
      passages,
      violations,
      timestamp: this.clock().toISOString(),
    });

    return Object.freeze(validateFinalDecision(candidate));
  }

  /**
   * Archive once. Never retried here; a failure is reported on the outcome.
   */
  private async persist(
    decision: FinalDecision,
    log: Logger
  ): Promise<{ recordId?: string; persistenceError?: PersistenceError }> {
    const store = this.deps.store;
    if (!store) {
      return {};
    }

    try {
      const recordId = await store.save(decision);
      log.info("Decision archived", { recordId });
      return { recordId };
    } catch (error) {
      const persistenceError =
        error instanceof PersistenceError ? error : new PersistenceError(toError(error).message, error);
      log.error("Failed to archive decision", persistenceError);
      return { persistenceError };
    }
  }
}
