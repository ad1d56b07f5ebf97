/**
 * Workflow State
 * Phases, the allowed-transition table and the per-run state record.
 *
 *   START → AGENTS_RUNNING → STRATEGY_RETRIEVAL → SYNTHESIZING → DONE
 *     └──────────┴──────────────────┴──────────────────┴──→ FAILED | CANCELLED
 */

import { IdeaGateError } from "../core/errors.js";
import type { FinalDecision } from "../schemas/decision.js";
import type { ProductIdea } from "../schemas/idea.js";
import type { RetrievedPassage } from "../schemas/passage.js";
import type { AgentName, AgentReport } from "../schemas/report.js";

export const WORKFLOW_PHASES = [
  "START",
  "AGENTS_RUNNING",
  "STRATEGY_RETRIEVAL",
  "SYNTHESIZING",
  "DONE",
  "FAILED",
  "CANCELLED",
] as const;

export type WorkflowPhase = (typeof WORKFLOW_PHASES)[number];

const ALLOWED_TRANSITIONS: Readonly<Record<WorkflowPhase, readonly WorkflowPhase[]>> = {
  START: ["AGENTS_RUNNING", "FAILED", "CANCELLED"],
  AGENTS_RUNNING: ["STRATEGY_RETRIEVAL", "FAILED", "CANCELLED"],
  STRATEGY_RETRIEVAL: ["SYNTHESIZING", "FAILED", "CANCELLED"],
  SYNTHESIZING: ["DONE", "FAILED", "CANCELLED"],
  DONE: [],
  FAILED: [],
  CANCELLED: [],
};

export function canTransition(from: WorkflowPhase, to: WorkflowPhase): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export interface PhaseRecord {
  phase: WorkflowPhase;
  /** ISO timestamp of entry */
  at: string;
}

/**
 * Owned by exactly one run. Agents never see it; the orchestrator alone
 * writes their reports into it.
 */
export interface WorkflowState {
  readonly runId: string;
  readonly idea: ProductIdea;
  phase: WorkflowPhase;
  history: PhaseRecord[];
  /** A slot is present only once its agent produced a schema-valid report */
  reports: Partial<Record<AgentName, AgentReport>>;
  strategyPassages?: readonly RetrievedPassage[];
  finalDecision?: FinalDecision;
}

export function createWorkflowState(runId: string, idea: ProductIdea, now: Date): WorkflowState {
  return {
    runId,
    idea,
    phase: "START",
    history: [{ phase: "START", at: now.toISOString() }],
    reports: {},
  };
}

/**
 * Move to the next phase, rejecting anything outside the transition table
 */
export function transition(state: WorkflowState, to: WorkflowPhase, now: Date): void {
  if (!canTransition(state.phase, to)) {
    throw new IdeaGateError(`Illegal workflow transition ${state.phase} → ${to}`, "ILLEGAL_TRANSITION", {
      context: { runId: state.runId, from: state.phase, to },
    });
  }
  state.phase = to;
  state.history.push({ phase: to, at: now.toISOString() });
}
