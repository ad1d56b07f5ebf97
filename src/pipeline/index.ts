export {
  DecisionWorkflow,
  type DecisionWorkflowDeps,
  type RunOptions,
  type WorkflowOutcome,
} from "./decision-workflow.js";
export { SupabaseDecisionStore, type DecisionRecordSource, type IDecisionStore } from "./decision-store.js";
export {
  ModelConstraintMatcher,
  RuleConstraintMatcher,
  extractHardConstraints,
  type ConstraintViolation,
  type HardConstraint,
  type IStrategyConstraintMatcher,
} from "./policy.js";
export {
  WORKFLOW_PHASES,
  canTransition,
  createWorkflowState,
  transition,
  type PhaseRecord,
  type WorkflowPhase,
  type WorkflowState,
} from "./state.js";
export {
  INCONCLUSIVE_PENALTY,
  aggregateVerdict,
  deriveActionItems,
  synthesizeDecision,
  tallyVotes,
  type AggregateResult,
  type SynthesisInput,
  type VoteTally,
} from "./synthesis.js";
