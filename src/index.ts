#!/usr/bin/env node
/**
 * IdeaGate CLI - Entry Point
 * GO / NO_GO / PIVOT evaluation of a product idea
 *
 * EXECUTION FLOW:
 * ===============
 * 1. Load environment variables from .env (dotenv/config)
 * 2. Parse CLI arguments (parseArgs)
 * 3. Load configuration (loadConfig) and build collaborators (createIdeaGate)
 * 4. Branch based on command:
 *    - "evaluate" → guardrails, then DecisionWorkflow.run() (Ctrl-C cancels)
 *    - "history"  → list archived decisions
 *    - "health"   → check config, archive, strategy store and cache
 * 5. Display results to console (or JSON on stdout)
 *
 * USAGE:
 *   npm run evaluate -- "A budgeting app for freelance designers"
 *   npm run evaluate -- "..." --top-k 3 --no-rerank --json
 *   npm run history -- --limit 10
 *   npm run health
 */

// ============================================================
// STEP 1: Load environment variables from .env file
// ============================================================
import "dotenv/config";

import { createIdeaGate, type IdeaGate } from "./app.js";
import {
  EXIT_CANCELLED,
  EXIT_FAILED,
  EXIT_INVALID_INPUT,
  EXIT_OK,
  exitCodeFor,
  exitCodeForHealth,
  parseArgs,
} from "./cli.js";
import { loadConfig } from "./core/config.js";
import { validateProductIdea } from "./core/guardrails.js";
import { checkHealth, type HealthReport } from "./health.js";
import { logger } from "./core/logger.js";
import type { WorkflowOutcome } from "./pipeline/index.js";
import { formatDecisionSummary } from "./schemas/index.js";

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
IdeaGate - Product Idea Evaluation

USAGE:
  ideagate evaluate <idea> [options]
  ideagate history [options]
  ideagate health [--json]

COMMANDS:
  evaluate <idea>    Run the four analysts and strategy check (default)
  history            List archived decisions (requires Supabase)
  health             Check configuration, archive, strategy store and cache
  help               Show this help message

OPTIONS:
  -k, --top-k <n>            Strategy passages to retrieve (default: RAG_TOP_K)
      --min-relevance <x>    Relevance cutoff in [0, 1] (default: RAG_MIN_RELEVANCE)
      --no-rerank            Keep vector similarity order
  -n, --limit <n>            Decisions to list with history (default: 20)
      --json                 Print the result as JSON on stdout
  -v, --verbose              Enable debug logging

EXIT CODES:
  0 decision produced   1 run failed   2 invalid input   130 cancelled
`);
}

/**
 * Format and display a workflow outcome
 */
function displayOutcome(outcome: WorkflowOutcome): void {
  console.log("\n" + "=".repeat(60));
  console.log("IDEAGATE DECISION");
  console.log("=".repeat(60));
  console.log(`\nRun ID: ${outcome.runId}`);

  if (outcome.status === "cancelled") {
    console.log(`Cancelled during ${outcome.stage}. Nothing was archived.`);
    return;
  }

  if (outcome.status === "failed") {
    console.log(`Failed during ${outcome.error.stage} (${outcome.error.causeClass})`);
    console.log(`Reason: ${outcome.error.message}`);
    console.log(`Retry worthwhile: ${outcome.error.retryable ? "yes" : "no"}`);
    return;
  }

  const { decision } = outcome;
  console.log(`\nVerdict:    ${decision.verdict}`);
  console.log(`Confidence: ${(decision.confidence * 100).toFixed(0)}%`);
  console.log(`\n${decision.rationale}`);

  console.log("\n--- Agents ---");
  for (const [name, report] of Object.entries(decision.contributingReports)) {
    console.log(`  ${name.padEnd(14)} ${report.verdict.padEnd(12)} ${(report.confidence * 100).toFixed(0)}%`);
  }

  if (decision.strategyConflicts.length > 0) {
    console.log("\n--- Strategy Conflicts ---");
    for (const conflict of decision.strategyConflicts) {
      console.log(`  - ${conflict}`);
    }
  }

  if (decision.strategyCitations.length > 0) {
    console.log("\n--- Strategy Citations ---");
    for (const passage of decision.strategyCitations) {
      console.log(`  [${passage.sourceDocumentId}] ${passage.text.slice(0, 70)}`);
    }
  }

  if (decision.actionItems.length > 0) {
    console.log("\n--- Action Items ---");
    for (const item of decision.actionItems) {
      console.log(`  - ${item}`);
    }
  }

  if (outcome.recordId) {
    console.log(`\nArchived as ${outcome.recordId}`);
  } else if (outcome.persistenceError) {
    console.log(`\nWarning: decision not archived (${outcome.persistenceError.message})`);
  }

  console.log("\n" + "=".repeat(60));
}

function displayHealth(report: HealthReport): void {
  console.log("IdeaGate health");
  console.log("-".repeat(40));
  for (const check of report.checks) {
    console.log(`  ${check.status.padEnd(7)}${check.name.padEnd(10)}${check.message}`);
  }
  console.log("-".repeat(40));
  const failed = report.checks.filter((check) => check.status === "failed").length;
  console.log(report.healthy ? "All critical checks passed" : `${failed} check(s) failed`);
}

async function setup(verbose: boolean): Promise<IdeaGate | undefined> {
  try {
    const config = loadConfig(process.env);
    logger.setFormat(config.logging.format);
    logger.setLevel(verbose ? "debug" : config.logging.level);
    return await createIdeaGate(config);
  } catch (error) {
    console.error("Configuration error:", error instanceof Error ? error.message : error);
    console.error("\nSee .env.example for the supported variables.");
    return undefined;
  }
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================
async function main(): Promise<number> {
  // --------------------------------------------------------
  // STEP 2: Parse command line arguments
  // --------------------------------------------------------
  const { command, idea, options, errors } = parseArgs(process.argv.slice(2));

  if (command === "help") {
    printHelp();
    return EXIT_OK;
  }
  if (errors.length > 0) {
    for (const message of errors) console.error(message);
    printHelp();
    return EXIT_INVALID_INPUT;
  }

  // --------------------------------------------------------
  // STEP 3: Configuration and collaborators
  // --------------------------------------------------------
  const gate = await setup(options.verbose);
  if (!gate) {
    return EXIT_FAILED;
  }

  // --------------------------------------------------------
  // STEP 4: Execute based on command
  // --------------------------------------------------------
  if (command === "history") {
    if (!gate.store) {
      console.error("History needs the decision archive: set SUPABASE_URL and SUPABASE_KEY.");
      return EXIT_FAILED;
    }
    try {
      const decisions = await gate.store.list(options.limit);
      if (options.json) {
        console.log(JSON.stringify(decisions, null, 2));
      } else if (decisions.length === 0) {
        console.log("No archived decisions.");
      } else {
        for (const decision of decisions) console.log(formatDecisionSummary(decision));
      }
      return EXIT_OK;
    } catch (error) {
      console.error("History failed:", error instanceof Error ? error.message : error);
      return EXIT_FAILED;
    }
  }

  if (command === "health") {
    const report = await checkHealth(gate);
    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      displayHealth(report);
    }
    return exitCodeForHealth(report);
  }

  // Guardrails run before any model call
  const validation = validateProductIdea(idea);
  if (!validation.ok) {
    console.error(`Invalid idea: ${validation.reason}`);
    return EXIT_INVALID_INPUT;
  }

  // Ctrl-C cancels the in-flight run; a second Ctrl-C exits immediately
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      process.exit(EXIT_CANCELLED);
    }
    logger.warn("Cancelling run (press Ctrl-C again to exit now)");
    controller.abort();
  };
  process.on("SIGINT", onInterrupt);

  if (!options.json) {
    console.log(`\nIdeaGate - Evaluating: "${validation.idea.slice(0, 80)}"\n`);
  }

  try {
    const outcome = await gate.workflow.run(validation.idea, {
      signal: controller.signal,
      retrieval: {
        topK: options.topK,
        minRelevance: options.minRelevance,
        rerank: options.rerank,
      },
    });

    // --------------------------------------------------------
    // STEP 5: Display results
    // --------------------------------------------------------
    if (options.json) {
      console.log(JSON.stringify(outcome, null, 2));
    } else {
      displayOutcome(outcome);
    }
    return exitCodeFor(outcome);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

// Run
main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Unexpected error:", error);
    process.exitCode = EXIT_FAILED;
  }
);
