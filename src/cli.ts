/**
 * CLI argument parsing and exit codes
 */

import type { HealthReport } from "./health.js";
import type { WorkflowOutcome } from "./pipeline/decision-workflow.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_INVALID_INPUT = 2;
export const EXIT_CANCELLED = 130;

export type CliCommand = "evaluate" | "history" | "health" | "help";

export interface CliOptions {
  topK?: number;
  minRelevance?: number;
  rerank?: boolean;
  /** Decisions listed by `history` */
  limit: number;
  json: boolean;
  verbose: boolean;
}

export interface ParsedArgs {
  command: CliCommand;
  idea: string;
  options: CliOptions;
  /** Problems found while parsing; the CLI prints them and exits */
  errors: string[];
}

const COMMANDS: readonly CliCommand[] = ["evaluate", "history", "health", "help"];

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse command line arguments. The first argument may name a command;
 * remaining bare words form the idea text.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  let command: CliCommand = "evaluate";
  const options: CliOptions = { limit: 20, json: false, verbose: false };
  const errors: string[] = [];
  const words: string[] = [];

  const numberFlag = (flag: string, value: string | undefined): number | undefined => {
    const parsed = value === undefined ? NaN : Number(value);
    if (Number.isNaN(parsed)) {
      errors.push(`${flag} expects a number`);
      return undefined;
    }
    return parsed;
  };

  const positiveIntegerFlag = (flag: string, value: string | undefined): number | undefined => {
    const parsed = numberFlag(flag, value);
    if (parsed !== undefined && !(Number.isInteger(parsed) && parsed >= 1)) {
      errors.push(`${flag} expects a positive integer, got ${parsed}`);
      return undefined;
    }
    return parsed;
  };

  const relevanceFlag = (flag: string, value: string | undefined): number | undefined => {
    const parsed = numberFlag(flag, value);
    if (parsed !== undefined && !(parsed >= 0 && parsed <= 1)) {
      errors.push(`${flag} expects a value within [0, 1], got ${parsed}`);
      return undefined;
    }
    return parsed;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (i === 0 && isCommand(arg)) {
      command = arg;
    } else if (arg === "--top-k" || arg === "-k") {
      options.topK = positiveIntegerFlag(arg, args[++i]);
    } else if (arg === "--min-relevance") {
      options.minRelevance = relevanceFlag(arg, args[++i]);
    } else if (arg === "--no-rerank") {
      options.rerank = false;
    } else if (arg === "--limit" || arg === "-n") {
      options.limit = positiveIntegerFlag(arg, args[++i]) ?? options.limit;
    } else if (arg === "--json") {
      options.json = true;
    } else if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      command = "help";
    } else if (arg.startsWith("-")) {
      errors.push(`Unknown option: ${arg}`);
    } else {
      words.push(arg);
    }
  }

  return { command, idea: words.join(" "), options, errors };
}

export function exitCodeFor(outcome: WorkflowOutcome): number {
  switch (outcome.status) {
    case "done":
      return EXIT_OK;
    case "cancelled":
      return EXIT_CANCELLED;
    case "failed":
      return outcome.error.stage === "START" ? EXIT_INVALID_INPUT : EXIT_FAILED;
  }
}

export function exitCodeForHealth(report: HealthReport): number {
  return report.healthy ? EXIT_OK : EXIT_FAILED;
}
