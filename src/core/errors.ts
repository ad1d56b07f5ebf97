/**
 * Custom Error Types
 * Structured errors carrying a transient/fatal classification for the retry layer
 */

import type { ZodIssue } from "zod";

export type FailureClass = "transient" | "fatal";

/**
 * Base error class for all IdeaGate errors
 */
export class IdeaGateError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly transient: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
      transient?: boolean;
    }
  ) {
    super(message);
    this.name = "IdeaGateError";
    this.code = code;
    this.context = options?.context;
    this.transient = options?.transient ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      transient: this.transient,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends IdeaGateError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context });
    this.name = "ConfigError";
  }
}

/**
 * Invalid caller input (product idea text, CLI flags)
 */
export class ValidationError extends IdeaGateError {
  public readonly field?: string;

  constructor(message: string, options?: { field?: string; context?: Record<string, unknown> }) {
    super(message, "VALIDATION_ERROR", { context: options?.context });
    this.name = "ValidationError";
    this.field = options?.field;
  }
}

/**
 * Network/connectivity errors
 */
export class NetworkError extends IdeaGateError {
  constructor(message: string, cause?: unknown) {
    super(message, "NETWORK_ERROR", { cause, transient: true });
    this.name = "NetworkError";
  }
}

/**
 * A single external call ran past its per-call deadline
 */
export class TimeoutError extends IdeaGateError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT", {
      transient: true,
      context: { operation, timeoutMs },
    });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Language-model inference errors
 */
export class ModelError extends IdeaGateError {
  public readonly statusCode?: number;

  constructor(
    message: string,
    options?: {
      cause?: unknown;
      statusCode?: number;
      transient?: boolean;
      context?: Record<string, unknown>;
    }
  ) {
    // Rate limits and overloads are retryable unless the caller says otherwise
    const status = options?.statusCode;
    const transient =
      options?.transient ??
      (status !== undefined && (status === 408 || status === 429 || status >= 500));

    super(message, "MODEL_ERROR", { cause: options?.cause, context: options?.context, transient });
    this.name = "ModelError";
    this.statusCode = status;
  }
}

/**
 * Web search errors
 */
export class SearchError extends IdeaGateError {
  public readonly statusCode?: number;

  constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
    const status = options?.statusCode;
    const transient = status !== undefined && (status === 429 || status >= 500);

    super(message, "SEARCH_ERROR", { cause: options?.cause, transient, context: { statusCode: status } });
    this.name = "SearchError";
    this.statusCode = status;
  }
}

/**
 * Vector store / retrieval errors
 */
export class RetrievalError extends IdeaGateError {
  constructor(message: string, options?: { cause?: unknown; transient?: boolean }) {
    super(message, "RETRIEVAL_ERROR", options);
    this.name = "RetrievalError";
  }
}

/**
 * Decision archive errors
 */
export class PersistenceError extends IdeaGateError {
  constructor(message: string, cause?: unknown) {
    super(message, "PERSISTENCE_ERROR", { cause });
    this.name = "PersistenceError";
  }
}

/**
 * A decision record failed its declared shape. Always a core defect.
 */
export class SchemaViolationError extends IdeaGateError {
  public readonly issues: ZodIssue[];

  constructor(schemaName: string, issues: ZodIssue[]) {
    const detail = issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    super(`${schemaName} failed validation: ${detail}`, "SCHEMA_VIOLATION", {
      context: { schemaName, issueCount: issues.length },
    });
    this.name = "SchemaViolationError";
    this.issues = issues;
  }
}

/**
 * Retry attempts ran out on a transient failure
 */
export class RetryExhaustedError extends IdeaGateError {
  public readonly attempts: number;
  public readonly lastError: Error;

  constructor(operation: string, attempts: number, lastError: Error) {
    super(
      `${operation} failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${lastError.message}`,
      "RETRY_EXHAUSTED",
      { cause: lastError, context: { operation, attempts } }
    );
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Caller-initiated cancellation. Never retried.
 */
export class CancelledError extends IdeaGateError {
  constructor(message = "Operation cancelled") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}

/**
 * Unrecoverable orchestration failure, attributed to the stage it escaped from
 */
export class WorkflowError extends IdeaGateError {
  public readonly stage: string;
  public readonly causeClass: string;

  constructor(stage: string, cause: unknown) {
    const causeClass = cause instanceof Error ? cause.name : typeof cause;
    const causeMessage = cause instanceof Error ? cause.message : String(cause);

    super(`Workflow failed during ${stage}: ${causeMessage}`, "WORKFLOW_FAILED", {
      cause,
      // Worth re-running the whole workflow only when the root cause was transient
      transient: classifyFailure(unwrapRetryCause(cause)) === "transient",
      context: { stage, causeClass },
    });
    this.name = "WorkflowError";
    this.stage = stage;
    this.causeClass = causeClass;
  }

  get retryable(): boolean {
    return this.transient;
  }
}

/**
 * Type guard to check if error is an IdeaGate error
 */
export function isIdeaGateError(error: unknown): error is IdeaGateError {
  return error instanceof IdeaGateError;
}

const TRANSIENT_MARKERS = [
  "timeout",
  "timed out",
  "rate limit",
  "overloaded",
  "econnreset",
  "econnrefused",
  "socket hang up",
  "429",
  "502",
  "503",
  "529",
];

/**
 * Decide whether a raised failure is worth another attempt
 */
export function classifyFailure(error: unknown): FailureClass {
  if (error instanceof CancelledError) {
    return "fatal";
  }

  if (isIdeaGateError(error)) {
    return error.transient ? "transient" : "fatal";
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return TRANSIENT_MARKERS.some((marker) => message.includes(marker)) ? "transient" : "fatal";
  }

  return "fatal";
}

function unwrapRetryCause(error: unknown): unknown {
  return error instanceof RetryExhaustedError ? error.lastError : error;
}

/**
 * Normalize any thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
