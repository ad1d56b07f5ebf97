/**
 * Retry / Backoff Executor
 *
 * Wraps a fallible async operation with bounded exponential backoff:
 *
 *   attempt 1 ── fail (transient) ── sleep min(base * mult^0, max) * (1 ± jitter)
 *   attempt 2 ── fail (transient) ── sleep min(base * mult^1, max) * (1 ± jitter)
 *   attempt 3 ── fail (transient) ── RetryExhausted(last error)
 *
 * A fatal failure (per the policy's classifier) stops immediately. Sleeps
 * are timers, so other runs keep making progress while one backs off.
 * The result is a value, never a throw.
 */

import { sleep } from "./abort.js";
import {
  CancelledError,
  RetryExhaustedError,
  classifyFailure,
  toError,
  type FailureClass,
} from "./errors.js";
import { logger, type Logger } from "./logger.js";

export interface RetryPolicy {
  /** Total attempts including the first (>= 1) */
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Fraction in [0, 1): each delay is scaled by a factor in [1 - jitter, 1 + jitter] */
  jitter: number;
  /** Decides whether a raised failure is retried */
  classify?: (error: unknown) => FailureClass;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  multiplier: 2,
  maxDelayMs: 8_000,
  jitter: 0.2,
};

export type RetryEvent =
  | { type: "attempt_succeeded"; operation: string; attempt: number; durationMs: number }
  | {
      type: "attempt_failed";
      operation: string;
      attempt: number;
      durationMs: number;
      failure: FailureClass;
      error: Error;
    }
  | { type: "backoff"; operation: string; attempt: number; delayMs: number };

export interface RetryOptions {
  /** Name used in events, logs and the exhausted error */
  operation: string;
  signal?: AbortSignal;
  /** Receives one event per attempt outcome and per backoff delay */
  onEvent?: (event: RetryEvent) => void;
  /** Random source in [0, 1) for jitter */
  random?: () => number;
  /** Delay implementation; defaults to an abortable timer */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  log?: Logger;
}

export type RetryFailureKind = "fatal" | "exhausted" | "cancelled";

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; kind: RetryFailureKind; error: Error; attempts: number };

/**
 * Delay before the attempt following `attempt` (1-based)
 */
export function computeBackoffDelay(policy: RetryPolicy, attempt: number, random: () => number): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
  const capped = Math.min(exponential, policy.maxDelayMs);
  const factor = 1 + policy.jitter * (2 * random() - 1);
  return Math.max(0, Math.round(capped * factor));
}

/**
 * Forward retry events to a logger
 */
export function logRetryEvent(log: Logger, event: RetryEvent): void {
  switch (event.type) {
    case "attempt_succeeded":
      log.debug(`${event.operation} succeeded`, { attempt: event.attempt, durationMs: event.durationMs });
      break;
    case "attempt_failed":
      log.warn(`${event.operation} failed (attempt ${event.attempt})`, {
        failure: event.failure,
        error: event.error.message,
        durationMs: event.durationMs,
      });
      break;
    case "backoff":
      log.debug(`Retrying ${event.operation} in ${event.delayMs}ms`, { attempt: event.attempt });
      break;
  }
}

/**
 * Execute an operation under a retry policy
 */
export async function executeWithRetry<T>(
  operation: (attempt: number, signal?: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const classify = policy.classify ?? classifyFailure;
  const random = options.random ?? Math.random;
  const wait = options.sleep ?? sleep;
  const log = options.log ?? logger.child({ component: "retry" });
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  const report = (event: RetryEvent): void => {
    logRetryEvent(log, event);
    options.onEvent?.(event);
  };

  let lastError: Error = new Error(`${options.operation} never ran`);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      return { ok: false, kind: "cancelled", error: new CancelledError(), attempts: attempt - 1 };
    }

    const startTime = Date.now();
    try {
      const value = await operation(attempt, options.signal);
      report({ type: "attempt_succeeded", operation: options.operation, attempt, durationMs: Date.now() - startTime });
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = toError(error);
      const failure = error instanceof CancelledError || options.signal?.aborted ? "fatal" : classify(error);

      report({
        type: "attempt_failed",
        operation: options.operation,
        attempt,
        durationMs: Date.now() - startTime,
        failure,
        error: lastError,
      });

      if (error instanceof CancelledError || options.signal?.aborted) {
        return { ok: false, kind: "cancelled", error: new CancelledError(), attempts: attempt };
      }

      if (failure === "fatal") {
        return { ok: false, kind: "fatal", error: lastError, attempts: attempt };
      }

      if (attempt < maxAttempts) {
        const delayMs = computeBackoffDelay(policy, attempt, random);
        report({ type: "backoff", operation: options.operation, attempt, delayMs });
        try {
          await wait(delayMs, options.signal);
        } catch {
          return { ok: false, kind: "cancelled", error: new CancelledError(), attempts: attempt };
        }
      }
    }
  }

  return {
    ok: false,
    kind: "exhausted",
    error: new RetryExhaustedError(options.operation, maxAttempts, lastError),
    attempts: maxAttempts,
  };
}

/**
 * Convenience for callers that prefer exceptions: returns the value or
 * throws the failure (CancelledError, the fatal error, or RetryExhaustedError)
 */
export async function retryOrThrow<T>(
  operation: (attempt: number, signal?: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const result = await executeWithRetry(operation, policy, options);
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}
