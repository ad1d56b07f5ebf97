/**
 * Input Guardrails
 * Sanitizes and screens product ideas before a run starts, and rate-limits
 * requesters. Front-ends call these; the workflow only requires a non-empty idea.
 */

import { logger } from "./logger.js";

export const MIN_IDEA_LENGTH = 10;
export const MAX_IDEA_LENGTH = 5000;
export const MAX_IDEA_WORDS = 1000;

// Script and eval-style payloads
const FORBIDDEN_PATTERNS: RegExp[] = [
  /<script[^>]*>[\s\S]*?<\/script>/i,
  /javascript:/i,
  /\bon\w+\s*=/i,
  /\beval\s*\(/i,
  /\bexec\s*\(/i,
];

// Phrases typical of prompt-injection attempts
const INJECTION_PHRASES = [
  "ignore previous instructions",
  "ignore above",
  "disregard",
  "system prompt",
  "new instructions",
  "forget everything",
  "admin mode",
  "developer mode",
];

export type IdeaValidation = { ok: true; idea: string } | { ok: false; reason: string };

/**
 * Strip NUL and control characters and collapse whitespace runs
 */
export function sanitizeIdea(text: string): string {
  return text
    .replace(/\u0000/g, "")
    .replace(/[\u0001-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, "")
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .join(" ");
}

/**
 * Validate raw idea text, returning the sanitized idea or the rejection reason
 */
export function validateProductIdea(text: string): IdeaValidation {
  const idea = sanitizeIdea(text);

  if (idea.length === 0) {
    return { ok: false, reason: "Input cannot be empty" };
  }
  if (idea.length < MIN_IDEA_LENGTH) {
    return { ok: false, reason: `Input too short (minimum ${MIN_IDEA_LENGTH} characters)` };
  }
  if (idea.length > MAX_IDEA_LENGTH) {
    return { ok: false, reason: `Input too long (maximum ${MAX_IDEA_LENGTH} characters)` };
  }
  if (idea.split(" ").length > MAX_IDEA_WORDS) {
    return { ok: false, reason: `Too many words (maximum ${MAX_IDEA_WORDS} words)` };
  }

  const forbidden = FORBIDDEN_PATTERNS.find((pattern) => pattern.test(idea));
  if (forbidden) {
    logger.warn("Blocked forbidden pattern in idea", { pattern: forbidden.source });
    return { ok: false, reason: "Input contains forbidden patterns" };
  }

  const lower = idea.toLowerCase();
  const phrase = INJECTION_PHRASES.find((candidate) => lower.includes(candidate));
  if (phrase) {
    logger.warn("Blocked suspected prompt injection", { phrase });
    return { ok: false, reason: "Input contains suspicious content" };
  }

  return { ok: true, idea };
}

// ============================================================
// RATE LIMITING
// ============================================================

export interface RateLimitDecision {
  allowed: boolean;
  message: string;
  /** Milliseconds until the oldest request leaves the window (0 when allowed) */
  retryAfterMs: number;
}

/**
 * Sliding-window rate limiter keyed by requester id
 */
export class RateLimiter {
  private readonly requests = new Map<string, number[]>();

  constructor(
    private readonly maxRequests = 10,
    private readonly windowMs = 60_000,
    private readonly clock: () => number = Date.now
  ) {}

  check(requesterId: string): RateLimitDecision {
    const now = this.clock();
    const recent = (this.requests.get(requesterId) ?? []).filter((at) => now - at < this.windowMs);

    if (recent.length >= this.maxRequests) {
      this.requests.set(requesterId, recent);
      return {
        allowed: false,
        message: `Rate limit exceeded (${this.maxRequests} requests per ${this.windowMs / 1000}s)`,
        retryAfterMs: this.windowMs - (now - recent[0]),
      };
    }

    recent.push(now);
    this.requests.set(requesterId, recent);
    return { allowed: true, message: "OK", retryAfterMs: 0 };
  }
}
