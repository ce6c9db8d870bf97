// Error taxonomy for the limiter. Quota and abuse rejections are decisions, not errors.

import type { LimitDecision } from "@ratewarden/shared";

export type RateLimitErrorCode =
  | "CONFIGURATION_ERROR"
  | "BACKEND_DEGRADED"
  | "STATE_CONFLICT"
  | "RATE_LIMITED";

export class RateLimitError extends Error {
  readonly code: RateLimitErrorCode;

  constructor(code: RateLimitErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RateLimitError";
    this.code = code;
  }
}

/** Unknown action or invalid limit definition. */
export class ConfigurationError extends RateLimitError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIGURATION_ERROR", message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/** Shared counter store unreachable; callers recover by falling back locally. */
export class StoreUnavailableError extends RateLimitError {
  readonly store: string;

  constructor(store: string, message: string, options?: { cause?: unknown }) {
    super("BACKEND_DEGRADED", message, options);
    this.name = "StoreUnavailableError";
    this.store = store;
  }
}

export class StoreTimeoutError extends StoreUnavailableError {
  readonly timeoutMs: number;

  constructor(store: string, operation: string, timeoutMs: number) {
    super(store, `${store} ${operation} timed out after ${timeoutMs}ms`);
    this.name = "StoreTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Optimistic update lost the race too many times. */
export class StateConflictError extends RateLimitError {
  readonly key: string;
  readonly attempts: number;

  constructor(key: string, attempts: number) {
    super("STATE_CONFLICT", `Could not update ${key} after ${attempts} attempts`);
    this.name = "StateConflictError";
    this.key = key;
    this.attempts = attempts;
  }
}

/** Thrown by guarded functions when the limiter refuses the attempt. */
export class RateLimitExceededError extends RateLimitError {
  readonly decision: LimitDecision;

  constructor(decision: LimitDecision) {
    const wait = decision.retryAfter !== undefined ? ` Try again in ${decision.retryAfter} seconds.` : "";
    super("RATE_LIMITED", `Rate limit exceeded for ${decision.action} (${decision.reason}).${wait}`);
    this.name = "RateLimitExceededError";
    this.decision = decision;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
