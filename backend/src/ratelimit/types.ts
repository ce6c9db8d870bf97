// Rate limiting types

import type { RateLimitConfig, StrategyKind } from "@ratewarden/shared";

export interface QuotaSnapshot {
  /** Total limit for this window */
  limit: number;
  /** Remaining requests in current window */
  remaining: number;
  /** Epoch ms when the quota is fully restored */
  resetAtMs: number;
}

export interface StrategyOutcome extends QuotaSnapshot {
  /** Whether request is allowed */
  allowed: boolean;
  /** Ms until the next attempt is likely to pass (0 if allowed) */
  retryAfterMs: number;
}

export interface Evaluation extends StrategyOutcome {
  /** Serialized state to persist */
  state: string;
}

/**
 * A limiting algorithm over stored state. Implementations are pure: the same
 * stored value, config and time always produce the same result.
 */
export interface LimitStrategy {
  readonly kind: StrategyKind;
  /** Consume one attempt */
  evaluate(stored: string | null, config: RateLimitConfig, now: number): Evaluation;
  /** Report the quota without consuming it */
  inspect(stored: string | null, config: RateLimitConfig, now: number): QuotaSnapshot;
  /** How long idle state is kept by the store */
  ttlSeconds(config: RateLimitConfig): number;
}
