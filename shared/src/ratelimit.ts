// Rate limit definitions shared between the engine and the code it guards

export const Strategy = {
  TokenBucket: "token-bucket",
  SlidingWindow: "sliding-window",
  FixedWindow: "fixed-window",
} as const;

export type StrategyKind = typeof Strategy[keyof typeof Strategy];

export const STRATEGY_KINDS: readonly StrategyKind[] = Object.values(Strategy);

export interface RateLimitConfig {
  /** Unique action key, e.g. "pack_create" */
  action: string;
  /** Max requests allowed in window */
  maxRequests: number;
  /** Time window in seconds */
  windowSeconds: number;
  /** Algorithm to use */
  strategy: StrategyKind;
  /** Repeat violations inflate the abuse score faster */
  enableAdaptive: boolean;
  /** A violation here is also recorded against the action's cascade set */
  enableCascading: boolean;
  description?: string;
}

export const DecisionReason = {
  Allowed: "allowed",
  QuotaExceeded: "quota_exceeded",
  AbuseBlocked: "abuse_blocked",
  ConfigurationError: "configuration_error",
} as const;

export type DecisionReason = typeof DecisionReason[keyof typeof DecisionReason];

export interface LimitDecision {
  /** Whether the attempt may proceed */
  allowed: boolean;
  reason: DecisionReason;
  action: string;
  actorId: string;
  /** Total limit for this window (0 when the action is unknown) */
  limit: number;
  /** Remaining requests in current window */
  remaining: number;
  /** Seconds until the actor is likely eligible again (if blocked by quota) */
  retryAfter?: number;
  /** Unix timestamp (seconds) when the quota is fully restored */
  resetTime?: number;
  strategy?: StrategyKind;
  /** Actor's abuse score after this check */
  abuseScore: number;
}

export interface ActionStatus {
  action: string;
  strategy: StrategyKind;
  limit: number;
  remaining: number;
  windowSeconds: number;
  resetTime: number;
}

export interface ActorStatus {
  actorId: string;
  abuseScore: number;
  blocked: boolean;
  violations: number;
  limits: ActionStatus[];
}
