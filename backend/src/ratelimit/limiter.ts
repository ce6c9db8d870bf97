/**
 * Rate Limiter
 *
 * Per-check flow: config lookup, abuse gate, quota evaluation against the
 * counter store, then on rejection a recorded violation, a sink event and the
 * configured cascade. `checkLimit` always resolves with a decision.
 */

import {
  DecisionReason,
  Strategy,
  type ActionStatus,
  type ActorStatus,
  type LimitDecision,
  type RateLimitConfig,
  type StrategyKind,
  type ViolationRecord,
} from "@ratewarden/shared";
import { limiterLog } from "../logger";
import { describeError } from "../errors";
import { systemClock, type Clock } from "../runtime/clock";
import type { CounterStore } from "../stores/types";
import { AbuseScorer } from "../abuse";
import { ViolationReporter } from "../violations";
import { METRIC, MetricsRegistry } from "../metrics";
import { LimitRegistry } from "./registry";
import { DEFAULT_LIMITS } from "./defaults";
import { TokenBucketStrategy } from "./token-bucket";
import { SlidingWindowStrategy } from "./sliding-window";
import { FixedWindowStrategy } from "./fixed-window";
import type { LimitStrategy, StrategyOutcome } from "./types";
import type { RateLimitConfigInput } from "../validation/schemas";

export interface RateLimiterOptions {
  store: CounterStore;
  /** Defaults to a registry seeded with the default action table */
  registry?: LimitRegistry;
  /** Defaults to a scorer sharing this limiter's clock and reporter */
  scorer?: AbuseScorer;
  reporter?: ViolationReporter;
  clock?: Clock;
  metrics?: MetricsRegistry;
  keyPrefix?: string;
  tokenBucketTtlMultiplier?: number;
}

/** Metric label for checks against actions the registry does not know */
export const UNREGISTERED_ACTION_LABEL = "(unregistered)";

export function stateKey(action: string, actorId: string, prefix: string = "rl"): string {
  return `${prefix}:${action}:${actorId}`;
}

export class RateLimiter {
  readonly registry: LimitRegistry;
  readonly scorer: AbuseScorer;
  readonly metrics: MetricsRegistry;
  private store: CounterStore;
  private reporter: ViolationReporter;
  private clock: Clock;
  private keyPrefix: string;
  private strategies: Record<StrategyKind, LimitStrategy>;

  constructor(options: RateLimiterOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.reporter = options.reporter ?? new ViolationReporter(null, this.clock);
    this.registry = options.registry ?? new LimitRegistry({ limits: DEFAULT_LIMITS });
    this.scorer = options.scorer ?? new AbuseScorer({ clock: this.clock, reporter: this.reporter });
    this.metrics = options.metrics ?? new MetricsRegistry();
    this.keyPrefix = options.keyPrefix ?? "rl";
    this.strategies = {
      [Strategy.TokenBucket]: new TokenBucketStrategy(options.tokenBucketTtlMultiplier),
      [Strategy.SlidingWindow]: new SlidingWindowStrategy(),
      [Strategy.FixedWindow]: new FixedWindowStrategy(),
    };
  }

  async checkLimit(actorId: string, action: string): Promise<LimitDecision> {
    const config = this.registry.get(action);
    if (!config) {
      return this.unknownAction(actorId, action);
    }

    if (this.scorer.isBlocked(actorId)) {
      const abuseScore = this.scorer.getAbuseScore(actorId);
      this.metrics.incCounter(METRIC.abuseBlocks);
      this.countCheck(action, DecisionReason.AbuseBlocked);
      limiterLog.warn({ actorId, action, abuseScore }, "Check refused: actor blocked for abuse");
      return {
        allowed: false,
        reason: DecisionReason.AbuseBlocked,
        action,
        actorId,
        limit: config.maxRequests,
        remaining: 0,
        strategy: config.strategy,
        abuseScore,
      };
    }

    let outcome: StrategyOutcome;
    try {
      outcome = await this.evaluate(actorId, config);
    } catch (error) {
      limiterLog.error({ actorId, action, error: describeError(error) }, "Quota evaluation failed, allowing attempt");
      this.countCheck(action, DecisionReason.Allowed);
      return {
        allowed: true,
        reason: DecisionReason.Allowed,
        action,
        actorId,
        limit: config.maxRequests,
        remaining: 0,
        strategy: config.strategy,
        abuseScore: this.scorer.getAbuseScore(actorId),
      };
    }

    const decision: LimitDecision = {
      allowed: outcome.allowed,
      reason: outcome.allowed ? DecisionReason.Allowed : DecisionReason.QuotaExceeded,
      action,
      actorId,
      limit: outcome.limit,
      remaining: outcome.remaining,
      resetTime: Math.ceil(outcome.resetAtMs / 1000),
      strategy: config.strategy,
      abuseScore: 0,
    };

    if (!outcome.allowed) {
      decision.retryAfter = Math.ceil(outcome.retryAfterMs / 1000);
      this.recordRejection(actorId, config);
    }

    decision.abuseScore = this.scorer.getAbuseScore(actorId);
    this.countCheck(action, decision.reason);
    return decision;
  }

  /** Validate and upsert a limit. Throws ConfigurationError on invalid input. */
  registerLimit(input: RateLimitConfigInput): RateLimitConfig {
    return this.registry.register(input);
  }

  registerCascade(action: string, related: readonly string[]): void {
    this.registry.registerCascade(action, related);
  }

  listLimits(): RateLimitConfig[] {
    return this.registry.list();
  }

  getAbuseScore(actorId: string): number {
    return this.scorer.getAbuseScore(actorId);
  }

  resetAbuseScore(actorId: string, options: { clearHistory?: boolean } = {}): void {
    this.scorer.resetAbuseScore(actorId, options);
  }

  getViolationHistory(actorId: string): ViolationRecord[] {
    return this.scorer.getViolationHistory(actorId);
  }

  isBlocked(actorId: string): boolean {
    return this.scorer.isBlocked(actorId);
  }

  /** Remaining quota for every registered action, without consuming any. */
  async getStatus(actorId: string): Promise<ActorStatus> {
    const now = this.clock.now();
    const limits: ActionStatus[] = [];

    for (const config of this.registry.list()) {
      const stored = await this.store.get(stateKey(config.action, actorId, this.keyPrefix));
      const snapshot = this.strategies[config.strategy].inspect(stored, config, now);
      limits.push({
        action: config.action,
        strategy: config.strategy,
        limit: snapshot.limit,
        remaining: snapshot.remaining,
        windowSeconds: config.windowSeconds,
        resetTime: Math.ceil(snapshot.resetAtMs / 1000),
      });
    }

    return {
      actorId,
      abuseScore: this.scorer.getAbuseScore(actorId),
      blocked: this.scorer.isBlocked(actorId),
      violations: this.scorer.getViolationHistory(actorId).length,
      limits,
    };
  }

  /** Drop stored quota state so the actor starts fresh on this action. */
  async resetLimit(actorId: string, action: string): Promise<boolean> {
    const removed = await this.store.delete(stateKey(action, actorId, this.keyPrefix));
    limiterLog.info({ actorId, action, removed }, "Reset rate limit state");
    return removed;
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  private async evaluate(actorId: string, config: RateLimitConfig): Promise<StrategyOutcome> {
    const strategy = this.strategies[config.strategy];
    const key = stateKey(config.action, actorId, this.keyPrefix);
    const now = this.clock.now();

    // The shared store may run the mutator more than once; the written state picks the outcome.
    const outcomes = new Map<string, StrategyOutcome>();
    const written = await this.store.update(key, strategy.ttlSeconds(config), (current) => {
      const { state, ...outcome } = strategy.evaluate(current, config, now);
      outcomes.set(state, outcome);
      return state;
    });

    const outcome = outcomes.get(written);
    if (!outcome) {
      throw new Error(`Store for ${key} wrote a state this check did not produce`);
    }
    return outcome;
  }

  private recordRejection(actorId: string, config: RateLimitConfig): void {
    const { action } = config;
    const result = this.scorer.recordViolation(actorId, action, { adaptive: config.enableAdaptive });
    this.metrics.incCounter(METRIC.violations, { action });
    limiterLog.info({ actorId, action, score: result.score }, "Rate limit exceeded");
    this.reporter.emit({
      type: "rate_limit_exceeded",
      actorId,
      action,
      score: result.score,
      violationCount: result.violationCount,
    });

    if (!config.enableCascading) return;

    for (const related of this.registry.cascadesFor(action)) {
      const relatedConfig = this.registry.get(related);
      if (!relatedConfig) {
        limiterLog.debug({ action, related }, "Cascading to an unregistered action");
      }
      const cascaded = this.scorer.recordViolation(actorId, related, {
        adaptive: relatedConfig?.enableAdaptive ?? false,
        cascadedFrom: action,
      });
      this.metrics.incCounter(METRIC.violations, { action: related });
      this.reporter.emit({
        type: "rate_limit_exceeded",
        severity: "info",
        actorId,
        action: related,
        score: cascaded.score,
        violationCount: cascaded.violationCount,
        cascadedFrom: action,
      });
    }
  }

  private unknownAction(actorId: string, action: string): LimitDecision {
    limiterLog.warn({ actorId, action }, "Check for unregistered action refused");
    // Caller-supplied names stay out of metric labels; the event carries the name
    this.countCheck(UNREGISTERED_ACTION_LABEL, DecisionReason.ConfigurationError);
    this.reporter.emit({
      type: "configuration_error",
      actorId,
      action,
      score: null,
      violationCount: null,
      detail: `No rate limit registered for ${action}`,
    });
    return {
      allowed: false,
      reason: DecisionReason.ConfigurationError,
      action,
      actorId,
      limit: 0,
      remaining: 0,
      abuseScore: this.scorer.getAbuseScore(actorId),
    };
  }

  private countCheck(action: string, result: DecisionReason): void {
    this.metrics.incCounter(METRIC.checks, { action, result });
  }
}
