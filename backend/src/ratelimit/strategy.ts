import type { z } from "zod";
import type { RateLimitConfig, StrategyKind } from "@ratewarden/shared";
import type { Evaluation, LimitStrategy, QuotaSnapshot, StrategyOutcome } from "./types";

/**
 * Base for strategies that keep a JSON state object per key.
 * Undecodable state (foreign writer, older format) counts as no state.
 */
export abstract class JsonStateStrategy<S> implements LimitStrategy {
  abstract readonly kind: StrategyKind;
  protected abstract readonly schema: z.ZodType<S>;

  protected abstract step(state: S | null, config: RateLimitConfig, now: number): StrategyOutcome & { state: S };
  protected abstract snapshot(state: S | null, config: RateLimitConfig, now: number): QuotaSnapshot;
  abstract ttlSeconds(config: RateLimitConfig): number;

  evaluate(stored: string | null, config: RateLimitConfig, now: number): Evaluation {
    const { state, ...outcome } = this.step(this.decode(stored), config, now);
    return { ...outcome, state: JSON.stringify(state) };
  }

  inspect(stored: string | null, config: RateLimitConfig, now: number): QuotaSnapshot {
    return this.snapshot(this.decode(stored), config, now);
  }

  protected decode(stored: string | null): S | null {
    if (stored === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(stored);
    } catch {
      return null;
    }

    const parsed = this.schema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }
}

export function windowMs(config: RateLimitConfig): number {
  return config.windowSeconds * 1000;
}
