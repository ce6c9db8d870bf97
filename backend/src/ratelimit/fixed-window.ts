// Fixed Window Rate Limiter
// Count resets at aligned window boundaries
// Cheapest algorithm; accepts up to 2x burst across a boundary (login attempts)

import { z } from "zod";
import { Strategy, type RateLimitConfig } from "@ratewarden/shared";
import { JsonStateStrategy, windowMs } from "./strategy";
import type { QuotaSnapshot, StrategyOutcome } from "./types";

const FixedWindowStateSchema = z.object({
  windowStart: z.number(),
  count: z.number().int().min(0),
});

export type FixedWindowState = z.infer<typeof FixedWindowStateSchema>;

export class FixedWindowStrategy extends JsonStateStrategy<FixedWindowState> {
  readonly kind = Strategy.FixedWindow;
  protected readonly schema = FixedWindowStateSchema;

  ttlSeconds(config: RateLimitConfig): number {
    return config.windowSeconds;
  }

  protected step(state: FixedWindowState | null, config: RateLimitConfig, now: number): StrategyOutcome & { state: FixedWindowState } {
    const windowStart = this.currentWindowStart(config, now);
    const windowEnd = windowStart + windowMs(config);
    let count = state && state.windowStart === windowStart ? state.count : 0;

    const allowed = count < config.maxRequests;
    if (allowed) count += 1;

    return {
      allowed,
      limit: config.maxRequests,
      remaining: Math.max(0, config.maxRequests - count),
      retryAfterMs: allowed ? 0 : windowEnd - now,
      resetAtMs: windowEnd,
      state: { windowStart, count },
    };
  }

  protected snapshot(state: FixedWindowState | null, config: RateLimitConfig, now: number): QuotaSnapshot {
    const windowStart = this.currentWindowStart(config, now);
    const count = state && state.windowStart === windowStart ? state.count : 0;
    return {
      limit: config.maxRequests,
      remaining: Math.max(0, config.maxRequests - count),
      resetAtMs: windowStart + windowMs(config),
    };
  }

  private currentWindowStart(config: RateLimitConfig, now: number): number {
    const window = windowMs(config);
    return Math.floor(now / window) * window;
  }
}
