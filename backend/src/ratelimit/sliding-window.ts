// Sliding Window Rate Limiter
// Keeps the exact timestamps of admitted requests
// Strictest algorithm: no burst at window boundaries (purchases, payments)

import { z } from "zod";
import { Strategy, type RateLimitConfig } from "@ratewarden/shared";
import { JsonStateStrategy, windowMs } from "./strategy";
import type { QuotaSnapshot, StrategyOutcome } from "./types";

const SlidingWindowStateSchema = z.object({
  timestamps: z.array(z.number()),
});

export type SlidingWindowState = z.infer<typeof SlidingWindowStateSchema>;

/** First instant at which an entry admitted at `timestamp` no longer counts. */
function leavesAt(timestamp: number, window: number): number {
  return timestamp + window + 1;
}

export class SlidingWindowStrategy extends JsonStateStrategy<SlidingWindowState> {
  readonly kind = Strategy.SlidingWindow;
  protected readonly schema = SlidingWindowStateSchema;

  // An entry exactly one window old still counts, so state outlives it by a second
  ttlSeconds(config: RateLimitConfig): number {
    return config.windowSeconds + 1;
  }

  protected step(state: SlidingWindowState | null, config: RateLimitConfig, now: number): StrategyOutcome & { state: SlidingWindowState } {
    const window = windowMs(config);
    const timestamps = this.inWindow(state, config, now);

    // Rejected attempts are not recorded
    const allowed = timestamps.length < config.maxRequests;
    if (allowed) timestamps.push(now);

    // Oldest admitted request leaves the window first
    const oldest = timestamps[0] ?? now;
    return {
      allowed,
      limit: config.maxRequests,
      remaining: Math.max(0, config.maxRequests - timestamps.length),
      retryAfterMs: allowed ? 0 : leavesAt(oldest, window) - now,
      resetAtMs: leavesAt(timestamps[timestamps.length - 1] ?? now, window),
      state: { timestamps },
    };
  }

  protected snapshot(state: SlidingWindowState | null, config: RateLimitConfig, now: number): QuotaSnapshot {
    const timestamps = this.inWindow(state, config, now);
    return {
      limit: config.maxRequests,
      remaining: Math.max(0, config.maxRequests - timestamps.length),
      resetAtMs: leavesAt(timestamps[timestamps.length - 1] ?? now, windowMs(config)),
    };
  }

  /** Timestamps still inside the trailing window, ascending */
  private inWindow(state: SlidingWindowState | null, config: RateLimitConfig, now: number): number[] {
    const windowStart = now - windowMs(config);
    return (state?.timestamps ?? []).filter((t) => t >= windowStart).sort((a, b) => a - b);
  }
}
