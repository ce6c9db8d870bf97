// Token Bucket Rate Limiter
// Allows bursts while maintaining steady rate
// Good for actions that can absorb occasional spikes (API calls, pack creation)

import { z } from "zod";
import { Strategy, type RateLimitConfig } from "@ratewarden/shared";
import { JsonStateStrategy, windowMs } from "./strategy";
import type { QuotaSnapshot, StrategyOutcome } from "./types";

const TokenBucketStateSchema = z.object({
  tokens: z.number().min(0),
  lastRefill: z.number(),
});

export type TokenBucketState = z.infer<typeof TokenBucketStateSchema>;

export class TokenBucketStrategy extends JsonStateStrategy<TokenBucketState> {
  readonly kind = Strategy.TokenBucket;
  protected readonly schema = TokenBucketStateSchema;
  private ttlMultiplier: number;

  /**
   * @param ttlMultiplier - idle state is kept this many windows so partial refills survive quiet periods
   */
  constructor(ttlMultiplier = 2) {
    super();
    this.ttlMultiplier = ttlMultiplier;
  }

  ttlSeconds(config: RateLimitConfig): number {
    return config.windowSeconds * this.ttlMultiplier;
  }

  protected step(state: TokenBucketState | null, config: RateLimitConfig, now: number): StrategyOutcome & { state: TokenBucketState } {
    const bucketSize = config.maxRequests;
    let tokens = this.refill(state, config, now);

    // Try to consume a token
    const allowed = tokens >= 1;
    if (allowed) tokens -= 1;

    const window = windowMs(config);
    return {
      allowed,
      limit: bucketSize,
      remaining: Math.floor(tokens),
      // Time until enough tokens for one request
      retryAfterMs: allowed ? 0 : ((1 - tokens) * window) / bucketSize,
      resetAtMs: now + ((bucketSize - tokens) * window) / bucketSize,
      state: { tokens, lastRefill: now },
    };
  }

  protected snapshot(state: TokenBucketState | null, config: RateLimitConfig, now: number): QuotaSnapshot {
    const tokens = this.refill(state, config, now);
    return {
      limit: config.maxRequests,
      remaining: Math.floor(tokens),
      resetAtMs: now + ((config.maxRequests - tokens) * windowMs(config)) / config.maxRequests,
    };
  }

  /** Tokens available at `now`. A bucket never seen before starts full. */
  private refill(state: TokenBucketState | null, config: RateLimitConfig, now: number): number {
    const bucketSize = config.maxRequests;
    if (!state) return bucketSize;

    // Multiply before dividing so whole-token refills land exactly on 1.0
    const elapsed = Math.max(0, now - state.lastRefill);
    return Math.min(bucketSize, state.tokens + (elapsed * bucketSize) / windowMs(config));
  }
}
