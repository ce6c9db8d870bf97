import { RateLimitExceededError } from "../errors";
import type { RateLimiter } from "./limiter";

/**
 * Wrap an async operation whose first argument is the acting actor's id.
 * The operation only runs when the limiter allows the attempt; otherwise the
 * returned function rejects with RateLimitExceededError carrying the decision.
 */
export function guardAction<A extends unknown[], R>(
  limiter: RateLimiter,
  action: string,
  fn: (actorId: string, ...args: A) => Promise<R>,
): (actorId: string, ...args: A) => Promise<R> {
  return async (actorId, ...args) => {
    const decision = await limiter.checkLimit(actorId, action);
    if (!decision.allowed) {
      throw new RateLimitExceededError(decision);
    }
    return fn(actorId, ...args);
  };
}
