/**
 * Default Action Limits
 *
 * Seed configuration registered at startup. Numbers are deployment data and
 * can be overridden from the config file or at runtime through registerLimit.
 */

import { Strategy, type RateLimitConfig, type StrategyKind } from "@ratewarden/shared";

function createActionLimit(
  action: string,
  maxRequests: number,
  windowSeconds: number,
  strategy: StrategyKind,
  description: string,
): RateLimitConfig {
  return {
    action,
    maxRequests,
    windowSeconds,
    strategy,
    enableAdaptive: false,
    enableCascading: false,
    description,
  };
}

export const DEFAULT_LIMITS: readonly RateLimitConfig[] = [
  createActionLimit("pack_create", 5, 3_600, Strategy.TokenBucket, "Pack creation"),
  createActionLimit("pack_purchase", 10, 86_400, Strategy.SlidingWindow, "Pack purchases (sensitive)"),
  createActionLimit("payment", 5, 3_600, Strategy.TokenBucket, "Payment capture"),
  createActionLimit("api_call", 100, 60, Strategy.TokenBucket, "General API calls"),
  createActionLimit("login_attempt", 10, 900, Strategy.FixedWindow, "Login attempts"),
  createActionLimit("failed_login", 5, 900, Strategy.FixedWindow, "Failed logins"),
];

// Get a default limit by action name
export function getDefaultLimit(action: string): RateLimitConfig | undefined {
  return DEFAULT_LIMITS.find((limit) => limit.action === action);
}
