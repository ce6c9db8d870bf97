// Public API of the rate limiting and abuse detection engine

export * from "./ratelimit";
export * from "./stores";
export * from "./abuse";
export * from "./violations";
export { MetricsRegistry, METRIC } from "./metrics";
export { createRedisClient } from "./redis";
export type { RedisConfig } from "./redis";
export { loadConfig, CONFIG_FILE, RateWardenConfigSchema } from "./runtime/config";
export type { RateWardenConfig, RateWardenConfigInput } from "./runtime/config";
export { readEnvOverrides } from "./runtime/env";
export { systemClock, ManualClock } from "./runtime/clock";
export type { Clock } from "./runtime/clock";
export {
  RateLimitError,
  ConfigurationError,
  StoreUnavailableError,
  StoreTimeoutError,
  StateConflictError,
  RateLimitExceededError,
  describeError,
} from "./errors";
export type { RateLimitErrorCode } from "./errors";
export { logger } from "./logger";
export type { RateLimitConfigInput } from "./validation/schemas";
export * from "@ratewarden/shared";
