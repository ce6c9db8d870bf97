// Rate limiting exports

export { RateLimiter, stateKey, UNREGISTERED_ACTION_LABEL } from './limiter';
export { LimitRegistry } from './registry';
export { DEFAULT_LIMITS, getDefaultLimit } from './defaults';
export { TokenBucketStrategy } from './token-bucket';
export { SlidingWindowStrategy } from './sliding-window';
export { FixedWindowStrategy } from './fixed-window';
export { JsonStateStrategy } from './strategy';
export { createRateLimiter } from './factory';
export { guardAction } from './guard';

// Middleware exports
export { limitAction } from './middleware';

export type {
  Evaluation,
  LimitStrategy,
  QuotaSnapshot,
  StrategyOutcome,
} from './types';

export type { RateLimiterOptions } from './limiter';
export type { LimitRegistryOptions } from './registry';
export type { CreateRateLimiterOptions } from './factory';
export type { LimitActionOptions } from './middleware';
