export {
  Strategy,
  STRATEGY_KINDS,
  DecisionReason,
} from "./ratelimit";

export type {
  StrategyKind,
  RateLimitConfig,
  LimitDecision,
  ActionStatus,
  ActorStatus,
} from "./ratelimit";

export { ViolationEventType } from "./violations";

export type {
  ViolationRecord,
  ViolationEventCategory,
  ViolationSeverity,
  ViolationEvent,
} from "./violations";
