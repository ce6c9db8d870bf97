// Violation history and the events handed to external sinks

export interface ViolationRecord {
  actorId: string;
  action: string;
  /** Epoch milliseconds */
  timestamp: number;
  /** Set when the violation was recorded through a cascade from another action */
  cascadedFrom?: string;
}

export const ViolationEventType = {
  RateLimitExceeded: "rate_limit_exceeded",
  SuspiciousActivity: "suspicious_activity",
  StoreDegraded: "store_degraded",
  ConfigurationError: "configuration_error",
} as const;

export type ViolationEventType = typeof ViolationEventType[keyof typeof ViolationEventType];

export type ViolationEventCategory = "security" | "operational";

export type ViolationSeverity = "info" | "warning" | "critical";

export interface ViolationEvent {
  id: string;
  type: ViolationEventType;
  category: ViolationEventCategory;
  severity: ViolationSeverity;
  actorId: string | null;
  action: string | null;
  score: number | null;
  violationCount: number | null;
  /** Epoch milliseconds */
  timestamp: number;
  cascadedFrom?: string;
  detail?: string;
}
