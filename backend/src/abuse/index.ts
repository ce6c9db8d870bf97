export { AbuseScorer } from "./scorer";

export type { AbuseScorerOptions, RecordViolationOptions, ViolationResult } from "./scorer";
