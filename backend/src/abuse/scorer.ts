/**
 * Abuse Scorer
 *
 * Running trust-violation score per actor, independent of any single action's
 * quota. Each violation adds `baseIncrement`, scaled by
 * (1 + recentViolations * adaptiveFactor) when the violated action is adaptive.
 * A score above `blockThreshold` blocks the actor from every action until an
 * operator resets it. Scores never decay on their own.
 */

import type { ViolationRecord } from "@ratewarden/shared";
import { abuseLog } from "../logger";
import { systemClock, type Clock } from "../runtime/clock";
import type { ViolationReporter } from "../violations";

export interface AbuseScorerOptions {
  clock?: Clock;
  reporter?: ViolationReporter;
  blockThreshold?: number;
  baseIncrement?: number;
  adaptiveFactor?: number;
  /** Trailing window in which earlier violations count as recent */
  recencyWindowSeconds?: number;
  /** Max violation records kept per actor */
  historyLimit?: number;
  /** Violation records older than this are dropped */
  historyRetentionSeconds?: number;
}

export interface RecordViolationOptions {
  adaptive?: boolean;
  cascadedFrom?: string;
}

export interface ViolationResult {
  score: number;
  increment: number;
  /** Earlier violations inside the recency window, excluding this one */
  recentViolations: number;
  /** Retained violations for the actor, this one included */
  violationCount: number;
  /** True only for the violation that first pushed the score over the threshold */
  crossedThreshold: boolean;
}

interface ActorRecord {
  score: number;
  history: ViolationRecord[];
  /** Suspicious-activity event already sent for the current block */
  alerted: boolean;
}

export class AbuseScorer {
  private actors: Map<string, ActorRecord> = new Map();
  private clock: Clock;
  private reporter?: ViolationReporter;
  private blockThreshold: number;
  private baseIncrement: number;
  private adaptiveFactor: number;
  private recencyWindowMs: number;
  private historyLimit: number;
  private historyRetentionMs: number;

  constructor(options: AbuseScorerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.reporter = options.reporter;
    this.blockThreshold = options.blockThreshold ?? 100;
    this.baseIncrement = options.baseIncrement ?? 10;
    this.adaptiveFactor = options.adaptiveFactor ?? 0.5;
    this.recencyWindowMs = (options.recencyWindowSeconds ?? 3_600) * 1000;
    this.historyLimit = options.historyLimit ?? 500;
    this.historyRetentionMs = (options.historyRetentionSeconds ?? 86_400) * 1000;
  }

  get threshold(): number {
    return this.blockThreshold;
  }

  recordViolation(actorId: string, action: string, options: RecordViolationOptions = {}): ViolationResult {
    const now = this.clock.now();
    const record = this.actorRecord(actorId);
    this.prune(record, now);

    const recentSince = now - this.recencyWindowMs;
    const recentViolations = record.history.filter((v) => v.timestamp > recentSince).length;

    const violation: ViolationRecord = { actorId, action, timestamp: now };
    if (options.cascadedFrom) violation.cascadedFrom = options.cascadedFrom;
    record.history.push(violation);
    if (record.history.length > this.historyLimit) {
      record.history.splice(0, record.history.length - this.historyLimit);
    }

    const increment = options.adaptive
      ? this.baseIncrement * (1 + recentViolations * this.adaptiveFactor)
      : this.baseIncrement;
    record.score += increment;

    abuseLog.debug({ actorId, action, increment, score: record.score, recentViolations }, "Violation recorded");

    const crossedThreshold = !record.alerted && record.score > this.blockThreshold;
    if (crossedThreshold) {
      record.alerted = true;
      abuseLog.warn({ actorId, action, score: record.score, violations: record.history.length }, "Abuse threshold crossed, actor blocked");
      this.reporter?.emit({
        type: "suspicious_activity",
        actorId,
        action,
        score: record.score,
        violationCount: record.history.length,
        cascadedFrom: options.cascadedFrom,
      });
    }

    return { score: record.score, increment, recentViolations, violationCount: record.history.length, crossedThreshold };
  }

  getAbuseScore(actorId: string): number {
    return this.actors.get(actorId)?.score ?? 0;
  }

  isBlocked(actorId: string): boolean {
    return this.getAbuseScore(actorId) > this.blockThreshold;
  }

  /** Retained violations, oldest first. */
  getViolationHistory(actorId: string): ViolationRecord[] {
    const record = this.actors.get(actorId);
    if (!record) return [];
    this.prune(record, this.clock.now());
    return record.history.map((v) => ({ ...v }));
  }

  /** Administrative: zero the score and re-arm the suspicious-activity alert. */
  resetAbuseScore(actorId: string, options: { clearHistory?: boolean } = {}): void {
    const record = this.actors.get(actorId);
    if (!record) return;

    record.score = 0;
    record.alerted = false;
    if (options.clearHistory) record.history = [];

    abuseLog.info({ actorId, clearedHistory: options.clearHistory ?? false }, "Reset abuse score");
  }

  /** Forget actors with nothing left to remember. Returns how many were dropped. */
  sweep(): number {
    const now = this.clock.now();
    let removed = 0;
    for (const [actorId, record] of this.actors) {
      this.prune(record, now);
      if (record.score === 0 && record.history.length === 0) {
        this.actors.delete(actorId);
        removed++;
      }
    }
    return removed;
  }

  private actorRecord(actorId: string): ActorRecord {
    let record = this.actors.get(actorId);
    if (!record) {
      record = { score: 0, history: [], alerted: false };
      this.actors.set(actorId, record);
    }
    return record;
  }

  private prune(record: ActorRecord, now: number): void {
    const retainedSince = now - this.historyRetentionMs;
    const firstKept = record.history.findIndex((v) => v.timestamp > retainedSince);
    if (firstKept === -1) {
      record.history = [];
    } else if (firstKept > 0) {
      record.history.splice(0, firstKept);
    }
  }
}
