/**
 * Limit Registry
 *
 * Action → RateLimitConfig plus the deployment cascade map. Reads go against an
 * immutable snapshot; writes build a new snapshot and swap it in, so a check
 * that already holds a config keeps it while a re-registration lands.
 */

import type { RateLimitConfig } from "@ratewarden/shared";
import { limiterLog } from "../logger";
import { ConfigurationError } from "../errors";
import {
  ActionNameSchema,
  CascadeTargetsSchema,
  RateLimitConfigSchema,
  parseOrThrow,
  type RateLimitConfigInput,
} from "../validation/schemas";

interface Snapshot {
  limits: ReadonlyMap<string, Readonly<RateLimitConfig>>;
  cascades: ReadonlyMap<string, readonly string[]>;
}

export interface LimitRegistryOptions {
  limits?: readonly RateLimitConfigInput[];
  cascades?: Record<string, string[]>;
}

export class LimitRegistry {
  private snapshot: Snapshot = { limits: new Map(), cascades: new Map() };

  constructor(options: LimitRegistryOptions = {}) {
    for (const limit of options.limits ?? []) {
      this.register(limit);
    }
    for (const [action, related] of Object.entries(options.cascades ?? {})) {
      this.registerCascade(action, related);
    }
  }

  /** Validate and upsert. Last write wins. */
  register(input: RateLimitConfigInput): RateLimitConfig {
    const config: RateLimitConfig = Object.freeze(parseOrThrow(RateLimitConfigSchema, input, "rate limit config"));

    const limits = new Map(this.snapshot.limits);
    const replaced = limits.has(config.action);
    limits.set(config.action, config);
    this.snapshot = { ...this.snapshot, limits };

    limiterLog.info(
      { action: config.action, strategy: config.strategy, maxRequests: config.maxRequests, windowSeconds: config.windowSeconds, replaced },
      "Registered rate limit",
    );
    return config;
  }

  /** Set the actions that also receive a violation when `action` is violated. */
  registerCascade(action: string, related: readonly string[]): void {
    const name = parseOrThrow(ActionNameSchema, action, "action name");
    const targets = [...new Set(parseOrThrow(CascadeTargetsSchema, related, "cascade set"))];

    if (targets.includes(name)) {
      throw new ConfigurationError(`Action ${name} cannot cascade to itself`, [`${name}: self-cascade`]);
    }

    const cascades = new Map(this.snapshot.cascades);
    if (targets.length > 0) {
      cascades.set(name, Object.freeze(targets));
    } else {
      cascades.delete(name);
    }
    this.snapshot = { ...this.snapshot, cascades };

    limiterLog.info({ action: name, related: targets }, "Registered cascade set");
  }

  get(action: string): RateLimitConfig | undefined {
    return this.snapshot.limits.get(action);
  }

  has(action: string): boolean {
    return this.snapshot.limits.has(action);
  }

  list(): RateLimitConfig[] {
    return [...this.snapshot.limits.values()];
  }

  cascadesFor(action: string): readonly string[] {
    return this.snapshot.cascades.get(action) ?? [];
  }
}
