/**
 * Wires a RateLimiter from configuration: a fallback store over Redis when a
 * Redis URL or host is configured (or over a given shared store), otherwise
 * the process-local store.
 */

import { limiterLog, storeLog } from "../logger";
import { describeError } from "../errors";
import { systemClock, type Clock } from "../runtime/clock";
import { RateWardenConfigSchema, type RateWardenConfig, type RateWardenConfigInput } from "../runtime/config";
import { FallbackCounterStore, MemoryCounterStore, RedisCounterStore, type CounterStore } from "../stores";
import { createRedisClient } from "../redis";
import { AbuseScorer } from "../abuse";
import { ViolationReporter, createLoggingSink, type ViolationSink } from "../violations";
import { METRIC, MetricsRegistry } from "../metrics";
import { LimitRegistry } from "./registry";
import { DEFAULT_LIMITS } from "./defaults";
import { parseOrThrow } from "../validation/schemas";
import { RateLimiter } from "./limiter";

export interface CreateRateLimiterOptions {
  /** Defaults to a sink that logs every event */
  sink?: ViolationSink;
  clock?: Clock;
  /** Replaces the whole counter store; used by tests and embedders */
  store?: CounterStore;
  /** Shared store to put behind the local fallback instead of Redis */
  sharedStore?: CounterStore;
}

function buildStore(
  config: RateWardenConfig,
  clock: Clock,
  reporter: ViolationReporter,
  metrics: MetricsRegistry,
  sharedStore?: CounterStore,
): CounterStore {
  const local = new MemoryCounterStore({ clock, sweepIntervalMs: config.store.sweepIntervalMs });
  if (!sharedStore && !config.redis.url && !config.redis.host) {
    storeLog.info("No Redis configured, using in-memory counter store");
    return local;
  }

  const shared = sharedStore ?? createRedisStore(config);

  return new FallbackCounterStore(shared, local, {
    clock,
    operationTimeoutMs: config.store.operationTimeoutMs,
    degradedCooldownMs: config.store.degradedCooldownMs,
    probeBeforeOperation: config.store.probeBeforeOperation,
    onDegraded: (error) => {
      metrics.incCounter(METRIC.storeDegradations);
      metrics.setGauge(METRIC.storeDegraded, {}, 1);
      reporter.emit({
        type: "store_degraded",
        actorId: null,
        action: null,
        score: null,
        violationCount: null,
        detail: describeError(error),
      });
    },
    onRecovered: () => {
      metrics.setGauge(METRIC.storeDegraded, {}, 0);
    },
  });
}

function createRedisStore(config: RateWardenConfig): RedisCounterStore {
  const store = new RedisCounterStore(createRedisClient(config.redis), {
    maxUpdateAttempts: config.store.maxUpdateAttempts,
  });
  store.initialize().catch((error: unknown) => {
    storeLog.warn({ error: describeError(error) }, "Redis scripts not loaded yet, will load on first use");
  });
  return store;
}

export function createRateLimiter(
  input: RateWardenConfigInput = {},
  options: CreateRateLimiterOptions = {},
): RateLimiter {
  const config = parseOrThrow(RateWardenConfigSchema, input, "configuration");
  const clock = options.clock ?? systemClock;
  const reporter = new ViolationReporter(options.sink ?? createLoggingSink(), clock);
  const metrics = new MetricsRegistry();

  const registry = new LimitRegistry({ limits: [...DEFAULT_LIMITS, ...config.limits], cascades: config.cascades });
  const scorer = new AbuseScorer({ ...config.abuse, clock, reporter });
  const store = options.store ?? buildStore(config, clock, reporter, metrics, options.sharedStore);

  limiterLog.info({ store: store.name, limits: registry.list().length }, "Rate limiter ready");

  return new RateLimiter({
    store,
    registry,
    scorer,
    reporter,
    clock,
    metrics,
    keyPrefix: config.store.keyPrefix,
    tokenBucketTtlMultiplier: config.store.tokenBucketTtlMultiplier,
  });
}
