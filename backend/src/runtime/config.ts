// Limiter configuration: defaults, optional ratewarden.json, then environment overrides

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { serverLog } from "../logger";
import { ConfigurationError, describeError } from "../errors";
import { CascadeMapSchema, RateLimitConfigSchema, parseOrThrow } from "../validation/schemas";
import { readEnvOverrides } from "./env";

export const CONFIG_FILE = "ratewarden.json";

const RedisSectionSchema = z.object({
  url: z.string().url().optional(),
  host: z.string().optional(),
  port: z.number().int().positive().optional(),
  password: z.string().optional(),
  db: z.number().int().nonnegative().optional(),
  tls: z.boolean().optional(),
  connectTimeoutMs: z.number().int().positive().optional(),
});

const StoreSectionSchema = z.object({
  keyPrefix: z.string().min(1).default("rl"),
  operationTimeoutMs: z.number().int().positive().default(50),
  degradedCooldownMs: z.number().int().nonnegative().default(30_000),
  probeBeforeOperation: z.boolean().default(true),
  sweepIntervalMs: z.number().int().nonnegative().default(60_000),
  maxUpdateAttempts: z.number().int().positive().default(16),
  tokenBucketTtlMultiplier: z.number().positive().default(2),
});

const AbuseSectionSchema = z.object({
  blockThreshold: z.number().positive().default(100),
  baseIncrement: z.number().positive().default(10),
  adaptiveFactor: z.number().nonnegative().default(0.5),
  recencyWindowSeconds: z.number().int().positive().default(3_600),
  historyLimit: z.number().int().positive().default(500),
  historyRetentionSeconds: z.number().int().positive().default(86_400),
});

export const RateWardenConfigSchema = z.object({
  redis: RedisSectionSchema.default({}),
  store: StoreSectionSchema.default({}),
  abuse: AbuseSectionSchema.default({}),
  /** Registered after the default table; same action replaces the default */
  limits: z.array(RateLimitConfigSchema).default([]),
  cascades: CascadeMapSchema.default({}),
});

export type RateWardenConfig = z.output<typeof RateWardenConfigSchema>;
export type RateWardenConfigInput = z.input<typeof RateWardenConfigSchema>;

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(path: string): RawObject {
  if (!existsSync(path)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Could not read ${path}: ${describeError(err)}`, [`(root): ${describeError(err)}`]);
  }

  if (!isObject(parsed)) {
    throw new ConfigurationError(`${path} must contain a JSON object`, ["(root): Expected object"]);
  }
  return parsed;
}

function mergeSection(raw: RawObject, section: string, overrides: RawObject): void {
  if (Object.keys(overrides).length === 0) return;
  const current = raw[section];
  raw[section] = isObject(current) ? { ...current, ...overrides } : overrides;
}

export function loadConfig(projectRoot: string, env: NodeJS.ProcessEnv = process.env): RateWardenConfig {
  const path = join(projectRoot, CONFIG_FILE);
  const raw = { ...readConfigFile(path) };

  const overrides = readEnvOverrides(env);
  mergeSection(raw, "redis", overrides.redis);
  mergeSection(raw, "store", overrides.store);
  mergeSection(raw, "abuse", overrides.abuse);

  const config = parseOrThrow(RateWardenConfigSchema, raw, "configuration");
  serverLog.debug(
    { path, limits: config.limits.length, cascades: Object.keys(config.cascades).length, redis: config.redis.url !== undefined },
    "Loaded configuration",
  );
  return config;
}
