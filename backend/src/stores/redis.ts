// Redis Counter Store
// Shared across processes, atomic through Lua scripts
// State updates are optimistic: read, compute in-process, compare-and-set

import type Redis from "ioredis";
import { storeLog } from "../logger";
import { StateConflictError, describeError } from "../errors";
import type { CounterStore, StateMutator } from "./types";

// Write ARGV[3] only if the key still holds what the caller read.
// ARGV[1] = '1' when the caller saw a value (ARGV[2]), '0' when it saw nothing.
const COMPARE_AND_SET_SCRIPT = `
local key = KEYS[1]
local had_value = ARGV[1]
local expected = ARGV[2]
local next_value = ARGV[3]
local ttl_ms = tonumber(ARGV[4])

local current = redis.call('GET', key)
if had_value == '1' then
    if current ~= expected then
        return 0
    end
elseif current then
    return 0
end

if ttl_ms > 0 then
    redis.call('SET', key, next_value, 'PX', ttl_ms)
else
    redis.call('SET', key, next_value)
end
return 1
`;

// Increment and attach the TTL only when the key has none.
const INCREMENT_SCRIPT = `
local key = KEYS[1]
local amount = tonumber(ARGV[1])
local ttl_ms = tonumber(ARGV[2])

local value = redis.call('INCRBY', key, amount)
if ttl_ms > 0 and redis.call('PTTL', key) < 0 then
    redis.call('PEXPIRE', key, ttl_ms)
end
return value
`;

const SCRIPTS = {
  compareAndSet: COMPARE_AND_SET_SCRIPT,
  increment: INCREMENT_SCRIPT,
} as const;

type ScriptName = keyof typeof SCRIPTS;

const SCRIPT_NAMES: readonly ScriptName[] = ["compareAndSet", "increment"];

export interface RedisCounterStoreOptions {
  /** Compare-and-set attempts before giving up on an update */
  maxUpdateAttempts?: number;
}

export class RedisCounterStore implements CounterStore {
  readonly name = "redis";
  private redis: Redis;
  private scriptShas: Map<ScriptName, string> = new Map();
  private maxUpdateAttempts: number;

  constructor(redis: Redis, options: RedisCounterStoreOptions = {}) {
    this.redis = redis;
    this.maxUpdateAttempts = options.maxUpdateAttempts ?? 16;
  }

  /**
   * Load Lua scripts into Redis
   */
  async initialize(): Promise<void> {
    for (const name of SCRIPT_NAMES) {
      await this.loadScript(name);
    }
    storeLog.info("Redis counter store initialized");
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async atomicIncrement(key: string, amount: number, ttlSeconds: number): Promise<number> {
    const result = await this.runScript("increment", key, [amount, Math.round(ttlSeconds * 1000)]);
    const value = Number(result);
    if (!Number.isFinite(value)) {
      throw new TypeError(`Unexpected increment result for ${key}: ${String(result)}`);
    }
    return value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds !== undefined && ttlSeconds > 0) {
      await this.redis.set(key, value, "PX", Math.round(ttlSeconds * 1000));
    } else {
      await this.redis.set(key, value);
    }
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.redis.del(key);
    return removed > 0;
  }

  async update(key: string, ttlSeconds: number, mutate: StateMutator): Promise<string> {
    const ttlMs = Math.round(ttlSeconds * 1000);

    for (let attempt = 1; attempt <= this.maxUpdateAttempts; attempt++) {
      const current = await this.redis.get(key);
      const next = mutate(current);
      const written = await this.runScript("compareAndSet", key, [
        current === null ? "0" : "1",
        current ?? "",
        next,
        ttlMs,
      ]);
      if (Number(written) === 1) return next;

      storeLog.debug({ key, attempt }, "Compare-and-set lost race, retrying");
    }

    throw new StateConflictError(key, this.maxUpdateAttempts);
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      storeLog.warn({ error: describeError(error) }, "Redis quit failed");
    }
  }

  private async loadScript(name: ScriptName): Promise<string> {
    const sha = await this.redis.script("LOAD", SCRIPTS[name]);
    if (typeof sha !== "string") {
      throw new TypeError(`SCRIPT LOAD returned ${String(sha)} for ${name}`);
    }
    this.scriptShas.set(name, sha);
    return sha;
  }

  private async runScript(name: ScriptName, key: string, args: (string | number)[]): Promise<unknown> {
    const sha = this.scriptShas.get(name) ?? (await this.loadScript(name));
    try {
      return await this.redis.evalsha(sha, 1, key, ...args);
    } catch (error) {
      // Script cache flushed (restart or failover): reload once and retry
      if (error instanceof Error && error.message.includes("NOSCRIPT")) {
        const reloaded = await this.loadScript(name);
        return this.redis.evalsha(reloaded, 1, key, ...args);
      }
      throw error;
    }
  }
}
