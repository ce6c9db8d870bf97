// Environment variables that override the config file

export interface EnvOverrides {
  redis: { url?: string };
  store: { operationTimeoutMs?: number; degradedCooldownMs?: number };
  abuse: { blockThreshold?: number };
}

/** Non-numeric values come through as NaN so config validation reports them. */
function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  return Number(raw);
}

export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): EnvOverrides {
  const overrides: EnvOverrides = { redis: {}, store: {}, abuse: {} };

  const redisUrl = env.REDIS_URL?.trim();
  if (redisUrl) overrides.redis.url = redisUrl;

  const operationTimeoutMs = readNumber(env, "RATEWARDEN_STORE_TIMEOUT_MS");
  if (operationTimeoutMs !== undefined) overrides.store.operationTimeoutMs = operationTimeoutMs;

  const degradedCooldownMs = readNumber(env, "RATEWARDEN_DEGRADED_COOLDOWN_MS");
  if (degradedCooldownMs !== undefined) overrides.store.degradedCooldownMs = degradedCooldownMs;

  const blockThreshold = readNumber(env, "RATEWARDEN_ABUSE_THRESHOLD");
  if (blockThreshold !== undefined) overrides.abuse.blockThreshold = blockThreshold;

  return overrides;
}
