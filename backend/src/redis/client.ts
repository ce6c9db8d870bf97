/**
 * Redis Connection Factory
 *
 * Builds the ioredis client behind the shared counter store. Commands fail fast
 * while disconnected (no offline queue, one retry per request) so the fallback
 * store can take over instead of callers queueing behind a dead connection.
 * ioredis keeps reconnecting in the background.
 */

import Redis, { type RedisOptions } from "ioredis";
import { storeLog } from "../logger";

export interface RedisConfig {
  url?: string;
  host?: string;
  port?: number;
  password?: string;
  db?: number;
  tls?: boolean;
  connectTimeoutMs?: number;
}

export function createRedisClient(config: RedisConfig): Redis {
  const options: RedisOptions = {
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    enableReadyCheck: true,
    connectTimeout: config.connectTimeoutMs ?? 2_000,
    retryStrategy: (times) => Math.min(times * 200, 5_000),
  };

  const client = config.url
    ? new Redis(config.url, options)
    : new Redis({
        ...options,
        host: config.host ?? "localhost",
        port: config.port ?? 6379,
        password: config.password,
        db: config.db ?? 0,
        tls: config.tls ? {} : undefined,
      });

  setupEventHandlers(client);
  return client;
}

function setupEventHandlers(client: Redis): void {
  client.on("ready", () => {
    storeLog.info("Redis ready");
  });

  client.on("error", (err: Error) => {
    storeLog.error({ error: err.message }, "Redis error");
  });

  client.on("close", () => {
    storeLog.warn("Redis connection closed");
  });

  client.on("reconnecting", (delayMs: number) => {
    storeLog.info({ delayMs }, "Redis reconnecting...");
  });
}
