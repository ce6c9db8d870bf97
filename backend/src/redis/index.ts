// Redis exports

export { createRedisClient } from "./client";

export type { RedisConfig } from "./client";
