// Counter store exports

export { MemoryCounterStore } from "./memory";
export { RedisCounterStore } from "./redis";
export { FallbackCounterStore } from "./fallback";
export { withTimeout } from "./timeout";

export type { CounterStore, StateMutator } from "./types";
export type { MemoryCounterStoreOptions } from "./memory";
export type { RedisCounterStoreOptions } from "./redis";
export type { FallbackCounterStoreOptions } from "./fallback";
