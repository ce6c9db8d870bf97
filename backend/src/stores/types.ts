// Counter store contract shared by the local, shared and fallback implementations

/**
 * Receives the current serialized value (null when absent or expired) and returns the next one.
 * Must be pure: the shared store may call it again after losing a compare-and-set race.
 */
export type StateMutator = (current: string | null) => string;

export interface CounterStore {
  readonly name: string;

  get(key: string): Promise<string | null>;

  /**
   * Add `amount` to the integer at `key` and return the new value.
   * The TTL is only applied when the key carries none yet.
   */
  atomicIncrement(key: string, amount: number, ttlSeconds: number): Promise<number>;

  set(key: string, value: string, ttlSeconds?: number): Promise<void>;

  /** Returns true when a key was removed. */
  delete(key: string): Promise<boolean>;

  /** Atomic read-modify-write. Resolves with the value that was written. */
  update(key: string, ttlSeconds: number, mutate: StateMutator): Promise<string>;

  /** Connectivity probe. */
  ping(): Promise<void>;

  close(): Promise<void>;
}
