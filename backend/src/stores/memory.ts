/**
 * Process-local counter store.
 *
 * Always available, used on its own for single-process deployments and as the
 * fallback target when the shared store is unreachable. Expiry is lazy (checked
 * on access against the injected clock) plus an optional periodic sweep.
 */

import { systemClock, type Clock } from "../runtime/clock";
import { storeLog } from "../logger";
import type { CounterStore, StateMutator } from "./types";

interface Entry {
  value: string;
  expiresAt: number | null;
}

export interface MemoryCounterStoreOptions {
  clock?: Clock;
  /** Interval for dropping expired keys; 0 disables the timer */
  sweepIntervalMs?: number;
}

export class MemoryCounterStore implements CounterStore {
  readonly name = "memory";
  private data: Map<string, Entry> = new Map();
  private clock: Clock;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: MemoryCounterStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;

    const interval = options.sweepIntervalMs ?? 0;
    if (interval > 0) {
      this.sweepTimer = setInterval(() => {
        const removed = this.sweep();
        if (removed > 0) storeLog.debug({ removed }, "Swept expired counters");
      }, interval);
      this.sweepTimer.unref();
    }
  }

  async get(key: string): Promise<string | null> {
    return this.read(key);
  }

  async atomicIncrement(key: string, amount: number, ttlSeconds: number): Promise<number> {
    const existing = this.readEntry(key);
    const current = existing ? Number(existing.value) : 0;
    if (!Number.isFinite(current)) {
      throw new TypeError(`Value at ${key} is not a number`);
    }

    const next = current + amount;
    const expiresAt = existing?.expiresAt ?? this.expiry(ttlSeconds);
    this.data.set(key, { value: String(next), expiresAt });
    return next;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.data.set(key, { value, expiresAt: this.expiry(ttlSeconds) });
  }

  async delete(key: string): Promise<boolean> {
    return this.data.delete(key);
  }

  async update(key: string, ttlSeconds: number, mutate: StateMutator): Promise<string> {
    // Read, mutate and write in one synchronous turn: no other caller can interleave.
    const next = mutate(this.read(key));
    this.data.set(key, { value: next, expiresAt: this.expiry(ttlSeconds) });
    return next;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /** Drop expired keys and return how many were removed. */
  sweep(): number {
    const now = this.clock.now();
    let removed = 0;
    for (const [key, entry] of this.data) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) {
        this.data.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Number of keys held, expired or not. */
  size(): number {
    return this.data.size;
  }

  clear(): void {
    this.data.clear();
  }

  private read(key: string): string | null {
    return this.readEntry(key)?.value ?? null;
  }

  private readEntry(key: string): Entry | undefined {
    const entry = this.data.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && entry.expiresAt <= this.clock.now()) {
      this.data.delete(key);
      return undefined;
    }
    return entry;
  }

  private expiry(ttlSeconds: number | undefined): number | null {
    if (ttlSeconds === undefined || ttlSeconds <= 0) return null;
    return this.clock.now() + ttlSeconds * 1000;
  }
}
