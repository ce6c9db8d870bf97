/**
 * Fallback Counter Store
 *
 * Delegates each call to the shared store while it is healthy and to the local
 * store otherwise:
 * 1. Optional connectivity probe before the operation (bounded by the timeout)
 * 2. The operation itself, bounded by the same timeout
 * 3. On an outage (unreachable or timed out) the current call runs locally and
 *    the shared store is skipped for the cool-down period
 *
 * Errors the shared store answers with, such as a StateConflictError from a
 * busy key, are rethrown and do not degrade the store.
 *
 * A degradation episode is logged and reported once; the first successful
 * shared call after the cool-down closes it.
 *
 * A shared update that times out stops retrying its compare-and-set, but a
 * write already sent before the timeout may still land. That attempt is then
 * counted by both stores.
 */

import { systemClock, type Clock } from "../runtime/clock";
import { storeLog } from "../logger";
import { StateConflictError, StoreTimeoutError, describeError } from "../errors";
import { withTimeout } from "./timeout";
import type { CounterStore, StateMutator } from "./types";

export interface FallbackCounterStoreOptions {
  clock?: Clock;
  /** Bound on each shared-store call, probe included */
  operationTimeoutMs?: number;
  /** How long to stay on the local store after a failure */
  degradedCooldownMs?: number;
  probeBeforeOperation?: boolean;
  /** Called once when an episode starts */
  onDegraded?: (error: unknown) => void;
  /** Called once when an episode ends */
  onRecovered?: (degradedForMs: number) => void;
}

export class FallbackCounterStore implements CounterStore {
  readonly name = "fallback";
  private primary: CounterStore;
  private local: CounterStore;
  private clock: Clock;
  private operationTimeoutMs: number;
  private degradedCooldownMs: number;
  private probeBeforeOperation: boolean;
  private onDegraded?: (error: unknown) => void;
  private onRecovered?: (degradedForMs: number) => void;

  private degradedSince: number | null = null;
  private retryAt = 0;

  constructor(primary: CounterStore, local: CounterStore, options: FallbackCounterStoreOptions = {}) {
    this.primary = primary;
    this.local = local;
    this.clock = options.clock ?? systemClock;
    this.operationTimeoutMs = options.operationTimeoutMs ?? 50;
    this.degradedCooldownMs = options.degradedCooldownMs ?? 30_000;
    this.probeBeforeOperation = options.probeBeforeOperation ?? true;
    this.onDegraded = options.onDegraded;
    this.onRecovered = options.onRecovered;
  }

  isDegraded(): boolean {
    return this.degradedSince !== null;
  }

  get(key: string): Promise<string | null> {
    return this.route("get", (store) => store.get(key));
  }

  atomicIncrement(key: string, amount: number, ttlSeconds: number): Promise<number> {
    return this.route("atomicIncrement", (store) => store.atomicIncrement(key, amount, ttlSeconds));
  }

  set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    return this.route("set", (store) => store.set(key, value, ttlSeconds));
  }

  delete(key: string): Promise<boolean> {
    return this.route("delete", (store) => store.delete(key));
  }

  update(key: string, ttlSeconds: number, mutate: StateMutator): Promise<string> {
    let abandoned = false;
    const guarded: StateMutator = (current) => {
      if (abandoned) {
        throw new StoreTimeoutError(this.primary.name, "update", this.operationTimeoutMs);
      }
      return mutate(current);
    };

    return this.route(
      "update",
      (store) => store.update(key, ttlSeconds, store === this.primary ? guarded : mutate),
      () => {
        abandoned = true;
      },
    );
  }

  async ping(): Promise<void> {
    await this.route("ping", (store) => store.ping());
  }

  async close(): Promise<void> {
    await Promise.all([this.primary.close(), this.local.close()]);
  }

  private async route<T>(
    operation: string,
    run: (store: CounterStore) => Promise<T>,
    abandon?: () => void,
  ): Promise<T> {
    if (this.degradedSince !== null && this.clock.now() < this.retryAt) {
      return run(this.local);
    }

    let result: T;
    try {
      if (this.probeBeforeOperation) {
        await withTimeout(this.primary.ping(), this.operationTimeoutMs, this.primary.name, "probe");
      }
      result = await withTimeout(run(this.primary), this.operationTimeoutMs, this.primary.name, operation);
    } catch (error) {
      if (error instanceof StateConflictError) {
        storeLog.debug({ operation, key: error.key }, "Shared store update conflicted, not degrading");
        throw error;
      }
      abandon?.();
      this.degrade(operation, error);
      return run(this.local);
    }

    this.recover();
    return result;
  }

  private degrade(operation: string, error: unknown): void {
    const now = this.clock.now();
    this.retryAt = now + this.degradedCooldownMs;

    if (this.degradedSince !== null) {
      storeLog.debug({ operation, error: describeError(error) }, "Shared store still unavailable");
      return;
    }

    this.degradedSince = now;
    storeLog.warn(
      { store: this.primary.name, operation, error: describeError(error), cooldownMs: this.degradedCooldownMs },
      "Shared counter store unavailable, falling back to local store",
    );
    this.onDegraded?.(error);
  }

  private recover(): void {
    if (this.degradedSince === null) return;

    const degradedForMs = this.clock.now() - this.degradedSince;
    this.degradedSince = null;
    this.retryAt = 0;
    storeLog.info({ store: this.primary.name, degradedForMs }, "Shared counter store recovered");
    this.onRecovered?.(degradedForMs);
  }
}
