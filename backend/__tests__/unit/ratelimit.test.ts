/**
 * Unit Tests: Rate Limiting Algorithms
 */

import { describe, it, expect } from 'vitest';
import { Strategy, type RateLimitConfig } from '@ratewarden/shared';
import { TokenBucketStrategy } from '../../src/ratelimit/token-bucket';
import { SlidingWindowStrategy } from '../../src/ratelimit/sliding-window';
import { FixedWindowStrategy } from '../../src/ratelimit/fixed-window';
import type { Evaluation, LimitStrategy } from '../../src/ratelimit/types';

function limit(overrides: Partial<RateLimitConfig> & Pick<RateLimitConfig, 'strategy'>): RateLimitConfig {
  return {
    action: 'test_action',
    maxRequests: 5,
    windowSeconds: 3600,
    enableAdaptive: false,
    enableCascading: false,
    ...overrides,
  };
}

// Evaluate `times` attempts at `now`, threading state through
function drain(strategy: LimitStrategy, config: RateLimitConfig, times: number, now: number, stored: string | null = null) {
  let state = stored;
  const results: Evaluation[] = [];
  for (let i = 0; i < times; i++) {
    const result = strategy.evaluate(state, config, now);
    results.push(result);
    state = result.state;
  }
  return { state, results };
}

describe('Token Bucket Algorithm', () => {
  const strategy = new TokenBucketStrategy();
  const config = limit({ strategy: Strategy.TokenBucket, maxRequests: 5, windowSeconds: 3600 });

  it('should start with a full bucket', () => {
    const result = strategy.evaluate(null, config, 0);

    expect(result.allowed).toBe(true);
    expect(result.remaining).toBe(4);
    expect(result.limit).toBe(5);
    expect(result.state).toBe('{"tokens":4,"lastRefill":0}');
  });

  it('should allow a burst up to capacity then reject', () => {
    const { results } = drain(strategy, config, 6, 0);

    expect(results.map((r) => r.allowed)).toEqual([true, true, true, true, true, false]);
    expect(results.map((r) => r.remaining)).toEqual([4, 3, 2, 1, 0, 0]);
  });

  it('should report time until the next token', () => {
    const { results } = drain(strategy, config, 6, 0);
    const rejected = results[5];

    // One token every 3600s / 5
    expect(rejected.retryAfterMs).toBe(720_000);
    expect(rejected.resetAtMs).toBe(3_600_000);
  });

  it('should refill exactly one token after W/N', () => {
    const { state } = drain(strategy, config, 5, 0);

    expect(strategy.evaluate(state, config, 719_999).allowed).toBe(false);
    expect(strategy.evaluate(state, config, 720_000).allowed).toBe(true);
  });

  it('should not refill beyond capacity', () => {
    const stored = JSON.stringify({ tokens: 2, lastRefill: 0 });
    const result = strategy.evaluate(stored, config, 10 * 3_600_000);

    expect(result.allowed).toBe(true);
    expect(result.remaining).toBe(4);
  });

  it('should clamp negative elapsed time to zero', () => {
    const stored = JSON.stringify({ tokens: 0, lastRefill: 1000 });
    const result = strategy.evaluate(stored, config, 500);

    expect(result.allowed).toBe(false);
    expect(result.retryAfterMs).toBe(720_000);
    expect(result.state).toBe('{"tokens":0,"lastRefill":500}');
  });

  it('should treat undecodable state as a fresh bucket', () => {
    expect(strategy.evaluate('not json', config, 0).remaining).toBe(4);
    expect(strategy.evaluate('{"tokens":-1,"lastRefill":0}', config, 0).remaining).toBe(4);
    expect(strategy.evaluate('{"timestamps":[]}', config, 0).remaining).toBe(4);
  });

  it('should inspect without consuming', () => {
    const { state } = drain(strategy, config, 2, 0);
    const snapshot = strategy.inspect(state, config, 0);

    expect(snapshot).toEqual({ limit: 5, remaining: 3, resetAtMs: 1_440_000 });
    expect(strategy.inspect(state, config, 0)).toEqual(snapshot);
  });

  it('should keep idle state for two windows by default', () => {
    expect(strategy.ttlSeconds(config)).toBe(7200);
    expect(new TokenBucketStrategy(3).ttlSeconds(config)).toBe(10_800);
  });
});

describe('Sliding Window Algorithm', () => {
  const strategy = new SlidingWindowStrategy();
  const config = limit({ strategy: Strategy.SlidingWindow, maxRequests: 3, windowSeconds: 60 });

  it('should allow requests within limit', () => {
    const { results } = drain(strategy, config, 3, 0);

    expect(results.map((r) => r.allowed)).toEqual([true, true, true]);
    expect(results.map((r) => r.remaining)).toEqual([2, 1, 0]);
  });

  it('should block requests over limit until the oldest leaves the window', () => {
    let state: string | null = null;
    for (const now of [0, 1000, 2000]) {
      state = strategy.evaluate(state, config, now).state;
    }

    const rejected = strategy.evaluate(state, config, 3000);
    expect(rejected.allowed).toBe(false);
    expect(rejected.remaining).toBe(0);
    expect(rejected.retryAfterMs).toBe(57_001);
    expect(rejected.resetAtMs).toBe(62_001);
  });

  it('should not record rejected attempts', () => {
    const { state } = drain(strategy, config, 3, 0);
    const rejected = strategy.evaluate(state, config, 1000);

    expect(rejected.state).toBe(state);
    expect(rejected.state).toBe('{"timestamps":[0,0,0]}');
  });

  it('should keep entries exactly one window old', () => {
    const { state } = drain(strategy, config, 3, 0);

    expect(strategy.evaluate(state, config, 59_999).allowed).toBe(false);
    expect(strategy.evaluate(state, config, 60_000).allowed).toBe(false);

    const admitted = strategy.evaluate(state, config, 60_001);
    expect(admitted.allowed).toBe(true);
    expect(admitted.remaining).toBe(2);
    expect(admitted.state).toBe('{"timestamps":[60001]}');
  });

  it('should inspect without consuming', () => {
    const { state } = drain(strategy, config, 1, 5000);

    expect(strategy.inspect(state, config, 6000)).toEqual({ limit: 3, remaining: 2, resetAtMs: 65_001 });
    expect(strategy.inspect(null, config, 6000)).toEqual({ limit: 3, remaining: 3, resetAtMs: 66_001 });
  });

  it('should outlive the window by a second', () => {
    expect(strategy.ttlSeconds(config)).toBe(61);
  });
});

describe('Fixed Window Algorithm', () => {
  const strategy = new FixedWindowStrategy();
  const config = limit({ strategy: Strategy.FixedWindow, maxRequests: 2, windowSeconds: 900 });

  it('should count within an aligned window', () => {
    const now = 2_700_010;
    const { results } = drain(strategy, config, 3, now);

    expect(results.map((r) => r.allowed)).toEqual([true, true, false]);
    expect(results[1].state).toBe('{"windowStart":2700000,"count":2}');
    expect(results[2].retryAfterMs).toBe(899_990);
    expect(results[2].resetAtMs).toBe(3_600_000);
  });

  it('should reset the count at the next boundary', () => {
    const { state } = drain(strategy, config, 3, 2_700_010);
    const result = strategy.evaluate(state, config, 3_600_000);

    expect(result.allowed).toBe(true);
    expect(result.remaining).toBe(1);
    expect(result.state).toBe('{"windowStart":3600000,"count":1}');
  });

  it('should allow a double burst across a boundary', () => {
    const before = drain(strategy, config, 2, 3_599_999);
    const after = drain(strategy, config, 2, 3_600_000, before.state);

    expect([...before.results, ...after.results].every((r) => r.allowed)).toBe(true);
  });

  it('should inspect without consuming', () => {
    const { state } = drain(strategy, config, 1, 1000);

    expect(strategy.inspect(state, config, 1000)).toEqual({ limit: 2, remaining: 1, resetAtMs: 900_000 });
  });

  it('should expire with the window', () => {
    expect(strategy.ttlSeconds(config)).toBe(900);
  });
});
