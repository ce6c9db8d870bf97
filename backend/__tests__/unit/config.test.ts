/**
 * Unit Tests: Configuration Loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CONFIG_FILE, loadConfig } from '../../src/runtime/config';
import { readEnvOverrides } from '../../src/runtime/env';
import { createRateLimiter } from '../../src/ratelimit/factory';
import { MemoryCounterStore } from '../../src/stores';
import { ConfigurationError } from '../../src/errors';

describe('Config Loading', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ratewarden-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown) {
    writeFileSync(join(dir, CONFIG_FILE), typeof content === 'string' ? content : JSON.stringify(content));
  }

  it('loads default config when no file exists', () => {
    const config = loadConfig(dir, {});

    expect(config.redis).toEqual({});
    expect(config.store).toEqual({
      keyPrefix: 'rl',
      operationTimeoutMs: 50,
      degradedCooldownMs: 30_000,
      probeBeforeOperation: true,
      sweepIntervalMs: 60_000,
      maxUpdateAttempts: 16,
      tokenBucketTtlMultiplier: 2,
    });
    expect(config.abuse.blockThreshold).toBe(100);
    expect(config.limits).toEqual([]);
    expect(config.cascades).toEqual({});
  });

  it('merges a partial file with defaults', () => {
    writeConfig({
      abuse: { blockThreshold: 50 },
      limits: [{ action: 'trade', maxRequests: 3, windowSeconds: 60, strategy: 'sliding-window' }],
      cascades: { failed_login: ['login_attempt'] },
    });

    const config = loadConfig(dir, {});

    expect(config.abuse.blockThreshold).toBe(50);
    expect(config.abuse.baseIncrement).toBe(10);
    expect(config.limits).toEqual([
      { action: 'trade', maxRequests: 3, windowSeconds: 60, strategy: 'sliding-window', enableAdaptive: false, enableCascading: false },
    ]);
    expect(config.cascades).toEqual({ failed_login: ['login_attempt'] });
  });

  it('applies environment overrides over the file', () => {
    writeConfig({ store: { operationTimeoutMs: 80, keyPrefix: 'limits' } });

    const config = loadConfig(dir, {
      REDIS_URL: 'redis://localhost:6379/2',
      RATEWARDEN_STORE_TIMEOUT_MS: '25',
      RATEWARDEN_ABUSE_THRESHOLD: '250',
    });

    expect(config.redis.url).toBe('redis://localhost:6379/2');
    expect(config.store.operationTimeoutMs).toBe(25);
    expect(config.store.keyPrefix).toBe('limits');
    expect(config.abuse.blockThreshold).toBe(250);
  });

  it('rejects a non-numeric override', () => {
    expect(() => loadConfig(dir, { RATEWARDEN_DEGRADED_COOLDOWN_MS: 'soon' })).toThrow(ConfigurationError);
  });

  it('rejects invalid JSON', () => {
    writeConfig('{ not json');

    expect(() => loadConfig(dir, {})).toThrow(ConfigurationError);
  });

  it('rejects an invalid limit with its path', () => {
    writeConfig({ limits: [{ action: 'trade', maxRequests: -1, windowSeconds: 60, strategy: 'token-bucket' }] });

    expect(() => loadConfig(dir, {})).toThrow('Invalid configuration: limits.0.maxRequests: maxRequests must be > 0');
  });

  it('reads only the known variables', () => {
    expect(readEnvOverrides({ REDIS_URL: '  ', PATH: '/usr/bin' })).toEqual({ redis: {}, store: {}, abuse: {} });
  });

  it('wires a limiter from the loaded config', async () => {
    writeConfig({
      abuse: { blockThreshold: 15 },
      limits: [{ action: 'trade', maxRequests: 1, windowSeconds: 60, strategy: 'fixed-window' }],
    });

    const limiter = createRateLimiter(loadConfig(dir, {}), { store: new MemoryCounterStore(), sink: { report: () => {} } });

    expect(limiter.listLimits().map((l) => l.action)).toContain('trade');
    await limiter.checkLimit('user-1', 'trade');
    await limiter.checkLimit('user-1', 'trade');
    await limiter.checkLimit('user-1', 'trade');
    expect(limiter.isBlocked('user-1')).toBe(true);
    await limiter.close();
  });
});
