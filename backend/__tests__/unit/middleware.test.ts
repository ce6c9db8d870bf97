/**
 * Unit Tests: Rate Limiting Middleware
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import httpMocks from 'node-mocks-http';
import type { Request, Response } from 'express';
import { limitAction } from '../../src/ratelimit/middleware';
import { RateLimiter } from '../../src/ratelimit/limiter';
import { MemoryCounterStore } from '../../src/stores';
import { ManualClock } from '../../src/runtime/clock';

describe('limitAction', () => {
  let limiter: RateLimiter;

  beforeEach(() => {
    const clock = new ManualClock(0);
    limiter = new RateLimiter({ store: new MemoryCounterStore({ clock }), clock });
  });

  function request(actorId?: string, ip = '10.0.0.1') {
    const req = httpMocks.createRequest<Request>({ method: 'POST', url: '/payments', ip });
    if (actorId) req.actorId = actorId;
    return req;
  }

  it('should pass allowed requests with rate limit headers', async () => {
    const res = httpMocks.createResponse<Response>();
    const next = vi.fn();

    await limitAction(limiter, 'payment')(request('user-1'), res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(res.getHeader('X-RateLimit-Limit')).toBe('5');
    expect(res.getHeader('X-RateLimit-Remaining')).toBe('4');
    expect(res.getHeader('X-RateLimit-Reset')).toBe('720');
    expect(res.getHeader('Retry-After')).toBeUndefined();
  });

  it('should respond 429 when the quota is spent', async () => {
    const middleware = limitAction(limiter, 'payment');
    for (let i = 0; i < 5; i++) {
      await middleware(request('user-1'), httpMocks.createResponse<Response>(), vi.fn<[err?: unknown], void>());
    }

    const res = httpMocks.createResponse<Response>();
    const next = vi.fn();
    await middleware(request('user-1'), res, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(429);
    expect(res.getHeader('Retry-After')).toBe('720');
    expect(res._getJSONData()).toEqual({ error: 'Too Many Requests', reason: 'quota_exceeded', retryAfter: 720 });
  });

  it('should respond 403 to a blocked actor', async () => {
    for (let i = 0; i < 11; i++) {
      limiter.scorer.recordViolation('user-1', 'payment');
    }

    const res = httpMocks.createResponse<Response>();
    await limitAction(limiter, 'payment')(request('user-1'), res, vi.fn<[err?: unknown], void>());

    expect(res.statusCode).toBe(403);
    expect(res.getHeader('X-RateLimit-Reset')).toBeUndefined();
    expect(res._getJSONData()).toEqual({ error: 'Forbidden', reason: 'abuse_blocked', retryAfter: null });
  });

  it('should respond 500 for an unregistered action', async () => {
    const res = httpMocks.createResponse<Response>();
    await limitAction(limiter, 'teleport')(request('user-1'), res, vi.fn<[err?: unknown], void>());

    expect(res.statusCode).toBe(500);
    expect(res._getJSONData()).toEqual({ error: 'Rate limit misconfigured', reason: 'configuration_error', retryAfter: null });
  });

  it('should key by custom actor, then actorId, then IP', async () => {
    const byKey = limitAction(limiter, 'payment', { actorKey: () => 'key-1' });
    const byDefault = limitAction(limiter, 'payment');

    await byKey(request('user-1'), httpMocks.createResponse<Response>(), vi.fn<[err?: unknown], void>());
    await byDefault(request('user-2'), httpMocks.createResponse<Response>(), vi.fn<[err?: unknown], void>());
    await byDefault(request(undefined, '10.0.0.9'), httpMocks.createResponse<Response>(), vi.fn<[err?: unknown], void>());

    for (const actor of ['key-1', 'user-2', '10.0.0.9']) {
      const status = await limiter.getStatus(actor);
      expect(status.limits.find((l) => l.action === 'payment')?.remaining).toBe(4);
    }
    const untouched = await limiter.getStatus('user-1');
    expect(untouched.limits.find((l) => l.action === 'payment')?.remaining).toBe(5);
  });

  it('should hand refusals to a custom handler', async () => {
    const handler = vi.fn();
    const res = httpMocks.createResponse<Response>();

    await limitAction(limiter, 'teleport', { handler })(request('user-1'), res, vi.fn<[err?: unknown], void>());

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][3]).toMatchObject({ reason: 'configuration_error', action: 'teleport' });
    expect(res._isEndCalled()).toBe(false);
  });

  it('should let the request through on unexpected errors', async () => {
    const next = vi.fn();
    const failing = limitAction(limiter, 'payment', {
      actorKey: () => {
        throw new Error('no session');
      },
    });

    await failing(request('user-1'), httpMocks.createResponse<Response>(), next);

    expect(next).toHaveBeenCalledWith();
  });
});
