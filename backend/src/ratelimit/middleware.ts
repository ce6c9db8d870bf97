/**
 * Rate Limiting Middleware
 *
 * Express middleware guarding a route with one limiter action.
 *
 * Features:
 * - Actor from a custom key function, `req.actorId`, or the client IP
 * - X-RateLimit-* and Retry-After headers on every checked response
 * - 429 for quota, 403 for abuse blocks, 500 for an unregistered action
 * - Fails open on unexpected errors
 */

import type { Request, Response, NextFunction } from 'express';
import { DecisionReason, type LimitDecision } from '@ratewarden/shared';
import type { RateLimiter } from './limiter';
import { serverLog } from '../logger';
import { describeError } from '../errors';

// Extend Express Request type
declare global {
  namespace Express {
    interface Request {
      /** Set by upstream authentication to rate limit per account */
      actorId?: string;
    }
  }
}

export interface LimitActionOptions {
  /**
   * Custom actor key
   */
  actorKey?: (req: Request) => string | undefined;

  /**
   * Custom handler when refused
   */
  handler?: (req: Request, res: Response, next: NextFunction, decision: LimitDecision) => void;
}

const STATUS_BY_REASON: Record<DecisionReason, number> = {
  [DecisionReason.Allowed]: 200,
  [DecisionReason.QuotaExceeded]: 429,
  [DecisionReason.AbuseBlocked]: 403,
  [DecisionReason.ConfigurationError]: 500,
};

const ERROR_BY_REASON: Record<DecisionReason, string> = {
  [DecisionReason.Allowed]: 'OK',
  [DecisionReason.QuotaExceeded]: 'Too Many Requests',
  [DecisionReason.AbuseBlocked]: 'Forbidden',
  [DecisionReason.ConfigurationError]: 'Rate limit misconfigured',
};

function resolveActor(req: Request, options: LimitActionOptions): string {
  return options.actorKey?.(req) ?? req.actorId ?? req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

function setRateLimitHeaders(res: Response, decision: LimitDecision): void {
  res.setHeader('X-RateLimit-Limit', String(decision.limit));
  res.setHeader('X-RateLimit-Remaining', String(Math.max(0, decision.remaining)));
  if (decision.resetTime !== undefined) {
    res.setHeader('X-RateLimit-Reset', String(decision.resetTime));
  }
  if (decision.retryAfter !== undefined) {
    res.setHeader('Retry-After', String(decision.retryAfter));
  }
}

/**
 * Create middleware that checks `action` for the requesting actor
 */
export function limitAction(
  limiter: RateLimiter,
  action: string,
  options: LimitActionOptions = {}
): (req: Request, res: Response, next: NextFunction) => Promise<void> {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    let decision: LimitDecision;
    try {
      decision = await limiter.checkLimit(resolveActor(req, options), action);
    } catch (error) {
      serverLog.error({ action, path: req.path, error: describeError(error) }, 'Rate limiting error');
      // Fail open - allow request
      next();
      return;
    }

    setRateLimitHeaders(res, decision);

    if (decision.allowed) {
      next();
      return;
    }

    serverLog.warn({ actorId: decision.actorId, action, reason: decision.reason, path: req.path }, 'Request refused by rate limiter');

    if (options.handler) {
      options.handler(req, res, next, decision);
      return;
    }

    res.status(STATUS_BY_REASON[decision.reason]).json({
      error: ERROR_BY_REASON[decision.reason],
      reason: decision.reason,
      retryAfter: decision.retryAfter ?? null,
    });
  };
}
