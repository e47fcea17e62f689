import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ServiceUnavailableError, TooManyRequestsError, errorMessage } from '../../utils/error';
import { logger } from '../../utils/logger';

/**
 * Sorted-set operations the sliding window needs. Implemented by RedisManager.
 */
export interface RateLimitStore {
  zadd(key: string, score: number, member: string, traceId?: string): Promise<number>;
  zremrangebyscore(key: string, min: string, max: string, traceId?: string): Promise<number>;
  zcard(key: string, traceId?: string): Promise<number>;
  expire(key: string, ttlSeconds: number, traceId?: string): Promise<boolean>;
}

export interface RateLimitOptions {
  /** Endpoint name; each endpoint keeps its own window per user */
  scope: string;
  windowMs: number;
  maxRequests: number;
  store: RateLimitStore;
  now?: () => number;
}

/**
 * Redis-based sliding window rate limiter, keyed by user and endpoint.
 * Must run after authentication. Fails closed when the store is down.
 */
export const createRateLimitMiddleware = (options: RateLimitOptions): RequestHandler => {
  const { scope, windowMs, maxRequests, store } = options;
  const now = options.now ?? Date.now;
  const windowSeconds = Math.ceil(windowMs / 1000);

  const check = async (req: Request, res: Response): Promise<void> => {
    const userId = req.user?.id;
    const traceId = req.traceId;
    const log = logger.withTrace(traceId);

    if (userId === undefined) {
      log.warn('Rate Limit: missing user for request', { path: req.path, scope });
      throw new TooManyRequestsError('Missing caller identifier for rate limiting.');
    }

    const key = `rate_limit:${scope}:${userId}`;
    const timestamp = now();
    let currentCount: number;

    try {
      await store.zadd(key, timestamp, `${timestamp}:${uuidv4()}`, traceId);
      await store.zremrangebyscore(key, '-inf', String(timestamp - windowMs), traceId);
      currentCount = await store.zcard(key, traceId);
      await store.expire(key, windowSeconds + 5, traceId);
    } catch (error) {
      log.error('Rate Limit Middleware Error', {
        userId,
        scope,
        error: errorMessage(error),
        path: req.path,
      });
      throw new ServiceUnavailableError(
        'Rate limiting service is currently unavailable. Please try again later.'
      );
    }

    const resetTime = new Date(timestamp + windowMs).toISOString();
    res.set({
      'X-RateLimit-Limit': String(maxRequests),
      'X-RateLimit-Remaining': String(Math.max(0, maxRequests - currentCount)),
      'X-RateLimit-Reset': resetTime,
    });

    log.debug('Rate Limit Check', { userId, scope, currentCount, limit: maxRequests });

    if (currentCount > maxRequests) {
      log.warn('Rate Limit Exceeded', { userId, scope, currentCount, limit: maxRequests });
      throw new TooManyRequestsError(
        `Rate limit exceeded. Maximum ${maxRequests} requests per ${windowSeconds} seconds`,
        { limit: maxRequests, remaining: 0, resetTime }
      );
    }
  };

  return (req: Request, res: Response, next: NextFunction): void => {
    check(req, res)
      .then(() => next())
      .catch(next);
  };
};
