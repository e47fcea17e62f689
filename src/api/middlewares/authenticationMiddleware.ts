import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Authenticator } from '../../types';
import { logger } from '../../utils/logger';
import { UnauthorizedError } from '../../utils/error';

const BEARER_PREFIX = /^Bearer\s+(.+)$/i;

/**
 * Bearer token authentication middleware
 * Resolves the calling user and attaches it to the request
 */
export const createAuthenticationMiddleware = (authenticator: Authenticator): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.get('Authorization');
    const token = header ? BEARER_PREFIX.exec(header)?.[1]?.trim() : undefined;

    if (!token) {
      logger.warn('Authentication failed: missing bearer token', { traceId: req.traceId });
      next(new UnauthorizedError('Not authenticated'));
      return;
    }

    authenticator
      .authenticate(token, req.traceId)
      .then(user => {
        req.user = user;
        next();
      })
      .catch(next);
  };
};
