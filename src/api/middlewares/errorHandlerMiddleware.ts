import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../utils/logger';
import {
  sendConflict,
  sendError,
  sendNotFound,
  sendRateLimit,
  sendServiceUnavailable,
  sendUnauthorized,
  sendValidationError,
} from '../../utils/response';
import {
  ConflictError,
  DatabaseError,
  NotFoundError,
  ServiceUnavailableError,
  TooManyRequestsError,
  UnauthorizedError,
  ValidationError,
} from '../../utils/error';

import config from '../../config/app';

const isMalformedJson = (error: Error): boolean =>
  error instanceof SyntaxError && 'body' in error && 'status' in error && error.status === 400;

/**
 * Centralized error handling middleware
 * Converts errors to standardized API responses
 */
export const errorHandlerMiddleware = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const traceId = req.traceId;

  if (error instanceof ValidationError) {
    sendValidationError(res, error.message, error.details, traceId);
    return;
  }

  if (isMalformedJson(error)) {
    sendValidationError(res, 'Malformed JSON body', undefined, traceId);
    return;
  }

  if (error instanceof UnauthorizedError) {
    sendUnauthorized(res, error.message, traceId);
    return;
  }

  if (error instanceof NotFoundError) {
    sendNotFound(res, error.message, traceId);
    return;
  }

  if (error instanceof ConflictError) {
    sendConflict(res, error.message, traceId);
    return;
  }

  if (error instanceof TooManyRequestsError) {
    sendRateLimit(res, error.message, error.details, traceId);
    return;
  }

  logger.error('Request error', {
    traceId,
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack,
    },
    request: {
      method: req.method,
      url: req.originalUrl,
      userId: req.user?.id,
      userAgent: req.get('User-Agent'),
      ip: req.ip,
    },
  });

  if (error instanceof ServiceUnavailableError) {
    sendServiceUnavailable(res, error.message, traceId);
    return;
  }

  if (error instanceof DatabaseError) {
    sendError(
      res,
      'Database operation failed',
      500,
      config.isDevelopment() ? { originalError: error.message } : undefined,
      traceId
    );
    return;
  }

  sendError(
    res,
    'Internal server error',
    500,
    config.isDevelopment() ? { originalError: error.message, stack: error.stack } : undefined,
    traceId
  );
};

/**
 * 404 handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  logger.warn('Route not found', {
    traceId: req.traceId,
    method: req.method,
    url: req.originalUrl,
  });
  sendNotFound(res, `Route ${req.method} ${req.originalUrl} not found`, req.traceId);
};
