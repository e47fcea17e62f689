import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../utils/logger';

/**
 * Adds correlation ID and request timing to all requests
 * Enhances logging with trace context
 */
export const tracingMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  req.traceId = uuidv4();
  req.startTime = Date.now();

  res.set('X-Trace-ID', req.traceId);

  logger.info('Request started', {
    traceId: req.traceId,
    method: req.method,
    url: req.originalUrl,
    userAgent: req.get('User-Agent'),
    ip: req.ip,
  });

  res.on('finish', () => {
    const duration = Date.now() - req.startTime;
    logger.info('Request completed', {
      traceId: req.traceId,
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      userId: req.user?.id,
      duration: `${duration}ms`,
    });
  });

  next();
};
