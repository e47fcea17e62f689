/**
 * Error response utilities
 */

import type { Response } from 'express';
import type { ApiErrorResponse } from '@/types/api';

export const sendError = (
  res: Response,
  message: string = 'Internal Server Error',
  statusCode: number = 500,
  details?: unknown,
  traceId?: string
): Response<ApiErrorResponse> => {
  const response: ApiErrorResponse = {
    success: false,
    message,
    timestamp: new Date().toISOString(),
    traceId,
  };

  if (details !== undefined) {
    response.details = details;
  }

  return res.status(statusCode).json(response);
};

export const sendValidationError = (
  res: Response,
  message: string = 'Validation failed',
  details?: unknown,
  traceId?: string
): Response<ApiErrorResponse> => {
  return sendError(res, message, 400, details, traceId);
};

export const sendNotFound = (
  res: Response,
  message: string = 'Resource not found',
  traceId?: string
): Response<ApiErrorResponse> => {
  return sendError(res, message, 404, undefined, traceId);
};

export const sendUnauthorized = (
  res: Response,
  message: string = 'Authentication required',
  traceId?: string
): Response<ApiErrorResponse> => {
  res.setHeader('WWW-Authenticate', 'Bearer');
  return sendError(res, message, 401, undefined, traceId);
};

/**
 * Duplicate contacts are reported as a bad request, not 409.
 */
export const sendConflict = (
  res: Response,
  message: string = 'Resource conflict',
  traceId?: string
): Response<ApiErrorResponse> => {
  return sendError(res, message, 400, undefined, traceId);
};

export const sendRateLimit = (
  res: Response,
  message: string = 'Rate limit exceeded',
  details?: unknown,
  traceId?: string
): Response<ApiErrorResponse> => {
  return sendError(res, message, 429, details, traceId);
};

export const sendServiceUnavailable = (
  res: Response,
  message: string = 'Service unavailable',
  traceId?: string
): Response<ApiErrorResponse> => {
  return sendError(res, message, 503, undefined, traceId);
};
