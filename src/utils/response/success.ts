/**
 * Success response utilities
 *
 * Contacts are written to the wire as-is, without an envelope.
 */

import type { Response } from 'express';

export const sendSuccess = <T>(res: Response, data: T, statusCode: number = 200): Response<T> => {
  return res.status(statusCode).json(data);
};
