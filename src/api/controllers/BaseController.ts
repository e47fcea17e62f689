import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ZodError, ZodTypeAny, z } from 'zod';
import type { User } from '../../models/User';
import type { ErrorDetails } from '../../types';
import { logger } from '../../utils/logger';
import { UnauthorizedError, ValidationError, errorMessage } from '../../utils/error';
import { sendSuccess } from '../../utils/response';

const toValidationError = (error: ZodError): ValidationError =>
  new ValidationError(
    'Validation failed',
    error.errors.map(
      (err): ErrorDetails => ({
        field: err.path.join('.'),
        message: err.message,
        code: err.code,
      })
    )
  );

/**
 * Base controller with common response handling patterns
 */
export abstract class BaseController {
  protected success<T>(res: Response, data: T, statusCode: number = 200): void {
    sendSuccess(res, data, statusCode);
  }

  /**
   * Parse request input into its typed form, reporting failures as ValidationError
   */
  protected parse<S extends ZodTypeAny>(schema: S, data: unknown): z.output<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw toValidationError(result.error);
    }
    return result.data;
  }

  /**
   * The authenticated caller; routes mount the authentication middleware first
   */
  protected requireUser(req: Request): User {
    if (!req.user) {
      throw new UnauthorizedError('Not authenticated');
    }
    return req.user;
  }

  /**
   * Wrap an async handler so rejections reach the error middleware
   */
  protected handle(operation: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      operation(req, res).catch(error => {
        if (error instanceof ValidationError) {
          logger.warn('Validation failed', {
            traceId: req.traceId,
            errors: error.details,
            userId: req.user?.id,
          });
        }
        logger.debug('Controller operation failed', {
          traceId: req.traceId,
          userId: req.user?.id,
          error: errorMessage(error),
        });
        next(error);
      });
    };
  }
}
