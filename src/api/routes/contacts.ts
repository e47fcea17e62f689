import { Router, type RequestHandler } from 'express';
import type { ContactController } from '../controllers';
import { createRateLimitMiddleware, type RateLimitStore } from '../middlewares';

export interface ContactRoutesOptions {
  contactController: ContactController;
  authenticate: RequestHandler;
  rateLimitStore: RateLimitStore;
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
}

/**
 * Middleware chain for every route:
 * 1. Authentication - resolve the user from the bearer token
 * 2. Rate limiting - per user, per endpoint
 * 3. Controller - parses query, params and body before calling the service
 */
export const createContactRoutes = (options: ContactRoutesOptions): Router => {
  const { contactController, authenticate, rateLimitStore, rateLimit } = options;
  const router = Router();

  const limit = (scope: string): RequestHandler =>
    createRateLimitMiddleware({ scope, store: rateLimitStore, ...rateLimit });

  /**
   * GET /contacts
   * List the caller's contacts, ?limit=10..500&offset=0..200
   */
  router.get(
    '/',
    authenticate,
    limit('contacts:list'),
    contactController.getContacts
  );

  /**
   * GET /contacts/search/{contactValue}
   */
  router.get(
    '/search/:contactValue',
    authenticate,
    limit('contacts:search'),
    contactController.searchContacts
  );

  /**
   * GET /contacts/birthday/next-week
   */
  router.get(
    '/birthday/next-week',
    authenticate,
    limit('contacts:birthdays'),
    contactController.getUpcomingBirthdays
  );

  /**
   * GET /contacts/{contactId}
   */
  router.get(
    '/:contactId',
    authenticate,
    limit('contacts:get'),
    contactController.getContactById
  );

  /**
   * POST /contacts
   */
  router.post(
    '/',
    authenticate,
    limit('contacts:create'),
    contactController.createContact
  );

  /**
   * PUT /contacts/{contactId}
   */
  router.put(
    '/:contactId',
    authenticate,
    limit('contacts:update'),
    contactController.updateContact
  );

  /**
   * DELETE /contacts/{contactId}
   */
  router.delete(
    '/:contactId',
    authenticate,
    limit('contacts:delete'),
    contactController.deleteContact
  );

  return router;
};
