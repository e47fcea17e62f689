export { tracingMiddleware } from './tracingMiddleware';
export { createAuthenticationMiddleware } from './authenticationMiddleware';
export { createRateLimitMiddleware, type RateLimitStore, type RateLimitOptions } from './rateLimitMiddleware';
export { errorHandlerMiddleware, notFoundHandler } from './errorHandlerMiddleware';
