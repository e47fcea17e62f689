import express, { type Application } from 'express';
import cors from 'cors';
import compression from 'compression';
import { securityConfig } from '../config/security';
import configManager from '../config/app';
import {
  createAuthenticationMiddleware,
  errorHandlerMiddleware,
  notFoundHandler,
  tracingMiddleware,
  type RateLimitStore,
} from './middlewares';
import { ContactController, HealthController } from './controllers';
import { createRoutes } from './routes';
import type { ContactService } from '../services/ContactService';
import type { Authenticator, HealthIndicator } from '../types';

export interface AppDependencies {
  contactService: ContactService;
  authenticator: Authenticator;
  rateLimitStore: RateLimitStore;
  healthIndicators: Record<string, HealthIndicator>;
  rateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  /** Source of "today" for the upcoming-birthday query */
  clock?: () => Date;
}

/**
 * Create and configure Express application
 */
export function createApp(dependencies: AppDependencies): Application {
  const app = express();

  app.set('trust proxy', configManager.getAppConfig().trustProxy);

  app.use(
    cors({
      origin: securityConfig.allowedOrigins,
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'DELETE'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Trace-ID'],
      exposedHeaders: ['X-Trace-ID', 'X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
    })
  );

  app.use(compression());

  // Tracing first so every later log line carries the trace ID
  app.use(tracingMiddleware);

  app.use(
    express.json({
      limit: securityConfig.maxRequestSize,
      type: ['application/json'],
    })
  );

  app.use(
    createRoutes({
      contactController: new ContactController(dependencies.contactService, dependencies.clock),
      healthController: new HealthController(
        dependencies.healthIndicators,
        configManager.getPackageConfig().npmPackageVersion
      ),
      authenticate: createAuthenticationMiddleware(dependencies.authenticator),
      rateLimitStore: dependencies.rateLimitStore,
      rateLimit: dependencies.rateLimit ?? {
        windowMs: securityConfig.rateLimitWindow,
        maxRequests: securityConfig.maxRequestsPerWindow,
      },
    })
  );

  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandlerMiddleware);

  return app;
}
