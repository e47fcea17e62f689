/**
 * Application configuration
 * Centralized configuration management with environment validation
 */

import { z } from 'zod';
import { logger } from '../utils/logger';

const DEFAULT_JWT_SECRET = 'change-me';

// Environment validation schema
const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'verbose']).default('info'),

  // Database
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DB_NAME: z.string().default('contacts'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('password'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(20),

  // Redis
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DATABASE: z.coerce.number().int().min(0).default(0),
  REDIS_CONNECT_TIMEOUT: z.coerce.number().int().min(0).default(2000),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60000), // 1 minute
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().min(1).default(10),

  // Authentication
  JWT_SECRET: z.string().min(1).default(DEFAULT_JWT_SECRET),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),

  // Security
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),
  TRUST_PROXY: z
    .enum(['true', 'false'])
    .default('false')
    .transform(value => value === 'true'),
  MAX_REQUEST_SIZE: z.string().default('100kb'),

  // Monitoring
  LOKI_HOST: z.string().optional(),

  // Package details
  PACKAGE_VERSION: z.string().default('1.0.0'),
});

type AppConfig = z.infer<typeof envSchema>;

class ConfigManager {
  private config: AppConfig;

  constructor() {
    this.config = this.loadAndValidateConfig();
  }

  /**
   * Load and validate environment configuration
   */
  private loadAndValidateConfig(): AppConfig {
    const result = envSchema.safeParse(process.env);

    if (!result.success) {
      const errors = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`);

      logger.error('Configuration validation failed', { errors });
      throw new Error(`Invalid configuration: ${errors.join(', ')}`);
    }

    if (result.data.NODE_ENV === 'production' && result.data.JWT_SECRET === DEFAULT_JWT_SECRET) {
      logger.error('Configuration validation failed', { errors: ['JWT_SECRET: must be set'] });
      throw new Error('Invalid configuration: JWT_SECRET must be set in production');
    }

    logger.info('Configuration loaded successfully', {
      environment: result.data.NODE_ENV,
      port: result.data.PORT,
      logLevel: result.data.LOG_LEVEL,
    });

    return result.data;
  }

  public getAppConfig() {
    return {
      nodeEnv: this.config.NODE_ENV,
      port: this.config.PORT,
      logLevel: this.config.LOG_LEVEL,
      trustProxy: this.config.TRUST_PROXY,
    };
  }

  public getDatabaseConfig() {
    return {
      host: this.config.DB_HOST,
      port: this.config.DB_PORT,
      database: this.config.DB_NAME,
      user: this.config.DB_USER,
      password: this.config.DB_PASSWORD,
      min: this.config.DB_POOL_MIN,
      max: this.config.DB_POOL_MAX,
    };
  }

  public getRedisConfig() {
    return {
      host: this.config.REDIS_HOST,
      port: this.config.REDIS_PORT,
      password: this.config.REDIS_PASSWORD,
      database: this.config.REDIS_DATABASE,
      connectTimeout: this.config.REDIS_CONNECT_TIMEOUT,
    };
  }

  public getRateLimitConfig() {
    return {
      windowMs: this.config.RATE_LIMIT_WINDOW_MS,
      maxRequests: this.config.RATE_LIMIT_MAX_REQUESTS,
    };
  }

  public getAuthConfig() {
    return {
      secret: this.config.JWT_SECRET,
      algorithm: this.config.JWT_ALGORITHM,
    };
  }

  public getSecurityConfig() {
    return {
      allowedOrigins: this.config.ALLOWED_ORIGINS.split(',').map(origin => origin.trim()),
      maxRequestSize: this.config.MAX_REQUEST_SIZE,
    };
  }

  public getPackageConfig() {
    return {
      npmPackageVersion: this.config.PACKAGE_VERSION,
    };
  }

  public isDevelopment(): boolean {
    return this.config.NODE_ENV === 'development';
  }
}

// Export singleton instance
const configManager = new ConfigManager();
export default configManager;
export { ConfigManager };
