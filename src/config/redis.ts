/**
 * Redis configuration and connection management
 * Backs the per-user request rate limiter
 */

import { createClient, type RedisClientType } from 'redis';
import type { HealthIndicator, HealthStatus } from '../types/database';
import type { RateLimitStore } from '../api/middlewares/rateLimitMiddleware';
import { logger } from '../utils/logger';
import { ServiceUnavailableError, errorMessage } from '../utils/error';

import configManager from '../config/app';

interface RedisConfig {
  host: string;
  port: number;
  password?: string;
  database: number;
  connectTimeout: number;
}

class RedisManager implements RateLimitStore, HealthIndicator {
  private client: RedisClientType | null = null;
  private isConnected = false;
  private config: RedisConfig;

  constructor() {
    this.config = configManager.getRedisConfig();
  }

  /**
   * Initialize Redis connection
   */
  public async connect(): Promise<void> {
    try {
      const client: RedisClientType = createClient({
        socket: {
          host: this.config.host,
          port: this.config.port,
          connectTimeout: this.config.connectTimeout,
        },
        password: this.config.password,
        database: this.config.database,
      });

      client.on('error', (err: Error) => {
        logger.error('Redis client error', { error: err.message });
        this.isConnected = false;
      });

      client.on('ready', () => {
        logger.info('Redis connected successfully', {
          host: this.config.host,
          port: this.config.port,
          database: this.config.database,
        });
        this.isConnected = true;
      });

      client.on('end', () => {
        logger.info('Redis connection ended');
        this.isConnected = false;
      });

      this.client = client;
      await client.connect();
      this.isConnected = true;
    } catch (error) {
      this.isConnected = false;
      logger.error('Redis connection failed', {
        error: errorMessage(error),
        config: {
          host: this.config.host,
          port: this.config.port,
          database: this.config.database,
        },
      });
      throw new ServiceUnavailableError(`Redis connection failed: ${errorMessage(error)}`);
    }
  }

  public getClient(): RedisClientType {
    if (!this.client || !this.isConnected) {
      throw new ServiceUnavailableError('Redis not connected');
    }
    return this.client;
  }

  /**
   * Set expiration for a key
   */
  public async expire(key: string, ttlSeconds: number, traceId?: string): Promise<boolean> {
    const log = traceId ? logger.withTrace(traceId) : logger;

    try {
      const result = await this.getClient().expire(key, ttlSeconds);
      log.debug('Redis EXPIRE operation successful', { key, ttl: ttlSeconds, success: result });
      return result;
    } catch (error) {
      log.error('Redis EXPIRE operation failed', { key, ttl: ttlSeconds, error: errorMessage(error) });
      throw new ServiceUnavailableError(`Redis EXPIRE failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Sorted Set operations - Add a member to a sorted set
   */
  public async zadd(key: string, score: number, member: string, traceId?: string): Promise<number> {
    const log = traceId ? logger.withTrace(traceId) : logger;

    try {
      const result = await this.getClient().zAdd(key, { score, value: member });
      log.debug('Redis ZADD operation successful', { key, score, member, result });
      return result;
    } catch (error) {
      log.error('Redis ZADD operation failed', { key, score, member, error: errorMessage(error) });
      throw new ServiceUnavailableError(`Redis ZADD failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Sorted Set operations - Remove members from a sorted set by score range
   */
  public async zremrangebyscore(
    key: string,
    min: string,
    max: string,
    traceId?: string
  ): Promise<number> {
    const log = traceId ? logger.withTrace(traceId) : logger;

    try {
      const result = await this.getClient().zRemRangeByScore(key, min, max);
      log.debug('Redis ZREMRANGEBYSCORE operation successful', { key, min, max, removed: result });
      return result;
    } catch (error) {
      log.error('Redis ZREMRANGEBYSCORE operation failed', {
        key,
        min,
        max,
        error: errorMessage(error),
      });
      throw new ServiceUnavailableError(`Redis ZREMRANGEBYSCORE failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Sorted Set operations - Get the number of members in a sorted set
   */
  public async zcard(key: string, traceId?: string): Promise<number> {
    const log = traceId ? logger.withTrace(traceId) : logger;

    try {
      const result = await this.getClient().zCard(key);
      log.debug('Redis ZCARD operation successful', { key, count: result });
      return result;
    } catch (error) {
      log.error('Redis ZCARD operation failed', { key, error: errorMessage(error) });
      throw new ServiceUnavailableError(`Redis ZCARD failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Health check for Redis
   */
  public async healthCheck(): Promise<HealthStatus> {
    if (!this.client || !this.isConnected) {
      return {
        connected: false,
        error: 'Redis not connected',
      };
    }

    const start = Date.now();

    try {
      await this.client.ping();
      return {
        connected: true,
        latency: Date.now() - start,
      };
    } catch (error) {
      return {
        connected: false,
        error: errorMessage(error),
      };
    }
  }

  /**
   * Close Redis connection
   */
  public async close(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
      this.isConnected = false;
      logger.info('Redis connection closed');
    }
  }

  public isHealthy(): boolean {
    return this.isConnected && this.client !== null;
  }
}

export { RedisManager };

// Export singleton instance
const redisManager = new RedisManager();
export default redisManager;
