/**
 * Database configuration and connection management
 * Implements connection pooling and error handling with TypeScript support
 */

import { Pool, types, type QueryResult, type QueryResultRow } from 'pg';
import type { DatabaseConfig, HealthIndicator, HealthStatus, Queryable } from '../types/database';
import { logger } from '../utils/logger';
import { DatabaseError, errorMessage } from '../utils/error';

import configManager from '../config/app';

const DATE_OID = 1082;

// DATE columns stay `YYYY-MM-DD` strings instead of local-midnight Date objects
types.setTypeParser(DATE_OID, (value: string) => value);

class Database implements Queryable, HealthIndicator {
  private pool: Pool | null = null;
  private isConnected = false;
  private config: DatabaseConfig;

  constructor() {
    this.config = configManager.getDatabaseConfig();
  }

  /**
   * Initialize database connection pool
   */
  public async connect(): Promise<void> {
    try {
      this.pool = new Pool({
        ...this.config,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        statement_timeout: 30000,
        query_timeout: 30000,
      });

      this.pool.on('error', (err: Error) => {
        logger.error('Unexpected database pool error', { error: err.message });
      });

      // Test connection
      const client = await this.pool.connect();
      const result = await client.query<{ connected_at: Date; version: string }>(
        'SELECT NOW() as connected_at, version()'
      );
      client.release();

      this.isConnected = true;
      logger.info('Database connected successfully', {
        host: this.config.host,
        database: this.config.database,
        connectedAt: result.rows[0]?.connected_at,
        version: result.rows[0]?.version.split(' ')[0],
      });
    } catch (error) {
      this.isConnected = false;
      logger.error('Database connection failed', {
        error: errorMessage(error),
        config: {
          host: this.config.host,
          port: this.config.port,
          database: this.config.database,
          user: this.config.user,
        },
      });
      throw new DatabaseError(`Database connection failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Execute a query with error handling and logging
   */
  public async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
    traceId?: string
  ): Promise<QueryResult<T>> {
    if (!this.pool || !this.isConnected) {
      throw new DatabaseError('Database not connected');
    }

    const start = Date.now();
    const log = traceId ? logger.withTrace(traceId) : logger;

    try {
      const result = await this.pool.query<T>(text, params);

      log.debug('Database query executed successfully', {
        duration: Date.now() - start,
        rowCount: result.rowCount,
        query: this.sanitizeQuery(text),
        paramCount: params.length,
      });

      return result;
    } catch (error) {
      log.error('Database query failed', {
        duration: Date.now() - start,
        error: errorMessage(error),
        query: this.sanitizeQuery(text),
        paramCount: params.length,
      });

      throw new DatabaseError(
        `Query execution failed: ${errorMessage(error)}`,
        undefined,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Check database health
   */
  public async healthCheck(): Promise<HealthStatus> {
    if (!this.pool || !this.isConnected) {
      return {
        connected: false,
        error: 'Database not connected',
      };
    }

    const start = Date.now();

    try {
      await this.pool.query('SELECT 1');
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
   * Close database connection pool
   */
  public async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.isConnected = false;
      logger.info('Database connection closed');
    }
  }

  public isHealthy(): boolean {
    return this.isConnected && this.pool !== null;
  }

  private sanitizeQuery(query: string): string {
    const compact = query.replace(/\s+/g, ' ').trim();
    return compact.substring(0, 200) + (compact.length > 200 ? '...' : '');
  }
}

export { Database };

// Export singleton instance
const database = new Database();
export default database;
