/**
 * Database-related type definitions
 */

import type { QueryResult, QueryResultRow } from 'pg';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  min: number;
  max: number;
}

/**
 * Store handle handed to repositories. Each call runs as a single statement
 * on a pooled connection.
 */
export interface Queryable {
  query(text: string, params?: unknown[], traceId?: string): Promise<QueryResult<QueryResultRow>>;
}

export interface HealthStatus {
  connected: boolean;
  latency?: number;
  error?: string;
}

export interface HealthIndicator {
  healthCheck(): Promise<HealthStatus>;
  isHealthy(): boolean;
}
