/**
 * Logging-related type definitions
 */

export interface LogContext {
  traceId?: string;
  userId?: number;
  [key: string]: unknown;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'verbose';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'verbose'];
