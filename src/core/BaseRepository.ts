/**
 * Base repository implementation with common query plumbing
 * Takes its store handle through the constructor and maps rows to entities
 */

import type { IEntity, Queryable } from '../types';
import { BaseEntity } from './BaseEntity';
import { DatabaseError, errorMessage } from '../utils/error';
import { logger } from '../utils/logger';

export abstract class BaseRepository<T extends IEntity> {
  protected readonly db: Queryable;
  protected readonly entityClass: typeof BaseEntity;
  protected readonly tableName: string;
  protected readonly columnMappings: Record<string, string>;
  protected readonly selectColumns: string;

  constructor(db: Queryable, entityClass: typeof BaseEntity) {
    this.db = db;
    this.entityClass = entityClass;
    this.tableName = entityClass.getTableName();
    this.columnMappings = entityClass.getColumnMappings();
    this.selectColumns = Object.values(this.columnMappings).join(', ');
  }

  /**
   * Abstract method to create entity instance from database row
   * Must be implemented by concrete repository classes
   */
  protected abstract createEntityFromRow(row: Record<string, unknown>): T;

  /**
   * Run a statement and map every returned row
   */
  protected async queryMany(
    operation: string,
    text: string,
    params: unknown[],
    traceId: string
  ): Promise<T[]> {
    const log = logger.withTrace(traceId);

    try {
      const result = await this.db.query(text, params, traceId);
      const entities = result.rows.map(row => this.createEntityFromRow(row));

      log.debug(`Successfully executed ${operation}`, {
        entityType: this.entityClass.getEntityType(),
        returned: entities.length,
      });

      return entities;
    } catch (error) {
      log.error(`Failed to ${operation}`, {
        entityType: this.entityClass.getEntityType(),
        error: errorMessage(error),
      });

      if (error instanceof DatabaseError) {
        throw error;
      }
      throw new DatabaseError(
        `Failed to ${operation}: ${errorMessage(error)}`,
        undefined,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Run a statement expected to touch at most one row
   */
  protected async queryOne(
    operation: string,
    text: string,
    params: unknown[],
    traceId: string
  ): Promise<T | null> {
    const rows = await this.queryMany(operation, text, params, traceId);
    return rows[0] ?? null;
  }

  /**
   * Build an AND-ed equality clause from entity fields. Unknown fields are
   * rejected so a filter can never be dropped silently.
   */
  protected buildWhereClause(
    filters: Record<string, string | number>,
    startIndex: number = 1
  ): {
    whereClause: string;
    queryParams: unknown[];
  } {
    const conditions: string[] = [];
    const queryParams: unknown[] = [];
    let paramIndex = startIndex;

    for (const [field, value] of Object.entries(filters)) {
      const column = this.columnMappings[field];
      if (!column) {
        throw new Error(`Unknown ${this.entityClass.getEntityType()} field: ${field}`);
      }
      conditions.push(`${column} = $${paramIndex}`);
      queryParams.push(value);
      paramIndex++;
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    return { whereClause, queryParams };
  }

  /**
   * Map entity fields to columns, in column-mapping order
   */
  protected toColumnValues(values: Record<string, unknown>): {
    columns: string[];
    params: unknown[];
  } {
    const columns: string[] = [];
    const params: unknown[] = [];

    for (const [field, column] of Object.entries(this.columnMappings)) {
      if (values[field] !== undefined) {
        columns.push(column);
        params.push(values[field]);
      }
    }

    return { columns, params };
  }
}
