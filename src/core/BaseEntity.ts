/**
 * Base entity abstraction for all persisted entities
 * Carries the table metadata repositories need; entities stay free of queries
 */

import type { IEntity } from '@/types';

export abstract class BaseEntity implements IEntity {
  public id: number;

  constructor(data: IEntity) {
    this.id = data.id;
  }

  /**
   * Get entity type - to be implemented by concrete classes
   */
  public static getEntityType(): string {
    throw new Error('getEntityType must be implemented by concrete entity classes');
  }

  /**
   * Get database table name
   */
  public static getTableName(): string {
    throw new Error('getTableName must be implemented by concrete entity classes');
  }

  /**
   * Get database column mappings, entity field -> column
   */
  public static getColumnMappings(): Record<string, string> {
    return {
      id: 'id',
    };
  }

  /**
   * Protected helper method for mapping database rows to entity data
   * To be used by concrete classes in their fromDbRow implementations
   */
  protected static mapDbRowToEntityData(
    row: Record<string, unknown>,
    columnMappings: Record<string, string>
  ): Record<string, unknown> {
    const entityData: Record<string, unknown> = {};

    for (const [entityField, dbColumn] of Object.entries(columnMappings)) {
      if (Object.prototype.hasOwnProperty.call(row, dbColumn)) {
        entityData[entityField] = row[dbColumn];
      }
    }

    return entityData;
  }
}
