/**
 * Contact repository implementation
 * Every statement carries the owner in its predicate
 */

import { BaseRepository } from '../core/BaseRepository';
import { Contact } from '../models/Contact';
import type { ContactFields, IContactRepository, Queryable, UserRef } from '../types';
import { birthdayWindow } from '../utils/date';
import { logger } from '../utils/logger';
import { DatabaseError } from '../utils/error';

export class ContactRepository extends BaseRepository<Contact> implements IContactRepository {
  constructor(db: Queryable) {
    super(db, Contact);
  }

  protected createEntityFromRow(row: Record<string, unknown>): Contact {
    return Contact.fromDbRow(row);
  }

  /**
   * Owner's contacts in insertion order
   */
  public async list(
    limit: number,
    offset: number,
    owner: UserRef,
    traceId: string
  ): Promise<Contact[]> {
    const { whereClause, queryParams } = this.buildWhereClause({ ownerId: owner.id });
    const query = `
      SELECT ${this.selectColumns} FROM ${this.tableName}
      ${whereClause}
      ORDER BY id ASC
      LIMIT $2 OFFSET $3
    `;

    return this.queryMany('list contacts', query, [...queryParams, limit, offset], traceId);
  }

  public async getById(id: number, owner: UserRef, traceId: string): Promise<Contact | null> {
    const { whereClause, queryParams } = this.buildWhereClause({ id, ownerId: owner.id });
    const query = `SELECT ${this.selectColumns} FROM ${this.tableName} ${whereClause}`;

    const contact = await this.queryOne('fetch contact', query, queryParams, traceId);
    if (!contact) {
      logger.withTrace(traceId).debug('Contact not found', { id, userId: owner.id });
    }
    return contact;
  }

  /**
   * Find contact by email and number (soft uniqueness check before create)
   */
  public async findDuplicate(
    email: string,
    number: string,
    owner: UserRef,
    traceId: string
  ): Promise<Contact | null> {
    const { whereClause, queryParams } = this.buildWhereClause({
      email,
      number,
      ownerId: owner.id,
    });
    const query = `SELECT ${this.selectColumns} FROM ${this.tableName} ${whereClause} LIMIT 1`;

    return this.queryOne('find duplicate contact', query, queryParams, traceId);
  }

  public async create(fields: ContactFields, owner: UserRef, traceId: string): Promise<Contact> {
    const { columns, params } = this.toColumnValues({ ...fields, ownerId: owner.id });
    const placeholders = columns.map((_, index) => `$${index + 1}`);
    const query = `
      INSERT INTO ${this.tableName} (${columns.join(', ')})
      VALUES (${placeholders.join(', ')})
      RETURNING ${this.selectColumns}
    `;

    const created = await this.queryOne('create contact', query, params, traceId);
    if (!created) {
      throw new DatabaseError('Failed to create contact, no rows returned');
    }

    logger.withTrace(traceId).info('Successfully created contact', {
      id: created.id,
      userId: owner.id,
    });

    return created;
  }

  /**
   * Overwrite every mutable field in one statement
   */
  public async update(
    id: number,
    fields: ContactFields,
    owner: UserRef,
    traceId: string
  ): Promise<Contact | null> {
    const values: ContactFields = {
      name: fields.name,
      surname: fields.surname,
      email: fields.email,
      number: fields.number,
      bdDate: fields.bdDate,
      additionalData: fields.additionalData,
    };
    const { columns, params } = this.toColumnValues(values);
    const setClauses = columns.map((column, index) => `${column} = $${index + 1}`);
    const { whereClause, queryParams } = this.buildWhereClause(
      { id, ownerId: owner.id },
      params.length + 1
    );
    const query = `
      UPDATE ${this.tableName}
      SET ${setClauses.join(', ')}
      ${whereClause}
      RETURNING ${this.selectColumns}
    `;

    const updated = await this.queryOne('update contact', query, [...params, ...queryParams], traceId);
    const log = logger.withTrace(traceId);
    if (updated) {
      log.info('Successfully updated contact', { id, userId: owner.id });
    } else {
      log.warn('Contact not found for update', { id, userId: owner.id });
    }
    return updated;
  }

  /**
   * Delete and return the row as it was before deletion
   */
  public async remove(id: number, owner: UserRef, traceId: string): Promise<Contact | null> {
    const { whereClause, queryParams } = this.buildWhereClause({ id, ownerId: owner.id });
    const query = `DELETE FROM ${this.tableName} ${whereClause} RETURNING ${this.selectColumns}`;

    const removed = await this.queryOne('delete contact', query, queryParams, traceId);
    const log = logger.withTrace(traceId);
    if (removed) {
      log.info('Successfully deleted contact', { id, userId: owner.id });
    } else {
      log.warn('Contact not found for deletion', { id, userId: owner.id });
    }
    return removed;
  }

  /**
   * Whole-value match on name or surname ignoring case, or on email exactly
   */
  public async searchByField(value: string, owner: UserRef, traceId: string): Promise<Contact[]> {
    const query = `
      SELECT ${this.selectColumns} FROM ${this.tableName}
      WHERE user_id = $1
        AND (lower(name) = $2 OR lower(surname) = $2 OR email = $3)
      ORDER BY id ASC
    `;

    return this.queryMany(
      'search contacts',
      query,
      [owner.id, value.toLowerCase(), value],
      traceId
    );
  }

  /**
   * Contacts whose birthday month and day fall inside the coming week,
   * checked as independent month and day ranges
   */
  public async birthdayWithinWeek(
    owner: UserRef,
    traceId: string,
    now: Date = new Date()
  ): Promise<Contact[]> {
    const window = birthdayWindow(now);
    const query = `
      SELECT ${this.selectColumns} FROM ${this.tableName}
      WHERE user_id = $1
        AND EXTRACT(MONTH FROM bd_date) BETWEEN $2 AND $3
        AND EXTRACT(DAY FROM bd_date) BETWEEN $4 AND $5
      ORDER BY id ASC
    `;

    return this.queryMany(
      'fetch upcoming birthdays',
      query,
      [owner.id, window.fromMonth, window.toMonth, window.fromDay, window.toDay],
      traceId
    );
  }
}
