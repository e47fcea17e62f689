/**
 * User lookups for the authenticator
 */

import { BaseRepository } from '../core/BaseRepository';
import { User } from '../models/User';
import type { IUserRepository, Queryable } from '../types';

export class UserRepository extends BaseRepository<User> implements IUserRepository {
  constructor(db: Queryable) {
    super(db, User);
  }

  protected createEntityFromRow(row: Record<string, unknown>): User {
    return User.fromDbRow(row);
  }

  public async findByEmail(email: string, traceId: string): Promise<User | null> {
    const { whereClause, queryParams } = this.buildWhereClause({ email });
    const query = `SELECT ${this.selectColumns} FROM ${this.tableName} ${whereClause} LIMIT 1`;

    return this.queryOne('fetch user by email', query, queryParams, traceId);
  }
}
