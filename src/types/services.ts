/**
 * Service and Repository interface definitions
 */

import type { Contact } from '../models/Contact';
import type { User } from '../models/User';
import type { ContactFields, UserRef } from './entities';

export interface IContactRepository {
  list(limit: number, offset: number, owner: UserRef, traceId: string): Promise<Contact[]>;
  getById(id: number, owner: UserRef, traceId: string): Promise<Contact | null>;
  findDuplicate(
    email: string,
    number: string,
    owner: UserRef,
    traceId: string
  ): Promise<Contact | null>;
  create(fields: ContactFields, owner: UserRef, traceId: string): Promise<Contact>;
  update(id: number, fields: ContactFields, owner: UserRef, traceId: string): Promise<Contact | null>;
  remove(id: number, owner: UserRef, traceId: string): Promise<Contact | null>;
  searchByField(value: string, owner: UserRef, traceId: string): Promise<Contact[]>;
  birthdayWithinWeek(owner: UserRef, traceId: string, now?: Date): Promise<Contact[]>;
}

export interface IUserRepository {
  findByEmail(email: string, traceId: string): Promise<User | null>;
}

export interface Authenticator {
  authenticate(token: string, traceId: string): Promise<User>;
}
