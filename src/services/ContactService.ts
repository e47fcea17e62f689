/**
 * Business logic service for contacts
 * Owns the not-found and duplicate rules on top of the scoped repository
 */

import type { Contact } from '../models/Contact';
import type { ContactFields, IContactRepository, UserRef } from '../types';
import { ConflictError, NotFoundError } from '../utils/error';
import { logger } from '../utils/logger';

export const CONTACT_NOT_FOUND = 'Contact not found';
export const DUPLICATE_CONTACT = 'Contact with this number or email already exists';

export class ContactService {
  private contactRepository: IContactRepository;

  constructor(contactRepository: IContactRepository) {
    this.contactRepository = contactRepository;
  }

  public async listContacts(
    limit: number,
    offset: number,
    owner: UserRef,
    traceId: string
  ): Promise<Contact[]> {
    logger.withTrace(traceId).debug('Fetching contacts', { limit, offset, userId: owner.id });
    return this.contactRepository.list(limit, offset, owner, traceId);
  }

  public async getContact(id: number, owner: UserRef, traceId: string): Promise<Contact> {
    const contact = await this.contactRepository.getById(id, owner, traceId);
    if (!contact) {
      throw new NotFoundError(CONTACT_NOT_FOUND);
    }
    return contact;
  }

  /**
   * Create a contact unless the owner already has one with the same email and number
   */
  public async createContact(
    fields: ContactFields,
    owner: UserRef,
    traceId: string
  ): Promise<Contact> {
    const existing = await this.contactRepository.findDuplicate(
      fields.email,
      fields.number,
      owner,
      traceId
    );

    if (existing) {
      logger.withTrace(traceId).warn('Duplicate contact rejected', {
        existingId: existing.id,
        userId: owner.id,
      });
      throw new ConflictError(DUPLICATE_CONTACT);
    }

    return this.contactRepository.create(fields, owner, traceId);
  }

  public async updateContact(
    id: number,
    fields: ContactFields,
    owner: UserRef,
    traceId: string
  ): Promise<Contact> {
    const contact = await this.contactRepository.update(id, fields, owner, traceId);
    if (!contact) {
      throw new NotFoundError(CONTACT_NOT_FOUND);
    }
    return contact;
  }

  public async removeContact(id: number, owner: UserRef, traceId: string): Promise<Contact> {
    const contact = await this.contactRepository.remove(id, owner, traceId);
    if (!contact) {
      throw new NotFoundError(CONTACT_NOT_FOUND);
    }
    return contact;
  }

  public async searchContacts(value: string, owner: UserRef, traceId: string): Promise<Contact[]> {
    return this.contactRepository.searchByField(value, owner, traceId);
  }

  public async getUpcomingBirthdays(
    owner: UserRef,
    traceId: string,
    now?: Date
  ): Promise<Contact[]> {
    return this.contactRepository.birthdayWithinWeek(owner, traceId, now);
  }
}
