import { Contact } from '../models/Contact';
import type { ContactFields, IContactRepository, UserRef } from '../types';
import { birthdayWindow, matchesBirthdayWindow } from '../utils/date';

/**
 * Contact repository stand-in with the same owner scoping and matching rules
 * as the SQL implementation.
 */
export class InMemoryContactRepository implements IContactRepository {
  private contacts: Contact[] = [];
  private nextId = 1;

  public clear(): void {
    this.contacts = [];
    this.nextId = 1;
  }

  public count(owner?: UserRef): number {
    return owner ? this.owned(owner).length : this.contacts.length;
  }

  public async list(limit: number, offset: number, owner: UserRef): Promise<Contact[]> {
    return this.owned(owner).slice(offset, offset + limit);
  }

  public async getById(id: number, owner: UserRef): Promise<Contact | null> {
    return this.owned(owner).find(contact => contact.id === id) ?? null;
  }

  public async findDuplicate(
    email: string,
    number: string,
    owner: UserRef
  ): Promise<Contact | null> {
    return (
      this.owned(owner).find(contact => contact.email === email && contact.number === number) ??
      null
    );
  }

  public async create(fields: ContactFields, owner: UserRef): Promise<Contact> {
    const contact = new Contact({ ...fields, id: this.nextId++, ownerId: owner.id });
    this.contacts.push(contact);
    return contact;
  }

  public async update(id: number, fields: ContactFields, owner: UserRef): Promise<Contact | null> {
    const index = this.contacts.findIndex(
      contact => contact.id === id && contact.ownerId === owner.id
    );
    if (index === -1) {
      return null;
    }

    const updated = new Contact({ ...fields, id, ownerId: owner.id });
    this.contacts[index] = updated;
    return updated;
  }

  public async remove(id: number, owner: UserRef): Promise<Contact | null> {
    const existing = await this.getById(id, owner);
    if (!existing) {
      return null;
    }

    this.contacts = this.contacts.filter(contact => contact !== existing);
    return existing;
  }

  public async searchByField(value: string, owner: UserRef): Promise<Contact[]> {
    const lowered = value.toLowerCase();
    return this.owned(owner).filter(
      contact =>
        contact.name.toLowerCase() === lowered ||
        contact.surname.toLowerCase() === lowered ||
        contact.email === value
    );
  }

  public async birthdayWithinWeek(
    owner: UserRef,
    _traceId: string,
    now: Date = new Date()
  ): Promise<Contact[]> {
    const window = birthdayWindow(now);
    return this.owned(owner).filter(contact => matchesBirthdayWindow(contact.bdDate, window));
  }

  private owned(owner: UserRef): Contact[] {
    return this.contacts.filter(contact => contact.ownerId === owner.id);
  }
}
