/**
 * Contact entity implementation
 * Extends BaseEntity with contact-specific fields
 */

import { BaseEntity } from '../core/BaseEntity';
import type { ContactResponse, IContact } from '../types/entities/contact';
import { contactEntitySchema } from '../schemas/entities/contact';

export class Contact extends BaseEntity implements IContact {
  public name: string;
  public surname: string;
  public email: string;
  public number: string;
  public bdDate: string;
  public additionalData: string | null;
  public ownerId: number;

  constructor(data: IContact) {
    super(data);
    this.name = data.name;
    this.surname = data.surname;
    this.email = data.email;
    this.number = data.number;
    this.bdDate = data.bdDate;
    this.additionalData = data.additionalData;
    this.ownerId = data.ownerId;
  }

  public static getEntityType(): string {
    return 'contact';
  }

  public static getTableName(): string {
    return 'contacts';
  }

  public static getColumnMappings(): Record<string, string> {
    return {
      ...super.getColumnMappings(),
      name: 'name',
      surname: 'surname',
      email: 'email',
      number: 'number',
      bdDate: 'bd_date',
      additionalData: 'additional_data',
      ownerId: 'user_id',
    };
  }

  /**
   * Create Contact instance from database row
   */
  public static fromDbRow(row: Record<string, unknown>): Contact {
    const entityData = this.mapDbRowToEntityData(row, this.getColumnMappings());
    return new Contact(contactEntitySchema.parse(entityData));
  }

  /**
   * Wire representation; the owner never leaves the service
   */
  public toApiResponse(): ContactResponse {
    return {
      id: this.id,
      name: this.name,
      surname: this.surname,
      email: this.email,
      number: this.number,
      bd_date: this.bdDate,
      additional_data: this.additionalData,
    };
  }
}
