/**
 * Contact entity type definitions
 */

import type { IEntity } from '../base';

export interface IContact extends IEntity {
  name: string;
  surname: string;
  email: string;
  number: string;
  /** Calendar date, `YYYY-MM-DD` */
  bdDate: string;
  additionalData: string | null;
  ownerId: number;
}

/**
 * Mutable contact fields. Create and update both take the full set.
 */
export type ContactFields = Omit<IContact, 'id' | 'ownerId'>;

export interface ContactResponse {
  id: number;
  name: string;
  surname: string;
  email: string;
  number: string;
  bd_date: string;
  additional_data: string | null;
}

