import type { IEntity } from '../base';

export interface IUser extends IEntity {
  email: string;
}

/**
 * The owning user as seen by the contacts core: only the id is used, as the
 * filter key of every scoped query.
 */
export type UserRef = Pick<IUser, 'id'>;
