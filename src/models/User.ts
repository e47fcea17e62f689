import { z } from 'zod';
import { BaseEntity } from '../core/BaseEntity';
import type { IUser } from '../types/entities/user';

const userEntitySchema = z.object({
  id: z.number().int(),
  email: z.string(),
});

export class User extends BaseEntity implements IUser {
  public email: string;

  constructor(data: IUser) {
    super(data);
    this.email = data.email;
  }

  public static getEntityType(): string {
    return 'user';
  }

  public static getTableName(): string {
    return 'users';
  }

  public static getColumnMappings(): Record<string, string> {
    return {
      ...super.getColumnMappings(),
      email: 'email',
    };
  }

  public static fromDbRow(row: Record<string, unknown>): User {
    const entityData = this.mapDbRowToEntityData(row, this.getColumnMappings());
    return new User(userEntitySchema.parse(entityData));
  }
}
