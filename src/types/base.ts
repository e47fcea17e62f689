/**
 * Base type definitions - fundamental types used across the application
 */

export interface IEntity {
  id: number;
}

export interface ErrorDetails {
  field?: string;
  message: string;
  code?: string;
}
