/**
 * Base validation schemas using Zod
 * Provides reusable validation patterns
 */

import { z } from 'zod';
import { isCalendarDate } from '../utils/date';

// contacts.id is a SERIAL (int4) column
const MAX_ID = 2147483647;

export const idSchema = z.coerce
  .number()
  .int('Id must be an integer')
  .min(1, 'Id must be at least 1')
  .max(MAX_ID, `Id cannot exceed ${MAX_ID}`);

// Emails keep their case: search compares them exactly
export const emailSchema = z.string().email('Invalid email format').max(50, 'Email too long');

export const requiredTextSchema = (field: string, max: number) =>
  z
    .string({ required_error: `${field} is required` })
    .min(1, `${field} cannot be empty`)
    .max(max, `${field} too long`);

export const calendarDateSchema = z
  .string()
  .refine(isCalendarDate, 'Expected a calendar date in YYYY-MM-DD format');
