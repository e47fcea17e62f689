/**
 * Contact entity validation schemas
 */

import { z } from 'zod';
import { calendarDateSchema, emailSchema, idSchema, requiredTextSchema } from '../base';
import type { ContactFields } from '../../types/entities/contact';

// Request body, snake_case on the wire
export const contactBodySchema = z
  .object({
    name: requiredTextSchema('Name', 50),
    surname: requiredTextSchema('Surname', 50),
    email: emailSchema,
    number: requiredTextSchema('Number', 20),
    bd_date: calendarDateSchema,
    additional_data: z.string().max(250, 'Additional data too long').nullish(),
  })
  .transform(
    (body): ContactFields => ({
      name: body.name,
      surname: body.surname,
      email: body.email,
      number: body.number,
      bdDate: body.bd_date,
      additionalData: body.additional_data ?? null,
    })
  );

export const contactIdParamSchema = z.object({
  contactId: idSchema,
});

export const contactListQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(10, 'Limit must be at least 10')
    .max(500, 'Limit cannot exceed 500')
    .default(10),
  offset: z.coerce
    .number()
    .int()
    .min(0, 'Offset cannot be negative')
    .max(200, 'Offset cannot exceed 200')
    .default(0),
});

export const contactSearchParamSchema = z.object({
  contactValue: z.string().min(1, 'Search value cannot be empty'),
});

// Persisted contact as mapped from a row
export const contactEntitySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  surname: z.string(),
  email: z.string(),
  number: z.string(),
  bdDate: z.string(),
  additionalData: z.string().nullable(),
  ownerId: z.number().int(),
});
