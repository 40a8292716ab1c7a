// Change event validation - used when reading a stored change log back

import { z } from 'zod';
import type { ChangeEvent } from '../types/changes.js';
import { AttributeValueSchema, CanonicalFieldSchema } from './config.js';
import { TimestampSchema } from './timestamps.js';

const ChangeDisplaySchema = z.object({
  name: z.string().optional(),
  jurisdiction: z.string().optional(),
  status: z.string().optional(),
});

const EventBaseSchema = z.object({
  identifier: z.string().min(1, 'Identifier is required'),
  timestamp: TimestampSchema,
  display: ChangeDisplaySchema,
});

export const ChangeEventSchema = z
  .discriminatedUnion('kind', [
    EventBaseSchema.extend({ kind: z.literal('new_entity') }),
    EventBaseSchema.extend({ kind: z.literal('removed_entity') }),
    EventBaseSchema.extend({
      kind: z.literal('field_updated'),
      fieldName: CanonicalFieldSchema,
      oldValue: AttributeValueSchema.optional(),
      newValue: AttributeValueSchema.optional(),
    }),
  ])
  .superRefine((event, ctx) => {
    if (event.kind === 'field_updated' && event.oldValue === event.newValue) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['newValue'],
        message: 'A field update must change the value',
      });
    }
  });

/**
 * Validate a single change event
 * @throws ZodError if validation fails
 */
export function validateChangeEvent(data: unknown): ChangeEvent {
  return ChangeEventSchema.parse(data);
}

export function safeValidateChangeEvent(
  data: unknown
): z.SafeParseReturnType<unknown, ChangeEvent> {
  return ChangeEventSchema.safeParse(data);
}
