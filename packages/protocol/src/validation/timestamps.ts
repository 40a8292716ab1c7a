// Timestamp validation - calendar dates or date-times with an explicit offset
//
// Local date-times are rejected so that ordering never depends on the time
// zone of the machine doing the comparison.

import { z } from 'zod';

const CalendarDateSchema = z.string().date();
const OffsetDateTimeSchema = z.string().datetime({ offset: true });

export const TimestampSchema = z
  .string()
  .refine(
    (value) => CalendarDateSchema.safeParse(value).success || OffsetDateTimeSchema.safeParse(value).success,
    { message: 'Timestamp must be an ISO 8601 date (YYYY-MM-DD) or a date-time with an offset' }
  );

/**
 * Whether a value is a YYYY-MM-DD date or an ISO 8601 date-time carrying
 * `Z` or a numeric offset.
 */
export function isTimestamp(value: unknown): value is string {
  return TimestampSchema.safeParse(value).success;
}
