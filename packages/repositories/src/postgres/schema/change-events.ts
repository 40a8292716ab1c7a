import { pgTable, text, timestamp, integer, jsonb, index } from 'drizzle-orm/pg-core';
import { CANONICAL_FIELDS, CHANGE_KINDS, type AttributeValue } from '@corpledger/protocol';
import { snapshots } from './snapshots.js';

/**
 * Change events table - append-only log of differences between snapshots.
 *
 * Design notes:
 * - Append-only: no updates or deletes in normal operation
 * - One segment per (baseline, current) snapshot pair
 * - Old/new values are JSONB so numbers stay numbers
 */
export const changeEvents = pgTable(
  'change_events',
  {
    id: text('id').primaryKey(),
    baselineSnapshot: text('baseline_snapshot')
      .notNull()
      .references(() => snapshots.timestamp),
    currentSnapshot: text('current_snapshot')
      .notNull()
      .references(() => snapshots.timestamp),
    sequence: integer('sequence').notNull(),
    identifier: text('identifier').notNull(),
    kind: text('kind', { enum: CHANGE_KINDS }).notNull(),
    eventTimestamp: text('event_timestamp').notNull(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).notNull(),
    fieldName: text('field_name', { enum: CANONICAL_FIELDS }),
    oldValue: jsonb('old_value').$type<AttributeValue>(),
    newValue: jsonb('new_value').$type<AttributeValue>(),
    name: text('name'),
    jurisdiction: text('jurisdiction'),
    status: text('status'),
    recordedAt: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('change_events_identifier_idx').on(table.identifier),
    index('change_events_kind_idx').on(table.kind),
    index('change_events_occurred_at_idx').on(table.occurredAt, table.sequence),
    index('change_events_segment_idx').on(table.baselineSnapshot, table.currentSnapshot),
    index('change_events_jurisdiction_idx').on(table.jurisdiction),
  ]
);
