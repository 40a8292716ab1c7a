import { pgTable, text, timestamp, integer, jsonb, primaryKey, index } from 'drizzle-orm/pg-core';
import type { BuildSummary, CanonicalAttributes } from '@corpledger/protocol';

/**
 * Snapshots table - one row per materialized snapshot.
 *
 * `timestamp` keeps the caller's text so it round-trips unchanged;
 * `taken_at` holds the parsed instant for ordering.
 */
export const snapshots = pgTable(
  'snapshots',
  {
    timestamp: text('timestamp').primaryKey(),
    takenAt: timestamp('taken_at', { withTimezone: true }).notNull(),
    entityCount: integer('entity_count').notNull(),
    summary: jsonb('summary').$type<BuildSummary>(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('snapshots_taken_at_idx').on(table.takenAt)]
);

/**
 * Snapshot records - immutable once written.
 */
export const snapshotRecords = pgTable(
  'snapshot_records',
  {
    snapshotTimestamp: text('snapshot_timestamp')
      .notNull()
      .references(() => snapshots.timestamp, { onDelete: 'cascade' }),
    identifier: text('identifier').notNull(),
    attributes: jsonb('attributes').$type<CanonicalAttributes>().notNull(),
    sourceTag: text('source_tag').notNull(),
  },
  (table) => [primaryKey({ columns: [table.snapshotTimestamp, table.identifier] })]
);
