import { randomUUID } from 'node:crypto';
import { eq, and, gte, lte, inArray, asc, sql, type SQL } from 'drizzle-orm';
import type { DatabaseExecutor } from '../db.js';
import { changeEvents } from '../schema/index.js';
import {
  MAX_CHANGE_QUERY_LIMIT,
  type ChangeLogRepository,
  type ChangeEventFilter,
  type ChangeLogEntryMeta,
  type StoredChangeEvent,
} from '../../interfaces/index.js';
import type {
  ChangeDisplay,
  ChangeEvent,
  ChangeLogSegment,
  FieldUpdatedEvent,
  Timestamp,
} from '@corpledger/protocol';

type ChangeEventRow = typeof changeEvents.$inferSelect;
type NewChangeEventRow = typeof changeEvents.$inferInsert;

/**
 * Map one event of a segment to its table row.
 */
export function changeEventToRow(
  event: ChangeEvent,
  segment: Pick<ChangeLogSegment, 'baselineTimestamp' | 'currentTimestamp'>,
  sequence: number,
  id: string = randomUUID()
): NewChangeEventRow {
  return {
    id,
    baselineSnapshot: segment.baselineTimestamp,
    currentSnapshot: segment.currentTimestamp,
    sequence,
    identifier: event.identifier,
    kind: event.kind,
    eventTimestamp: event.timestamp,
    occurredAt: new Date(event.timestamp),
    fieldName: event.kind === 'field_updated' ? event.fieldName : null,
    oldValue: event.kind === 'field_updated' ? event.oldValue : undefined,
    newValue: event.kind === 'field_updated' ? event.newValue : undefined,
    name: event.display.name ?? null,
    jurisdiction: event.display.jurisdiction ?? null,
    status: event.display.status ?? null,
  };
}

/**
 * Rebuild a stored event from its row. Null columns become absent keys.
 */
export function rowToStoredChangeEvent(row: ChangeEventRow): StoredChangeEvent {
  const display: ChangeDisplay = {};
  if (row.name !== null) display.name = row.name;
  if (row.jurisdiction !== null) display.jurisdiction = row.jurisdiction;
  if (row.status !== null) display.status = row.status;

  const meta: ChangeLogEntryMeta = {
    id: row.id,
    baselineTimestamp: row.baselineSnapshot,
    currentTimestamp: row.currentSnapshot,
    sequence: row.sequence,
    recordedAt: row.recordedAt.toISOString(),
  };
  const base = { identifier: row.identifier, timestamp: row.eventTimestamp, display };

  switch (row.kind) {
    case 'new_entity':
      return { ...base, ...meta, kind: 'new_entity' };
    case 'removed_entity':
      return { ...base, ...meta, kind: 'removed_entity' };
    case 'field_updated': {
      if (row.fieldName === null) {
        throw new Error(`Change event ${row.id} is a field update without a field name`);
      }
      const stored: FieldUpdatedEvent & ChangeLogEntryMeta = {
        ...base,
        ...meta,
        kind: 'field_updated',
        fieldName: row.fieldName,
      };
      if (row.oldValue !== null) stored.oldValue = row.oldValue;
      if (row.newValue !== null) stored.newValue = row.newValue;
      return stored;
    }
    default:
      throw new Error(`Change event ${row.id} has unknown kind "${String(row.kind)}"`);
  }
}

function buildConditions(filter: Omit<ChangeEventFilter, 'limit' | 'offset'>): SQL[] {
  const conditions: SQL[] = [];

  if (filter.identifier) {
    conditions.push(eq(changeEvents.identifier, filter.identifier));
  }

  if (filter.jurisdiction) {
    conditions.push(eq(changeEvents.jurisdiction, filter.jurisdiction));
  }

  if (filter.status) {
    conditions.push(eq(changeEvents.status, filter.status));
  }

  if (filter.kinds) {
    conditions.push(inArray(changeEvents.kind, filter.kinds));
  }

  if (filter.fieldName) {
    conditions.push(eq(changeEvents.fieldName, filter.fieldName));
  }

  if (filter.segment) {
    conditions.push(eq(changeEvents.baselineSnapshot, filter.segment.baselineTimestamp));
    conditions.push(eq(changeEvents.currentSnapshot, filter.segment.currentTimestamp));
  }

  if (filter.timeRange?.start) {
    conditions.push(gte(changeEvents.occurredAt, new Date(filter.timeRange.start)));
  }

  if (filter.timeRange?.end) {
    conditions.push(lte(changeEvents.occurredAt, new Date(filter.timeRange.end)));
  }

  return conditions;
}

export class PgChangeLogRepository implements ChangeLogRepository {
  constructor(private db: DatabaseExecutor) {}

  async append(segment: ChangeLogSegment): Promise<StoredChangeEvent[]> {
    if (segment.events.length === 0) return [];

    const rows = await this.db
      .insert(changeEvents)
      .values(segment.events.map((event, sequence) => changeEventToRow(event, segment, sequence)))
      .returning();

    return rows
      .sort((a, b) => a.sequence - b.sequence)
      .map((r) => rowToStoredChangeEvent(r));
  }

  async hasSegment(baselineTimestamp: Timestamp, currentTimestamp: Timestamp): Promise<boolean> {
    const [row] = await this.db
      .select({ id: changeEvents.id })
      .from(changeEvents)
      .where(
        and(
          eq(changeEvents.baselineSnapshot, baselineTimestamp),
          eq(changeEvents.currentSnapshot, currentTimestamp)
        )
      )
      .limit(1);

    return row !== undefined;
  }

  async query(filter: ChangeEventFilter): Promise<StoredChangeEvent[]> {
    const rows = await this.db
      .select()
      .from(changeEvents)
      .where(and(...buildConditions(filter)))
      .orderBy(asc(changeEvents.occurredAt), asc(changeEvents.sequence))
      .limit(Math.min(filter.limit, MAX_CHANGE_QUERY_LIMIT))
      .offset(filter.offset ?? 0);

    return rows.map((r) => rowToStoredChangeEvent(r));
  }

  async count(filter: Omit<ChangeEventFilter, 'limit' | 'offset'>): Promise<number> {
    const [result] = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(changeEvents)
      .where(and(...buildConditions(filter)));

    return Number(result?.count ?? 0);
  }

  async *stream(filter: Omit<ChangeEventFilter, 'limit' | 'offset'>): AsyncGenerator<StoredChangeEvent> {
    const batchSize = MAX_CHANGE_QUERY_LIMIT;
    let offset = 0;

    while (true) {
      const batch = await this.query({ ...filter, limit: batchSize, offset });

      for (const event of batch) {
        yield event;
      }

      if (batch.length < batchSize) break;
      offset += batchSize;
    }
  }
}
