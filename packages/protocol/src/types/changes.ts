// Change events - the change log produced by diffing two snapshots

import type { DateRange, Timestamp } from './common.js';
import type { AttributeValue, CanonicalField } from './records.js';

export const CHANGE_KINDS = ['new_entity', 'removed_entity', 'field_updated'] as const;

export type ChangeKind = (typeof CHANGE_KINDS)[number];

/**
 * Denormalized attributes carried on every event for downstream readability.
 */
export type ChangeDisplay = {
  name?: string;
  jurisdiction?: string;
  status?: string;
};

type ChangeEventBase = {
  identifier: string;

  /** Logical date of the current snapshot */
  timestamp: Timestamp;

  display: ChangeDisplay;
};

export type NewEntityEvent = ChangeEventBase & {
  kind: 'new_entity';
};

export type RemovedEntityEvent = ChangeEventBase & {
  kind: 'removed_entity';
};

/**
 * A single field that differs between baseline and current.
 * oldValue and newValue are never both absent and never equal.
 */
export type FieldUpdatedEvent = ChangeEventBase & {
  kind: 'field_updated';
  fieldName: CanonicalField;
  oldValue?: AttributeValue;
  newValue?: AttributeValue;
};

/**
 * One detected difference between two snapshots for one identifier.
 * Events are immutable once created.
 */
export type ChangeEvent = NewEntityEvent | RemovedEntityEvent | FieldUpdatedEvent;

/**
 * Aggregate view of a change log
 */
export type ChangeSummary = {
  total: number;
  byKind: Record<ChangeKind, number>;
  byField: Partial<Record<CanonicalField, number>>;
  byJurisdiction: Record<string, number>;
  dateRange: DateRange;
};

export function isFieldUpdate(event: ChangeEvent): event is FieldUpdatedEvent {
  return event.kind === 'field_updated';
}

/**
 * The events produced by diffing one (baseline, current) snapshot pair.
 * The persisted change log is keyed by the two timestamps.
 */
export type ChangeLogSegment = {
  baselineTimestamp: Timestamp;
  currentTimestamp: Timestamp;
  events: ChangeEvent[];
};
