// Snapshot differ - compares two snapshots and produces the change log
//
// Three-way partition of identifiers (added / removed / common) followed by a
// field-wise scan of the common ones. Each group is emitted in ascending
// identifier order, so output never depends on snapshot insertion order.

import {
  compareIdentifiers,
  type CanonicalRecord,
  type ChangeDisplay,
  type ChangeEvent,
  type ChangeLogSegment,
  type FieldUpdatedEvent,
  type NewEntityEvent,
  type RemovedEntityEvent,
  type Snapshot,
  type Timestamp,
} from '@corpledger/protocol';
import { InvalidSnapshotOrdering } from '../errors.js';
import { assertTimestamp } from '../build/index.js';
import { classifyChange } from './classifier.js';

/**
 * Denormalized name, jurisdiction and status for an event.
 */
function displayOf(record: CanonicalRecord): ChangeDisplay {
  const display: ChangeDisplay = {};
  const { name, jurisdiction, status } = record.attributes;
  if (name !== undefined) display.name = String(name);
  if (jurisdiction !== undefined) display.jurisdiction = String(jurisdiction);
  if (status !== undefined) display.status = String(status);
  return Object.freeze(display);
}

function sortedKeys(keys: Iterable<string>): string[] {
  return [...keys].sort(compareIdentifiers);
}

/**
 * Detect changes between a baseline snapshot and a later current snapshot.
 *
 * Events are ordered: new entities, then removed entities, then field
 * updates (by identifier, then by canonical field order). Records that are
 * identical in both snapshots produce no events.
 *
 * @param baseline - The older snapshot
 * @param current - The newer snapshot
 * @param timestamp - Logical date stamped on every event; defaults to current.timestamp
 * @returns The ordered change log
 * @throws InvalidSnapshotOrdering if current is older than baseline, or
 *   timestamp is not later than baseline.timestamp
 * @throws ValidationError if any timestamp is not a valid ISO 8601 date
 *
 * @example
 * ```typescript
 * const events = detectChanges(mondaySnapshot, tuesdaySnapshot);
 * const updates = events.filter(isFieldUpdate);
 * ```
 */
export function detectChanges(
  baseline: Snapshot,
  current: Snapshot,
  timestamp: Timestamp = current.timestamp
): ChangeEvent[] {
  assertTimestamp(baseline.timestamp, 'baseline.timestamp');
  assertTimestamp(current.timestamp, 'current.timestamp');
  assertTimestamp(timestamp, 'timestamp');

  const baselineTime = Date.parse(baseline.timestamp);
  if (Date.parse(current.timestamp) < baselineTime) {
    throw new InvalidSnapshotOrdering(baseline.timestamp, current.timestamp);
  }
  if (Date.parse(timestamp) <= baselineTime) {
    throw new InvalidSnapshotOrdering(baseline.timestamp, timestamp);
  }

  const added: string[] = [];
  const common: string[] = [];
  for (const identifier of current.records.keys()) {
    if (baseline.records.has(identifier)) {
      common.push(identifier);
    } else {
      added.push(identifier);
    }
  }
  const removed = [...baseline.records.keys()].filter((id) => !current.records.has(id));

  const events: ChangeEvent[] = [];

  for (const identifier of sortedKeys(added)) {
    const classification = classifyChange(undefined, current.records.get(identifier));
    const event: NewEntityEvent = {
      kind: 'new_entity',
      identifier,
      timestamp,
      display: displayOf(classification.record),
    };
    events.push(Object.freeze(event));
  }

  for (const identifier of sortedKeys(removed)) {
    const classification = classifyChange(baseline.records.get(identifier), undefined);
    const event: RemovedEntityEvent = {
      kind: 'removed_entity',
      identifier,
      timestamp,
      display: displayOf(classification.record),
    };
    events.push(Object.freeze(event));
  }

  for (const identifier of sortedKeys(common)) {
    const classification = classifyChange(
      baseline.records.get(identifier),
      current.records.get(identifier)
    );
    if (classification.kind !== 'updated') continue;

    const display = displayOf(classification.record);
    for (const delta of classification.fields) {
      const event: FieldUpdatedEvent = {
        kind: 'field_updated',
        identifier,
        timestamp,
        fieldName: delta.field,
        display,
      };
      if (delta.oldValue !== undefined) event.oldValue = delta.oldValue;
      if (delta.newValue !== undefined) event.newValue = delta.newValue;
      events.push(Object.freeze(event));
    }
  }

  return events;
}

/**
 * Diff each consecutive pair of snapshots (pairwise-daily log).
 * A cumulative comparison is `detectChanges(first, last)` instead.
 *
 * @param snapshots - Snapshots in ascending timestamp order
 * @returns One segment per consecutive pair; empty when fewer than two snapshots
 * @throws InvalidSnapshotOrdering if the snapshots are not strictly ascending
 */
export function detectChangesAcross(snapshots: readonly Snapshot[]): ChangeLogSegment[] {
  const segments: ChangeLogSegment[] = [];

  for (let i = 1; i < snapshots.length; i++) {
    const baseline = snapshots[i - 1];
    const current = snapshots[i];
    segments.push({
      baselineTimestamp: baseline.timestamp,
      currentTimestamp: current.timestamp,
      events: detectChanges(baseline, current),
    });
  }

  return segments;
}
