import { describe, it, expect } from 'vitest';
import type { CanonicalAttributes, ChangeEvent, Snapshot } from '@corpledger/protocol';
import { detectChanges, detectChangesAcross } from './differ.js';
import { createSnapshot } from '../build/index.js';
import { InvalidSnapshotOrdering, ValidationError } from '../errors.js';

// --- Test Fixtures ---

function snapshot(timestamp: string, entries: Record<string, CanonicalAttributes>): Snapshot {
  return createSnapshot(
    timestamp,
    Object.entries(entries).map(([identifier, attributes]) => ({
      identifier,
      attributes,
      sourceTag: 'stateA',
    }))
  );
}

const DAY1 = '2024-03-01';
const DAY2 = '2024-03-02';
const DAY3 = '2024-03-03';

// --- Tests ---

describe('detectChanges', () => {
  it('reports a status change and a new entity, but no unchanged capital', () => {
    const baseline = snapshot(DAY1, {
      ID1: { name: 'Alpha Ltd', status: 'Active', paidUpCapital: 100000 },
    });
    const current = snapshot(DAY2, {
      ID1: { name: 'Alpha Ltd', status: 'Strike Off', paidUpCapital: 100000 },
      ID2: { name: 'Beta Ltd', status: 'Active' },
    });

    const events = detectChanges(baseline, current);

    expect(events).toEqual([
      {
        kind: 'new_entity',
        identifier: 'ID2',
        timestamp: DAY2,
        display: { name: 'Beta Ltd', status: 'Active' },
      },
      {
        kind: 'field_updated',
        identifier: 'ID1',
        timestamp: DAY2,
        fieldName: 'status',
        oldValue: 'Active',
        newValue: 'Strike Off',
        display: { name: 'Alpha Ltd', status: 'Strike Off' },
      },
    ]);
  });

  it('partitions identifiers into new and removed sets', () => {
    const baseline = snapshot(DAY1, { A: {}, B: {}, C: {} });
    const current = snapshot(DAY2, { B: {}, D: {}, E: {} });

    const events = detectChanges(baseline, current);
    const idsOf = (kind: ChangeEvent['kind']) =>
      events.filter((e) => e.kind === kind).map((e) => e.identifier);

    expect(idsOf('new_entity')).toEqual(['D', 'E']);
    expect(idsOf('removed_entity')).toEqual(['A', 'C']);
    expect(idsOf('field_updated')).toEqual([]);
  });

  it('produces nothing for identical content', () => {
    const attributes = { name: 'Alpha Ltd', authorizedCapital: 500, registrationDate: '2001-05-06' };
    const events = detectChanges(
      snapshot(DAY1, { ID1: attributes }),
      snapshot(DAY2, { ID1: { ...attributes } })
    );

    expect(events).toEqual([]);
  });

  it('produces nothing when the same snapshot is on both sides', () => {
    const a = snapshot(DAY1, { ID1: { name: 'Alpha Ltd', status: 'Active' }, ID2: {} });

    expect(detectChanges(a, a, DAY2)).toEqual([]);
  });

  it('reports a value that appears', () => {
    const events = detectChanges(
      snapshot(DAY1, { ID1: { name: 'Alpha Ltd' } }),
      snapshot(DAY2, { ID1: { name: 'Alpha Ltd', category: 'Company limited by Shares' } })
    );

    expect(events).toHaveLength(1);
    expect(events[0]).toEqual({
      kind: 'field_updated',
      identifier: 'ID1',
      timestamp: DAY2,
      fieldName: 'category',
      newValue: 'Company limited by Shares',
      display: { name: 'Alpha Ltd' },
    });
    expect('oldValue' in events[0]).toBe(false);
  });

  it('reports a value that disappears', () => {
    const events = detectChanges(
      snapshot(DAY1, { ID1: { name: 'Alpha Ltd', category: 'Company limited by Shares' } }),
      snapshot(DAY2, { ID1: { name: 'Alpha Ltd' } })
    );

    expect(events).toEqual([
      {
        kind: 'field_updated',
        identifier: 'ID1',
        timestamp: DAY2,
        fieldName: 'category',
        oldValue: 'Company limited by Shares',
        display: { name: 'Alpha Ltd' },
      },
    ]);
  });

  it('reports exactly one event for one differing number', () => {
    const events = detectChanges(
      snapshot(DAY1, { ID1: { authorizedCapital: 1000000, paidUpCapital: 500000 } }),
      snapshot(DAY2, { ID1: { authorizedCapital: 1000000, paidUpCapital: 500001 } })
    );

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      fieldName: 'paidUpCapital',
      oldValue: 500000,
      newValue: 500001,
    });
  });

  it('orders new, then removed, then updates by identifier and field', () => {
    const baseline = snapshot(DAY1, {
      Z9: { status: 'Active', address: 'A' },
      A1: { status: 'Active' },
      R1: {},
    });
    const current = snapshot(DAY2, {
      Z9: { status: 'Dormant', address: 'B' },
      A1: { status: 'Dormant' },
      N2: {},
      N1: {},
    });

    const events = detectChanges(baseline, current);

    expect(
      events.map((e) => (e.kind === 'field_updated' ? `${e.identifier}.${e.fieldName}` : `${e.kind}:${e.identifier}`))
    ).toEqual([
      'new_entity:N1',
      'new_entity:N2',
      'removed_entity:R1',
      'A1.status',
      'Z9.status',
      'Z9.address',
    ]);
  });

  it('takes the display of removed entities from the baseline', () => {
    const events = detectChanges(
      snapshot(DAY1, { ID1: { name: 'Gone Ltd', jurisdiction: 'StateA', status: 'Active' } }),
      snapshot(DAY2, {})
    );

    expect(events).toEqual([
      {
        kind: 'removed_entity',
        identifier: 'ID1',
        timestamp: DAY2,
        display: { name: 'Gone Ltd', jurisdiction: 'StateA', status: 'Active' },
      },
    ]);
  });

  it('stamps events with an explicit timestamp', () => {
    const events = detectChanges(snapshot(DAY1, {}), snapshot(DAY2, { ID1: {} }), '2024-03-02T06:00:00Z');

    expect(events[0].timestamp).toBe('2024-03-02T06:00:00Z');
  });

  it('returns frozen events', () => {
    const [event] = detectChanges(snapshot(DAY1, {}), snapshot(DAY2, { ID1: { name: 'x' } }));

    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.display)).toBe(true);
  });

  it('rejects a current snapshot that is not later than the baseline', () => {
    const a = snapshot(DAY2, {});
    const b = snapshot(DAY1, {});

    expect(() => detectChanges(a, b)).toThrow(InvalidSnapshotOrdering);
    expect(() => detectChanges(a, snapshot(DAY2, {}))).toThrow(
      `Current snapshot (${DAY2}) must be later than baseline (${DAY2})`
    );
  });

  it('rejects a reversed pair even with a later event timestamp', () => {
    const baseline = snapshot(DAY2, { ID1: { status: 'Active' } });
    const current = snapshot(DAY1, { ID1: { status: 'Strike Off' } });

    expect(() => detectChanges(baseline, current, DAY3)).toThrow(InvalidSnapshotOrdering);
    expect(() => detectChanges(baseline, current, DAY3)).toThrow(
      `Current snapshot (${DAY1}) must be later than baseline (${DAY2})`
    );
  });

  it('rejects an unparseable timestamp', () => {
    expect(() => detectChanges(snapshot(DAY1, {}), snapshot(DAY2, {}), 'soon')).toThrow(ValidationError);
  });

  it('rejects event timestamps that are not strict ISO 8601', () => {
    const baseline = snapshot(DAY1, {});
    const current = snapshot(DAY2, {});

    expect(() => detectChanges(baseline, current, '2024/03/02')).toThrow(ValidationError);
    expect(() => detectChanges(baseline, current, '2024-03-02T03:00:00')).toThrow(ValidationError);
  });
});

describe('detectChangesAcross', () => {
  it('diffs each consecutive pair', () => {
    const s1 = snapshot(DAY1, { ID1: { status: 'Active' } });
    const s2 = snapshot(DAY2, { ID1: { status: 'Dormant' } });
    const s3 = snapshot(DAY3, { ID1: { status: 'Active' } });

    const segments = detectChangesAcross([s1, s2, s3]);

    expect(segments.map((s) => [s.baselineTimestamp, s.currentTimestamp, s.events.length])).toEqual([
      [DAY1, DAY2, 1],
      [DAY2, DAY3, 1],
    ]);
    // The round trip cancels out cumulatively
    expect(detectChanges(s1, s3)).toEqual([]);
  });

  it('returns no segments for fewer than two snapshots', () => {
    expect(detectChangesAcross([])).toEqual([]);
    expect(detectChangesAcross([snapshot(DAY1, {})])).toEqual([]);
  });

  it('rejects snapshots out of order', () => {
    expect(() => detectChangesAcross([snapshot(DAY2, {}), snapshot(DAY1, {})])).toThrow(
      InvalidSnapshotOrdering
    );
  });
});
