import { describe, it, expect } from 'vitest';
import type { ChangeEvent } from '@corpledger/protocol';
import { summarizeChanges } from './summary.js';

const events: ChangeEvent[] = [
  {
    kind: 'new_entity',
    identifier: 'ID2',
    timestamp: '2024-03-02',
    display: { jurisdiction: 'StateA' },
  },
  {
    kind: 'field_updated',
    identifier: 'ID1',
    timestamp: '2024-03-02',
    fieldName: 'status',
    oldValue: 'Active',
    newValue: 'Strike Off',
    display: { jurisdiction: 'StateA' },
  },
  {
    kind: 'field_updated',
    identifier: 'ID1',
    timestamp: '2024-03-05',
    fieldName: 'status',
    oldValue: 'Strike Off',
    newValue: 'Active',
    display: {},
  },
  {
    kind: 'removed_entity',
    identifier: 'ID7',
    timestamp: '2024-03-01T12:00:00Z',
    display: { jurisdiction: 'StateB' },
  },
];

describe('summarizeChanges', () => {
  it('counts events by kind, field and jurisdiction', () => {
    expect(summarizeChanges(events)).toEqual({
      total: 4,
      byKind: { new_entity: 1, removed_entity: 1, field_updated: 2 },
      byField: { status: 2 },
      byJurisdiction: { StateA: 2, unknown: 1, StateB: 1 },
      dateRange: { earliest: '2024-03-01T12:00:00Z', latest: '2024-03-05' },
    });
  });

  it('counts jurisdictions named like object properties', () => {
    const summary = summarizeChanges([
      { kind: 'new_entity', identifier: 'ID1', timestamp: '2024-03-02', display: { jurisdiction: 'constructor' } },
      { kind: 'new_entity', identifier: 'ID2', timestamp: '2024-03-02', display: { jurisdiction: 'constructor' } },
    ]);

    expect(Object.entries(summary.byJurisdiction)).toEqual([['constructor', 2]]);
  });

  it('summarizes an empty log', () => {
    expect(summarizeChanges([])).toEqual({
      total: 0,
      byKind: { new_entity: 0, removed_entity: 0, field_updated: 0 },
      byField: {},
      byJurisdiction: {},
      dateRange: {},
    });
  });
});
