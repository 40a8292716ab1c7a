import { describe, it, expect } from 'vitest';
import { CHANGE_LOG_CSV_COLUMNS, escapeCsvCell, formatChangeLogCsv } from './csv.js';
import { changeLogFileName } from './paths.js';

describe('escapeCsvCell', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvCell('Active')).toBe('Active');
    expect(escapeCsvCell(100000)).toBe('100000');
  });

  it('renders absent values as empty cells', () => {
    expect(escapeCsvCell(undefined)).toBe('');
  });

  it('quotes delimiters, quotes and line breaks', () => {
    expect(escapeCsvCell('Alpha, Ltd')).toBe('"Alpha, Ltd"');
    expect(escapeCsvCell('The "Best" Co')).toBe('"The ""Best"" Co"');
    expect(escapeCsvCell('line\nbreak')).toBe('"line\nbreak"');
  });
});

describe('formatChangeLogCsv', () => {
  it('writes a header for an empty log', () => {
    expect(formatChangeLogCsv([])).toBe(`${CHANGE_LOG_CSV_COLUMNS.join(',')}\n`);
  });

  it('flattens events into rows', () => {
    const csv = formatChangeLogCsv([
      {
        kind: 'field_updated',
        identifier: 'ID1',
        timestamp: '2024-01-02',
        fieldName: 'paidUpCapital',
        oldValue: 100000,
        display: { name: 'Alpha Ltd', jurisdiction: 'StateA', status: 'Active' },
      },
      { kind: 'removed_entity', identifier: 'ID9', timestamp: '2024-01-02', display: {} },
    ]);

    expect(csv.split('\n')).toEqual([
      'identifier,kind,timestamp,fieldName,oldValue,newValue,name,jurisdiction,status',
      'ID1,field_updated,2024-01-02,paidUpCapital,100000,,Alpha Ltd,StateA,Active',
      'ID9,removed_entity,2024-01-02,,,,,,',
      '',
    ]);
  });
});

describe('changeLogFileName', () => {
  it('keys files by both timestamps and makes them filesystem safe', () => {
    expect(changeLogFileName('2024-01-01', '2024-01-02', 'csv')).toBe('changes_2024-01-01_2024-01-02.csv');
    expect(changeLogFileName('2024-01-01T00:00:00Z', '2024-01-02T06:30:00Z', 'ndjson')).toBe(
      'changes_2024-01-01T00-00-00Z_2024-01-02T06-30-00Z.ndjson'
    );
  });
});
