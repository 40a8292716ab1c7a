// CSV rendering of a change log
//
// One row per event with the ChangeEvent fields flattened. Absent values are
// empty cells.

import type { ChangeEvent } from '../types/changes.js';

export const CHANGE_LOG_CSV_COLUMNS = [
  'identifier',
  'kind',
  'timestamp',
  'fieldName',
  'oldValue',
  'newValue',
  'name',
  'jurisdiction',
  'status',
] as const;

type CsvCell = string | number | undefined;

/**
 * Quote a cell when it contains a delimiter, quote or line break.
 */
export function escapeCsvCell(value: CsvCell): string {
  if (value === undefined) {
    return '';
  }

  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

function eventToCells(event: ChangeEvent): CsvCell[] {
  const isUpdate = event.kind === 'field_updated';
  return [
    event.identifier,
    event.kind,
    event.timestamp,
    isUpdate ? event.fieldName : undefined,
    isUpdate ? event.oldValue : undefined,
    isUpdate ? event.newValue : undefined,
    event.display.name,
    event.display.jurisdiction,
    event.display.status,
  ];
}

/**
 * Render events as CSV with a header row and `\n` line endings.
 */
export function formatChangeLogCsv(events: readonly ChangeEvent[]): string {
  const lines = [CHANGE_LOG_CSV_COLUMNS.join(',')];
  for (const event of events) {
    lines.push(eventToCells(event).map(escapeCsvCell).join(','));
  }
  return lines.join('\n') + '\n';
}
