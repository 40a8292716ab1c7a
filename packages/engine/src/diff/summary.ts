// Change log summary - counts by kind, field and jurisdiction

import { isFieldUpdate, type ChangeEvent, type ChangeSummary } from '@corpledger/protocol';

/**
 * Summarize a change log.
 * Events without a jurisdiction are counted under "unknown".
 */
export function summarizeChanges(events: readonly ChangeEvent[]): ChangeSummary {
  const byJurisdiction = new Map<string, number>();
  const summary: ChangeSummary = {
    total: events.length,
    byKind: { new_entity: 0, removed_entity: 0, field_updated: 0 },
    byField: {},
    byJurisdiction: {},
    dateRange: {},
  };

  for (const event of events) {
    summary.byKind[event.kind]++;

    if (isFieldUpdate(event)) {
      summary.byField[event.fieldName] = (summary.byField[event.fieldName] ?? 0) + 1;
    }

    const jurisdiction = event.display.jurisdiction ?? 'unknown';
    byJurisdiction.set(jurisdiction, (byJurisdiction.get(jurisdiction) ?? 0) + 1);

    const time = Date.parse(event.timestamp);
    const { earliest, latest } = summary.dateRange;
    if (earliest === undefined || time < Date.parse(earliest)) {
      summary.dateRange.earliest = event.timestamp;
    }
    if (latest === undefined || time > Date.parse(latest)) {
      summary.dateRange.latest = event.timestamp;
    }
  }

  summary.byJurisdiction = Object.fromEntries(byJurisdiction);
  return summary;
}
