// Snapshot summary - totals by jurisdiction and status, registration date range

import type { Snapshot, SnapshotSummary } from '@corpledger/protocol';

const UNKNOWN = 'unknown';

/**
 * Summarize a snapshot for reporting.
 * Entities without a jurisdiction or status are counted under "unknown".
 */
export function summarizeSnapshot(snapshot: Snapshot): SnapshotSummary {
  const byJurisdiction = new Map<string, number>();
  const byStatus = new Map<string, number>();
  let earliest: string | undefined;
  let latest: string | undefined;

  for (const record of snapshot.records.values()) {
    const jurisdiction = String(record.attributes.jurisdiction ?? UNKNOWN);
    const status = String(record.attributes.status ?? UNKNOWN);
    byJurisdiction.set(jurisdiction, (byJurisdiction.get(jurisdiction) ?? 0) + 1);
    byStatus.set(status, (byStatus.get(status) ?? 0) + 1);

    const registered = record.attributes.registrationDate;
    if (typeof registered === 'string') {
      if (earliest === undefined || registered < earliest) earliest = registered;
      if (latest === undefined || registered > latest) latest = registered;
    }
  }

  return {
    totalEntities: snapshot.records.size,
    byJurisdiction: Object.fromEntries(byJurisdiction),
    byStatus: Object.fromEntries(byStatus),
    registrationDateRange: { earliest, latest },
  };
}
