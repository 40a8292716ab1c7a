// Canonical set builder - source batches to one immutable snapshot

import {
  compareIdentifiers,
  isTimestamp,
  type BuildSummary,
  type BuildWarning,
  type CanonicalRecord,
  type Snapshot,
  type SourceBatch,
  type SourceBuildCounters,
  type Timestamp,
} from '@corpledger/protocol';
import { EmptyBatchError, ValidationError } from '../errors.js';
import { silentLogger, type EngineLogger } from '../logging.js';
import { mappedColumns, normalizeRecord } from '../normalize/index.js';
import { deduplicate, type DedupCandidate, type DeduplicateOptions } from '../dedupe/index.js';

/**
 * Options for building a snapshot.
 */
export type BuildSnapshotOptions = DeduplicateOptions & {
  /** Logical date of the snapshot (ISO 8601) */
  timestamp: Timestamp;

  /**
   * Source tags in ascending precedence: a later tag beats an earlier one.
   * Defaults to the order of the batches.
   */
  sourcePriority?: readonly string[];

  /**
   * Maximum number of warnings kept on the summary; the rest are only counted.
   * Defaults to 1000.
   */
  maxWarnings?: number;

  logger?: EngineLogger;
};

export type BuildSnapshotResult = {
  snapshot: Snapshot;
  summary: BuildSummary;
};

/**
 * Assert that a string is an ISO 8601 date or a date-time with an offset.
 */
export function assertTimestamp(value: string, field: string): void {
  if (!isTimestamp(value)) {
    throw new ValidationError(`${field} must be a valid ISO 8601 date string`, {
      field,
      details: { value },
    });
  }
}

/**
 * Create a frozen snapshot from records, ordered by ascending identifier.
 *
 * @throws ValidationError if the timestamp is invalid or an identifier repeats
 */
export function createSnapshot(timestamp: Timestamp, records: Iterable<CanonicalRecord>): Snapshot {
  assertTimestamp(timestamp, 'timestamp');

  const sorted = [...records].sort((a, b) => compareIdentifiers(a.identifier, b.identifier));
  const map = new Map<string, CanonicalRecord>();
  for (const record of sorted) {
    if (map.has(record.identifier)) {
      throw new ValidationError(`Duplicate identifier in snapshot: ${record.identifier}`, {
        field: 'identifier',
      });
    }
    map.set(
      record.identifier,
      Object.isFrozen(record) && Object.isFrozen(record.attributes)
        ? record
        : Object.freeze({ ...record, attributes: Object.freeze({ ...record.attributes }) })
    );
  }

  return Object.freeze({ timestamp, records: map });
}

/**
 * Resolve each batch's precedence rank.
 */
function rankSources(
  batches: readonly SourceBatch[],
  sourcePriority?: readonly string[]
): Map<string, number> {
  const seen = new Set<string>();
  for (const batch of batches) {
    if (seen.has(batch.sourceTag)) {
      throw new ValidationError(`Duplicate source tag: ${batch.sourceTag}`, {
        field: 'sourceTag',
      });
    }
    seen.add(batch.sourceTag);
  }

  const order = sourcePriority ?? batches.map((b) => b.sourceTag);
  const ranks = new Map(order.map((tag, index) => [tag, index] as const));
  for (const tag of seen) {
    if (!ranks.has(tag)) {
      throw new ValidationError(`Source "${tag}" is missing from sourcePriority`, {
        field: 'sourcePriority',
        details: { sourcePriority: order },
      });
    }
  }
  return ranks;
}

/**
 * Build one canonical snapshot from per-source batches.
 *
 * Every row is normalized with its batch's mapping, rows are grouped by
 * identifier, and each group is reduced to one record by the deduplicator.
 * Data-quality problems are collected on the summary, never thrown per row.
 *
 * @throws EmptyBatchError if the batches contain no rows at all
 * @throws ValidationError on duplicate source tags, an incomplete
 *   sourcePriority, or an invalid timestamp
 * @throws DuplicateIdentifierConflict in strict mode
 *
 * @example
 * ```typescript
 * const { snapshot, summary } = buildSnapshot(
 *   [
 *     { sourceTag: 'delhi', records: delhiRows, mapping: delhiMapping },
 *     { sourceTag: 'gujarat', records: gujaratRows, mapping: gujaratMapping },
 *   ],
 *   { timestamp: '2024-06-01' }
 * );
 * console.log(summary.entities, summary.duplicatesCollapsed);
 * ```
 */
export function buildSnapshot(
  batches: readonly SourceBatch[],
  options: BuildSnapshotOptions
): BuildSnapshotResult {
  const { timestamp, sourcePriority, maxWarnings = 1000, logger = silentLogger } = options;

  assertTimestamp(timestamp, 'timestamp');

  const recordsIn = batches.reduce((sum, batch) => sum + batch.records.length, 0);
  if (recordsIn === 0) {
    throw new EmptyBatchError(batches.map((b) => b.sourceTag));
  }

  const ranks = rankSources(batches, sourcePriority);
  const warnings: BuildWarning[] = [];
  let warningsDropped = 0;
  const addWarning = (warning: BuildWarning) => {
    if (warnings.length < maxWarnings) {
      warnings.push(warning);
    } else {
      warningsDropped++;
    }
  };

  const perSource = new Map<string, SourceBuildCounters>();
  const groups = new Map<string, DedupCandidate[]>();
  let rowsMissingIdentifier = 0;
  let inputIndex = 0;

  for (const batch of batches) {
    const counters: SourceBuildCounters = { recordsIn: batch.records.length, missingIdentifier: 0, won: 0 };
    perSource.set(batch.sourceTag, counters);
    const sourceRank = ranks.get(batch.sourceTag) ?? 0;
    const columnsSeen = new Set<string>();

    batch.records.forEach((raw, rowIndex) => {
      for (const column of Object.keys(raw)) {
        columnsSeen.add(column);
      }

      const normalized = normalizeRecord(raw, batch.mapping, { sourceTag: batch.sourceTag, rowIndex });
      normalized.warnings.forEach(addWarning);

      if (normalized.identifier === null) {
        rowsMissingIdentifier++;
        counters.missingIdentifier++;
        addWarning({
          code: 'MISSING_IDENTIFIER',
          message: `Row ${rowIndex} of ${batch.sourceTag} has no identifier and was dropped`,
          sourceTag: batch.sourceTag,
          rowIndex,
        });
        inputIndex++;
        return;
      }

      const candidate: DedupCandidate = {
        identifier: normalized.identifier,
        attributes: normalized.attributes,
        sourceTag: batch.sourceTag,
        sourceRank,
        inputIndex: inputIndex++,
      };

      const group = groups.get(candidate.identifier);
      if (group) {
        group.push(candidate);
      } else {
        groups.set(candidate.identifier, [candidate]);
      }
    });

    if (batch.records.length > 0) {
      for (const column of mappedColumns(batch.mapping)) {
        if (!columnsSeen.has(column)) {
          addWarning({
            code: 'MISSING_SOURCE_COLUMN',
            message: `Column "${column}" does not appear in any row of ${batch.sourceTag}`,
            sourceTag: batch.sourceTag,
            column,
          });
        }
      }
    }
  }

  const records: CanonicalRecord[] = [];
  let duplicatesCollapsed = 0;

  for (const group of groups.values()) {
    const result = deduplicate(group, options);
    records.push(result.record);
    duplicatesCollapsed += result.collapsed;
    const winner = perSource.get(result.record.sourceTag);
    if (winner) winner.won++;

    for (const warning of result.warnings) {
      logger.warn(warning.message, { identifier: warning.identifier, field: warning.field });
      addWarning(warning);
    }
  }

  const snapshot = createSnapshot(timestamp, records);
  const summary: BuildSummary = {
    recordsIn,
    rowsMissingIdentifier,
    duplicatesCollapsed,
    entities: snapshot.records.size,
    perSource: Object.fromEntries(perSource),
    warnings,
    warningsDropped,
  };

  logger.info('Snapshot built', {
    timestamp,
    recordsIn,
    entities: summary.entities,
    duplicatesCollapsed,
    rowsMissingIdentifier,
    warnings: warnings.length + warningsDropped,
  });

  return { snapshot, summary };
}
