// Change-log export.
// Writes the stored change log as one file per snapshot pair.

import * as path from 'node:path';
import {
  CHANGE_LOG_DIR,
  changeLogFileName,
  formatChangeLogCsv,
  parseChangeLogNdjson,
  stringifyNdjson,
  type ChangeEvent,
  type ChangeLogSegment,
  type FieldUpdatedEvent,
} from '@corpledger/protocol';
import type { RepositoryContext, StoredChangeEvent } from '../interfaces/index.js';
import type {
  ChangeLogReader,
  ChangeLogWriter,
  ExportOptions,
  ExportSummary,
  ExportedSegmentFile,
} from './types.js';

/**
 * Drop storage metadata, keeping only the event itself.
 */
export function toChangeEvent(stored: StoredChangeEvent): ChangeEvent {
  const base = {
    identifier: stored.identifier,
    timestamp: stored.timestamp,
    display: stored.display,
  };

  if (stored.kind !== 'field_updated') {
    return { ...base, kind: stored.kind };
  }

  const event: FieldUpdatedEvent = { ...base, kind: 'field_updated', fieldName: stored.fieldName };
  if (stored.oldValue !== undefined) event.oldValue = stored.oldValue;
  if (stored.newValue !== undefined) event.newValue = stored.newValue;
  return event;
}

/**
 * Export the change log to `<outputDir>/change-logs/`.
 *
 * Events are grouped by (baseline, current) snapshot pair in log order;
 * each group becomes one NDJSON or CSV file.
 */
export async function exportChangeLog(
  repos: RepositoryContext,
  writer: ChangeLogWriter,
  options: ExportOptions
): Promise<ExportSummary> {
  const format = options.format ?? 'ndjson';
  const overwrite = options.overwrite ?? true;

  const segments = new Map<string, ChangeLogSegment>();
  for await (const stored of repos.changeLog.stream(options.filter ?? {})) {
    const key = `${stored.baselineTimestamp}\u0000${stored.currentTimestamp}`;
    let segment = segments.get(key);
    if (!segment) {
      segment = {
        baselineTimestamp: stored.baselineTimestamp,
        currentTimestamp: stored.currentTimestamp,
        events: [],
      };
      segments.set(key, segment);
    }
    segment.events.push(toChangeEvent(stored));
  }

  const dir = path.join(options.outputDir, CHANGE_LOG_DIR);
  const files: ExportedSegmentFile[] = [];

  for (const segment of segments.values()) {
    const filePath = path.join(
      dir,
      changeLogFileName(segment.baselineTimestamp, segment.currentTimestamp, format)
    );

    if (!overwrite && (await writer.exists(filePath))) {
      throw new Error(`Export target already exists: ${filePath}`);
    }

    const content =
      format === 'csv' ? formatChangeLogCsv(segment.events) : stringifyNdjson(segment.events);
    await writer.writeFile(filePath, content);

    files.push({
      path: filePath,
      baselineTimestamp: segment.baselineTimestamp,
      currentTimestamp: segment.currentTimestamp,
      eventCount: segment.events.length,
    });
  }

  return {
    outputDir: options.outputDir,
    format,
    files,
    eventCount: files.reduce((sum, file) => sum + file.eventCount, 0),
    exportedAt: new Date().toISOString(),
  };
}

/**
 * Read and validate one exported NDJSON change-log file.
 */
export async function readChangeLogFile(
  reader: ChangeLogReader,
  filePath: string
): Promise<ChangeEvent[]> {
  if (!filePath.endsWith('.ndjson')) {
    throw new Error(`Only NDJSON change logs can be read back: ${filePath}`);
  }
  return parseChangeLogNdjson(await reader.readFile(filePath));
}

/**
 * Read every NDJSON change-log file under `<outputDir>/change-logs/`,
 * in file-name order.
 */
export async function readChangeLogDirectory(
  reader: ChangeLogReader,
  outputDir: string
): Promise<{ path: string; events: ChangeEvent[] }[]> {
  const dir = path.join(outputDir, CHANGE_LOG_DIR);
  if (!(await reader.exists(dir))) {
    return [];
  }

  const names = (await reader.listDirectory(dir)).filter((name) => name.endsWith('.ndjson')).sort();
  const results: { path: string; events: ChangeEvent[] }[] = [];
  for (const name of names) {
    const filePath = path.join(dir, name);
    results.push({ path: filePath, events: await readChangeLogFile(reader, filePath) });
  }
  return results;
}
