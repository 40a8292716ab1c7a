// NDJSON (Newline Delimited JSON) helpers
// Used for append-only change log files

import type { ChangeEvent } from '../types/changes.js';
import { safeValidateChangeEvent } from '../validation/events.js';

/**
 * Parse an NDJSON string into an array of objects
 */
export function parseNdjson(content: string): unknown[] {
  if (!content.trim()) {
    return [];
  }

  const lines = content.split('\n');
  const results: unknown[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue; // Skip empty lines

    try {
      results.push(JSON.parse(line));
    } catch (error) {
      throw new Error(
        `Failed to parse NDJSON at line ${i + 1}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  return results;
}

/**
 * Stringify an array of objects to NDJSON format
 */
export function stringifyNdjson<T>(items: readonly T[]): string {
  return items.map((item) => JSON.stringify(item)).join('\n') + (items.length > 0 ? '\n' : '');
}

/**
 * Stringify a single item as an NDJSON line (for appending)
 */
export function stringifyNdjsonLine<T>(item: T): string {
  return JSON.stringify(item) + '\n';
}

/**
 * Parse a change log written as NDJSON, validating every event.
 * Absent values are missing keys, so they survive the round trip.
 */
export function parseChangeLogNdjson(content: string): ChangeEvent[] {
  return parseNdjson(content).map((item, index) => {
    const result = safeValidateChangeEvent(item);
    if (!result.success) {
      const issue = result.error.errors[0];
      throw new Error(
        `Invalid change event at entry ${index + 1}: ${issue.path.join('.') || 'event'}: ${issue.message}`
      );
    }
    return result.data;
  });
}
