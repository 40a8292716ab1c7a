// Change log file naming

import type { Timestamp } from '../types/common.js';

export type ChangeLogFormat = 'ndjson' | 'csv';

/**
 * Directory that holds exported change logs
 */
export const CHANGE_LOG_DIR = 'change-logs';

/**
 * File name for the log of one snapshot pair, keyed by both timestamps.
 * Colons are replaced so the name is valid on every filesystem.
 *
 * @example changeLogFileName('2024-01-01', '2024-01-02', 'csv')
 *   // => 'changes_2024-01-01_2024-01-02.csv'
 */
export function changeLogFileName(
  baselineTimestamp: Timestamp,
  currentTimestamp: Timestamp,
  format: ChangeLogFormat
): string {
  const safe = (value: string) => value.replace(/:/g, '-');
  return `changes_${safe(baselineTimestamp)}_${safe(currentTimestamp)}.${format}`;
}
