// File abstractions for change-log export.
// Lets tests and other storage backends stand in for the local filesystem.

import type { ChangeLogFormat, Timestamp } from '@corpledger/protocol';
import type { ChangeEventFilter } from '../interfaces/index.js';

/**
 * Abstraction for writing export files.
 */
export interface ChangeLogWriter {
  /**
   * Write a file with the given content.
   * Creates parent directories as needed.
   */
  writeFile(path: string, content: string): Promise<void>;

  exists(path: string): Promise<boolean>;
}

/**
 * Abstraction for reading exported files back.
 */
export interface ChangeLogReader {
  exists(path: string): Promise<boolean>;

  readFile(path: string): Promise<string>;

  /**
   * List entry names (not full paths) in a directory.
   */
  listDirectory(path: string): Promise<string[]>;
}

/**
 * One written file: the events of one snapshot pair.
 */
export type ExportedSegmentFile = {
  path: string;
  baselineTimestamp: Timestamp;
  currentTimestamp: Timestamp;
  eventCount: number;
};

export type ExportSummary = {
  outputDir: string;
  format: ChangeLogFormat;
  files: ExportedSegmentFile[];
  eventCount: number;
  exportedAt: string;
};

export type ExportOptions = {
  outputDir: string;

  /**
   * @default 'ndjson'
   */
  format?: ChangeLogFormat;

  /**
   * Restrict the export to matching events. Exports the whole log if undefined.
   */
  filter?: Omit<ChangeEventFilter, 'limit' | 'offset'>;

  /**
   * If false, fail when a target file already exists.
   * @default true
   */
  overwrite?: boolean;
};
