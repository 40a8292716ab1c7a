// Reconciliation config loading
//
// Reads the JSON config that declares sources and dedup policy, validates it
// with the protocol schema, and turns it into builder inputs.

import { readFile } from 'node:fs/promises';
import {
  formatValidationErrors,
  safeParseReconcileConfig,
  type RawRecord,
  type ReconcileConfig,
  type SourceBatch,
  type Timestamp,
} from '@corpledger/protocol';
import { ConfigurationError, ValidationError } from './errors.js';
import type { EngineLogger } from './logging.js';
import type { BuildSnapshotOptions } from './build/index.js';

/**
 * Load and validate a reconciliation config file.
 *
 * @throws ConfigurationError if the file is missing, is not JSON, or fails validation
 */
export async function loadReconcileConfig(path: string): Promise<ReconcileConfig> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(path, 'file not found');
    }
    throw new ConfigurationError(
      path,
      `could not be read: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      path,
      `malformed JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = safeParseReconcileConfig(data);
  if (!result.success) {
    const issues = formatValidationErrors(result.error);
    throw new ConfigurationError(path, `${issues.length} validation error(s)`, issues);
  }
  return result.data;
}

/**
 * Pair each configured source with its rows.
 *
 * @throws ValidationError if rows are given for an unknown tag or a configured tag has none
 */
export function createSourceBatches(
  config: ReconcileConfig,
  rowsByTag: Readonly<Record<string, readonly RawRecord[]>>
): SourceBatch[] {
  const known = new Set(config.sources.map((source) => source.tag));
  for (const tag of Object.keys(rowsByTag)) {
    if (!known.has(tag)) {
      throw new ValidationError(`Rows supplied for unknown source "${tag}"`, {
        field: 'sourceTag',
        details: { tag },
      });
    }
  }

  return config.sources.map((source) => {
    const records = rowsByTag[source.tag];
    if (!records) {
      throw new ValidationError(`No rows supplied for source "${source.tag}"`, {
        field: 'sourceTag',
        details: { tag: source.tag },
      });
    }
    return { sourceTag: source.tag, records, mapping: source.mapping };
  });
}

/**
 * Builder options for one run of the configured reconciliation.
 */
export function buildOptionsFromConfig(
  config: ReconcileConfig,
  timestamp: Timestamp,
  logger?: EngineLogger
): BuildSnapshotOptions {
  return {
    timestamp,
    sourcePriority: config.sourcePriority ?? config.sources.map((source) => source.tag),
    strict: config.strict,
    identityFields: config.identityFields,
    dateToleranceDays: config.dateToleranceDays,
    numericTolerance: config.numericTolerance,
    maxWarnings: config.maxWarnings,
    logger,
  };
}
