// Engine error types

import type { CanonicalField, Timestamp } from '@corpledger/protocol';

/**
 * Base class for all engine errors.
 * Provides structured error information for debugging and logging.
 */
export class EngineError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid caller input.
 */
export class ValidationError extends EngineError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a config file cannot be read or does not validate.
 */
export class ConfigurationError extends EngineError {
  readonly path: string;
  readonly issues: string[];

  constructor(path: string, reason: string, issues: string[] = []) {
    super('CONFIGURATION_ERROR', `Invalid config "${path}": ${reason}`);
    this.name = 'ConfigurationError';
    this.path = path;
    this.issues = issues;
  }
}

/**
 * Error when a snapshot build receives no raw records at all.
 */
export class EmptyBatchError extends EngineError {
  readonly sourceTags: string[];

  constructor(sourceTags: string[]) {
    super(
      'EMPTY_BATCH',
      sourceTags.length === 0
        ? 'No source batches were supplied'
        : `Source batches contain no records: ${sourceTags.join(', ')}`
    );
    this.name = 'EmptyBatchError';
    this.sourceTags = sourceTags;
  }
}

/**
 * Error when the current snapshot is not strictly later than the baseline.
 */
export class InvalidSnapshotOrdering extends EngineError {
  readonly baselineTimestamp: Timestamp;
  readonly currentTimestamp: Timestamp;

  constructor(baselineTimestamp: Timestamp, currentTimestamp: Timestamp) {
    super(
      'INVALID_SNAPSHOT_ORDERING',
      `Current snapshot (${currentTimestamp}) must be later than baseline (${baselineTimestamp})`
    );
    this.name = 'InvalidSnapshotOrdering';
    this.baselineTimestamp = baselineTimestamp;
    this.currentTimestamp = currentTimestamp;
  }
}

/**
 * Error when duplicate rows disagree on an identity-defining field in strict mode.
 */
export class DuplicateIdentifierConflict extends EngineError {
  readonly identifier: string;
  readonly field: CanonicalField;
  readonly values: unknown[];

  constructor(identifier: string, field: CanonicalField, values: unknown[]) {
    super(
      'DUPLICATE_IDENTIFIER_CONFLICT',
      `Records for ${identifier} disagree on ${field}: ${values.map((v) => JSON.stringify(v)).join(' vs ')}`
    );
    this.name = 'DuplicateIdentifierConflict';
    this.identifier = identifier;
    this.field = field;
    this.values = values;
  }
}

/**
 * Error when a snapshot already exists at the given timestamp.
 */
export class SnapshotExistsError extends EngineError {
  readonly timestamp: Timestamp;

  constructor(timestamp: Timestamp) {
    super('SNAPSHOT_EXISTS', `A snapshot already exists at ${timestamp}`);
    this.name = 'SnapshotExistsError';
    this.timestamp = timestamp;
  }
}
