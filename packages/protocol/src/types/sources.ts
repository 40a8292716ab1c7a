// Source batches and their declarative column mappings

import type { DateRange, SourceTag } from './common.js';
import type { AttributeValue, CanonicalField } from './records.js';

/**
 * One raw row as read from a source file: arbitrary column name to raw value.
 */
export type RawRecord = Readonly<Record<string, unknown>>;

/**
 * How string values are cased after trimming
 */
export type TextCase = 'preserve' | 'upper';

/**
 * Declarative mapping from one source's column layout onto the canonical fields.
 * Adding a source means adding one of these, not new normalization logic.
 */
export type SourceMapping = {
  /**
   * Column(s) holding the registration number, tried in order.
   */
  identifier: readonly string[];

  /**
   * Source column(s) per canonical field, tried in order.
   * The first column that is present and non-empty after trimming wins.
   */
  fields: { readonly [F in CanonicalField]?: readonly string[] };

  /**
   * Values the source implies for every row (e.g. the jurisdiction of a
   * per-state registry). A fixed field must not also appear in `fields`.
   */
  fixed?: { readonly [F in CanonicalField]?: AttributeValue };

  /** Defaults to 'preserve' */
  textCase?: TextCase;
};

/**
 * A batch of raw rows from one origin, with the mapping that reads it.
 */
export type SourceBatch = {
  sourceTag: SourceTag;
  records: readonly RawRecord[];
  mapping: SourceMapping;
};

export type WarningCode =
  | 'COERCION_FAILED'
  | 'MISSING_IDENTIFIER'
  | 'MISSING_SOURCE_COLUMN'
  | 'IDENTITY_CONFLICT';

/**
 * A non-fatal data-quality issue found while building a snapshot.
 */
export type BuildWarning = {
  code: WarningCode;
  message: string;
  sourceTag?: SourceTag;
  /** Position of the row within its batch */
  rowIndex?: number;
  identifier?: string;
  field?: CanonicalField;
  column?: string;
  rawValue?: unknown;
};

export type SourceBuildCounters = {
  recordsIn: number;
  missingIdentifier: number;
  /** Entities whose winning record came from this source */
  won: number;
};

/**
 * Counters and warnings returned alongside a built snapshot.
 */
export type BuildSummary = {
  recordsIn: number;
  rowsMissingIdentifier: number;
  /** Rows discarded because another row with the same identifier won */
  duplicatesCollapsed: number;
  entities: number;
  perSource: Record<SourceTag, SourceBuildCounters>;
  warnings: BuildWarning[];
  /** Warnings not recorded because the warning cap was reached */
  warningsDropped: number;
};

/**
 * Aggregate view of a snapshot
 */
export type SnapshotSummary = {
  totalEntities: number;
  byJurisdiction: Record<string, number>;
  byStatus: Record<string, number>;
  registrationDateRange: DateRange;
};
