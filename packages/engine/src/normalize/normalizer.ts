// Schema normalizer - maps one raw row onto the canonical field set

import {
  CANONICAL_FIELDS,
  CANONICAL_FIELD_KINDS,
  type AttributeValue,
  type BuildWarning,
  type CanonicalAttributes,
  type CanonicalField,
  type RawRecord,
  type SourceMapping,
  type SourceTag,
} from '@corpledger/protocol';
import { coerceValue, isBlank } from './coerce.js';

/**
 * Where the row being normalized came from, for warnings.
 */
export type NormalizeContext = {
  sourceTag: SourceTag;
  rowIndex: number;
};

/**
 * Result of normalizing one raw row.
 */
export type NormalizedRecord = {
  /** Trimmed registration number, or null when the row has none */
  identifier: string | null;
  attributes: CanonicalAttributes;
  /** Per-field coercion failures; the affected fields are absent */
  warnings: BuildWarning[];
};

/**
 * Find the first configured column that holds a non-blank value.
 */
function findColumn(raw: RawRecord, columns: readonly string[]): string | undefined {
  return columns.find((column) => !isBlank(raw[column]));
}

/**
 * Read the registration number of a row.
 * Returns null when none of the identifier columns has a usable value.
 */
export function readIdentifier(raw: RawRecord, columns: readonly string[]): string | null {
  const column = findColumn(raw, columns);
  if (column === undefined) {
    return null;
  }

  const value = raw[column];
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

/**
 * Normalize one raw row using its source's column mapping.
 *
 * - Columns not named in the mapping are ignored
 * - Canonical fields with no usable column are absent, never defaulted
 * - Values that cannot be coerced to the field's kind are absent and
 *   reported as COERCION_FAILED warnings
 *
 * @example
 * ```typescript
 * const result = normalizeRecord(
 *   { CIN: 'U1', CompanyName: ' acme  ltd ', PaidupCapital: '1,00,000' },
 *   { identifier: ['CIN'], fields: { name: ['CompanyName'], paidUpCapital: ['PaidupCapital'] }, textCase: 'upper' },
 *   { sourceTag: 'delhi', rowIndex: 0 }
 * );
 * // result.attributes => { name: 'ACME LTD', paidUpCapital: 100000 }
 * ```
 */
export function normalizeRecord(
  raw: RawRecord,
  mapping: SourceMapping,
  context: NormalizeContext
): NormalizedRecord {
  const identifier = readIdentifier(raw, mapping.identifier);
  const attributes: Partial<Record<CanonicalField, AttributeValue>> = {};
  const warnings: BuildWarning[] = [];

  for (const field of CANONICAL_FIELDS) {
    const fixed = mapping.fixed?.[field];
    if (fixed !== undefined) {
      attributes[field] = fixed;
      continue;
    }

    const columns = mapping.fields[field];
    if (!columns) continue;

    const column = findColumn(raw, columns);
    if (column === undefined) continue;

    const kind = CANONICAL_FIELD_KINDS[field];
    const result = coerceValue(raw[column], kind, mapping.textCase);
    if (result.ok) {
      attributes[field] = result.value;
    } else {
      warnings.push({
        code: 'COERCION_FAILED',
        message: `Cannot read column "${column}" as ${kind} for ${field}: ${result.reason}`,
        sourceTag: context.sourceTag,
        rowIndex: context.rowIndex,
        identifier: identifier ?? undefined,
        field,
        column,
        rawValue: raw[column],
      });
    }
  }

  return { identifier, attributes, warnings };
}

/**
 * List the columns a mapping reads, identifier columns first.
 */
export function mappedColumns(mapping: SourceMapping): string[] {
  const columns = new Set<string>(mapping.identifier);
  for (const field of CANONICAL_FIELDS) {
    for (const column of mapping.fields[field] ?? []) {
      columns.add(column);
    }
  }
  return [...columns];
}
