// Deduplicator - collapses rows sharing an identifier into one record
//
// Precedence, highest first:
//   1. source listed latest in the priority order
//   2. fewer absent canonical fields
//   3. encountered latest in input order
//
// The winner's attributes are taken wholesale. Absent fields are never filled
// from a losing row, so conflicting sources are not blended.

import {
  CANONICAL_FIELD_KINDS,
  countAbsentFields,
  type AttributeValue,
  type BuildWarning,
  type CanonicalAttributes,
  type CanonicalField,
  type CanonicalRecord,
  type SourceTag,
} from '@corpledger/protocol';
import { DuplicateIdentifierConflict, ValidationError } from '../errors.js';

/**
 * A normalized row competing to become the canonical record for its identifier.
 */
export type DedupCandidate = {
  identifier: string;
  attributes: CanonicalAttributes;
  sourceTag: SourceTag;
  /** Position of the source in the priority order; higher wins */
  sourceRank: number;
  /** Position of the row across the whole input; higher wins ties */
  inputIndex: number;
};

export type DeduplicateOptions = {
  /**
   * Throw DuplicateIdentifierConflict instead of warning when candidates
   * disagree on an identity field. Defaults to false.
   */
  strict?: boolean;

  /** Fields that must agree across duplicates. Defaults to ['registrationDate']. */
  identityFields?: readonly CanonicalField[];

  /** Allowed difference in days between date identity fields. Defaults to 0. */
  dateToleranceDays?: number;

  /** Allowed absolute difference between numeric identity fields. Defaults to 0. */
  numericTolerance?: number;
};

export type DeduplicateResult = {
  record: CanonicalRecord;
  /** Number of candidates discarded in favor of the winner */
  collapsed: number;
  warnings: BuildWarning[];
};

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Compare two candidates by precedence. Positive when `a` outranks `b`.
 */
export function comparePrecedence(a: DedupCandidate, b: DedupCandidate): number {
  if (a.sourceRank !== b.sourceRank) {
    return a.sourceRank - b.sourceRank;
  }

  const absentA = countAbsentFields(a.attributes);
  const absentB = countAbsentFields(b.attributes);
  if (absentA !== absentB) {
    return absentB - absentA;
  }

  return a.inputIndex - b.inputIndex;
}

/**
 * Whether two present identity values agree within tolerance.
 */
function valuesAgree(
  field: CanonicalField,
  a: AttributeValue,
  b: AttributeValue,
  options: Required<Pick<DeduplicateOptions, 'dateToleranceDays' | 'numericTolerance'>>
): boolean {
  switch (CANONICAL_FIELD_KINDS[field]) {
    case 'date': {
      const diff = Math.abs(Date.parse(String(a)) - Date.parse(String(b)));
      return diff <= options.dateToleranceDays * DAY_MS;
    }
    case 'number':
      return (
        typeof a === 'number' &&
        typeof b === 'number' &&
        Math.abs(a - b) <= options.numericTolerance
      );
    case 'string':
      return a === b;
  }
}

/**
 * Pick the single authoritative record among rows sharing one identifier.
 *
 * @throws ValidationError if the candidates are empty or carry different identifiers
 * @throws DuplicateIdentifierConflict in strict mode when candidates disagree
 *   on an identity field beyond the configured tolerance
 */
export function deduplicate(
  candidates: readonly DedupCandidate[],
  options: DeduplicateOptions = {}
): DeduplicateResult {
  const {
    strict = false,
    identityFields = ['registrationDate'],
    dateToleranceDays = 0,
    numericTolerance = 0,
  } = options;

  if (candidates.length === 0) {
    throw new ValidationError('deduplicate requires at least one candidate');
  }

  const identifier = candidates[0].identifier;
  if (candidates.some((c) => c.identifier !== identifier)) {
    throw new ValidationError('all candidates must share one identifier', {
      field: 'identifier',
      details: { identifiers: [...new Set(candidates.map((c) => c.identifier))] },
    });
  }

  let winner = candidates[0];
  for (const candidate of candidates.slice(1)) {
    if (comparePrecedence(candidate, winner) > 0) {
      winner = candidate;
    }
  }

  const warnings: BuildWarning[] = [];
  for (const field of identityFields) {
    const present = candidates.filter((c) => c.attributes[field] !== undefined);
    const conflict = findDisagreement(field, present, { dateToleranceDays, numericTolerance });
    if (!conflict) continue;

    const values = conflict.map((c) => c.attributes[field]);
    if (strict) {
      throw new DuplicateIdentifierConflict(identifier, field, values);
    }

    warnings.push({
      code: 'IDENTITY_CONFLICT',
      message: `Duplicate rows for ${identifier} disagree on ${field}; keeping the ${winner.sourceTag} record`,
      identifier,
      field,
      sourceTag: winner.sourceTag,
      rawValue: values,
    });
  }

  return {
    record: Object.freeze({
      identifier,
      attributes: Object.freeze({ ...winner.attributes }),
      sourceTag: winner.sourceTag,
    }),
    collapsed: candidates.length - 1,
    warnings,
  };
}

/**
 * Find the first pair of candidates whose values for `field` disagree.
 */
function findDisagreement(
  field: CanonicalField,
  candidates: readonly DedupCandidate[],
  tolerance: { dateToleranceDays: number; numericTolerance: number }
): [DedupCandidate, DedupCandidate] | null {
  for (let i = 0; i < candidates.length; i++) {
    for (let j = i + 1; j < candidates.length; j++) {
      const a = candidates[i].attributes[field];
      const b = candidates[j].attributes[field];
      if (a === undefined || b === undefined) continue;
      if (!valuesAgree(field, a, b, tolerance)) {
        return [candidates[i], candidates[j]];
      }
    }
  }
  return null;
}
