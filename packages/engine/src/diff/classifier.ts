// Change classifier - decides what happened to one identifier between snapshots

import {
  CANONICAL_FIELDS,
  type AttributeValue,
  type CanonicalAttributes,
  type CanonicalField,
  type CanonicalRecord,
} from '@corpledger/protocol';
import { ValidationError } from '../errors.js';

/**
 * One field whose value differs. At most one side is absent.
 */
export type FieldDelta = {
  field: CanonicalField;
  oldValue?: AttributeValue;
  newValue?: AttributeValue;
};

export type Classification =
  | { kind: 'new'; record: CanonicalRecord }
  | { kind: 'removed'; record: CanonicalRecord }
  | { kind: 'updated'; record: CanonicalRecord; fields: FieldDelta[] }
  | { kind: 'unchanged'; record: CanonicalRecord };

/**
 * Exact equality of two optional attribute values.
 * Two absent values are equal; absent never equals present; no numeric tolerance.
 */
export function valuesEqual(a: AttributeValue | undefined, b: AttributeValue | undefined): boolean {
  return a === b;
}

/**
 * List the canonical fields that differ, in catalogue order.
 */
export function diffAttributes(
  baseline: CanonicalAttributes,
  current: CanonicalAttributes
): FieldDelta[] {
  const deltas: FieldDelta[] = [];

  for (const field of CANONICAL_FIELDS) {
    const oldValue = baseline[field];
    const newValue = current[field];
    if (valuesEqual(oldValue, newValue)) continue;

    const delta: FieldDelta = { field };
    if (oldValue !== undefined) delta.oldValue = oldValue;
    if (newValue !== undefined) delta.newValue = newValue;
    deltas.push(delta);
  }

  return deltas;
}

/**
 * Classify one identifier given its record in each snapshot.
 * The returned record is the current one, or the baseline one when removed.
 *
 * @throws ValidationError if both records are missing or their identifiers differ
 */
export function classifyChange(
  baseline: CanonicalRecord | undefined,
  current: CanonicalRecord | undefined
): Classification {
  if (!baseline) {
    if (!current) {
      throw new ValidationError('classifyChange requires at least one record');
    }
    return { kind: 'new', record: current };
  }
  if (!current) {
    return { kind: 'removed', record: baseline };
  }
  if (baseline.identifier !== current.identifier) {
    throw new ValidationError('cannot classify records with different identifiers', {
      field: 'identifier',
      details: { baseline: baseline.identifier, current: current.identifier },
    });
  }

  const fields = diffAttributes(baseline.attributes, current.attributes);
  return fields.length > 0
    ? { kind: 'updated', record: current, fields }
    : { kind: 'unchanged', record: current };
}
