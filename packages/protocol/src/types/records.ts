// Canonical records and snapshots - the reconciled dataset

import type { CalendarDate, SourceTag, Timestamp } from './common.js';

/**
 * The fixed, ordered catalogue of canonical fields.
 * The order is the order in which snapshots are compared field by field.
 */
export const CANONICAL_FIELDS = [
  'name',
  'jurisdiction',
  'status',
  'category',
  'subCategory',
  'companyClass',
  'authorizedCapital',
  'paidUpCapital',
  'registrationDate',
  'industryClassification',
  'address',
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

/**
 * Declared value kind of a canonical field
 */
export type FieldKind = 'string' | 'number' | 'date';

export const CANONICAL_FIELD_KINDS: Readonly<Record<CanonicalField, FieldKind>> = {
  name: 'string',
  jurisdiction: 'string',
  status: 'string',
  category: 'string',
  subCategory: 'string',
  companyClass: 'string',
  authorizedCapital: 'number',
  paidUpCapital: 'number',
  registrationDate: 'date',
  industryClassification: 'string',
  address: 'string',
};

/**
 * A present attribute value.
 * Date fields hold a CalendarDate string; the field kind tells them apart.
 */
export type AttributeValue = string | number | CalendarDate;

/**
 * Canonical attributes of one entity.
 * A field that is unknown is absent from the object, never an empty string or zero.
 */
export type CanonicalAttributes = {
  readonly [F in CanonicalField]?: AttributeValue;
};

/**
 * One corporate entity at a point in time.
 */
export type CanonicalRecord = {
  /** Registration number; join key across sources and across time */
  readonly identifier: string;

  readonly attributes: CanonicalAttributes;

  /** Source batch that produced the winning version */
  readonly sourceTag: SourceTag;
};

/**
 * An immutable, reconciled view of the dataset at one logical time.
 * Records are keyed by identifier and iterate in ascending identifier order.
 *
 * The snapshot object, each record and each attribute map are frozen. The
 * records Map itself cannot be frozen, so only its ReadonlyMap type keeps
 * callers from adding or deleting entries.
 */
export type Snapshot = {
  /** Logical date of the snapshot (ISO 8601) */
  readonly timestamp: Timestamp;

  readonly records: ReadonlyMap<string, CanonicalRecord>;
};

/**
 * Count canonical fields that have no value.
 */
export function countAbsentFields(attributes: CanonicalAttributes): number {
  let absent = 0;
  for (const field of CANONICAL_FIELDS) {
    if (attributes[field] === undefined) {
      absent++;
    }
  }
  return absent;
}

/**
 * Compare identifiers by UTF-16 code unit so ordering does not depend on locale.
 */
export function compareIdentifiers(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
