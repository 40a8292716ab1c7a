// Normalization - raw source rows to canonical attributes

export {
  normalizeRecord,
  readIdentifier,
  mappedColumns,
  type NormalizeContext,
  type NormalizedRecord,
} from './normalizer.js';

export {
  coerceValue,
  coerceString,
  coerceNumber,
  coerceDate,
  isBlank,
  type CoercionResult,
} from './coerce.js';
