// Snapshot diffing and change classification

export { detectChanges, detectChangesAcross } from './differ.js';

export {
  classifyChange,
  diffAttributes,
  valuesEqual,
  type Classification,
  type FieldDelta,
} from './classifier.js';

export { summarizeChanges } from './summary.js';
