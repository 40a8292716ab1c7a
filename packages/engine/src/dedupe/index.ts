// Deduplication - one canonical record per identifier

export {
  deduplicate,
  comparePrecedence,
  type DedupCandidate,
  type DeduplicateOptions,
  type DeduplicateResult,
} from './deduplicator.js';
