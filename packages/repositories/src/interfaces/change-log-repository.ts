import type {
  CanonicalField,
  ChangeEvent,
  ChangeKind,
  ChangeLogSegment,
  Timestamp,
} from '@corpledger/protocol';

/**
 * Storage metadata attached to every persisted event
 */
export type ChangeLogEntryMeta = {
  id: string;
  baselineTimestamp: Timestamp;
  currentTimestamp: Timestamp;
  /** Position of the event within its segment */
  sequence: number;
  recordedAt: Timestamp;
};

export type StoredChangeEvent = ChangeEvent & ChangeLogEntryMeta;

/**
 * Maximum number of events a single query may return.
 */
export const MAX_CHANGE_QUERY_LIMIT = 1000;

/**
 * Filter for querying the change log.
 *
 * `limit` is required and capped at MAX_CHANGE_QUERY_LIMIT.
 */
export type ChangeEventFilter = {
  identifier?: string;
  jurisdiction?: string;
  status?: string;
  kinds?: ChangeKind[];
  fieldName?: CanonicalField;

  /** Restrict to one snapshot pair */
  segment?: {
    baselineTimestamp: Timestamp;
    currentTimestamp: Timestamp;
  };

  /** Inclusive range on the event timestamp */
  timeRange?: {
    start?: Timestamp;
    end?: Timestamp;
  };

  limit: number;
  offset?: number;
};

/**
 * Repository interface for the change log.
 *
 * The log is append-only: events are never edited or deleted here.
 * Retention belongs to whoever operates the storage.
 * Results are ordered by event timestamp, then by sequence within a segment.
 */
export interface ChangeLogRepository {
  /**
   * Append the events of one snapshot pair, preserving their order.
   */
  append(segment: ChangeLogSegment): Promise<StoredChangeEvent[]>;

  /**
   * Whether events were already appended for this snapshot pair.
   */
  hasSegment(baselineTimestamp: Timestamp, currentTimestamp: Timestamp): Promise<boolean>;

  query(filter: ChangeEventFilter): Promise<StoredChangeEvent[]>;

  count(filter: Omit<ChangeEventFilter, 'limit' | 'offset'>): Promise<number>;

  /**
   * Stream matching events page by page, for export.
   */
  stream(filter: Omit<ChangeEventFilter, 'limit' | 'offset'>): AsyncIterable<StoredChangeEvent>;
}
