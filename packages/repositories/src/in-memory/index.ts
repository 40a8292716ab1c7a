// In-memory repository implementations for development and testing
//
// Data does not persist between restarts.

import type { ChangeLogSegment, Snapshot, Timestamp } from '@corpledger/protocol';
import {
  MAX_CHANGE_QUERY_LIMIT,
  type ChangeEventFilter,
  type ChangeLogRepository,
  type RepositoryContext,
  type SnapshotInfo,
  type SnapshotRepository,
  type StoredChangeEvent,
  type TransactionalRepositoryContext,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  snapshots: Map<Timestamp, { snapshot: Snapshot; info: SnapshotInfo }>;
  changeEvents: StoredChangeEvent[];
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

/**
 * Whether a stored event matches every criterion of a filter.
 */
export function matchesChangeFilter(
  event: StoredChangeEvent,
  filter: Omit<ChangeEventFilter, 'limit' | 'offset'>
): boolean {
  if (filter.identifier && event.identifier !== filter.identifier) return false;
  if (filter.jurisdiction && event.display.jurisdiction !== filter.jurisdiction) return false;
  if (filter.status && event.display.status !== filter.status) return false;
  if (filter.kinds && !filter.kinds.includes(event.kind)) return false;
  if (filter.fieldName && (event.kind !== 'field_updated' || event.fieldName !== filter.fieldName)) {
    return false;
  }

  if (filter.segment) {
    if (
      event.baselineTimestamp !== filter.segment.baselineTimestamp ||
      event.currentTimestamp !== filter.segment.currentTimestamp
    ) {
      return false;
    }
  }

  const time = Date.parse(event.timestamp);
  if (filter.timeRange?.start && time < Date.parse(filter.timeRange.start)) return false;
  if (filter.timeRange?.end && time > Date.parse(filter.timeRange.end)) return false;

  return true;
}

function compareStored(a: StoredChangeEvent, b: StoredChangeEvent): number {
  const byTime = Date.parse(a.timestamp) - Date.parse(b.timestamp);
  return byTime !== 0 ? byTime : a.sequence - b.sequence;
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * await repos.snapshots.save({ snapshot });
 * console.log(repos._data.snapshots.size);
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const snapshots = new Map<Timestamp, { snapshot: Snapshot; info: SnapshotInfo }>();
  const changeEvents: StoredChangeEvent[] = [];
  let nextEventId = 1;

  const snapshotRepo: SnapshotRepository = {
    async save({ snapshot, summary }) {
      if (snapshots.has(snapshot.timestamp)) {
        throw new Error(`Snapshot already stored: ${snapshot.timestamp}`);
      }

      const info: SnapshotInfo = {
        timestamp: snapshot.timestamp,
        entityCount: snapshot.records.size,
        summary,
        createdAt: new Date().toISOString(),
      };
      snapshots.set(snapshot.timestamp, { snapshot, info });
      return info;
    },

    async get(timestamp) {
      return snapshots.get(timestamp)?.snapshot ?? null;
    },

    async getInfo(timestamp) {
      return snapshots.get(timestamp)?.info ?? null;
    },

    async getLatestBefore(timestamp) {
      const limit = Date.parse(timestamp);
      let latest: Snapshot | null = null;
      for (const { snapshot } of snapshots.values()) {
        const time = Date.parse(snapshot.timestamp);
        if (time < limit && (!latest || time > Date.parse(latest.timestamp))) {
          latest = snapshot;
        }
      }
      return latest;
    },

    async list() {
      return [...snapshots.values()]
        .map(({ info }) => info)
        .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
    },
  };

  const changeLogRepo: ChangeLogRepository = {
    async append(segment: ChangeLogSegment) {
      const recordedAt = new Date().toISOString();
      const stored = segment.events.map((event, sequence): StoredChangeEvent => ({
        ...event,
        id: `change-${nextEventId++}`,
        baselineTimestamp: segment.baselineTimestamp,
        currentTimestamp: segment.currentTimestamp,
        sequence,
        recordedAt,
      }));
      changeEvents.push(...stored);
      return stored;
    },

    async hasSegment(baselineTimestamp, currentTimestamp) {
      return changeEvents.some(
        (e) => e.baselineTimestamp === baselineTimestamp && e.currentTimestamp === currentTimestamp
      );
    },

    async query(filter) {
      const limit = Math.min(filter.limit, MAX_CHANGE_QUERY_LIMIT);
      const offset = filter.offset ?? 0;
      return changeEvents
        .filter((e) => matchesChangeFilter(e, filter))
        .sort(compareStored)
        .slice(offset, offset + limit);
    },

    async count(filter) {
      return changeEvents.filter((e) => matchesChangeFilter(e, filter)).length;
    },

    async *stream(filter) {
      yield* changeEvents.filter((e) => matchesChangeFilter(e, filter)).sort(compareStored);
    },
  };

  const context: RepositoryContext = {
    snapshots: snapshotRepo,
    changeLog: changeLogRepo,
  };

  return {
    ...context,
    // In-memory operations are synchronous per-call, so just execute
    async transaction<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
      return fn(context);
    },
    _data: {
      snapshots,
      changeEvents,
    },
    clear() {
      snapshots.clear();
      changeEvents.length = 0;
      nextEventId = 1;
    },
  };
}
