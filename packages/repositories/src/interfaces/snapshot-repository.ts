import type { BuildSummary, Snapshot, Timestamp } from '@corpledger/protocol';

/**
 * Input for saving a built snapshot
 */
export type SaveSnapshotInput = {
  snapshot: Snapshot;
  /** Build counters and warnings kept alongside the snapshot for audit */
  summary?: BuildSummary;
};

/**
 * Stored snapshot metadata, without its records
 */
export type SnapshotInfo = {
  timestamp: Timestamp;
  entityCount: number;
  summary?: BuildSummary;
  createdAt: Timestamp;
};

/**
 * Repository interface for canonical snapshots.
 *
 * Snapshots are immutable: once saved, a snapshot is never updated.
 * A newer view of the dataset is saved as a new snapshot with a later timestamp.
 */
export interface SnapshotRepository {
  /**
   * Save a snapshot with all of its records.
   * Callers check `getInfo` first; saving an existing timestamp is an error.
   */
  save(input: SaveSnapshotInput): Promise<SnapshotInfo>;

  /**
   * Load a snapshot with its records.
   * @returns Snapshot or null if not found
   */
  get(timestamp: Timestamp): Promise<Snapshot | null>;

  /**
   * Get snapshot metadata without loading records.
   * @returns SnapshotInfo or null if not found
   */
  getInfo(timestamp: Timestamp): Promise<SnapshotInfo | null>;

  /**
   * Load the latest snapshot strictly earlier than the given timestamp.
   * Used to find the baseline for a newly built snapshot.
   */
  getLatestBefore(timestamp: Timestamp): Promise<Snapshot | null>;

  /**
   * List stored snapshots in ascending timestamp order.
   */
  list(): Promise<SnapshotInfo[]>;
}
