// Snapshot commit - persist a built snapshot and extend the change log

import type { BuildSummary, Snapshot, Timestamp } from '@corpledger/protocol';
import {
  isTransactional,
  type RepositoryContext,
  type SnapshotInfo,
  type StoredChangeEvent,
} from '@corpledger/repositories';
import { SnapshotExistsError } from '../errors.js';
import { consoleLogger, type EngineLogger } from '../logging.js';
import { assertTimestamp } from '../build/index.js';
import { detectChanges, summarizeChanges } from '../diff/index.js';

export type CommitSnapshotOptions = {
  /** Build summary stored alongside the snapshot */
  summary?: BuildSummary;
  logger?: EngineLogger;
};

export type CommitSnapshotResult = {
  info: SnapshotInfo;
  /** Timestamp of the snapshot diffed against, or null for the first snapshot */
  baselineTimestamp: Timestamp | null;
  events: StoredChangeEvent[];
};

/**
 * Save a snapshot and append its changes against the latest earlier snapshot.
 *
 * Runs inside a transaction when the context supports one, so the snapshot
 * and its change-log segment are stored together or not at all.
 *
 * @throws SnapshotExistsError if a snapshot is already stored at the same timestamp
 */
export async function commitSnapshot(
  repos: RepositoryContext,
  snapshot: Snapshot,
  options: CommitSnapshotOptions = {}
): Promise<CommitSnapshotResult> {
  const logger = options.logger ?? consoleLogger;
  assertTimestamp(snapshot.timestamp, 'snapshot.timestamp');

  const run = async (tx: RepositoryContext): Promise<CommitSnapshotResult> => {
    if (await tx.snapshots.getInfo(snapshot.timestamp)) {
      throw new SnapshotExistsError(snapshot.timestamp);
    }

    const current = Date.parse(snapshot.timestamp);
    const later = (await tx.snapshots.list()).filter((s) => Date.parse(s.timestamp) > current);
    if (later.length > 0) {
      logger.warn('Committing a snapshot older than stored ones; later segments are not recomputed', {
        timestamp: snapshot.timestamp,
        laterSnapshots: later.map((s) => s.timestamp),
      });
    }

    const baseline = await tx.snapshots.getLatestBefore(snapshot.timestamp);
    const info = await tx.snapshots.save({ snapshot, summary: options.summary });
    logger.info('Snapshot saved', {
      timestamp: info.timestamp,
      entityCount: info.entityCount,
    });

    if (!baseline) {
      logger.info('No earlier snapshot, change log not extended', { timestamp: snapshot.timestamp });
      return { info, baselineTimestamp: null, events: [] };
    }

    const events = detectChanges(baseline, snapshot);
    const stored = await tx.changeLog.append({
      baselineTimestamp: baseline.timestamp,
      currentTimestamp: snapshot.timestamp,
      events,
    });

    const { byKind } = summarizeChanges(events);
    logger.info('Change log appended', {
      baselineTimestamp: baseline.timestamp,
      currentTimestamp: snapshot.timestamp,
      ...byKind,
    });

    return { info, baselineTimestamp: baseline.timestamp, events: stored };
  };

  return isTransactional(repos) ? repos.transaction(run) : run(repos);
}
