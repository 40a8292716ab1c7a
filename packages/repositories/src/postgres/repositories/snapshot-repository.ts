import { eq, lt, desc, asc } from 'drizzle-orm';
import type { DatabaseExecutor } from '../db.js';
import { snapshots, snapshotRecords } from '../schema/index.js';
import type {
  SnapshotRepository,
  SaveSnapshotInput,
  SnapshotInfo,
} from '../../interfaces/index.js';
import {
  compareIdentifiers,
  type CanonicalRecord,
  type Snapshot,
  type Timestamp,
} from '@corpledger/protocol';

/** Rows per INSERT statement when writing snapshot records */
const INSERT_CHUNK_SIZE = 500;

/**
 * Assemble a frozen snapshot from stored record rows.
 */
export function rowsToSnapshot(
  timestamp: Timestamp,
  rows: (typeof snapshotRecords.$inferSelect)[]
): Snapshot {
  const sorted = [...rows].sort((a, b) => compareIdentifiers(a.identifier, b.identifier));
  const records = new Map<string, CanonicalRecord>();
  for (const row of sorted) {
    records.set(
      row.identifier,
      Object.freeze({
        identifier: row.identifier,
        attributes: Object.freeze({ ...row.attributes }),
        sourceTag: row.sourceTag,
      })
    );
  }
  return Object.freeze({ timestamp, records });
}

export class PgSnapshotRepository implements SnapshotRepository {
  constructor(private db: DatabaseExecutor) {}

  async save({ snapshot, summary }: SaveSnapshotInput): Promise<SnapshotInfo> {
    const records = [...snapshot.records.values()];

    const row = await this.db.transaction(async (tx) => {
      const [inserted] = await tx
        .insert(snapshots)
        .values({
          timestamp: snapshot.timestamp,
          takenAt: new Date(snapshot.timestamp),
          entityCount: records.length,
          summary,
        })
        .returning();

      for (let i = 0; i < records.length; i += INSERT_CHUNK_SIZE) {
        const chunk = records.slice(i, i + INSERT_CHUNK_SIZE);
        await tx.insert(snapshotRecords).values(
          chunk.map((record) => ({
            snapshotTimestamp: snapshot.timestamp,
            identifier: record.identifier,
            attributes: record.attributes,
            sourceTag: record.sourceTag,
          }))
        );
      }

      return inserted;
    });

    return this.rowToInfo(row);
  }

  async get(timestamp: Timestamp): Promise<Snapshot | null> {
    const info = await this.getInfo(timestamp);
    if (!info) return null;
    return this.loadRecords(info.timestamp);
  }

  async getInfo(timestamp: Timestamp): Promise<SnapshotInfo | null> {
    const [row] = await this.db
      .select()
      .from(snapshots)
      .where(eq(snapshots.timestamp, timestamp));

    return row ? this.rowToInfo(row) : null;
  }

  async getLatestBefore(timestamp: Timestamp): Promise<Snapshot | null> {
    const [row] = await this.db
      .select()
      .from(snapshots)
      .where(lt(snapshots.takenAt, new Date(timestamp)))
      .orderBy(desc(snapshots.takenAt))
      .limit(1);

    return row ? this.loadRecords(row.timestamp) : null;
  }

  async list(): Promise<SnapshotInfo[]> {
    const rows = await this.db.select().from(snapshots).orderBy(asc(snapshots.takenAt));
    return rows.map((r) => this.rowToInfo(r));
  }

  private async loadRecords(timestamp: Timestamp): Promise<Snapshot> {
    const rows = await this.db
      .select()
      .from(snapshotRecords)
      .where(eq(snapshotRecords.snapshotTimestamp, timestamp));

    return rowsToSnapshot(timestamp, rows);
  }

  private rowToInfo(row: typeof snapshots.$inferSelect): SnapshotInfo {
    return {
      timestamp: row.timestamp,
      entityCount: row.entityCount,
      summary: row.summary ?? undefined,
      createdAt: row.createdAt.toISOString(),
    };
  }
}
