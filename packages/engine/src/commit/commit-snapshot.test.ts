import { describe, it, expect, beforeEach } from 'vitest';
import type { CanonicalAttributes, Snapshot } from '@corpledger/protocol';
import {
  createInMemoryRepositoryContext,
  type InMemoryRepositoryContext,
  type RepositoryContext,
} from '@corpledger/repositories';
import { commitSnapshot } from './commit-snapshot.js';
import { createSnapshot } from '../build/index.js';
import { SnapshotExistsError } from '../errors.js';
import { createCapturingLogger, silentLogger } from '../logging.js';

// --- Test Fixtures ---

function snapshot(timestamp: string, entries: Record<string, CanonicalAttributes>): Snapshot {
  return createSnapshot(
    timestamp,
    Object.entries(entries).map(([identifier, attributes]) => ({
      identifier,
      attributes,
      sourceTag: 'stateA',
    }))
  );
}

const monday = snapshot('2024-03-04', { ID1: { name: 'Alpha Ltd', status: 'Active' } });
const tuesday = snapshot('2024-03-05', {
  ID1: { name: 'Alpha Ltd', status: 'Strike Off' },
  ID2: { name: 'Beta Ltd' },
});

let repos: InMemoryRepositoryContext;

beforeEach(() => {
  repos = createInMemoryRepositoryContext();
});

// --- Tests ---

describe('commitSnapshot', () => {
  it('stores the first snapshot without extending the change log', async () => {
    const result = await commitSnapshot(repos, monday, { logger: silentLogger });

    expect(result.baselineTimestamp).toBeNull();
    expect(result.events).toEqual([]);
    expect(result.info.timestamp).toBe('2024-03-04');
    expect(result.info.entityCount).toBe(1);
    expect(await repos.snapshots.get('2024-03-04')).toBe(monday);
  });

  it('diffs against the latest earlier snapshot and appends the segment', async () => {
    await commitSnapshot(repos, monday, { logger: silentLogger });
    const result = await commitSnapshot(repos, tuesday, { logger: silentLogger });

    expect(result.baselineTimestamp).toBe('2024-03-04');
    expect(result.events.map((e) => [e.kind, e.identifier, e.sequence])).toEqual([
      ['new_entity', 'ID2', 0],
      ['field_updated', 'ID1', 1],
    ]);
    expect(await repos.changeLog.hasSegment('2024-03-04', '2024-03-05')).toBe(true);
    expect(repos._data.changeEvents).toHaveLength(2);
  });

  it('stores the build summary with the snapshot', async () => {
    const summary = {
      recordsIn: 1,
      rowsMissingIdentifier: 0,
      duplicatesCollapsed: 0,
      entities: 1,
      perSource: { stateA: { recordsIn: 1, missingIdentifier: 0, won: 1 } },
      warnings: [],
      warningsDropped: 0,
    };

    await commitSnapshot(repos, monday, { summary, logger: silentLogger });

    expect((await repos.snapshots.getInfo('2024-03-04'))?.summary).toEqual(summary);
  });

  it('refuses a second snapshot at the same timestamp', async () => {
    await commitSnapshot(repos, monday, { logger: silentLogger });
    const again = snapshot('2024-03-04', {});

    await expect(commitSnapshot(repos, again, { logger: silentLogger })).rejects.toThrow(
      SnapshotExistsError
    );
    expect(await repos.snapshots.get('2024-03-04')).toBe(monday);
  });

  it('works with a context that has no transactions', async () => {
    const plain: RepositoryContext = { snapshots: repos.snapshots, changeLog: repos.changeLog };

    await commitSnapshot(plain, monday, { logger: silentLogger });
    const result = await commitSnapshot(plain, tuesday, { logger: silentLogger });

    expect(result.events).toHaveLength(2);
  });

  it('warns when committing behind a later snapshot', async () => {
    const logger = createCapturingLogger();
    await commitSnapshot(repos, tuesday, { logger: silentLogger });

    const result = await commitSnapshot(repos, monday, { logger });

    expect(result.baselineTimestamp).toBeNull();
    expect(logger.entries[0]).toMatchObject({
      level: 'warn',
      data: { timestamp: '2024-03-04', laterSnapshots: ['2024-03-05'] },
    });
  });

  it('logs persistence steps', async () => {
    const logger = createCapturingLogger();
    await commitSnapshot(repos, monday, { logger });
    await commitSnapshot(repos, tuesday, { logger });

    expect(logger.entries.map((e) => e.message)).toEqual([
      'Snapshot saved',
      'No earlier snapshot, change log not extended',
      'Snapshot saved',
      'Change log appended',
    ]);
    expect(logger.entries[3].data).toEqual({
      baselineTimestamp: '2024-03-04',
      currentTimestamp: '2024-03-05',
      new_entity: 1,
      removed_entity: 0,
      field_updated: 1,
    });
  });
});
