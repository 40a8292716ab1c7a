// Snapshot building

export {
  buildSnapshot,
  createSnapshot,
  assertTimestamp,
  type BuildSnapshotOptions,
  type BuildSnapshotResult,
} from './snapshot-builder.js';

export { summarizeSnapshot } from './summary.js';
