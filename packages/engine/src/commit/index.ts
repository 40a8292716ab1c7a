export {
  commitSnapshot,
  type CommitSnapshotOptions,
  type CommitSnapshotResult,
} from './commit-snapshot.js';
