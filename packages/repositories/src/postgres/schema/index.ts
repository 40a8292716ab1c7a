// Re-export all schema tables
export * from './snapshots.js';
export * from './change-events.js';
