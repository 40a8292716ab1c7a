// @corpledger/repositories
// Persistence contracts for snapshots and change logs, plus their implementations.
//
// Interfaces define WHAT operations are available; Postgres and in-memory
// implementations fulfill them, so callers can swap storage without changes.

export * from './interfaces/index.js';
export * from './in-memory/index.js';
export * as postgres from './postgres/index.js';
export * from './export/index.js';
