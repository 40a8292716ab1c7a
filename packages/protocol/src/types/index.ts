// Re-export all protocol types

export * from './common.js';
export * from './records.js';
export * from './changes.js';
export * from './sources.js';
