// Change-log export: write the stored log to NDJSON or CSV files and read it back

export * from './types.js';
export * from './fs.js';
export * from './change-log.js';
