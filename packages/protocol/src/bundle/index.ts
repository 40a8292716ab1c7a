export * from './ndjson.js';
export * from './csv.js';
export * from './paths.js';
