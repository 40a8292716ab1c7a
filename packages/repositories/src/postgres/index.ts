// Postgres implementation of the repository contracts (drizzle-orm + postgres.js)

export * from './db.js';
export * as schema from './schema/index.js';
export * from './repositories/index.js';
