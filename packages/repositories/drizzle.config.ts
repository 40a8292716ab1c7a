import { defineConfig } from 'drizzle-kit';

// Migrations for the snapshot and change-log tables
export default defineConfig({
  dialect: 'postgresql',
  schema: './src/postgres/schema/index.ts',
  out: './drizzle',
  strict: true,
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/corpledger',
  },
});
