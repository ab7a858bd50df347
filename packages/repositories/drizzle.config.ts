import { defineConfig } from 'drizzle-kit';

// Only the engine's own tables; anything else in the database is left alone
export default defineConfig({
  dialect: 'postgresql',
  schema: './src/postgres/schema/index.ts',
  out: './migrations',
  tablesFilter: ['entity_revisions', 'constraint_statements', 'subclass_edges'],
  strict: true,
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://claimwatch@localhost:5432/claimwatch',
  },
});
