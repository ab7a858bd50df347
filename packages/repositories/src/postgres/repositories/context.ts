import type { Database } from '../db.js';
import type { RepositoryContext } from '../../interfaces/index.js';
import { PgRevisionRepository } from './revision-repository.js';
import { PgChangeStream } from './change-stream.js';
import { PgQueryService } from './query-service.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 *
 * const latest = await repos.revisions.getLatest('Q42');
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return {
    revisions: new PgRevisionRepository(db),
    changes: new PgChangeStream(db),
    query: new PgQueryService(db),
  };
}
