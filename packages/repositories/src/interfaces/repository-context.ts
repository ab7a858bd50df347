import type { RevisionRepository } from './revision-repository.js';
import type { ChangeStream } from './change-stream.js';
import type { QueryService } from './query-service.js';

/**
 * RepositoryContext bundles the external collaborators together.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a RepositoryContext to any code that needs data access,
 * and you can swap implementations (Postgres, in-memory, fixtures)
 * without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createPgRepositoryContext(db);
 * const engine = createEngine({ repos });
 * ```
 */
export interface RepositoryContext {
  readonly revisions: RevisionRepository;
  readonly changes: ChangeStream;
  readonly query: QueryService;
}
