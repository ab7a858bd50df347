// Collaborator interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  RevisionRepository,
  RevisionHistoryFilter,
} from './revision-repository.js';

export type {
  ChangeStream,
  ChangePage,
} from './change-stream.js';

export {
  QUERY_COLUMNS,
  type QueryService,
  type TabularQuery,
  type TabularResult,
  type TabularRow,
  type Cell,
} from './query-service.js';

export type { RepositoryContext } from './repository-context.js';
