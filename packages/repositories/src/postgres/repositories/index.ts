export { PgRevisionRepository } from './revision-repository.js';
export { PgChangeStream } from './change-stream.js';
export { PgQueryService } from './query-service.js';
export { createPgRepositoryContext } from './context.js';
