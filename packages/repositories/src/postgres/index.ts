// Postgres implementations of the collaborator interfaces

export {
  createDatabase,
  DEFAULT_MAX_CONNECTIONS,
  DEFAULT_APPLICATION_NAME,
  type Database,
  type DatabaseConfig,
} from './db.js';
export * from './repositories/index.js';
export * as schema from './schema/index.js';
