// Connection pool and Drizzle instance over the revision, constraint
// and class-hierarchy tables

import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export const DEFAULT_MAX_CONNECTIONS = 10;
export const DEFAULT_APPLICATION_NAME = 'claimwatch';

export type DatabaseConfig = {
  connectionString: string;

  /**
   * Pool size (default: 10)
   */
  maxConnections?: number;

  /**
   * Reported to the server as application_name (default: claimwatch)
   */
  applicationName?: string;

  /**
   * Seconds before an idle connection is closed (default: never)
   */
  idleTimeoutSeconds?: number;
};

/**
 * Open a pool over the engine's tables. Nothing connects until the first query.
 *
 * @example
 * ```ts
 * const { db, client } = createDatabase({ connectionString: 'postgres://localhost:5432/claimwatch' });
 * const engine = createEngine({ repos: createPgRepositoryContext(db) });
 * // ...
 * await client.end();
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? DEFAULT_MAX_CONNECTIONS,
    idle_timeout: config.idleTimeoutSeconds,
    connection: { application_name: config.applicationName ?? DEFAULT_APPLICATION_NAME },
  });

  return { db: drizzle(client, { schema }), client };
}

export type Database = ReturnType<typeof createDatabase>['db'];
