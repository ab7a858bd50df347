// Engine wiring - builds the store, registry, lookup and evaluator

import type { Id, RevisionId, RevisionSpan } from '@claimwatch/protocol';
import {
  createInMemoryRepositoryContext,
  postgres,
  type RepositoryContext,
} from '@claimwatch/repositories';
import { loadConfig, type EngineConfig } from './config.js';
import { createConsoleLogger, type Logger } from './logger.js';
import { DEFAULT_CONSTRAINT_TTL_MS, ConstraintsStore } from './constraints/store.js';
import {
  DEFAULT_REFERENCE_CACHE_SIZE,
  DEFAULT_REFERENCE_TTL_MS,
  QueryReferenceLookup,
  type ReferenceLookup,
} from './constraints/reference.js';
import { createCheckerRegistry, type CheckerRegistry } from './constraints/registry.js';
import { ConstraintEvaluator, type EvaluationReport } from './evaluation/evaluator.js';
import { getRevision, getLatestRevision } from './revisions/fetch.js';
import { DEFAULT_SPAN_WINDOW_MS } from './revisions/span.js';

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  databaseMaxConnections: 10,
  constraintCacheTtlMs: DEFAULT_CONSTRAINT_TTL_MS,
  referenceCacheSize: DEFAULT_REFERENCE_CACHE_SIZE,
  referenceCacheTtlMs: DEFAULT_REFERENCE_TTL_MS,
  spanWindowMs: DEFAULT_SPAN_WINDOW_MS,
  logLevel: 'info',
  implicitConstraints: [],
};

export type EngineOptions = {
  repos: RepositoryContext;
  config?: Partial<EngineConfig>;

  /**
   * Logger (default: console, filtered by config.logLevel)
   */
  logger?: Logger;

  registry?: CheckerRegistry;
  lookup?: ReferenceLookup;

  /**
   * Clock for cache expiry, for tests
   */
  now?: () => number;
};

export type EvaluateByIdOptions = {
  /**
   * Also read the latest revision and skip properties whose changes it
   * has already undone (default: false)
   */
  skipReverted?: boolean;
};

export type Engine = {
  readonly repos: RepositoryContext;
  readonly config: EngineConfig;
  readonly logger: Logger;
  readonly store: ConstraintsStore;
  readonly registry: CheckerRegistry;
  readonly lookup: ReferenceLookup;
  readonly evaluator: ConstraintEvaluator;

  /**
   * Fetch both revisions and evaluate the change between them.
   * A null base evaluates the creation of the entity.
   *
   * @throws RevisionNotFoundError if either revision cannot be read
   */
  evaluateChangeById(
    entityId: Id,
    baseRevisionId: RevisionId | null,
    newRevisionId: RevisionId,
    options?: EvaluateByIdOptions
  ): Promise<EvaluationReport>;

  evaluateSpan(span: RevisionSpan, options?: EvaluateByIdOptions): Promise<EvaluationReport>;

  /**
   * Evaluate the latest revision of an entity without a base
   *
   * @throws RevisionNotFoundError if the entity does not exist
   */
  evaluateLatest(entityId: Id): Promise<EvaluationReport>;
};

/**
 * Create an engine over a set of collaborators.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * const engine = createEngine({ repos, logger: silentLogger });
 * const report = await engine.evaluateChangeById('Q42', 10, 11);
 * ```
 */
export function createEngine(options: EngineOptions): Engine {
  const { repos } = options;
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...options.config };
  const logger = options.logger ?? createConsoleLogger(config.logLevel);

  const store = new ConstraintsStore(repos.query, {
    ttlMs: config.constraintCacheTtlMs,
    logger,
    now: options.now,
    implicit: config.implicitConstraints,
  });
  const registry = options.registry ?? createCheckerRegistry();
  const lookup =
    options.lookup ??
    new QueryReferenceLookup(repos.query, {
      cacheSize: config.referenceCacheSize,
      ttlMs: config.referenceCacheTtlMs,
      now: options.now,
    });
  const evaluator = new ConstraintEvaluator({ constraints: store, registry, lookup, logger });

  const evaluateChangeById = async (
    entityId: Id,
    baseRevisionId: RevisionId | null,
    newRevisionId: RevisionId,
    { skipReverted = false }: EvaluateByIdOptions = {}
  ): Promise<EvaluationReport> => {
    const base = baseRevisionId === null ? null : await getRevision(repos.revisions, entityId, baseRevisionId);
    const next = await getRevision(repos.revisions, entityId, newRevisionId);
    const current = skipReverted ? await getLatestRevision(repos.revisions, entityId) : null;
    return evaluator.evaluateChange(base, next, { current });
  };

  return {
    repos,
    config,
    logger,
    store,
    registry,
    lookup,
    evaluator,
    evaluateChangeById,
    evaluateSpan: (span, evaluateOptions) =>
      evaluateChangeById(span.entityId, span.baseRevisionId, span.newRevisionId, evaluateOptions),
    evaluateLatest: async (entityId) => evaluator.evaluateEntity(await getLatestRevision(repos.revisions, entityId)),
  };
}

/**
 * Create an engine from environment variables.
 * Uses Postgres when DATABASE_URL is set, in-memory collaborators otherwise.
 *
 * @throws ConfigurationError if a variable is invalid
 */
export function createEngineFromEnv(
  env: Record<string, string | undefined> = process.env,
  options: Omit<EngineOptions, 'repos' | 'config'> = {}
): { engine: Engine; close: () => Promise<void> } {
  const config = loadConfig(env);

  if (!config.databaseUrl) {
    const engine = createEngine({ ...options, repos: createInMemoryRepositoryContext(), config });
    return { engine, close: async () => {} };
  }

  const { db, client } = postgres.createDatabase({
    connectionString: config.databaseUrl,
    maxConnections: config.databaseMaxConnections,
  });
  const engine = createEngine({ ...options, repos: postgres.createPgRepositoryContext(db), config });

  return {
    engine,
    close: async () => {
      await client.end();
    },
  };
}
