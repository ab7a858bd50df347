// ConstraintsStore - resolves and caches constraint definitions per property

import type { Id, ConstraintDefinition, ImplicitConstraintKind } from '@claimwatch/protocol';
import type { QueryService, TabularResult } from '@claimwatch/repositories';
import { ConstraintFetchError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { parseConstraintRows, implicitDefinitions, type ParsedConstraints } from './parse.js';

/**
 * Default time-to-live for cached definitions (6 hours)
 */
export const DEFAULT_CONSTRAINT_TTL_MS = 6 * 60 * 60 * 1000;

export type ConstraintsStoreOptions = {
  /**
   * How long fetched definitions stay fresh (default: 6 hours)
   */
  ttlMs?: number;

  /**
   * Constraints added to every property after its declared ones (default: none)
   */
  implicit?: readonly ImplicitConstraintKind[];

  logger?: Logger;

  /**
   * Clock in epoch milliseconds, for tests
   */
  now?: () => number;
};

type CacheEntry = {
  definitions: ConstraintDefinition[];
  expiresAt: number;
};

/**
 * Constraint definitions per property, fetched lazily from the query service.
 *
 * A property without constraints is cached as an empty list, so "no
 * constraints" is distinct from "not fetched yet". Concurrent misses on one
 * property share a single in-flight fetch. A fetch only writes the cache once
 * it fully succeeded; a failed or abandoned fetch leaves no entry behind.
 */
export class ConstraintsStore {
  private readonly cache = new Map<Id, CacheEntry>();
  private readonly inFlight = new Map<Id, Promise<ConstraintDefinition[]>>();
  private readonly ttlMs: number;
  private readonly implicit: readonly ImplicitConstraintKind[];
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly query: QueryService,
    options: ConstraintsStoreOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CONSTRAINT_TTL_MS;
    this.implicit = options.implicit ?? [];
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Definitions declared on a property, in query order.
   *
   * @throws ConstraintFetchError if the query service fails or returns malformed rows
   */
  async constraintsFor(propertyId: Id): Promise<ConstraintDefinition[]> {
    const cached = this.fresh(propertyId);
    if (cached) return [...cached.definitions];

    const pending = this.inFlight.get(propertyId) ?? this.startFetch([propertyId])[0];
    return [...(await pending)];
  }

  /**
   * Fetch definitions for several properties with one query.
   * Properties that are cached or already being fetched are not queried again.
   *
   * @throws ConstraintFetchError if the query service fails or returns malformed rows
   */
  async preload(propertyIds: Id[]): Promise<void> {
    const unique = [...new Set(propertyIds)];
    const pending = unique.flatMap((id) => {
      const existing = this.inFlight.get(id);
      return existing ? [existing] : [];
    });

    const missing = unique.filter((id) => !this.fresh(id) && !this.inFlight.has(id));
    if (missing.length > 0) {
      pending.push(...this.startFetch(missing));
    }

    await Promise.all(pending);
  }

  /**
   * Whether fresh definitions are cached for a property
   */
  has(propertyId: Id): boolean {
    return this.fresh(propertyId) !== undefined;
  }

  /**
   * Drop the cached definitions of one property
   * @returns true if an entry was removed
   */
  purge(propertyId: Id): boolean {
    return this.cache.delete(propertyId);
  }

  clear(): void {
    this.cache.clear();
  }

  private fresh(propertyId: Id): CacheEntry | undefined {
    const entry = this.cache.get(propertyId);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.cache.delete(propertyId);
      return undefined;
    }
    return entry;
  }

  /**
   * Start one batched fetch and register a per-property in-flight promise
   */
  private startFetch(propertyIds: Id[]): Array<Promise<ConstraintDefinition[]>> {
    const batch = this.load(propertyIds);

    return propertyIds.map((propertyId) => {
      const run = async (): Promise<ConstraintDefinition[]> => {
        try {
          return (await batch).get(propertyId) ?? [];
        } finally {
          if (this.inFlight.get(propertyId) === single) {
            this.inFlight.delete(propertyId);
          }
        }
      };
      const single: Promise<ConstraintDefinition[]> = run();
      this.inFlight.set(propertyId, single);
      return single;
    });
  }

  private async load(propertyIds: Id[]): Promise<Map<Id, ConstraintDefinition[]>> {
    let result: TabularResult;
    try {
      result = await this.query.select({ select: 'constraint_statements', propertyIds });
    } catch (error) {
      throw new ConstraintFetchError(
        propertyIds,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    }

    let parsed: ParsedConstraints;
    try {
      parsed = parseConstraintRows(result.rows);
    } catch (error) {
      throw new ConstraintFetchError(
        propertyIds,
        `malformed constraint rows: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    for (const skipped of parsed.skipped) {
      this.logger.warn('Skipping unusable constraint', { ...skipped });
    }

    const byProperty = new Map<Id, ConstraintDefinition[]>(propertyIds.map((id) => [id, []]));
    for (const definition of parsed.definitions) {
      byProperty.get(definition.propertyId)?.push(definition);
    }
    for (const [propertyId, definitions] of byProperty) {
      definitions.push(...implicitDefinitions(propertyId, this.implicit));
    }

    const expiresAt = this.now() + this.ttlMs;
    for (const [propertyId, definitions] of byProperty) {
      this.cache.set(propertyId, { definitions, expiresAt });
    }

    this.logger.debug('Fetched constraint definitions', {
      propertyIds,
      count: parsed.definitions.length,
    });

    return byProperty;
  }
}
