// Reference data lookup for checkers
//
// Checkers that look beyond the entity itself (class hierarchy, statements of
// linked entities) read through a ReferenceLookup. Reference data changes
// independently of the edited entity, so cached answers expire.

import { z } from 'zod';
import { dataValueSchema, type Id, type Rank, type Snak } from '@claimwatch/protocol';
import type { QueryService, TabularRow } from '@claimwatch/repositories';
import { LruCache } from './lru.js';

/**
 * Main snak of a statement on another entity
 */
export type LinkedStatement = {
  id: Id;
  propertyId: Id;
  rank: Rank;
  mainsnak: Snak;
};

export interface ReferenceLookup {
  /**
   * Transitive superclasses of each class (the class itself excluded)
   */
  superclassesOf(classIds: Id[]): Promise<Map<Id, Set<Id>>>;

  /**
   * Current statements of an entity
   * @returns the statements, or null if the entity does not exist
   */
  statementsOf(entityId: Id): Promise<LinkedStatement[] | null>;
}

/**
 * Default number of entries kept per cache
 */
export const DEFAULT_REFERENCE_CACHE_SIZE = 1000;

/**
 * Default time-to-live for cached reference data (10 minutes)
 */
export const DEFAULT_REFERENCE_TTL_MS = 10 * 60 * 1000;

export type QueryReferenceLookupOptions = {
  /**
   * Entries kept per cache (default: 1000)
   */
  cacheSize?: number;

  /**
   * How long answers stay fresh (default: 10 minutes)
   */
  ttlMs?: number;

  /**
   * Clock in epoch milliseconds, for tests
   */
  now?: () => number;
};

type Cached<T> = {
  value: T;
  expiresAt: number;
};

const superclassRowSchema = z.object({ base: z.string().min(1), super: z.string().min(1) });

const entityStatementRowSchema = z.object({
  entity_id: z.string().min(1),
  statement_id: z.string().min(1).nullable(),
  property_id: z.string().min(1).nullable(),
  rank: z.enum(['preferred', 'normal', 'deprecated']).nullable(),
  snaktype: z.enum(['value', 'somevalue', 'novalue']).nullable(),
  value: z.string().nullable(),
});

/**
 * ReferenceLookup backed by the query service, with bounded LRU caches
 * whose entries expire after a fixed time
 */
export class QueryReferenceLookup implements ReferenceLookup {
  private readonly superclasses: LruCache<Id, Cached<Set<Id>>>;
  private readonly statements: LruCache<Id, Cached<LinkedStatement[] | null>>;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly query: QueryService,
    options: QueryReferenceLookupOptions = {}
  ) {
    const size = options.cacheSize ?? DEFAULT_REFERENCE_CACHE_SIZE;
    this.superclasses = new LruCache(size);
    this.statements = new LruCache(size);
    this.ttlMs = options.ttlMs ?? DEFAULT_REFERENCE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  async superclassesOf(classIds: Id[]): Promise<Map<Id, Set<Id>>> {
    const unique = [...new Set(classIds)];
    const result = new Map<Id, Set<Id>>();
    const missing: Id[] = [];

    for (const id of unique) {
      const cached = this.fresh(this.superclasses, id);
      if (cached) {
        result.set(id, cached.value);
      } else {
        missing.push(id);
      }
    }

    if (missing.length > 0) {
      const { rows } = await this.query.select({ select: 'superclasses', classIds: missing });
      const fetched = new Map<Id, Set<Id>>(missing.map((id) => [id, new Set<Id>()]));

      for (const row of rows) {
        const { base, super: parent } = superclassRowSchema.parse(row);
        fetched.get(base)?.add(parent);
      }

      const expiresAt = this.now() + this.ttlMs;
      for (const [id, supers] of fetched) {
        this.superclasses.set(id, { value: supers, expiresAt });
        result.set(id, supers);
      }
    }

    return result;
  }

  async statementsOf(entityId: Id): Promise<LinkedStatement[] | null> {
    const cached = this.fresh(this.statements, entityId);
    if (cached) return cached.value;

    const { rows } = await this.query.select({ select: 'entity_statements', entityIds: [entityId] });
    const statements = rows.length === 0 ? null : toLinkedStatements(rows);

    this.statements.set(entityId, { value: statements, expiresAt: this.now() + this.ttlMs });
    return statements;
  }

  clear(): void {
    this.superclasses.clear();
    this.statements.clear();
  }

  private fresh<T>(cache: LruCache<Id, Cached<T>>, id: Id): Cached<T> | undefined {
    const entry = cache.get(id);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      cache.delete(id);
      return undefined;
    }
    return entry;
  }
}

function toLinkedStatements(rows: TabularRow[]): LinkedStatement[] {
  const statements: LinkedStatement[] = [];

  for (const raw of rows) {
    const row = entityStatementRowSchema.parse(raw);
    if (row.statement_id === null || row.property_id === null || row.snaktype === null) continue;

    const mainsnak: Snak =
      row.snaktype === 'value'
        ? {
            snaktype: 'value',
            property: row.property_id,
            datavalue: dataValueSchema.parse(JSON.parse(row.value ?? 'null')),
          }
        : { snaktype: row.snaktype, property: row.property_id };

    statements.push({
      id: row.statement_id,
      propertyId: row.property_id,
      rank: row.rank ?? 'normal',
      mainsnak,
    });
  }

  return statements;
}
