// In-memory collaborator implementations for development and testing
//
// This module provides a complete in-memory implementation of all collaborators,
// useful for:
// - Local development without a database (seeded from fixture bundles)
// - Fast unit testing
//
// Data does not persist between restarts.

import type { Id, EntityRevision, ChangeEntry } from '@claimwatch/protocol';
import {
  QUERY_COLUMNS,
  type RepositoryContext,
  type RevisionRepository,
  type ChangeStream,
  type QueryService,
  type TabularQuery,
  type TabularRow,
} from '../interfaces/index.js';
import {
  constraintStatementRows,
  entityStatementRows,
  superclassRows,
  type ConstraintStatementRecord,
  type SubclassEdge,
} from '../records.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  /**
   * Revisions by entity id, kept in ascending revision order
   */
  revisions: Map<Id, EntityRevision[]>;
  constraintStatements: Map<Id, ConstraintStatementRecord>;
  subclassEdges: SubclassEdge[];
}

/**
 * Extended repository context with seeding helpers and access to underlying data.
 */
export interface InMemoryRepositoryContext extends RepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  addRevision(revision: EntityRevision): void;
  addConstraintStatement(record: ConstraintStatementRecord): void;
  addSubclassEdge(edge: SubclassEdge): void;
  /** Clear all data */
  clear(): void;
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * repos.addRevision({ entityId: 'Q1', revisionId: 10, parentId: 0, ... });
 * const latest = await repos.revisions.getLatest('Q1');
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const revisions = new Map<Id, EntityRevision[]>();
  const constraintStatements = new Map<Id, ConstraintStatementRecord>();
  const subclassEdges: SubclassEdge[] = [];

  function latestReadable(entityId: Id): EntityRevision | null {
    const list = revisions.get(entityId) ?? [];
    for (let i = list.length - 1; i >= 0; i--) {
      if (!list[i].deleted) return list[i];
    }
    return null;
  }

  // Revision repository
  const revisionRepo: RevisionRepository = {
    async get(entityId, revisionId) {
      const found = (revisions.get(entityId) ?? []).find((r) => r.revisionId === revisionId);
      return found && !found.deleted ? found : null;
    },
    async getLatest(entityId) {
      return latestReadable(entityId);
    },
    async listHistory(entityId, filter) {
      let result = (revisions.get(entityId) ?? []).map(({ payload: _payload, ...meta }) => meta);
      if (filter?.from !== undefined) {
        const from = filter.from;
        result = result.filter((r) => r.revisionId >= from);
      }
      if (filter?.to !== undefined) {
        const to = filter.to;
        result = result.filter((r) => r.revisionId <= to);
      }
      if (filter?.limit !== undefined) {
        result = result.slice(0, filter.limit);
      }
      return result;
    },
  };

  // Change stream
  const changeStream: ChangeStream = {
    async read(cursor, limit) {
      const after = cursor === null ? 0 : Number(cursor);
      const entries: ChangeEntry[] = Array.from(revisions.values())
        .flat()
        .filter((r) => r.revisionId > after)
        .sort((a, b) => a.revisionId - b.revisionId)
        .slice(0, limit)
        .map((r) => ({
          entityId: r.entityId,
          oldRevisionId: r.parentId,
          newRevisionId: r.revisionId,
          tags: [...r.tags],
          user: r.user,
          timestamp: r.timestamp,
        }));

      const last = entries[entries.length - 1];
      return {
        entries,
        nextCursor: last ? String(last.newRevisionId) : cursor,
      };
    },
  };

  function selectRows(query: TabularQuery): TabularRow[] {
    switch (query.select) {
      case 'constraint_statements': {
        const wanted = new Set(query.propertyIds);
        const records = Array.from(constraintStatements.values()).filter((r) =>
          wanted.has(r.propertyId)
        );
        return constraintStatementRows(records);
      }
      case 'superclasses':
        return superclassRows(subclassEdges, query.classIds);
      case 'entity_statements':
        return query.entityIds.flatMap((entityId) => {
          const latest = latestReadable(entityId);
          return latest ? entityStatementRows(latest.payload, query.propertyIds) : [];
        });
    }
  }

  // Query service
  const queryService: QueryService = {
    async select(query) {
      return { columns: QUERY_COLUMNS[query.select], rows: selectRows(query) };
    },
  };

  return {
    revisions: revisionRepo,
    changes: changeStream,
    query: queryService,
    _data: { revisions, constraintStatements, subclassEdges },

    addRevision(revision) {
      const list = revisions.get(revision.entityId) ?? [];
      list.push(revision);
      list.sort((a, b) => a.revisionId - b.revisionId);
      revisions.set(revision.entityId, list);
    },
    addConstraintStatement(record) {
      constraintStatements.set(record.id, record);
    },
    addSubclassEdge(edge) {
      subclassEdges.push(edge);
    },
    clear() {
      revisions.clear();
      constraintStatements.clear();
      subclassEdges.length = 0;
    },
  };
}
