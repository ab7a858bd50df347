import { sql, inArray, and, eq, desc, asc } from 'drizzle-orm';
import { z } from 'zod';
import type { Database } from '../db.js';
import { entityRevisions, constraintStatements } from '../schema/index.js';
import {
  QUERY_COLUMNS,
  type QueryService,
  type TabularQuery,
  type TabularResult,
  type TabularRow,
} from '../../interfaces/index.js';
import { constraintStatementRows, entityStatementRows } from '../../records.js';
import type { Id } from '@claimwatch/protocol';

const closureRowSchema = z.array(z.object({ base: z.string(), super: z.string() }));

/**
 * Query service answering tabular queries from Postgres
 */
export class PgQueryService implements QueryService {
  constructor(private db: Database) {}

  async select(query: TabularQuery): Promise<TabularResult> {
    return { columns: QUERY_COLUMNS[query.select], rows: await this.selectRows(query) };
  }

  private async selectRows(query: TabularQuery): Promise<TabularRow[]> {
    switch (query.select) {
      case 'constraint_statements':
        return this.constraintRows(query.propertyIds);
      case 'superclasses':
        return this.superclassRows(query.classIds);
      case 'entity_statements':
        return this.entityRows(query.entityIds, query.propertyIds);
    }
  }

  private async constraintRows(propertyIds: Id[]): Promise<TabularRow[]> {
    if (propertyIds.length === 0) return [];

    const rows = await this.db
      .select()
      .from(constraintStatements)
      .where(inArray(constraintStatements.propertyId, propertyIds))
      .orderBy(asc(constraintStatements.propertyId), asc(constraintStatements.id));

    return constraintStatementRows(rows);
  }

  private async superclassRows(classIds: Id[]): Promise<TabularRow[]> {
    if (classIds.length === 0) return [];

    const ids = sql.join(
      classIds.map((id) => sql`${id}`),
      sql`, `
    );

    // UNION (not UNION ALL) terminates on cycles in the hierarchy
    const result = await this.db.execute(sql`
      WITH RECURSIVE closure(base, super) AS (
        SELECT child_id, parent_id FROM subclass_edges WHERE child_id IN (${ids})
        UNION
        SELECT closure.base, subclass_edges.parent_id
        FROM closure JOIN subclass_edges ON subclass_edges.child_id = closure.super
      )
      SELECT base, super FROM closure
    `);

    return closureRowSchema.parse(Array.from(result));
  }

  private async entityRows(entityIds: Id[], propertyIds?: Id[]): Promise<TabularRow[]> {
    const rows: TabularRow[] = [];

    for (const entityId of new Set(entityIds)) {
      const [latest] = await this.db
        .select({ payload: entityRevisions.payload })
        .from(entityRevisions)
        .where(and(eq(entityRevisions.entityId, entityId), eq(entityRevisions.deleted, false)))
        .orderBy(desc(entityRevisions.revisionId))
        .limit(1);

      if (latest) {
        rows.push(...entityStatementRows(latest.payload, propertyIds));
      }
    }

    return rows;
  }
}
