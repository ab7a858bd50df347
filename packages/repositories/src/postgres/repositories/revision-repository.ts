import { eq, and, asc, desc, gte, lte } from 'drizzle-orm';
import type { Database } from '../db.js';
import { entityRevisions } from '../schema/index.js';
import type { RevisionRepository, RevisionHistoryFilter } from '../../interfaces/index.js';
import type { Id, RevisionId, EntityRevision, RevisionMeta } from '@claimwatch/protocol';

type RevisionRow = typeof entityRevisions.$inferSelect;

export class PgRevisionRepository implements RevisionRepository {
  constructor(private db: Database) {}

  async get(entityId: Id, revisionId: RevisionId): Promise<EntityRevision | null> {
    const [row] = await this.db
      .select()
      .from(entityRevisions)
      .where(
        and(
          eq(entityRevisions.entityId, entityId),
          eq(entityRevisions.revisionId, revisionId),
          eq(entityRevisions.deleted, false)
        )
      );

    return row ? this.rowToRevision(row) : null;
  }

  async getLatest(entityId: Id): Promise<EntityRevision | null> {
    const [row] = await this.db
      .select()
      .from(entityRevisions)
      .where(and(eq(entityRevisions.entityId, entityId), eq(entityRevisions.deleted, false)))
      .orderBy(desc(entityRevisions.revisionId))
      .limit(1);

    return row ? this.rowToRevision(row) : null;
  }

  async listHistory(entityId: Id, filter?: RevisionHistoryFilter): Promise<RevisionMeta[]> {
    const conditions = [eq(entityRevisions.entityId, entityId)];

    if (filter?.from !== undefined) {
      conditions.push(gte(entityRevisions.revisionId, filter.from));
    }

    if (filter?.to !== undefined) {
      conditions.push(lte(entityRevisions.revisionId, filter.to));
    }

    let query = this.db
      .select({
        entityId: entityRevisions.entityId,
        revisionId: entityRevisions.revisionId,
        parentId: entityRevisions.parentId,
        user: entityRevisions.user,
        timestamp: entityRevisions.timestamp,
        tags: entityRevisions.tags,
        deleted: entityRevisions.deleted,
        trustedUser: entityRevisions.trustedUser,
      })
      .from(entityRevisions)
      .where(and(...conditions))
      .orderBy(asc(entityRevisions.revisionId))
      .$dynamic();

    if (filter?.limit) {
      query = query.limit(filter.limit);
    }

    const rows = await query;
    return rows.map((r) => ({ ...r, timestamp: r.timestamp.toISOString() }));
  }

  private rowToRevision(row: RevisionRow): EntityRevision {
    return {
      entityId: row.entityId,
      revisionId: row.revisionId,
      parentId: row.parentId,
      user: row.user,
      timestamp: row.timestamp.toISOString(),
      tags: row.tags,
      deleted: row.deleted,
      trustedUser: row.trustedUser,
      payload: row.payload,
    };
  }
}
