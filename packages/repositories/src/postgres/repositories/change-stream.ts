import { gt, asc } from 'drizzle-orm';
import type { Database } from '../db.js';
import { entityRevisions } from '../schema/index.js';
import type { ChangeStream, ChangePage } from '../../interfaces/index.js';

/**
 * Change stream over the revisions table.
 * The cursor is the last revision id returned.
 */
export class PgChangeStream implements ChangeStream {
  constructor(private db: Database) {}

  async read(cursor: string | null, limit: number): Promise<ChangePage> {
    const after = cursor === null ? 0 : Number.parseInt(cursor, 10);

    const rows = await this.db
      .select({
        entityId: entityRevisions.entityId,
        revisionId: entityRevisions.revisionId,
        parentId: entityRevisions.parentId,
        user: entityRevisions.user,
        timestamp: entityRevisions.timestamp,
        tags: entityRevisions.tags,
      })
      .from(entityRevisions)
      .where(gt(entityRevisions.revisionId, Number.isNaN(after) ? 0 : after))
      .orderBy(asc(entityRevisions.revisionId))
      .limit(limit);

    const entries = rows.map((r) => ({
      entityId: r.entityId,
      oldRevisionId: r.parentId,
      newRevisionId: r.revisionId,
      tags: r.tags,
      user: r.user,
      timestamp: r.timestamp.toISOString(),
    }));

    const last = entries[entries.length - 1];
    return {
      entries,
      nextCursor: last ? String(last.newRevisionId) : cursor,
    };
  }
}
