import { pgTable, text, integer, timestamp, jsonb, boolean, index } from 'drizzle-orm/pg-core';
import type { EntityPayload } from '@claimwatch/protocol';

/**
 * Entity revisions - immutable snapshots of entity content.
 *
 * Revision ids are unique across the graph and increase over time, so the
 * table doubles as the change stream (ordered by revision_id).
 */
export const entityRevisions = pgTable(
  'entity_revisions',
  {
    revisionId: integer('revision_id').primaryKey(),
    entityId: text('entity_id').notNull(),
    parentId: integer('parent_id').notNull().default(0), // 0 = entity creation
    user: text('user_name').notNull(),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
    tags: jsonb('tags').$type<string[]>().notNull().default([]),
    deleted: boolean('deleted').notNull().default(false), // content deleted or suppressed
    trustedUser: boolean('trusted_user').notNull().default(false),
    payload: jsonb('payload').$type<EntityPayload>().notNull(),
  },
  (table) => [
    index('entity_revisions_entity_idx').on(table.entityId),
    index('entity_revisions_entity_revision_idx').on(table.entityId, table.revisionId),
  ]
);
