import type { Id, RevisionId, EntityRevision, RevisionMeta } from '@claimwatch/protocol';

/**
 * Filter for listing an entity's revision history
 */
export type RevisionHistoryFilter = {
  /**
   * Only include revisions with id >= from
   */
  from?: RevisionId;

  /**
   * Only include revisions with id <= to
   */
  to?: RevisionId;

  limit?: number;
};

/**
 * Repository interface for reading entity revisions (the entity-read collaborator).
 *
 * Revisions are immutable. A revision whose content was deleted or suppressed
 * is still listed in the history (with `deleted: true`) but cannot be read.
 */
export interface RevisionRepository {
  /**
   * Get one revision of an entity
   * @returns the revision, or null if it does not exist or was deleted
   */
  get(entityId: Id, revisionId: RevisionId): Promise<EntityRevision | null>;

  /**
   * Get the latest readable revision of an entity
   * @returns the revision, or null if the entity does not exist
   */
  getLatest(entityId: Id): Promise<EntityRevision | null>;

  /**
   * List revision metadata in ascending revision order
   */
  listHistory(entityId: Id, filter?: RevisionHistoryFilter): Promise<RevisionMeta[]>;
}
