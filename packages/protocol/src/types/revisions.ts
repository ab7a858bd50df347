// Revision and change stream types

import type { Id, RevisionId, Timestamp } from './common.js';
import type { EntityPayload } from './statements.js';

/**
 * Metadata for one revision of an entity
 */
export type RevisionMeta = {
  entityId: Id;
  revisionId: RevisionId;

  /**
   * Revision this one was based on (0 for the entity's first revision)
   */
  parentId: RevisionId;

  user: string;
  timestamp: Timestamp;
  tags: string[];

  /**
   * Content deleted or suppressed; the revision cannot be read
   */
  deleted: boolean;

  /**
   * Whether the editor is an established (autoconfirmed) account
   */
  trustedUser: boolean;
};

/**
 * Stored revision: metadata plus entity content
 */
export type EntityRevision = RevisionMeta & {
  payload: EntityPayload;
};

/**
 * One entry of the revision stream
 */
export type ChangeEntry = {
  entityId: Id;

  /**
   * Revision the edit was based on (0 when the edit created the entity)
   */
  oldRevisionId: RevisionId;

  newRevisionId: RevisionId;
  tags: string[];
  user?: string;
  timestamp?: Timestamp;
};

/**
 * The (base, new) revision pair evaluated as one logical edit
 */
export type RevisionSpan = {
  entityId: Id;

  /**
   * Revision before the change, or null when the span created the entity
   */
  baseRevisionId: RevisionId | null;

  newRevisionId: RevisionId;
};
