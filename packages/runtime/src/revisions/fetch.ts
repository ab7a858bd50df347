// Revision retrieval through the entity-read collaborator

import type { Id, RevisionId } from '@claimwatch/protocol';
import type { RevisionRepository } from '@claimwatch/repositories';
import { RevisionNotFoundError } from '../errors.js';
import { RevisionWrapper } from './wrapper.js';

/**
 * Fetch one revision and wrap it.
 *
 * @throws RevisionNotFoundError if the revision does not exist or was deleted
 * @throws MalformedEntityError if the stored content is invalid
 */
export async function getRevision(
  revisions: RevisionRepository,
  entityId: Id,
  revisionId: RevisionId
): Promise<RevisionWrapper> {
  const revision = await revisions.get(entityId, revisionId);
  if (!revision) {
    throw new RevisionNotFoundError(entityId, revisionId);
  }
  return RevisionWrapper.fromRevision(revision);
}

/**
 * Fetch the latest readable revision of an entity.
 *
 * @throws RevisionNotFoundError if the entity does not exist
 */
export async function getLatestRevision(
  revisions: RevisionRepository,
  entityId: Id
): Promise<RevisionWrapper> {
  const revision = await revisions.getLatest(entityId);
  if (!revision) {
    throw new RevisionNotFoundError(entityId, null);
  }
  return RevisionWrapper.fromRevision(revision);
}
