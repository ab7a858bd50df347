// Revision span resolution
//
// Collapses a burst of edits into the single (base, new) revision pair that
// is evaluated as one logical change, so intermediate states an editor
// corrected within the burst are never evaluated.

import type { Id, ChangeEntry, RevisionMeta, RevisionSpan } from '@claimwatch/protocol';
import { SpanResolutionError } from '../errors.js';

/**
 * Default window for joining edits by different users (15 minutes)
 */
export const DEFAULT_SPAN_WINDOW_MS = 15 * 60 * 1000;

/**
 * Resolve a burst of same-session edits to one revision span.
 *
 * Base is the revision preceding the first edit, new is the last edit.
 * Entries may arrive in any order; they are sorted by new revision id.
 *
 * @throws SpanResolutionError if the burst is empty, spans several entities
 *   or its revisions do not form a contiguous chain
 */
export function spanRevisions(burst: ChangeEntry[]): RevisionSpan {
  if (burst.length === 0) {
    throw new SpanResolutionError('burst is empty');
  }

  const entityIds = new Set(burst.map((e) => e.entityId));
  if (entityIds.size > 1) {
    throw new SpanResolutionError(`burst spans several entities: ${[...entityIds].join(', ')}`);
  }

  const sorted = [...burst].sort((a, b) => a.newRevisionId - b.newRevisionId);
  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    if (current.oldRevisionId !== previous.newRevisionId) {
      throw new SpanResolutionError(
        `revision ${current.newRevisionId} is based on ${current.oldRevisionId}, not ${previous.newRevisionId}`
      );
    }
  }

  const first = sorted[0];
  const last = sorted[sorted.length - 1];

  return {
    entityId: first.entityId,
    baseRevisionId: first.oldRevisionId === 0 ? null : first.oldRevisionId,
    newRevisionId: last.newRevisionId,
  };
}

/**
 * Group stream entries into bursts.
 *
 * Consecutive edits of one entity that share a tag (starting with `tagPrefix`,
 * when given) and chain onto each other form one burst. Untagged entries are
 * bursts of their own. Bursts are returned in order of their first entry.
 */
export function groupBursts(entries: ChangeEntry[], tagPrefix?: string): ChangeEntry[][] {
  const bursts: ChangeEntry[][] = [];
  const open = new Map<string, ChangeEntry[]>();

  for (const entry of entries) {
    const tag = entry.tags.find((t) => tagPrefix === undefined || t.startsWith(tagPrefix));
    if (tag === undefined) {
      bursts.push([entry]);
      continue;
    }

    const key = `${entry.entityId}\u0000${tag}`;
    const current = open.get(key);
    const tail = current?.[current.length - 1];

    if (current && tail && tail.newRevisionId === entry.oldRevisionId) {
      current.push(entry);
    } else {
      const burst = [entry];
      bursts.push(burst);
      open.set(key, burst);
    }
  }

  return bursts;
}

/**
 * Options for history-based span extension
 */
export type SpanFromHistoryOptions = {
  /**
   * Edits by different users closer than this are joined when the later
   * editor is not trusted (default: 15 minutes)
   */
  windowMs?: number;
};

/**
 * Extend a single stream entry into a span using the entity's history.
 *
 * Walks forward from the edit while the next revision is by the same user,
 * or by an untrusted user within the window; then walks backward under the
 * same rule. The first revision that does not join ends the walk and, going
 * backward, becomes the base. Deleted revisions are never used as either end.
 *
 * @param history - Revision metadata of the entity in ascending order
 * @throws SpanResolutionError if the entry's revision is not in the history
 *   or no readable revision remains for the new end
 */
export function spanFromHistory(
  history: RevisionMeta[],
  entry: ChangeEntry,
  options: SpanFromHistoryOptions = {}
): RevisionSpan {
  const { windowMs = DEFAULT_SPAN_WINDOW_MS } = options;

  const index = history.findIndex((r) => r.revisionId === entry.newRevisionId);
  if (index === -1) {
    throw new SpanResolutionError(`revision ${entry.newRevisionId} is not in the history of ${entry.entityId}`);
  }

  const joins = (later: RevisionMeta, earlier: RevisionMeta, candidate: RevisionMeta): boolean => {
    if (later.user === earlier.user) return true;
    const delta = Date.parse(later.timestamp) - Date.parse(earlier.timestamp);
    return delta < windowMs && !candidate.trustedUser;
  };

  const queue: RevisionMeta[] = [history[index]];

  // Towards now
  for (let i = index + 1; i < history.length; i++) {
    const rev = history[i];
    const last = queue[queue.length - 1];
    if (!joins(rev, last, rev)) break;
    queue.push(rev);
  }

  // Towards the past
  let firstIsBase = false;
  for (let i = index - 1; i >= 0; i--) {
    const rev = history[i];
    const first = queue[0];
    queue.unshift(rev);
    if (!joins(first, rev, rev)) {
      firstIsBase = true;
      break;
    }
  }

  const readable = (revisionId: number) =>
    !history.some((r) => r.revisionId === revisionId && r.deleted);

  const newEnd = [...queue].reverse().find((r) => !r.deleted);
  if (!newEnd) {
    throw new SpanResolutionError(`no readable revision around ${entry.entityId}@${entry.newRevisionId}`);
  }

  const head = queue[0];
  if (!firstIsBase && (head.parentId === 0 || readable(head.parentId))) {
    return toSpan(entry.entityId, head.parentId, newEnd.revisionId);
  }

  const baseEnd = queue.find((r) => !r.deleted);
  return toSpan(entry.entityId, baseEnd ? baseEnd.revisionId : entry.oldRevisionId, newEnd.revisionId);
}

function toSpan(entityId: Id, baseRevisionId: number, newRevisionId: number): RevisionSpan {
  return {
    entityId,
    baseRevisionId: baseRevisionId === 0 ? null : baseRevisionId,
    newRevisionId,
  };
}
