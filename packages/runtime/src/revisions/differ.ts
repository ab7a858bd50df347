// Revision Diffing
//
// Reduces two snapshots of one entity to statement-level changes.
// Statements are matched by their stable id only; value equality never pairs
// two statements with different ids.

import type { Id, ChangeSet, PropertyChanges, Statement } from '@claimwatch/protocol';
import { EntityMismatchError } from '../errors.js';
import type { RevisionWrapper } from './wrapper.js';

/**
 * Compare two revisions of the same entity.
 *
 * `base` must be the earlier revision: statements only in `next` are added,
 * statements only in `base` are removed. A null base stands for an entity
 * that did not exist yet, so every statement of `next` is added.
 *
 * @throws EntityMismatchError if the snapshots belong to different entities
 */
export function diff(base: RevisionWrapper | null, next: RevisionWrapper): ChangeSet {
  if (base && base.entityId !== next.entityId) {
    throw new EntityMismatchError(base.entityId, next.entityId);
  }

  // Properties in first-seen order, scanning base then next
  const propertyIds = [...new Set([...(base?.propertyIds ?? []), ...next.propertyIds])];

  const properties = propertyIds.map((propertyId) =>
    diffProperty(propertyId, base?.statements(propertyId) ?? [], next.statements(propertyId))
  );

  return {
    entityId: next.entityId,
    baseRevisionId: base ? base.revisionId : null,
    newRevisionId: next.revisionId,
    touched: properties.filter(isTouched).map((p) => p.propertyId),
    properties,
  };
}

/**
 * Whether a property has any added, removed or modified statement
 */
export function isTouched(changes: PropertyChanges): boolean {
  return changes.added.length > 0 || changes.removed.length > 0 || changes.modified.length > 0;
}

/**
 * Changes for one property, or undefined if the property is on neither side
 */
export function getPropertyChanges(changeSet: ChangeSet, propertyId: Id): PropertyChanges | undefined {
  return changeSet.properties.find((p) => p.propertyId === propertyId);
}

/**
 * Whether every change to a property has been undone in `current`: statements
 * removed or modified since the base are back in their base form, and
 * statements added since the base are gone again
 */
export function isReverted(changes: PropertyChanges, base: RevisionWrapper | null, current: RevisionWrapper): boolean {
  const baseById = new Map((base?.statements(changes.propertyId) ?? []).map((s) => [s.id, s]));
  const currentById = new Map(current.statements(changes.propertyId).map((s) => [s.id, s]));

  const restored = [...changes.removed, ...changes.modified].every((id) => {
    const before = baseById.get(id);
    const now = currentById.get(id);
    return before !== undefined && now !== undefined && sameStatement(before, now);
  });

  return restored && changes.added.every((id) => !currentById.has(id));
}

/**
 * Summary counts across all properties
 */
export function summarizeChangeSet(changeSet: ChangeSet): {
  added: number;
  removed: number;
  modified: number;
  unchanged: number;
} {
  return changeSet.properties.reduce(
    (acc, p) => ({
      added: acc.added + p.added.length,
      removed: acc.removed + p.removed.length,
      modified: acc.modified + p.modified.length,
      unchanged: acc.unchanged + p.unchanged.length,
    }),
    { added: 0, removed: 0, modified: 0, unchanged: 0 }
  );
}

function diffProperty(
  propertyId: Id,
  baseStatements: readonly Statement[],
  newStatements: readonly Statement[]
): PropertyChanges {
  const changes: PropertyChanges = {
    propertyId,
    added: [],
    removed: [],
    modified: [],
    unchanged: [],
  };

  const newById = new Map(newStatements.map((s) => [s.id, s]));
  const baseIds = new Set(baseStatements.map((s) => s.id));

  for (const baseStatement of baseStatements) {
    const newStatement = newById.get(baseStatement.id);
    if (!newStatement) {
      changes.removed.push(baseStatement.id);
    } else if (sameStatement(baseStatement, newStatement)) {
      changes.unchanged.push(baseStatement.id);
    } else {
      changes.modified.push(baseStatement.id);
    }
  }

  for (const newStatement of newStatements) {
    if (!baseIds.has(newStatement.id)) {
      changes.added.push(newStatement.id);
    }
  }

  return changes;
}

/**
 * Statements are equal when value, qualifiers (in order) and rank are equal.
 * References are provenance only and do not count.
 */
export function sameStatement(a: Statement, b: Statement): boolean {
  return (
    a.rank === b.rank && deepEqual(a.mainsnak, b.mainsnak) && deepEqual(a.qualifiers, b.qualifiers)
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep equality check for JSON-like values
 */
function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }

  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a).filter((key) => a[key] !== undefined);
    const bKeys = Object.keys(b).filter((key) => b[key] !== undefined);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((key) => deepEqual(a[key], b[key]));
  }

  return false;
}
