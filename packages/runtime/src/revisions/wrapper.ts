// RevisionWrapper - immutable snapshot of one entity at one revision

import {
  validateEntityPayload,
  type Id,
  type RevisionId,
  type EntityPayload,
  type EntityRevision,
  type Snak,
  type Statement,
  type TermMap,
} from '@claimwatch/protocol';
import { MalformedEntityError } from '../errors.js';

/**
 * Normalized, read-only view of an entity's statements at one revision.
 *
 * The payload is validated and copied on construction and the copy is frozen,
 * so two wrappers never share statement objects, even for the same payload.
 */
export class RevisionWrapper {
  readonly entityId: Id;
  readonly revisionId: RevisionId;
  private readonly payload: EntityPayload;

  /**
   * @throws MalformedEntityError if the payload fails validation
   */
  constructor(payload: unknown, revisionId: RevisionId) {
    const result = validateEntityPayload(payload);
    if (!result.valid) {
      throw new MalformedEntityError(readEntityId(payload), result.issues);
    }

    this.entityId = result.payload.id;
    this.revisionId = revisionId;
    this.payload = result.payload;
    deepFreeze(this.payload);
  }

  static fromRevision(revision: EntityRevision): RevisionWrapper {
    return new RevisionWrapper(revision.payload, revision.revisionId);
  }

  /**
   * Property ids with at least one statement, in payload order
   */
  get propertyIds(): Id[] {
    return Object.keys(this.payload.statements).filter(
      (propertyId) => this.statements(propertyId).length > 0
    );
  }

  get labels(): Readonly<TermMap> {
    return this.payload.labels ?? {};
  }

  get descriptions(): Readonly<TermMap> {
    return this.payload.descriptions ?? {};
  }

  /**
   * All statements declared under a property (empty if absent)
   */
  statements(propertyId: Id): readonly Statement[] {
    return Object.hasOwn(this.payload.statements, propertyId)
      ? this.payload.statements[propertyId]
      : [];
  }

  /**
   * Statements that are not deprecated
   */
  activeStatements(propertyId: Id): Statement[] {
    return this.statements(propertyId).filter((s) => s.rank !== 'deprecated');
  }

  /**
   * Statements holding the best rank: the preferred ones if any, else the normal ones
   */
  bestStatements(propertyId: Id): Statement[] {
    const active = this.activeStatements(propertyId);
    const preferred = active.filter((s) => s.rank === 'preferred');
    return preferred.length > 0 ? preferred : active;
  }

  hasProperty(propertyId: Id): boolean {
    return this.activeStatements(propertyId).length > 0;
  }

  /**
   * Qualifier snaks of a property, across all non-deprecated statements
   */
  qualifierSnaks(propertyId: Id): Snak[] {
    return this.propertyIds.flatMap((id) =>
      this.activeStatements(id).flatMap((s) => s.qualifiers.filter((q) => q.property === propertyId))
    );
  }

  /**
   * Properties used as qualifiers on the non-deprecated statements of the
   * given properties (all properties when omitted), in first-seen order
   */
  qualifierPropertyIds(propertyIds: Id[] = this.propertyIds): Id[] {
    const seen = new Set<Id>();
    for (const id of propertyIds) {
      for (const statement of this.activeStatements(id)) {
        for (const qualifier of statement.qualifiers) {
          seen.add(qualifier.property);
        }
      }
    }
    return [...seen];
  }

  getStatement(statementId: Id): Statement | undefined {
    for (const propertyId of Object.keys(this.payload.statements)) {
      const found = this.statements(propertyId).find((s) => s.id === statementId);
      if (found) return found;
    }
    return undefined;
  }

  /**
   * Detached, mutable copy of the underlying payload
   */
  toPayload(): EntityPayload {
    return structuredClone(this.payload);
  }
}

function readEntityId(payload: unknown): Id | null {
  if (typeof payload === 'object' && payload !== null && 'id' in payload) {
    return typeof payload.id === 'string' ? payload.id : null;
  }
  return null;
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
}
