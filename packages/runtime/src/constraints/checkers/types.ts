// Checker contract and helpers

import {
  isConstraintOfKind,
  type CheckScope,
  type ConstraintBase,
  type ConstraintDefinition,
  type ConstraintKind,
  type ConstraintOfKind,
  type Snak,
  type Statement,
  type Verdict,
} from '@claimwatch/protocol';
import type { RevisionWrapper } from '../../revisions/wrapper.js';
import type { ReferenceLookup } from '../reference.js';

export type CheckOptions = {
  /**
   * Where the constrained property is used (default: main)
   */
  scope?: CheckScope;

  /**
   * State of the entity before the change, when checking the new side of a change
   */
  previous?: RevisionWrapper | null;
};

/**
 * Checks one constraint against one entity snapshot.
 *
 * Checkers have no side effects besides reads through the lookup. They return
 * "inapplicable" for cases they do not check (entity exempt, property absent)
 * and throw when reference data is unusable.
 */
export interface ConstraintChecker {
  (
    entity: RevisionWrapper,
    constraint: ConstraintDefinition,
    lookup: ReferenceLookup,
    options?: CheckOptions
  ): Verdict | Promise<Verdict>;

  /**
   * Scopes the checker can test (default: main only)
   */
  readonly scopes?: readonly CheckScope[];
}

const MAIN_ONLY: readonly CheckScope[] = ['main'];
const MAIN_AND_QUALIFIER: readonly CheckScope[] = ['main', 'qualifier'];

/**
 * Whether a checker can test a property used in the given scope
 */
export function supportsScope(checker: ConstraintChecker, scope: CheckScope): boolean {
  return (checker.scopes ?? MAIN_ONLY).includes(scope);
}

/**
 * Whether the constraint is checked on this entity in the given scope at all
 */
export function isApplicable(entity: RevisionWrapper, constraint: ConstraintBase, scope: CheckScope = 'main'): boolean {
  if (constraint.exceptions.includes(entity.entityId)) return false;
  if (!constraint.scopes.includes(scope)) return false;
  return scope === 'main'
    ? entity.hasProperty(constraint.propertyId)
    : entity.qualifierSnaks(constraint.propertyId).length > 0;
}

function narrow<K extends ConstraintKind>(constraint: ConstraintDefinition, kind: K): ConstraintOfKind<K> {
  if (!isConstraintOfKind(constraint, kind)) {
    throw new Error(`Checker for ${kind} received a ${constraint.kind} constraint`);
  }
  return constraint;
}

export type ValueContext = {
  entity: RevisionWrapper;
  lookup: ReferenceLookup;
  scope: CheckScope;
};

/**
 * Build a checker that tests single snaks: the main snak of each
 * non-deprecated statement of the constrained property, or each qualifier
 * snak of that property. Any violating snak violates the constraint.
 */
export function defineValueChecker<K extends ConstraintKind>(
  kind: K,
  violates: (snak: Snak, constraint: ConstraintOfKind<K>, context: ValueContext) => boolean | Promise<boolean>
): ConstraintChecker {
  const checker: ConstraintChecker = async (entity, definition, lookup, options = {}) => {
    const constraint = narrow(definition, kind);
    const scope = options.scope ?? 'main';
    if (!isApplicable(entity, constraint, scope)) return 'inapplicable';

    const snaks =
      scope === 'main'
        ? entity.activeStatements(constraint.propertyId).map((s) => s.mainsnak)
        : entity.qualifierSnaks(constraint.propertyId);

    for (const snak of snaks) {
      if (await violates(snak, constraint, { entity, lookup, scope })) {
        return 'violated';
      }
    }
    return 'satisfied';
  };

  return Object.assign(checker, { scopes: MAIN_AND_QUALIFIER });
}

export type StatementContext = {
  entity: RevisionWrapper;
  lookup: ReferenceLookup;
  previous: RevisionWrapper | null;
};

/**
 * Build a checker that tests each non-deprecated statement of the
 * constrained property as a whole. Main scope only.
 */
export function defineStatementChecker<K extends ConstraintKind>(
  kind: K,
  violates: (
    statement: Statement,
    constraint: ConstraintOfKind<K>,
    context: StatementContext
  ) => boolean | Promise<boolean>
): ConstraintChecker {
  const checker: ConstraintChecker = async (entity, definition, lookup, options = {}) => {
    const constraint = narrow(definition, kind);
    if ((options.scope ?? 'main') !== 'main' || !isApplicable(entity, constraint)) return 'inapplicable';

    const context = { entity, lookup, previous: options.previous ?? null };
    for (const statement of entity.activeStatements(constraint.propertyId)) {
      if (await violates(statement, constraint, context)) {
        return 'violated';
      }
    }
    return 'satisfied';
  };

  return Object.assign(checker, { scopes: MAIN_ONLY });
}

/**
 * Build a checker that tests the entity as a whole. Main scope only.
 */
export function defineEntityChecker<K extends ConstraintKind>(
  kind: K,
  satisfied: (
    entity: RevisionWrapper,
    constraint: ConstraintOfKind<K>,
    lookup: ReferenceLookup
  ) => boolean | Promise<boolean>
): ConstraintChecker {
  const checker: ConstraintChecker = async (entity, definition, lookup, options = {}) => {
    const constraint = narrow(definition, kind);
    if ((options.scope ?? 'main') !== 'main' || !isApplicable(entity, constraint)) return 'inapplicable';

    return (await satisfied(entity, constraint, lookup)) ? 'satisfied' : 'violated';
  };

  return Object.assign(checker, { scopes: MAIN_ONLY });
}
