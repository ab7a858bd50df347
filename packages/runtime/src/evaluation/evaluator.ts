// Constraint evaluation engine - runs checkers for a change or a whole entity
//
// evaluateChange only considers constraints declared on properties the diff
// touched, and on the qualifiers of statements of those properties.
// Constraints whose checkers read other properties are not re-checked when
// only those other properties change.

import type {
  Id,
  RevisionId,
  ChangeSet,
  CheckScope,
  ConstraintDefinition,
  EvaluationResult,
  CheckerFailure,
  Transition,
  Verdict,
} from '@claimwatch/protocol';
import { CheckerError, EntityMismatchError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { diff, getPropertyChanges, isReverted } from '../revisions/differ.js';
import type { RevisionWrapper } from '../revisions/wrapper.js';
import type { CheckerRegistry } from '../constraints/registry.js';
import { supportsScope, type CheckOptions, type ConstraintChecker } from '../constraints/checkers/index.js';
import type { ReferenceLookup } from '../constraints/reference.js';

/**
 * Source of constraint definitions. Satisfied by ConstraintsStore;
 * tests can pass a fake with fixed contents.
 */
export interface ConstraintSource {
  constraintsFor(propertyId: Id): Promise<ConstraintDefinition[]>;
}

export type ConstraintEvaluatorDeps = {
  constraints: ConstraintSource;
  registry: CheckerRegistry;
  lookup: ReferenceLookup;
  logger?: Logger;
};

/**
 * Result of evaluating one change or one entity
 */
export type EvaluationReport = {
  entityId: Id;

  /**
   * Revision compared against (null for cold evaluation or a new entity)
   */
  baseRevisionId: RevisionId | null;

  newRevisionId: RevisionId;

  /**
   * Statement-level changes (null for cold evaluation)
   */
  changes: ChangeSet | null;

  /**
   * Results in evaluation order, keyed by constraint id for the main scope
   * and by `${id}@qualifier` for the qualifier scope.
   * Every constraint that was attempted is present.
   */
  results: Map<string, EvaluationResult>;

  durationMs: number;
};

export type EvaluateChangeOptions = {
  /**
   * Latest state of the entity. Touched properties whose changes have all
   * been undone in this state are skipped.
   */
  current?: RevisionWrapper | null;
};

type CheckOutcome = {
  verdict: Verdict;
  error?: CheckerFailure;
};

/**
 * Key of a result in EvaluationReport.results
 */
export function resultKey(constraintId: Id, scope: CheckScope): string {
  return scope === 'main' ? constraintId : `${constraintId}@${scope}`;
}

/**
 * Label how a verdict moved from the base state to the new state.
 * Without a base, the new state is compared against an empty entity.
 */
export function classifyTransition(verdict: Verdict, baseVerdict: Verdict | null): Transition {
  if (verdict === 'error' || baseVerdict === 'error') return 'indeterminate';
  if (verdict === 'violated') {
    return baseVerdict === 'violated' ? 'unchanged-violated' : 'newly-violated';
  }
  return baseVerdict === 'violated' ? 'newly-satisfied' : 'unchanged-satisfied';
}

/**
 * Orchestrates diffing, constraint resolution and checking.
 *
 * Structural errors (EntityMismatchError, ConstraintFetchError) abort the
 * call. A checker that throws only affects its own constraint, which is
 * reported with an "error" verdict.
 */
export class ConstraintEvaluator {
  private readonly constraints: ConstraintSource;
  private readonly registry: CheckerRegistry;
  private readonly lookup: ReferenceLookup;
  private readonly logger: Logger;

  constructor(deps: ConstraintEvaluatorDeps) {
    this.constraints = deps.constraints;
    this.registry = deps.registry;
    this.lookup = deps.lookup;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Evaluate the change from `base` to `next`.
   *
   * Each constraint on a touched property is checked against both states and
   * labelled with its transition. Constraints on properties used as
   * qualifiers of the touched statements are checked in the qualifier scope.
   * A null base means the entity was created.
   *
   * @throws EntityMismatchError if the snapshots (or `current`) belong to different entities
   * @throws ConstraintFetchError if definitions for a touched property cannot be fetched
   */
  async evaluateChange(
    base: RevisionWrapper | null,
    next: RevisionWrapper,
    options: EvaluateChangeOptions = {}
  ): Promise<EvaluationReport> {
    const startTime = Date.now();
    const changes = diff(base, next);
    const { current } = options;
    if (current && current.entityId !== next.entityId) {
      throw new EntityMismatchError(next.entityId, current.entityId);
    }

    const pending = changes.touched.filter((propertyId) => {
      const propertyChanges = getPropertyChanges(changes, propertyId);
      return !(current && propertyChanges && isReverted(propertyChanges, base, current));
    });
    const results = new Map<string, EvaluationResult>();

    for (const propertyId of pending) {
      for (const constraint of await this.constraints.constraintsFor(propertyId)) {
        const checker = this.resolveChecker(constraint);
        results.set(resultKey(constraint.id, 'main'), await this.compare(checker, base, next, constraint, 'main'));
      }
    }

    const qualifierIds = [
      ...new Set([...(base?.qualifierPropertyIds(pending) ?? []), ...next.qualifierPropertyIds(pending)]),
    ];
    for (const propertyId of qualifierIds) {
      for (const { constraint, checker } of await this.qualifierConstraints(propertyId)) {
        results.set(
          resultKey(constraint.id, 'qualifier'),
          await this.compare(checker, base, next, constraint, 'qualifier')
        );
      }
    }

    this.logger.debug('Evaluated change', {
      entityId: changes.entityId,
      baseRevisionId: changes.baseRevisionId,
      newRevisionId: changes.newRevisionId,
      touched: changes.touched,
      reverted: changes.touched.length - pending.length,
      constraints: results.size,
    });

    return {
      entityId: changes.entityId,
      baseRevisionId: changes.baseRevisionId,
      newRevisionId: changes.newRevisionId,
      changes,
      results,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Evaluate every constraint on every property of an entity, with no base.
   * Transitions are "unchanged-violated" or "unchanged-satisfied", or
   * "indeterminate" when the checker failed.
   *
   * @throws ConstraintFetchError if definitions cannot be fetched
   */
  async evaluateEntity(entity: RevisionWrapper): Promise<EvaluationReport> {
    const startTime = Date.now();
    const results = new Map<string, EvaluationResult>();

    for (const propertyId of entity.propertyIds) {
      for (const constraint of await this.constraints.constraintsFor(propertyId)) {
        const checker = this.resolveChecker(constraint);
        results.set(resultKey(constraint.id, 'main'), await this.evaluateAlone(checker, entity, constraint, 'main'));
      }
    }

    for (const propertyId of entity.qualifierPropertyIds()) {
      for (const { constraint, checker } of await this.qualifierConstraints(propertyId)) {
        results.set(
          resultKey(constraint.id, 'qualifier'),
          await this.evaluateAlone(checker, entity, constraint, 'qualifier')
        );
      }
    }

    return {
      entityId: entity.entityId,
      baseRevisionId: null,
      newRevisionId: entity.revisionId,
      changes: null,
      results,
      durationMs: Date.now() - startTime,
    };
  }

  private async compare(
    checker: ConstraintChecker | undefined,
    base: RevisionWrapper | null,
    next: RevisionWrapper,
    constraint: ConstraintDefinition,
    scope: CheckScope
  ): Promise<EvaluationResult> {
    const outcome = await this.check(checker, next, constraint, 'new', { scope, previous: base });
    const baseOutcome = base ? await this.check(checker, base, constraint, 'base', { scope }) : null;
    const baseVerdict = baseOutcome ? baseOutcome.verdict : null;
    const error = outcome.error ?? baseOutcome?.error;

    return {
      constraint,
      scope,
      verdict: outcome.verdict,
      baseVerdict,
      transition: classifyTransition(outcome.verdict, baseVerdict),
      ...(error && { error }),
    };
  }

  private async evaluateAlone(
    checker: ConstraintChecker | undefined,
    entity: RevisionWrapper,
    constraint: ConstraintDefinition,
    scope: CheckScope
  ): Promise<EvaluationResult> {
    const outcome = await this.check(checker, entity, constraint, 'new', { scope });
    return {
      constraint,
      scope,
      verdict: outcome.verdict,
      baseVerdict: null,
      // The entity is its own base
      transition: classifyTransition(outcome.verdict, outcome.verdict),
      ...(outcome.error && { error: outcome.error }),
    };
  }

  /**
   * Constraints on a property that are checked where it is used as a
   * qualifier. Kinds without a checker are left to the main scope to report.
   */
  private async qualifierConstraints(
    propertyId: Id
  ): Promise<{ constraint: ConstraintDefinition; checker: ConstraintChecker }[]> {
    const definitions = await this.constraints.constraintsFor(propertyId);
    return definitions.flatMap((constraint) => {
      const checker = this.registry.get(constraint.kind);
      return checker && supportsScope(checker, 'qualifier') && constraint.scopes.includes('qualifier')
        ? [{ constraint, checker }]
        : [];
    });
  }

  private resolveChecker(constraint: ConstraintDefinition): ConstraintChecker | undefined {
    const checker = this.registry.get(constraint.kind);
    if (!checker) {
      this.logger.warn('No checker registered for constraint kind', {
        constraintId: constraint.id,
        propertyId: constraint.propertyId,
        kind: constraint.kind,
        typeId: constraint.typeId,
      });
    }
    return checker;
  }

  private async check(
    checker: ConstraintChecker | undefined,
    entity: RevisionWrapper,
    constraint: ConstraintDefinition,
    side: CheckerFailure['side'],
    options: CheckOptions
  ): Promise<CheckOutcome> {
    if (!checker) return { verdict: 'inapplicable' };

    try {
      return { verdict: await checker(entity, constraint, this.lookup, options) };
    } catch (error) {
      const checkerError = new CheckerError(
        constraint.id,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );

      this.logger.error(checkerError.message, {
        constraintId: constraint.id,
        entityId: entity.entityId,
        revisionId: entity.revisionId,
        side,
        scope: options.scope ?? 'main',
      });

      return { verdict: 'error', error: { message: checkerError.message, side } };
    }
  }
}
