// Evaluation result types

import type { Id, RevisionId } from './common.js';
import type { ConstraintDefinition, ConstraintScope } from './constraints.js';

/**
 * Outcome of checking one constraint against one entity state.
 * "inapplicable" means the constraint was not checked (property absent,
 * entity exempt, unknown kind); "error" means the checker failed.
 */
export type Verdict = 'satisfied' | 'violated' | 'inapplicable' | 'error';

/**
 * How a verdict moved between the base and the new state.
 * "indeterminate" is used when either side ended in an error.
 */
export type Transition =
  | 'newly-violated'
  | 'newly-satisfied'
  | 'unchanged-violated'
  | 'unchanged-satisfied'
  | 'indeterminate';

/**
 * Where a checked snak sits: the main value of a statement or one of its qualifiers
 */
export type CheckScope = Exclude<ConstraintScope, 'reference'>;

/**
 * Serializable description of a checker failure
 */
export type CheckerFailure = {
  message: string;
  side: 'base' | 'new';
};

/**
 * Verdict for one constraint
 */
export type EvaluationResult = {
  constraint: ConstraintDefinition;
  scope: CheckScope;

  /**
   * Verdict against the new state
   */
  verdict: Verdict;

  /**
   * Verdict against the base state (null when there is no base)
   */
  baseVerdict: Verdict | null;

  transition: Transition;
  error?: CheckerFailure;
};

/**
 * Statement-level change buckets for one property
 */
export type PropertyChanges = {
  propertyId: Id;
  added: Id[];
  removed: Id[];
  modified: Id[];
  unchanged: Id[];
};

/**
 * Minimal statement-level delta between two revisions of one entity
 */
export type ChangeSet = {
  entityId: Id;
  baseRevisionId: RevisionId | null;
  newRevisionId: RevisionId;

  /**
   * Properties with at least one added, removed or modified statement,
   * in first-seen order
   */
  touched: Id[];

  /**
   * Buckets for every property present on either side, in first-seen order
   */
  properties: PropertyChanges[];
};
