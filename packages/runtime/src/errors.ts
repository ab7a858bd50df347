// Runtime error types

import type { Id, RevisionId } from '@claimwatch/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  /**
   * Whether retrying the same call may succeed
   */
  readonly retryable: boolean;

  constructor(code: string, message: string, retryable = false) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
    this.retryable = retryable;
  }
}

/**
 * Entity content that cannot be turned into a snapshot.
 */
export class MalformedEntityError extends RuntimeError {
  readonly entityId: Id | null;
  readonly issues: Array<{ path: string; message: string }>;

  constructor(entityId: Id | null, issues: Array<{ path: string; message: string }>) {
    const first = issues[0];
    super(
      'MALFORMED_ENTITY',
      `Malformed entity ${entityId ?? '<unknown>'}: ${first ? `${first.path}: ${first.message}` : 'invalid payload'}`
    );
    this.name = 'MalformedEntityError';
    this.entityId = entityId;
    this.issues = issues;
  }
}

/**
 * Two snapshots of different entities were compared.
 */
export class EntityMismatchError extends RuntimeError {
  readonly baseEntityId: Id;
  readonly newEntityId: Id;

  constructor(baseEntityId: Id, newEntityId: Id) {
    super('ENTITY_MISMATCH', `Cannot compare revisions of different entities: ${baseEntityId} and ${newEntityId}`);
    this.name = 'EntityMismatchError';
    this.baseEntityId = baseEntityId;
    this.newEntityId = newEntityId;
  }
}

/**
 * A burst of edits could not be reduced to one revision span.
 */
export class SpanResolutionError extends RuntimeError {
  constructor(reason: string) {
    super('SPAN_RESOLUTION_ERROR', `Cannot resolve revision span: ${reason}`);
    this.name = 'SpanResolutionError';
  }
}

/**
 * Constraint definitions could not be fetched or parsed. Transient.
 */
export class ConstraintFetchError extends RuntimeError {
  readonly propertyIds: Id[];
  readonly cause?: Error;

  constructor(propertyIds: Id[], reason: string, cause?: Error) {
    super('CONSTRAINT_FETCH_ERROR', `Failed to fetch constraints for ${propertyIds.join(', ')}: ${reason}`, true);
    this.name = 'ConstraintFetchError';
    this.propertyIds = propertyIds;
    this.cause = cause;
  }
}

/**
 * A checker threw while evaluating one constraint.
 * Contained by the evaluator and reported as an "error" verdict.
 */
export class CheckerError extends RuntimeError {
  readonly constraintId: Id;
  readonly cause?: Error;

  constructor(constraintId: Id, reason: string, cause?: Error) {
    super('CHECKER_ERROR', `Checker for constraint ${constraintId} failed: ${reason}`);
    this.name = 'CheckerError';
    this.constraintId = constraintId;
    this.cause = cause;
  }
}

/**
 * A revision does not exist or was deleted or suppressed.
 */
export class RevisionNotFoundError extends RuntimeError {
  readonly entityId: Id;
  readonly revisionId: RevisionId | null;

  constructor(entityId: Id, revisionId: RevisionId | null) {
    super(
      'REVISION_NOT_FOUND',
      revisionId === null
        ? `Entity not found: ${entityId}`
        : `Revision not found: ${entityId}@${revisionId}`
    );
    this.name = 'RevisionNotFoundError';
    this.entityId = entityId;
    this.revisionId = revisionId;
  }
}

/**
 * Invalid engine configuration.
 */
export class ConfigurationError extends RuntimeError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
    this.field = field;
  }
}
