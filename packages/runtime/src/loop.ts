// Monitoring loop - reads the revision stream and evaluates each logical edit
//
// One call reads one page: stream entries → bursts → revision spans → evaluation.

import type { ChangeEntry, RevisionSpan } from '@claimwatch/protocol';
import { RevisionNotFoundError, RuntimeError } from './errors.js';
import type { Engine } from './engine.js';
import type { EvaluationReport } from './evaluation/evaluator.js';
import { getNewlyViolated, scoreEvaluation } from './evaluation/report.js';
import { groupBursts, spanRevisions, spanFromHistory } from './revisions/span.js';

/**
 * Options for processing one page of the stream
 */
export type ProcessChangesOptions = {
  /**
   * Resume after this cursor (null = from the beginning)
   */
  cursor: string | null;

  /**
   * Maximum number of stream entries to read (default: 100)
   */
  limit?: number;

  /**
   * Only tags with this prefix group edits into bursts
   */
  tagPrefix?: string;

  /**
   * Extend single edits through the entity history (default: false)
   */
  extendFromHistory?: boolean;

  /**
   * Skip changes the latest revision has already undone (default: false)
   */
  skipReverted?: boolean;
};

export type SpanOutcome =
  | {
      status: 'evaluated';
      span: RevisionSpan;
      report: EvaluationReport;
      score: number;
    }
  | {
      /**
       * A revision disappeared (reverted or suppressed); do not retry
       */
      status: 'skipped';
      span: RevisionSpan;
      reason: string;
    }
  | {
      status: 'failed';
      entries: ChangeEntry[];
      error: Error;
      retryable: boolean;
    };

export type ProcessChangesResult = {
  outcomes: SpanOutcome[];

  /**
   * Cursor to pass to the next call
   */
  nextCursor: string | null;

  entriesRead: number;
  totalDurationMs: number;
};

/**
 * Process one page of the revision stream.
 *
 * Each burst is resolved and evaluated independently; a failing burst is
 * reported in its outcome and does not stop the others.
 *
 * @example
 * ```typescript
 * let cursor: string | null = null;
 * const { outcomes, nextCursor } = await processChanges(engine, { cursor, limit: 50 });
 * cursor = nextCursor;
 * ```
 */
export async function processChanges(
  engine: Engine,
  options: ProcessChangesOptions
): Promise<ProcessChangesResult> {
  const startTime = Date.now();
  const { cursor, limit = 100, tagPrefix, extendFromHistory = false, skipReverted = false } = options;
  const { logger } = engine;

  const page = await engine.repos.changes.read(cursor, limit);
  const outcomes: SpanOutcome[] = [];

  for (const burst of groupBursts(page.entries, tagPrefix)) {
    outcomes.push(await processBurst(engine, burst, { extendFromHistory, skipReverted }));
  }

  for (const outcome of outcomes) {
    if (outcome.status === 'evaluated') {
      const newlyViolated = getNewlyViolated(outcome.report);
      if (newlyViolated.length > 0) {
        logger.info('Edit introduced constraint violations', {
          entityId: outcome.span.entityId,
          baseRevisionId: outcome.span.baseRevisionId,
          newRevisionId: outcome.span.newRevisionId,
          constraints: newlyViolated.map((r) => r.constraint.id),
          score: outcome.score,
        });
      }
    } else if (outcome.status === 'failed') {
      logger.error('Failed to evaluate edit', {
        entries: outcome.entries.map((e) => `${e.entityId}@${e.newRevisionId}`),
        error: outcome.error.message,
        retryable: outcome.retryable,
      });
    }
  }

  return {
    outcomes,
    nextCursor: page.nextCursor,
    entriesRead: page.entries.length,
    totalDurationMs: Date.now() - startTime,
  };
}

async function processBurst(
  engine: Engine,
  burst: ChangeEntry[],
  { extendFromHistory, skipReverted }: { extendFromHistory: boolean; skipReverted: boolean }
): Promise<SpanOutcome> {
  let span: RevisionSpan | undefined;

  try {
    const [first] = burst;
    if (extendFromHistory && burst.length === 1 && first) {
      const history = await engine.repos.revisions.listHistory(first.entityId);
      span = spanFromHistory(history, first, { windowMs: engine.config.spanWindowMs });
    } else {
      span = spanRevisions(burst);
    }

    const report = await engine.evaluateSpan(span, { skipReverted });
    return { status: 'evaluated', span, report, score: scoreEvaluation(report) };
  } catch (error) {
    if (error instanceof RevisionNotFoundError && span) {
      engine.logger.debug('Skipping edit with unreadable revision', { ...span, reason: error.message });
      return { status: 'skipped', span, reason: error.message };
    }

    return {
      status: 'failed',
      entries: burst,
      error: error instanceof Error ? error : new Error(String(error)),
      retryable: error instanceof RuntimeError && error.retryable,
    };
  }
}

/**
 * Check if an outcome is a failure.
 */
export function isFailedOutcome(outcome: SpanOutcome): outcome is Extract<SpanOutcome, { status: 'failed' }> {
  return outcome.status === 'failed';
}
