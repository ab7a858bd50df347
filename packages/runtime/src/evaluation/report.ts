// Evaluation report helpers

import type { ConstraintStatus, EvaluationResult } from '@claimwatch/protocol';
import type { EvaluationReport } from './evaluator.js';

/**
 * Weight of a newly introduced violation by constraint status
 */
export const STATUS_WEIGHTS: Readonly<Record<ConstraintStatus, number>> = {
  mandatory: 4,
  regular: 2,
  suggestion: 0,
};

/**
 * Constraints the change started to violate
 */
export function getNewlyViolated(report: EvaluationReport): EvaluationResult[] {
  return Array.from(report.results.values()).filter((r) => r.transition === 'newly-violated');
}

/**
 * Constraints the change stopped violating
 */
export function getResolved(report: EvaluationReport): EvaluationResult[] {
  return Array.from(report.results.values()).filter((r) => r.transition === 'newly-satisfied');
}

/**
 * Constraints whose checker failed on either side
 */
export function getFailed(report: EvaluationReport): EvaluationResult[] {
  return Array.from(report.results.values()).filter((r) => r.verdict === 'error' || r.baseVerdict === 'error');
}

/**
 * Score a change: each new violation adds its status weight, each resolved
 * violation subtracts one. Positive scores mean the change made things worse.
 */
export function scoreEvaluation(report: EvaluationReport): number {
  let score = 0;
  for (const result of report.results.values()) {
    if (result.transition === 'newly-violated') {
      score += STATUS_WEIGHTS[result.constraint.status];
    } else if (result.transition === 'newly-satisfied') {
      score -= 1;
    }
  }
  return score;
}

/**
 * Count results by verdict
 */
export function summarizeReport(report: EvaluationReport): Record<EvaluationResult['verdict'], number> {
  const counts = { satisfied: 0, violated: 0, inapplicable: 0, error: 0 };
  for (const result of report.results.values()) {
    counts[result.verdict]++;
  }
  return counts;
}
