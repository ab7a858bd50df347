export {
  ConstraintEvaluator,
  classifyTransition,
  resultKey,
  type ConstraintSource,
  type EvaluateChangeOptions,
  type ConstraintEvaluatorDeps,
  type EvaluationReport,
} from './evaluator.js';
export {
  STATUS_WEIGHTS,
  getNewlyViolated,
  getResolved,
  getFailed,
  scoreEvaluation,
  summarizeReport,
} from './report.js';
