// @claimwatch/runtime
// Constraint evaluation engine: snapshots, diffing, constraint resolution,
// checkers, evaluation and the monitoring loop.

export * from './errors.js';
export * from './logger.js';
export * from './config.js';
export * from './revisions/index.js';
export * from './constraints/index.js';
export * from './evaluation/index.js';
export {
  createEngine,
  createEngineFromEnv,
  DEFAULT_ENGINE_CONFIG,
  type Engine,
  type EngineOptions,
  type EvaluateByIdOptions,
} from './engine.js';
export {
  processChanges,
  isFailedOutcome,
  type ProcessChangesOptions,
  type ProcessChangesResult,
  type SpanOutcome,
} from './loop.js';
