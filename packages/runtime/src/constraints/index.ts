export {
  ConstraintsStore,
  DEFAULT_CONSTRAINT_TTL_MS,
  type ConstraintsStoreOptions,
} from './store.js';
export { parseConstraintRows, type ParsedConstraints, type SkippedConstraint } from './parse.js';
export {
  QueryReferenceLookup,
  DEFAULT_REFERENCE_CACHE_SIZE,
  type ReferenceLookup,
  type LinkedStatement,
} from './reference.js';
export { LruCache } from './lru.js';
export { CheckerRegistry, createCheckerRegistry } from './registry.js';
export {
  builtinCheckers,
  defineValueChecker,
  defineStatementChecker,
  defineEntityChecker,
  isApplicable,
  supportsScope,
  type ConstraintChecker,
  type CheckOptions,
} from './checkers/index.js';
