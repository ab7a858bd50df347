export { RevisionWrapper } from './wrapper.js';
export { diff, isTouched, isReverted, sameStatement, getPropertyChanges, summarizeChangeSet } from './differ.js';
export { getRevision, getLatestRevision } from './fetch.js';
export {
  spanRevisions,
  groupBursts,
  spanFromHistory,
  DEFAULT_SPAN_WINDOW_MS,
  type SpanFromHistoryOptions,
} from './span.js';
