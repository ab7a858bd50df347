// @claimwatch/protocol
// Shared data model for statement constraint monitoring

export * from './types/index.js';
export * from './vocabulary.js';

export {
  dataValueSchema,
  snakSchema,
  statementSchema,
  entityPayloadSchema,
  validateEntityPayload,
  type EntityValidationIssue,
  type EntityValidationResult,
} from './validation/entities.js';

export {
  parseNdjson,
  stringifyNdjson,
  NdjsonParseError,
} from './bundle/ndjson.js';
