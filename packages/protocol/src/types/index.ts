// Re-export all protocol types

export * from './common.js';
export * from './values.js';
export * from './statements.js';
export * from './revisions.js';
export * from './constraints.js';
export * from './evaluation.js';
