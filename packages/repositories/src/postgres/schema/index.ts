// Re-export all schema tables
export * from './revisions.js';
export * from './constraints.js';
