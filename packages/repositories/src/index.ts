// @claimwatch/repositories
// Collaborator interfaces and implementations for substrate-independent data access.
//
// This package defines the "contract" for the data sources the constraint
// engine reads from: entity revisions, the change stream and the query service.
// The actual implementations (Postgres, in-memory, fixture bundles) fulfill these
// contracts, allowing the runtime to work with any backend.

export * from './interfaces/index.js';
export * from './records.js';
export * from './in-memory/index.js';
export * from './fixtures/index.js';
export * as postgres from './postgres/index.js';
