// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Entity, property or statement identifier (e.g. "Q42", "P31", "Q42$5f2c...")
 */
export type Id = string;

/**
 * Revision identifier. Revisions of one entity increase monotonically.
 * Zero stands for "no revision" (the parent of an entity's first revision).
 */
export type RevisionId = number;

/**
 * Language-keyed text map used for labels and descriptions
 */
export type TermMap = Record<string, string>;
