// Statement types - property/value assertions on an entity

import type { Id, TermMap } from './common.js';
import type { DataValue } from './values.js';

/**
 * Snak types. "somevalue" and "novalue" are the unknown-value and
 * no-value sentinels.
 */
export type SnakType = 'value' | 'somevalue' | 'novalue';

/**
 * A property/value pair. Main values, qualifiers and reference parts are all snaks.
 */
export type Snak =
  | { snaktype: 'value'; property: Id; datavalue: DataValue }
  | { snaktype: 'somevalue' | 'novalue'; property: Id };

/**
 * Statement rank. Deprecated statements are not considered current truth.
 */
export type Rank = 'preferred' | 'normal' | 'deprecated';

/**
 * Provenance block attached to a statement
 */
export type Reference = {
  hash?: string;
  snaks: Snak[];
};

/**
 * A Statement asserts one value for one property of an entity.
 * Its id is stable across edits that do not touch it.
 */
export type Statement = {
  id: Id;
  mainsnak: Snak;
  rank: Rank;

  /**
   * Ordered qualifiers; the same property may appear several times
   */
  qualifiers: Snak[];

  references: Reference[];
};

/**
 * Raw entity content as returned by the entity-read collaborator
 */
export type EntityPayload = {
  id: Id;
  labels?: TermMap;
  descriptions?: TermMap;

  /**
   * Statements grouped by property id
   */
  statements: Record<Id, Statement[]>;
};
