// Constraint definitions - rules attached to properties

import type { Id } from './common.js';
import type { SnakType, Snak } from './statements.js';
import type { TimeValue } from './values.js';

/**
 * How strongly a constraint is enforced
 */
export type ConstraintStatus = 'mandatory' | 'regular' | 'suggestion';

/**
 * Where a property may be used: as main value, qualifier or in a reference
 */
export type ConstraintScope = 'main' | 'qualifier' | 'reference';

/**
 * Relation used by type constraints to reach a class
 */
export type ClassRelation = 'instance' | 'subclass' | 'instance_or_subclass';

/**
 * A value allowed or forbidden by a list constraint: an entity id,
 * or a sentinel snak type ("somevalue" / "novalue")
 */
export type ListedValue = Id | Exclude<SnakType, 'value'>;

/**
 * Bound of a time range. "now" is resolved when the check runs.
 */
export type TimeBound = TimeValue | 'now';

/**
 * Bound of a difference range: a decimal amount in a unit
 * (null for a unitless bound)
 */
export type DifferenceBound = {
  amount: string;
  unit: Id | null;
};

/**
 * Constraints the store can add to every property without a declaring statement
 */
export const IMPLICIT_CONSTRAINT_KINDS = ['no_self_link', 'value_exists', 'large_change'] as const;

export type ImplicitConstraintKind = (typeof IMPLICIT_CONSTRAINT_KINDS)[number];

/**
 * Kind-specific parameters for every supported constraint kind
 */
export type ConstraintParamsMap = {
  one_of: { values: ListedValue[] };
  none_of: { values: ListedValue[] };
  format: { pattern: string };
  /**
   * Decimal strings, compared exactly
   */
  quantity_range: { min: string | null; max: string | null };
  time_range: { min: TimeBound | null; max: TimeBound | null };
  integer: Record<string, never>;
  no_bounds: Record<string, never>;
  units: { units: ListedValue[] };
  single_value: Record<string, never>;
  qualifiers: { allowed: Id[] };
  required_qualifiers: { required: Id[] };
  item_requires: { property: Id; values: ListedValue[] | null };
  conflicts_with: { property: Id; values: ListedValue[] | null };
  subject_type: { classes: Id[]; relation: ClassRelation };
  value_type: { classes: Id[]; relation: ClassRelation };
  value_requires: { property: Id; values: ListedValue[] | null };
  symmetric: Record<string, never>;
  inverse: { property: Id };
  property_scope: { allowed: ConstraintScope[] };
  label_in_language: { languages: string[] };
  description_in_language: { languages: string[] };
  difference_within_range: { property: Id; min: DifferenceBound | null; max: DifferenceBound | null };

  no_self_link: Record<string, never>;
  value_exists: Record<string, never>;

  /**
   * Quantity changed by an order of magnitude or more
   */
  large_change: Record<string, never>;

  /**
   * A constraint type this system does not know how to check
   */
  unsupported: { qualifiers: Snak[] };
};

/**
 * Enumerated constraint kinds
 */
export type ConstraintKind = keyof ConstraintParamsMap;

/**
 * Attributes shared by all constraint definitions
 */
export type ConstraintBase = {
  /**
   * Id of the constraint statement on the property
   */
  id: Id;

  /**
   * Property the constraint is declared on
   */
  propertyId: Id;

  /**
   * Item naming the constraint type in the graph. Implicit constraints
   * have no such item and carry their kind instead.
   */
  typeId: Id;

  status: ConstraintStatus;
  scopes: ConstraintScope[];

  /**
   * Entities exempt from the check
   */
  exceptions: Id[];
};

/**
 * A constraint definition of one specific kind
 */
export type ConstraintOfKind<K extends ConstraintKind> = ConstraintBase & {
  kind: K;
  params: ConstraintParamsMap[K];
};

/**
 * Any constraint definition, discriminated by `kind`
 */
export type ConstraintDefinition = {
  [K in ConstraintKind]: ConstraintOfKind<K>;
}[ConstraintKind];

/**
 * Narrow a definition to a specific kind
 */
export function isConstraintOfKind<K extends ConstraintKind>(
  constraint: ConstraintDefinition,
  kind: K
): constraint is ConstraintDefinition & ConstraintOfKind<K> {
  return constraint.kind === kind;
}
