// Graph vocabulary used to declare constraints on properties
//
// Constraint definitions are ordinary statements on property entities:
// the main value names the constraint type, qualifiers carry parameters.

import type { ClassRelation, ConstraintKind, ConstraintScope, ConstraintStatus } from './types/constraints.js';

/**
 * Properties that carry constraint definitions and their parameters
 */
export const ConstraintProperty = {
  CONSTRAINT: 'P2302',
  EXCEPTION: 'P2303',
  ITEM: 'P2305',
  PROPERTY: 'P2306',
  CLASS: 'P2308',
  RELATION: 'P2309',
  MIN_DATE: 'P2310',
  MAX_DATE: 'P2311',
  MAX_VALUE: 'P2312',
  MIN_VALUE: 'P2313',
  STATUS: 'P2316',
  LANGUAGE: 'P424',
  FORMAT: 'P1793',
  CONSTRAINT_SCOPE: 'P4680',
  PROPERTY_SCOPE: 'P5314',
  INSTANCE_OF: 'P31',
  SUBCLASS_OF: 'P279',
} as const;

/**
 * Constraint type items mapped to the kind that checks them.
 * Range constraints (Q21510860) resolve to quantity_range or time_range
 * depending on which qualifiers are present.
 */
export const CONSTRAINT_TYPE_KINDS: Readonly<Record<string, ConstraintKind>> = {
  Q21510859: 'one_of',
  Q52558054: 'none_of',
  Q21502404: 'format',
  Q21510860: 'quantity_range',
  Q52848401: 'integer',
  Q51723761: 'no_bounds',
  Q21514353: 'units',
  Q19474404: 'single_value',
  Q21510851: 'qualifiers',
  Q21510856: 'required_qualifiers',
  Q21503247: 'item_requires',
  Q21502838: 'conflicts_with',
  Q21503250: 'subject_type',
  Q21510865: 'value_type',
  Q21510864: 'value_requires',
  Q21510862: 'symmetric',
  Q21510855: 'inverse',
  Q53869507: 'property_scope',
  Q108139345: 'label_in_language',
  Q111204896: 'description_in_language',
  Q21510854: 'difference_within_range',
};

export const RANGE_CONSTRAINT_TYPE = 'Q21510860';

export const RELATION_ITEMS: Readonly<Record<string, ClassRelation>> = {
  Q21503252: 'instance',
  Q21514624: 'subclass',
  Q30208840: 'instance_or_subclass',
};

export const STATUS_ITEMS: Readonly<Record<string, ConstraintStatus>> = {
  Q21502408: 'mandatory',
  Q62026391: 'suggestion',
};

/**
 * Values of the constraint scope qualifier (where the constraint is checked)
 */
export const CONSTRAINT_SCOPE_ITEMS: Readonly<Record<string, ConstraintScope>> = {
  Q46466787: 'main',
  Q46466783: 'qualifier',
  Q46466805: 'reference',
};

/**
 * Values of the property scope constraint (where the property may be used)
 */
export const PROPERTY_SCOPE_ITEMS: Readonly<Record<string, ConstraintScope>> = {
  Q54828448: 'main',
  Q54828449: 'qualifier',
  Q54828450: 'reference',
};

/**
 * Units a difference range can be stated in
 */
export const DIFFERENCE_UNITS = {
  YEAR: 'Q577',
  DAY: 'Q573',
  SECOND: 'Q11574',
} as const;

export const ALL_SCOPES: readonly ConstraintScope[] = ['main', 'qualifier', 'reference'];
