import type { ConstraintKind } from '@claimwatch/protocol';
import type { ConstraintChecker } from './types.js';
import {
  oneOfChecker,
  noneOfChecker,
  formatChecker,
  quantityRangeChecker,
  timeRangeChecker,
  integerChecker,
  noBoundsChecker,
  unitsChecker,
  differenceWithinRangeChecker,
} from './value-checkers.js';
import { qualifiersChecker, requiredQualifiersChecker, propertyScopeChecker } from './statement-checkers.js';
import {
  singleValueChecker,
  itemRequiresChecker,
  conflictsWithChecker,
  subjectTypeChecker,
  labelInLanguageChecker,
  descriptionInLanguageChecker,
} from './entity-checkers.js';
import { valueTypeChecker, valueRequiresChecker, symmetricChecker, inverseChecker } from './linked-checkers.js';
import { noSelfLinkChecker, valueExistsChecker, largeChangeChecker } from './implicit-checkers.js';

export {
  type ConstraintChecker,
  type CheckOptions,
  defineValueChecker,
  defineStatementChecker,
  defineEntityChecker,
  isApplicable,
  supportsScope,
} from './types.js';

/**
 * Built-in checkers for every known constraint kind.
 * "unsupported" has no checker by construction.
 */
export const builtinCheckers: Readonly<Record<Exclude<ConstraintKind, 'unsupported'>, ConstraintChecker>> = {
  one_of: oneOfChecker,
  none_of: noneOfChecker,
  format: formatChecker,
  quantity_range: quantityRangeChecker,
  time_range: timeRangeChecker,
  integer: integerChecker,
  no_bounds: noBoundsChecker,
  units: unitsChecker,
  single_value: singleValueChecker,
  qualifiers: qualifiersChecker,
  required_qualifiers: requiredQualifiersChecker,
  item_requires: itemRequiresChecker,
  conflicts_with: conflictsWithChecker,
  subject_type: subjectTypeChecker,
  value_type: valueTypeChecker,
  value_requires: valueRequiresChecker,
  symmetric: symmetricChecker,
  inverse: inverseChecker,
  property_scope: propertyScopeChecker,
  label_in_language: labelInLanguageChecker,
  description_in_language: descriptionInLanguageChecker,
  difference_within_range: differenceWithinRangeChecker,
  no_self_link: noSelfLinkChecker,
  value_exists: valueExistsChecker,
  large_change: largeChangeChecker,
};
