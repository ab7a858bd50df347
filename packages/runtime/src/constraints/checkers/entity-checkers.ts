// Checkers over the entity as a whole

import { defineEntityChecker } from './types.js';
import { inValues, entityTargets, relationProperties, reachesClass } from './values.js';

/**
 * At most one statement may hold the best rank
 */
export const singleValueChecker = defineEntityChecker('single_value', (entity, constraint) => {
  return entity.bestStatements(constraint.propertyId).length <= 1;
});

export const itemRequiresChecker = defineEntityChecker('item_requires', (entity, constraint) => {
  const { property, values } = constraint.params;
  const statements = entity.activeStatements(property);
  if (statements.length === 0) return false;
  if (values === null) return true;
  return statements.some((s) => inValues(s.mainsnak, values) === true);
});

export const conflictsWithChecker = defineEntityChecker('conflicts_with', (entity, constraint) => {
  const { property, values } = constraint.params;
  const statements = entity.activeStatements(property);
  if (statements.length === 0) return true;
  if (values === null) return false;
  return !statements.some((s) => inValues(s.mainsnak, values) === true);
});

export const subjectTypeChecker = defineEntityChecker('subject_type', (entity, constraint, lookup) => {
  const { classes, relation } = constraint.params;
  return reachesClass(entityTargets(entity, relationProperties(relation)), classes, lookup);
});

export const labelInLanguageChecker = defineEntityChecker('label_in_language', (entity, constraint) => {
  return constraint.params.languages.some((language) => Object.hasOwn(entity.labels, language));
});

export const descriptionInLanguageChecker = defineEntityChecker('description_in_language', (entity, constraint) => {
  return constraint.params.languages.some((language) => Object.hasOwn(entity.descriptions, language));
});
