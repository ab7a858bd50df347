// Checkers that read the entities a statement points to

import { ConstraintProperty } from '@claimwatch/protocol';
import { defineStatementChecker, defineValueChecker } from './types.js';
import { inValues, targetOf, linkedTargets, reachesClass } from './values.js';

/**
 * The target must be an instance and/or subclass of one of the classes.
 * A missing target violates the constraint.
 */
export const valueTypeChecker = defineValueChecker('value_type', async (snak, constraint, { lookup }) => {
  const target = targetOf(snak);
  if (!target) return false;

  const linked = await lookup.statementsOf(target);
  if (linked === null) return true;

  const { classes, relation } = constraint.params;
  const starts = relation === 'subclass' ? [] : linkedTargets(linked, [ConstraintProperty.INSTANCE_OF]);
  if (relation !== 'instance') starts.push(target);

  return !(await reachesClass(starts, classes, lookup));
});

export const valueRequiresChecker = defineValueChecker('value_requires', async (snak, constraint, { lookup }) => {
  const target = targetOf(snak);
  if (!target) return false;

  const linked = await lookup.statementsOf(target);
  if (linked === null) return true;

  const { property, values } = constraint.params;
  const required = linked.filter((s) => s.propertyId === property && s.rank !== 'deprecated');
  if (required.length === 0) return true;
  if (values === null) return false;
  return !required.some((s) => inValues(s.mainsnak, values) === true);
});

export const symmetricChecker = defineStatementChecker('symmetric', async (statement, constraint, { entity, lookup }) => {
  const target = targetOf(statement.mainsnak);
  if (!target) return false;

  const linked = await lookup.statementsOf(target);
  if (linked === null) return true;

  return !linked.some((s) => s.propertyId === constraint.propertyId && targetOf(s.mainsnak) === entity.entityId);
});

export const inverseChecker = defineStatementChecker('inverse', async (statement, constraint, { entity, lookup }) => {
  const target = targetOf(statement.mainsnak);
  if (!target) return false;

  const linked = await lookup.statementsOf(target);
  if (linked === null) return true;

  return !linked.some(
    (s) => s.propertyId === constraint.params.property && targetOf(s.mainsnak) === entity.entityId
  );
});
