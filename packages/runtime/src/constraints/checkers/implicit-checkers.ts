// Checkers for constraints that hold on every property without a declaring statement

import { defineStatementChecker, defineValueChecker } from './types.js';
import { targetOf, quantityAmount, decimalMagnitude } from './values.js';

export const noSelfLinkChecker = defineValueChecker('no_self_link', (snak, _constraint, { entity }) => {
  return targetOf(snak) === entity.entityId;
});

/**
 * A value pointing to an entity that does not exist
 */
export const valueExistsChecker = defineValueChecker('value_exists', async (snak, _constraint, { lookup }) => {
  const target = targetOf(snak);
  return target !== null && (await lookup.statementsOf(target)) === null;
});

/**
 * Compares each quantity with the statement of the same id before the change;
 * violated when the magnitudes differ by more than half an order.
 * Without a previous state, or with zero on either side, nothing is compared.
 */
export const largeChangeChecker = defineStatementChecker('large_change', (statement, _constraint, { previous }) => {
  const before = previous?.getStatement(statement.id);
  if (!before) return false;

  const oldAmount = quantityAmount(before.mainsnak);
  const newAmount = quantityAmount(statement.mainsnak);
  if (oldAmount === null || newAmount === null) return false;

  const oldMagnitude = decimalMagnitude(oldAmount);
  const newMagnitude = decimalMagnitude(newAmount);
  if (oldMagnitude === null || newMagnitude === null) return false;

  return Math.abs(oldMagnitude - newMagnitude) > 0.5;
});
