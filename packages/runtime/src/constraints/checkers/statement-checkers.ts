// Checkers over statement shape: qualifiers and usage scope

import { defineStatementChecker, defineValueChecker } from './types.js';

export const qualifiersChecker = defineStatementChecker('qualifiers', (statement, constraint) => {
  return statement.qualifiers.some((q) => !constraint.params.allowed.includes(q.property));
});

export const requiredQualifiersChecker = defineStatementChecker('required_qualifiers', (statement, constraint) => {
  return constraint.params.required.some(
    (propertyId) => !statement.qualifiers.some((q) => q.property === propertyId)
  );
});

/**
 * Fails whenever the property is used in a scope it is not allowed in.
 * References are not checked.
 */
export const propertyScopeChecker = defineValueChecker('property_scope', (_snak, constraint, { scope }) => {
  return !constraint.params.allowed.includes(scope);
});
