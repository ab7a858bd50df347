// Constraint definition parsing
//
// Translates `constraint_statements` query rows into typed definitions.
// Constraint statements live on property entities: the main value names the
// constraint type and the qualifiers carry its parameters.

import { z } from 'zod';
import {
  dataValueSchema,
  ConstraintProperty,
  CONSTRAINT_TYPE_KINDS,
  RANGE_CONSTRAINT_TYPE,
  RELATION_ITEMS,
  STATUS_ITEMS,
  CONSTRAINT_SCOPE_ITEMS,
  PROPERTY_SCOPE_ITEMS,
  ALL_SCOPES,
  UNITLESS,
  type Id,
  type Rank,
  type Snak,
  type ConstraintBase,
  type ConstraintDefinition,
  type ConstraintScope,
  type DifferenceBound,
  type ImplicitConstraintKind,
  type ListedValue,
  type TimeBound,
} from '@claimwatch/protocol';
import type { TabularRow } from '@claimwatch/repositories';
import { compileFormat, unitId } from './checkers/values.js';

const constraintRowSchema = z.object({
  constraint_id: z.string().min(1),
  property_id: z.string().min(1),
  constraint_type: z.string().min(1),
  rank: z.enum(['preferred', 'normal', 'deprecated']),
  qualifier_index: z.coerce.number().int().nonnegative().nullable(),
  qualifier_property: z.string().min(1).nullable(),
  qualifier_snaktype: z.enum(['value', 'somevalue', 'novalue']).nullable(),
  qualifier_value: z.string().nullable(),
});

type ConstraintRow = z.infer<typeof constraintRowSchema>;

/**
 * A constraint statement reassembled from its rows
 */
type ConstraintStatement = {
  id: Id;
  propertyId: Id;
  typeId: Id;
  rank: Rank;
  qualifiers: Snak[];
};

/**
 * A constraint statement that could not be turned into a definition
 */
export type SkippedConstraint = {
  constraintId: Id;
  propertyId: Id;
  typeId: Id;
  reason: string;
};

export type ParsedConstraints = {
  /**
   * Definitions in row order
   */
  definitions: ConstraintDefinition[];

  skipped: SkippedConstraint[];
};

/**
 * Parse `constraint_statements` rows into constraint definitions.
 *
 * Deprecated constraint statements are ignored. Statements whose parameters
 * are unusable are reported in `skipped`. Constraint types without a known
 * kind become `unsupported` definitions.
 *
 * @throws ZodError or SyntaxError if a row is malformed
 */
export function parseConstraintRows(rows: TabularRow[]): ParsedConstraints {
  const statements = groupRows(rows.map((row) => constraintRowSchema.parse(row)));

  const definitions: ConstraintDefinition[] = [];
  const skipped: SkippedConstraint[] = [];

  for (const statement of statements) {
    if (statement.rank === 'deprecated') continue;

    const result = toDefinition(statement);
    if (typeof result === 'string') {
      skipped.push({
        constraintId: statement.id,
        propertyId: statement.propertyId,
        typeId: statement.typeId,
        reason: result,
      });
    } else {
      definitions.push(result);
    }
  }

  return { definitions, skipped };
}

function groupRows(rows: ConstraintRow[]): ConstraintStatement[] {
  const byId = new Map<Id, { statement: ConstraintStatement; indexed: Array<[number, Snak]> }>();

  for (const row of rows) {
    let entry = byId.get(row.constraint_id);
    if (!entry) {
      entry = {
        statement: {
          id: row.constraint_id,
          propertyId: row.property_id,
          typeId: row.constraint_type,
          rank: row.rank,
          qualifiers: [],
        },
        indexed: [],
      };
      byId.set(row.constraint_id, entry);
    }

    const snak = rowQualifier(row);
    if (snak) {
      entry.indexed.push([row.qualifier_index ?? entry.indexed.length, snak]);
    }
  }

  return Array.from(byId.values(), ({ statement, indexed }) => ({
    ...statement,
    qualifiers: indexed.sort((a, b) => a[0] - b[0]).map(([, snak]) => snak),
  }));
}

function rowQualifier(row: ConstraintRow): Snak | null {
  if (row.qualifier_property === null || row.qualifier_snaktype === null) return null;

  if (row.qualifier_snaktype !== 'value') {
    return { snaktype: row.qualifier_snaktype, property: row.qualifier_property };
  }

  if (row.qualifier_value === null) {
    throw new SyntaxError(`qualifier ${row.qualifier_property} of ${row.constraint_id} has no value`);
  }

  return {
    snaktype: 'value',
    property: row.qualifier_property,
    datavalue: dataValueSchema.parse(JSON.parse(row.qualifier_value)),
  };
}

// --- Qualifier readers ---

function lookup<T>(items: Readonly<Record<string, T>>, id: Id): T | undefined {
  return Object.hasOwn(items, id) ? items[id] : undefined;
}

function qualifiersOf(statement: ConstraintStatement, property: Id): Snak[] {
  return statement.qualifiers.filter((q) => q.property === property);
}

/**
 * Entity ids and sentinel snak types, as used by list parameters
 */
function listedValues(statement: ConstraintStatement, property: Id): ListedValue[] {
  const values: ListedValue[] = [];
  for (const snak of qualifiersOf(statement, property)) {
    if (snak.snaktype !== 'value') {
      values.push(snak.snaktype);
    } else if (snak.datavalue.type === 'entity') {
      values.push(snak.datavalue.id);
    }
  }
  return [...new Set(values)];
}

function entityIds(statement: ConstraintStatement, property: Id): Id[] {
  return listedValues(statement, property).filter((v) => v !== 'somevalue' && v !== 'novalue');
}

function stringValues(statement: ConstraintStatement, property: Id): string[] {
  const values: string[] = [];
  for (const snak of qualifiersOf(statement, property)) {
    if (snak.snaktype === 'value' && snak.datavalue.type === 'string') {
      values.push(snak.datavalue.value);
    }
  }
  return values;
}

function quantityBound(snak: Snak): string | null {
  if (snak.snaktype === 'value' && snak.datavalue.type === 'quantity') {
    return snak.datavalue.amount;
  }
  return null;
}

function differenceBound(snak: Snak): DifferenceBound | null {
  if (snak.snaktype === 'value' && snak.datavalue.type === 'quantity') {
    const { amount, unit } = snak.datavalue;
    return { amount, unit: unit === UNITLESS ? null : unitId(unit) };
  }
  return null;
}

function timeBound(snak: Snak): TimeBound | null {
  if (snak.snaktype === 'somevalue') return 'now';
  if (snak.snaktype === 'value' && snak.datavalue.type === 'time') return snak.datavalue;
  return null;
}

function readBase(statement: ConstraintStatement): ConstraintBase {
  let status: ConstraintBase['status'] = 'regular';
  for (const id of entityIds(statement, ConstraintProperty.STATUS)) {
    const mapped = lookup(STATUS_ITEMS, id);
    if (mapped) {
      status = mapped;
      break;
    }
  }

  const scopes = new Set<ConstraintScope>();
  for (const id of entityIds(statement, ConstraintProperty.CONSTRAINT_SCOPE)) {
    const scope = lookup(CONSTRAINT_SCOPE_ITEMS, id);
    if (scope) scopes.add(scope);
  }

  return {
    id: statement.id,
    propertyId: statement.propertyId,
    typeId: statement.typeId,
    status,
    scopes: scopes.size > 0 ? [...scopes] : [...ALL_SCOPES],
    exceptions: entityIds(statement, ConstraintProperty.EXCEPTION),
  };
}

// --- Definitions ---

/**
 * Build a definition, or return the reason the statement is unusable
 */
function toDefinition(statement: ConstraintStatement): ConstraintDefinition | string {
  const base = readBase(statement);
  const kind = lookup(CONSTRAINT_TYPE_KINDS, statement.typeId);

  if (statement.typeId === RANGE_CONSTRAINT_TYPE) {
    return rangeDefinition(base, statement);
  }

  switch (kind) {
    case 'one_of':
    case 'none_of':
    case 'units': {
      const values = listedValues(statement, ConstraintProperty.ITEM);
      if (values.length === 0) return 'no values listed';
      if (kind === 'units') return { ...base, kind, params: { units: values } };
      return { ...base, kind, params: { values } };
    }

    case 'format': {
      const [pattern] = stringValues(statement, ConstraintProperty.FORMAT);
      if (pattern === undefined) return 'no format pattern';
      try {
        compileFormat(pattern);
      } catch (error) {
        return `invalid format pattern: ${error instanceof Error ? error.message : String(error)}`;
      }
      return { ...base, kind, params: { pattern } };
    }

    case 'integer':
    case 'no_bounds':
    case 'single_value':
    case 'symmetric':
      return { ...base, kind, params: {} };

    case 'qualifiers': {
      // "novalue" alone means no qualifiers are allowed
      const values = listedValues(statement, ConstraintProperty.PROPERTY);
      if (values.length === 0) return 'no qualifiers listed';
      return { ...base, kind, params: { allowed: entityIds(statement, ConstraintProperty.PROPERTY) } };
    }

    case 'required_qualifiers': {
      const required = entityIds(statement, ConstraintProperty.PROPERTY);
      if (required.length === 0) return 'no qualifiers listed';
      return { ...base, kind, params: { required } };
    }

    case 'item_requires':
    case 'conflicts_with':
    case 'value_requires': {
      const [property] = entityIds(statement, ConstraintProperty.PROPERTY);
      if (property === undefined) return 'no property given';
      const values =
        qualifiersOf(statement, ConstraintProperty.ITEM).length > 0
          ? listedValues(statement, ConstraintProperty.ITEM)
          : null;
      return { ...base, kind, params: { property, values } };
    }

    case 'subject_type':
    case 'value_type': {
      const classes = entityIds(statement, ConstraintProperty.CLASS);
      if (classes.length === 0) return 'no classes given';
      const relation = entityIds(statement, ConstraintProperty.RELATION)
        .map((id) => lookup(RELATION_ITEMS, id))
        .find((r) => r !== undefined);
      if (relation === undefined) return 'no relation given';
      return { ...base, kind, params: { classes, relation } };
    }

    case 'inverse': {
      const [property] = entityIds(statement, ConstraintProperty.PROPERTY);
      if (property === undefined) return 'no property given';
      return { ...base, kind, params: { property } };
    }

    case 'property_scope': {
      const allowed = new Set<ConstraintScope>();
      for (const id of entityIds(statement, ConstraintProperty.PROPERTY_SCOPE)) {
        const scope = lookup(PROPERTY_SCOPE_ITEMS, id);
        if (scope) allowed.add(scope);
      }
      if (allowed.size === 0) return 'no property scopes given';
      return { ...base, kind, params: { allowed: [...allowed] } };
    }

    case 'label_in_language':
    case 'description_in_language': {
      const languages = stringValues(statement, ConstraintProperty.LANGUAGE);
      if (languages.length === 0) return 'no languages given';
      return { ...base, kind, params: { languages } };
    }

    case 'difference_within_range': {
      const [property] = entityIds(statement, ConstraintProperty.PROPERTY);
      if (property === undefined) return 'no property given';
      const [minValue] = qualifiersOf(statement, ConstraintProperty.MIN_VALUE);
      const [maxValue] = qualifiersOf(statement, ConstraintProperty.MAX_VALUE);
      if (!minValue || !maxValue) return 'range is missing a bound';
      if (minValue.snaktype === 'somevalue' || maxValue.snaktype === 'somevalue') return 'range bound is unknown';
      return { ...base, kind, params: { property, min: differenceBound(minValue), max: differenceBound(maxValue) } };
    }

    case 'quantity_range':
    case 'time_range':
    case 'no_self_link':
    case 'value_exists':
    case 'large_change':
    case 'unsupported':
    case undefined:
      return { ...base, kind: 'unsupported', params: { qualifiers: statement.qualifiers } };
  }
}

/**
 * Range constraints are time ranges when they carry date bounds,
 * quantity ranges otherwise. Both bounds must be stated; "novalue" leaves
 * a side open.
 */
function rangeDefinition(base: ConstraintBase, statement: ConstraintStatement): ConstraintDefinition | string {
  const [minDate] = qualifiersOf(statement, ConstraintProperty.MIN_DATE);
  const [maxDate] = qualifiersOf(statement, ConstraintProperty.MAX_DATE);
  if (minDate || maxDate) {
    if (!minDate || !maxDate) return 'range is missing a date bound';
    return { ...base, kind: 'time_range', params: { min: timeBound(minDate), max: timeBound(maxDate) } };
  }

  const [minValue] = qualifiersOf(statement, ConstraintProperty.MIN_VALUE);
  const [maxValue] = qualifiersOf(statement, ConstraintProperty.MAX_VALUE);
  if (!minValue || !maxValue) return 'range is missing a bound';
  return { ...base, kind: 'quantity_range', params: { min: quantityBound(minValue), max: quantityBound(maxValue) } };
}

/**
 * Definitions that hold on a property without a declaring statement.
 * Large changes are only ever suggestions.
 */
export function implicitDefinitions(propertyId: Id, kinds: readonly ImplicitConstraintKind[]): ConstraintDefinition[] {
  return kinds.map((kind): ConstraintDefinition => {
    const base: ConstraintBase = {
      id: `${propertyId}#${kind}`,
      propertyId,
      typeId: kind,
      status: kind === 'large_change' ? 'suggestion' : 'regular',
      scopes: [...ALL_SCOPES],
      exceptions: [],
    };

    switch (kind) {
      case 'no_self_link':
        return { ...base, kind, params: {} };
      case 'value_exists':
        return { ...base, kind, params: {} };
      case 'large_change':
        return { ...base, kind, params: {} };
    }
  });
}
