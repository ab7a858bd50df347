// Stored record shapes and their row projections
//
// Constraint statements and subclass edges are the reference data served by
// the query service. Both the in-memory and the Postgres implementations
// project them into the same tabular rows.

import { z } from 'zod';
import {
  entityPayloadSchema,
  snakSchema,
  type Id,
  type Rank,
  type Snak,
  type EntityPayload,
  type EntityRevision,
} from '@claimwatch/protocol';
import type { TabularRow } from './interfaces/index.js';

/**
 * A constraint statement declared on a property
 */
export type ConstraintStatementRecord = {
  /**
   * Statement id of the constraint on the property entity
   */
  id: Id;
  propertyId: Id;

  /**
   * Constraint type item (main value of the statement)
   */
  typeId: Id;

  rank: Rank;
  qualifiers: Snak[];
};

/**
 * Direct subclass edge between two classes
 */
export type SubclassEdge = {
  child: Id;
  parent: Id;
};

export const constraintStatementRecordSchema: z.ZodType<ConstraintStatementRecord, z.ZodTypeDef, unknown> =
  z.object({
    id: z.string().min(1),
    propertyId: z.string().min(1),
    typeId: z.string().min(1),
    rank: z.enum(['preferred', 'normal', 'deprecated']).default('normal'),
    qualifiers: z.array(snakSchema).default([]),
  });

export const subclassEdgeSchema: z.ZodType<SubclassEdge, z.ZodTypeDef, unknown> = z.object({
  child: z.string().min(1),
  parent: z.string().min(1),
});

export const entityRevisionSchema: z.ZodType<EntityRevision, z.ZodTypeDef, unknown> = z.object({
  entityId: z.string().min(1),
  revisionId: z.number().int().positive(),
  parentId: z.number().int().nonnegative(),
  user: z.string(),
  timestamp: z.string(),
  tags: z.array(z.string()).default([]),
  deleted: z.boolean().default(false),
  trustedUser: z.boolean().default(false),
  payload: entityPayloadSchema,
});

/**
 * Project constraint statements into `constraint_statements` rows
 */
export function constraintStatementRows(records: ConstraintStatementRecord[]): TabularRow[] {
  const rows: TabularRow[] = [];

  for (const record of records) {
    const base = {
      constraint_id: record.id,
      property_id: record.propertyId,
      constraint_type: record.typeId,
      rank: record.rank,
    };

    if (record.qualifiers.length === 0) {
      rows.push({
        ...base,
        qualifier_index: null,
        qualifier_property: null,
        qualifier_snaktype: null,
        qualifier_value: null,
      });
      continue;
    }

    record.qualifiers.forEach((qualifier, index) => {
      rows.push({
        ...base,
        qualifier_index: index,
        qualifier_property: qualifier.property,
        qualifier_snaktype: qualifier.snaktype,
        qualifier_value: qualifier.snaktype === 'value' ? JSON.stringify(qualifier.datavalue) : null,
      });
    });
  }

  return rows;
}

/**
 * Project the main snaks of an entity into `entity_statements` rows
 */
export function entityStatementRows(payload: EntityPayload, propertyIds?: Id[]): TabularRow[] {
  const rows: TabularRow[] = [];
  const wanted = propertyIds ? new Set(propertyIds) : null;

  for (const [propertyId, statements] of Object.entries(payload.statements)) {
    if (wanted && !wanted.has(propertyId)) continue;

    for (const statement of statements) {
      rows.push({
        entity_id: payload.id,
        statement_id: statement.id,
        property_id: propertyId,
        rank: statement.rank,
        snaktype: statement.mainsnak.snaktype,
        value:
          statement.mainsnak.snaktype === 'value' ? JSON.stringify(statement.mainsnak.datavalue) : null,
      });
    }
  }

  if (rows.length === 0) {
    rows.push({
      entity_id: payload.id,
      statement_id: null,
      property_id: null,
      rank: null,
      snaktype: null,
      value: null,
    });
  }

  return rows;
}

/**
 * Compute (base, super) pairs of the transitive subclass closure
 */
export function superclassRows(edges: SubclassEdge[], classIds: Id[]): TabularRow[] {
  const parents = new Map<Id, Id[]>();
  for (const edge of edges) {
    const list = parents.get(edge.child) ?? [];
    list.push(edge.parent);
    parents.set(edge.child, list);
  }

  const rows: TabularRow[] = [];
  for (const base of new Set(classIds)) {
    const seen = new Set<Id>();
    const queue = [...(parents.get(base) ?? [])];

    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      rows.push({ base, super: next });
      queue.push(...(parents.get(next) ?? []));
    }
  }

  return rows;
}
