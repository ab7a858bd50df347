import { pgTable, text, jsonb, index, primaryKey } from 'drizzle-orm/pg-core';
import type { Rank, Snak } from '@claimwatch/protocol';

/**
 * Constraint statements declared on properties.
 *
 * The main value of each statement names the constraint type; parameters
 * are kept as the statement's ordered qualifier snaks.
 */
export const constraintStatements = pgTable(
  'constraint_statements',
  {
    id: text('id').primaryKey(),
    propertyId: text('property_id').notNull(),
    typeId: text('type_id').notNull(),
    rank: text('rank').$type<Rank>().notNull().default('normal'),
    qualifiers: jsonb('qualifiers').$type<Snak[]>().notNull().default([]),
  },
  (table) => [index('constraint_statements_property_idx').on(table.propertyId)]
);

/**
 * Direct subclass edges of the class hierarchy
 */
export const subclassEdges = pgTable(
  'subclass_edges',
  {
    childId: text('child_id').notNull(),
    parentId: text('parent_id').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.childId, table.parentId] }),
    index('subclass_edges_child_idx').on(table.childId),
  ]
);
