import type { Id } from '@claimwatch/protocol';

/**
 * Declarative queries understood by the query service.
 *
 * - `constraint_statements`: one row per constraint statement qualifier
 *   (a statement without qualifiers yields a single row with null qualifier columns)
 * - `superclasses`: transitive subclass closure, one row per (base, super) pair
 * - `entity_statements`: main snaks of the current revision of each entity;
 *   an existing entity without matching statements yields one row with null
 *   statement columns, a missing entity yields no rows
 */
export type TabularQuery =
  | { select: 'constraint_statements'; propertyIds: Id[] }
  | { select: 'superclasses'; classIds: Id[] }
  | { select: 'entity_statements'; entityIds: Id[]; propertyIds?: Id[] };

/**
 * Column sets returned for each query
 */
export const QUERY_COLUMNS = {
  constraint_statements: [
    'constraint_id',
    'property_id',
    'constraint_type',
    'rank',
    'qualifier_index',
    'qualifier_property',
    'qualifier_snaktype',
    'qualifier_value',
  ],
  superclasses: ['base', 'super'],
  entity_statements: ['entity_id', 'statement_id', 'property_id', 'rank', 'snaktype', 'value'],
} as const satisfies Record<TabularQuery['select'], readonly string[]>;

/**
 * A cell value. Structured values (data values) are JSON-encoded strings.
 */
export type Cell = string | number | null;

export type TabularRow = Record<string, Cell>;

export type TabularResult = {
  columns: readonly string[];
  rows: TabularRow[];
};

/**
 * The query-service collaborator.
 *
 * Accepts a declarative query and returns tabular results. Implementations
 * throw on transport failures; callers translate failures into their own errors.
 */
export interface QueryService {
  select(query: TabularQuery): Promise<TabularResult>;
}
