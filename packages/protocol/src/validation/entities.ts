// Entity payload validation
//
// Schemas for the content returned by the entity-read collaborator.
// Every statement must carry a stable id and a property id.

import { z } from 'zod';
import type { DataValue } from '../types/values.js';
import type { Snak, Statement, Reference, EntityPayload } from '../types/statements.js';

const idSchema = z.string().min(1);

const decimalSchema = z.string().regex(/^[+-]?\d+(\.\d+)?$/, 'must be a decimal string');

export const dataValueSchema: z.ZodType<DataValue, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('entity'), id: idSchema }),
  z.object({
    type: z.literal('quantity'),
    amount: decimalSchema,
    lowerBound: decimalSchema.optional(),
    upperBound: decimalSchema.optional(),
    unit: z.string().min(1).default('1'),
  }),
  z.object({ type: z.literal('string'), value: z.string() }),
  z.object({ type: z.literal('monolingualtext'), text: z.string(), language: z.string().min(1) }),
  z.object({
    type: z.literal('time'),
    time: z.string().regex(/^[+-]\d{1,16}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/, 'must be a signed ISO timestamp'),
    precision: z.number().int().min(0).max(14),
    calendar: idSchema.optional(),
  }),
  z.object({
    type: z.literal('globecoordinate'),
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-360).max(360),
    precision: z.number().positive().optional(),
    globe: idSchema.optional(),
  }),
]);

export const snakSchema: z.ZodType<Snak, z.ZodTypeDef, unknown> = z.discriminatedUnion('snaktype', [
  z.object({ snaktype: z.literal('value'), property: idSchema, datavalue: dataValueSchema }),
  z.object({ snaktype: z.literal('somevalue'), property: idSchema }),
  z.object({ snaktype: z.literal('novalue'), property: idSchema }),
]);

const referenceSchema: z.ZodType<Reference, z.ZodTypeDef, unknown> = z.object({
  hash: z.string().optional(),
  snaks: z.array(snakSchema),
});

export const statementSchema: z.ZodType<Statement, z.ZodTypeDef, unknown> = z.object({
  id: idSchema,
  mainsnak: snakSchema,
  rank: z.enum(['preferred', 'normal', 'deprecated']).default('normal'),
  qualifiers: z.array(snakSchema).default([]),
  references: z.array(referenceSchema).default([]),
});

export const entityPayloadSchema: z.ZodType<EntityPayload, z.ZodTypeDef, unknown> = z.object({
  id: idSchema,
  labels: z.record(z.string()).optional(),
  descriptions: z.record(z.string()).optional(),
  statements: z.record(z.array(statementSchema)).default({}),
});

/**
 * A problem found while validating an entity payload
 */
export type EntityValidationIssue = {
  path: string;
  message: string;
};

export type EntityValidationResult =
  | { valid: true; payload: EntityPayload; issues: [] }
  | { valid: false; issues: EntityValidationIssue[] };

/**
 * Validate raw entity content.
 *
 * Besides the schema, checks that statements are filed under the property
 * of their main snak and that statement ids are unique within the entity.
 */
export function validateEntityPayload(input: unknown): EntityValidationResult {
  const parsed = entityPayloadSchema.safeParse(input);
  if (!parsed.success) {
    return {
      valid: false,
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  const issues: EntityValidationIssue[] = [];
  const seen = new Set<string>();

  for (const [propertyId, statements] of Object.entries(parsed.data.statements)) {
    statements.forEach((statement, index) => {
      const path = `statements.${propertyId}.${index}`;
      if (statement.mainsnak.property !== propertyId) {
        issues.push({
          path: `${path}.mainsnak.property`,
          message: `statement ${statement.id} is filed under ${propertyId} but asserts ${statement.mainsnak.property}`,
        });
      }
      if (seen.has(statement.id)) {
        issues.push({ path: `${path}.id`, message: `duplicate statement id ${statement.id}` });
      }
      seen.add(statement.id);
    });
  }

  if (issues.length > 0) {
    return { valid: false, issues };
  }
  return { valid: true, payload: parsed.data, issues: [] };
}
