// NDJSON (Newline Delimited JSON) helpers
// Used for fixture bundles of revisions, constraint statements and class edges

import type { z } from 'zod';

/**
 * Error raised when a line of an NDJSON document is not valid JSON
 * or does not match the expected schema
 */
export class NdjsonParseError extends Error {
  readonly line: number;

  constructor(line: number, reason: string) {
    super(`Failed to parse NDJSON at line ${line}: ${reason}`);
    this.name = 'NdjsonParseError';
    this.line = line;
  }
}

/**
 * Parse an NDJSON string, validating every line against a schema
 */
export function parseNdjson<T>(content: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  if (!content.trim()) {
    return [];
  }

  const lines = content.split('\n');
  const results: T[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue; // Skip empty lines

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      throw new NdjsonParseError(i + 1, error instanceof Error ? error.message : 'Unknown error');
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new NdjsonParseError(i + 1, `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    }
    results.push(parsed.data);
  }

  return results;
}

/**
 * Stringify an array of objects to NDJSON format
 */
export function stringifyNdjson<T>(items: T[]): string {
  return items.map((item) => JSON.stringify(item)).join('\n') + (items.length > 0 ? '\n' : '');
}
