// Fixture bundles - seed an in-memory context from NDJSON files
//
// A fixture bundle is a directory with up to three files:
//   revisions.ndjson    one EntityRevision per line
//   constraints.ndjson  one ConstraintStatementRecord per line
//   subclasses.ndjson   one SubclassEdge per line
// Missing files are treated as empty.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parseNdjson } from '@claimwatch/protocol';
import {
  createInMemoryRepositoryContext,
  type InMemoryRepositoryContext,
} from '../in-memory/index.js';
import {
  entityRevisionSchema,
  constraintStatementRecordSchema,
  subclassEdgeSchema,
} from '../records.js';

export const FIXTURE_FILES = {
  revisions: 'revisions.ndjson',
  constraints: 'constraints.ndjson',
  subclasses: 'subclasses.ndjson',
} as const;

/**
 * Abstraction for reading fixture files.
 * Allows tests to serve bundles from memory.
 */
export interface FixtureReader {
  /**
   * Read a file as text, or null when it does not exist
   */
  readFile(filePath: string): Promise<string | null>;
}

/**
 * Create a FixtureReader that reads from the local filesystem.
 */
export function createFilesystemReader(): FixtureReader {
  return {
    async readFile(filePath: string): Promise<string | null> {
      try {
        return await fs.readFile(filePath, 'utf-8');
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
          return null;
        }
        throw error;
      }
    },
  };
}

/**
 * Summary of a loaded fixture bundle
 */
export type FixtureSummary = {
  bundlePath: string;
  revisionCount: number;
  constraintCount: number;
  subclassEdgeCount: number;
};

/**
 * Load a fixture bundle into a fresh in-memory context.
 *
 * @throws NdjsonParseError if a line is not valid JSON or does not match its record schema
 */
export async function loadFixtureBundle(
  bundlePath: string,
  reader: FixtureReader = createFilesystemReader()
): Promise<{ repos: InMemoryRepositoryContext; summary: FixtureSummary }> {
  const repos = createInMemoryRepositoryContext();

  const read = async (file: string) => (await reader.readFile(path.join(bundlePath, file))) ?? '';

  const revisions = parseNdjson(await read(FIXTURE_FILES.revisions), entityRevisionSchema);
  const constraints = parseNdjson(await read(FIXTURE_FILES.constraints), constraintStatementRecordSchema);
  const edges = parseNdjson(await read(FIXTURE_FILES.subclasses), subclassEdgeSchema);

  revisions.forEach((revision) => repos.addRevision(revision));
  constraints.forEach((record) => repos.addConstraintStatement(record));
  edges.forEach((edge) => repos.addSubclassEdge(edge));

  return {
    repos,
    summary: {
      bundlePath,
      revisionCount: revisions.length,
      constraintCount: constraints.length,
      subclassEdgeCount: edges.length,
    },
  };
}
