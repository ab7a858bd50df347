// Engine configuration from environment variables

import { z } from 'zod';
import { IMPLICIT_CONSTRAINT_KINDS, type ImplicitConstraintKind } from '@claimwatch/protocol';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import { DEFAULT_CONSTRAINT_TTL_MS } from './constraints/store.js';
import { DEFAULT_REFERENCE_CACHE_SIZE, DEFAULT_REFERENCE_TTL_MS } from './constraints/reference.js';
import { DEFAULT_SPAN_WINDOW_MS } from './revisions/span.js';

export type EngineConfig = {
  /**
   * Postgres connection string. In-memory collaborators are used when absent.
   */
  databaseUrl?: string;

  databaseMaxConnections: number;
  constraintCacheTtlMs: number;
  referenceCacheSize: number;
  referenceCacheTtlMs: number;
  spanWindowMs: number;
  logLevel: LogLevel;

  /**
   * Constraints checked on every property without being declared
   */
  implicitConstraints: ImplicitConstraintKind[];
};

const logLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === 'string' && LOG_LEVELS.some((level) => level === value),
  { message: `must be one of ${LOG_LEVELS.join(', ')}` }
);

const implicitSchema = z
  .string()
  .optional()
  .transform((value) => (value ?? '').split(',').map((kind) => kind.trim()).filter((kind) => kind !== ''))
  .pipe(z.array(z.enum(IMPLICIT_CONSTRAINT_KINDS)));

const envSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  CONSTRAINT_CACHE_TTL_MS: z.coerce.number().int().positive().default(DEFAULT_CONSTRAINT_TTL_MS),
  REFERENCE_CACHE_SIZE: z.coerce.number().int().positive().default(DEFAULT_REFERENCE_CACHE_SIZE),
  REFERENCE_CACHE_TTL_MS: z.coerce.number().int().positive().default(DEFAULT_REFERENCE_TTL_MS),
  SPAN_WINDOW_MS: z.coerce.number().int().nonnegative().default(DEFAULT_SPAN_WINDOW_MS),
  LOG_LEVEL: logLevelSchema.default('info'),
  IMPLICIT_CONSTRAINTS: implicitSchema,
});

/**
 * Read engine configuration from environment variables.
 * Empty strings count as unset.
 *
 * @throws ConfigurationError naming the first invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const result = envSchema.safeParse(present);

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? String(issue.path[0]) : undefined;
    throw new ConfigurationError(
      issue ? `Invalid ${field}: ${issue.message}` : 'Invalid configuration',
      field
    );
  }

  const parsed = result.data;
  return {
    databaseUrl: parsed.DATABASE_URL,
    databaseMaxConnections: parsed.DATABASE_MAX_CONNECTIONS,
    constraintCacheTtlMs: parsed.CONSTRAINT_CACHE_TTL_MS,
    referenceCacheSize: parsed.REFERENCE_CACHE_SIZE,
    referenceCacheTtlMs: parsed.REFERENCE_CACHE_TTL_MS,
    spanWindowMs: parsed.SPAN_WINDOW_MS,
    logLevel: parsed.LOG_LEVEL,
    implicitConstraints: parsed.IMPLICIT_CONSTRAINTS,
  };
}
