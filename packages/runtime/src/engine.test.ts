import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import type { EntityRevision, Statement } from '@claimwatch/protocol';
import {
  createInMemoryRepositoryContext,
  loadFixtureBundle,
  type InMemoryRepositoryContext,
} from '@claimwatch/repositories';
import { createEngine, createEngineFromEnv, DEFAULT_ENGINE_CONFIG } from './engine.js';
import { RevisionNotFoundError, ConfigurationError } from './errors.js';
import { createCapturingLogger, silentLogger } from './logger.js';

// --- Test Fixtures ---

const BASIC_BUNDLE = fileURLToPath(
  new URL('../../repositories/src/fixtures/__fixtures__/basic', import.meta.url)
);

function population(amount: string): Statement {
  return {
    id: 'Q1$pop',
    mainsnak: { snaktype: 'value', property: 'P1082', datavalue: { type: 'quantity', amount, unit: '1' } },
    rank: 'normal',
    qualifiers: [],
    references: [],
  };
}

function sibling(id: string, target: string): Statement {
  return {
    id,
    mainsnak: { snaktype: 'value', property: 'P3373', datavalue: { type: 'entity', id: target } },
    rank: 'normal',
    qualifiers: [],
    references: [],
  };
}

function createRevision(revisionId: number, parentId: number, statements: Record<string, Statement[]>): EntityRevision {
  return {
    entityId: 'Q1',
    revisionId,
    parentId,
    user: 'editor-1',
    timestamp: '2024-01-01T00:00:00Z',
    tags: [],
    deleted: false,
    trustedUser: true,
    payload: { id: 'Q1', statements },
  };
}

function seed(repos: InMemoryRepositoryContext): void {
  repos.addConstraintStatement({
    id: 'P1082$range',
    propertyId: 'P1082',
    typeId: 'Q21510860',
    rank: 'normal',
    qualifiers: [
      { snaktype: 'value', property: 'P2313', datavalue: { type: 'quantity', amount: '0', unit: '1' } },
      { snaktype: 'value', property: 'P2312', datavalue: { type: 'quantity', amount: '100', unit: '1' } },
      { snaktype: 'value', property: 'P2316', datavalue: { type: 'entity', id: 'Q21502408' } },
    ],
  });
  repos.addRevision(createRevision(1, 0, { P1082: [population('+50')] }));
  repos.addRevision(createRevision(2, 1, { P1082: [population('+150')] }));
}

// --- Tests ---

describe('createEngine', () => {
  let repos: InMemoryRepositoryContext;

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
    seed(repos);
  });

  it('evaluates the change between two stored revisions', async () => {
    const engine = createEngine({ repos, logger: silentLogger });

    const report = await engine.evaluateChangeById('Q1', 1, 2);

    expect(report.results.get('P1082$range')).toMatchObject({
      verdict: 'violated',
      baseVerdict: 'satisfied',
      transition: 'newly-violated',
      constraint: { kind: 'quantity_range', status: 'mandatory', params: { min: '0', max: '100' } },
    });
  });

  it('evaluates the creation of an entity against no base', async () => {
    const engine = createEngine({ repos, logger: silentLogger });

    const report = await engine.evaluateSpan({ entityId: 'Q1', baseRevisionId: null, newRevisionId: 1 });

    expect(report.baseRevisionId).toBeNull();
    expect(report.results.get('P1082$range')?.transition).toBe('unchanged-satisfied');
  });

  it('evaluates the latest revision without a base', async () => {
    const engine = createEngine({ repos, logger: silentLogger });

    const report = await engine.evaluateLatest('Q1');

    expect(report.newRevisionId).toBe(2);
    expect(report.changes).toBeNull();
    expect(report.results.get('P1082$range')?.transition).toBe('unchanged-violated');
  });

  it('skips changes already undone by the latest revision on request', async () => {
    repos.addRevision(createRevision(3, 2, { P1082: [population('+50')] }));
    const engine = createEngine({ repos, logger: silentLogger });

    const reverted = await engine.evaluateChangeById('Q1', 1, 2, { skipReverted: true });
    const kept = await engine.evaluateSpan({ entityId: 'Q1', baseRevisionId: 1, newRevisionId: 2 });

    expect(reverted.changes?.touched).toEqual(['P1082']);
    expect(reverted.results.size).toBe(0);
    expect(kept.results.get('P1082$range')?.transition).toBe('newly-violated');
  });

  it('raises RevisionNotFoundError for unreadable revisions', async () => {
    const engine = createEngine({ repos, logger: silentLogger });

    await expect(engine.evaluateChangeById('Q1', 1, 9)).rejects.toThrow(RevisionNotFoundError);
    await expect(engine.evaluateLatest('Q404')).rejects.toThrow('Entity not found: Q404');
  });

  it('reuses fetched constraints until they expire', async () => {
    const select = vi.spyOn(repos.query, 'select');
    let now = 0;
    const engine = createEngine({ repos, logger: silentLogger, config: { constraintCacheTtlMs: 1000 }, now: () => now });

    await engine.evaluateChangeById('Q1', 1, 2);
    await engine.evaluateChangeById('Q1', 1, 2);
    expect(select).toHaveBeenCalledTimes(1);

    now = 1000;
    await engine.evaluateChangeById('Q1', 1, 2);
    expect(select).toHaveBeenCalledTimes(2);
  });

  it('sees a symmetric statement added after the reference data expires', async () => {
    repos.addConstraintStatement({
      id: 'P3373$symmetric',
      propertyId: 'P3373',
      typeId: 'Q21510862',
      rank: 'normal',
      qualifiers: [],
    });
    repos.addRevision(createRevision(3, 2, { P1082: [population('+50')], P3373: [sibling('Q1$sib', 'Q2')] }));
    repos.addRevision({ ...createRevision(1, 0, {}), entityId: 'Q2', payload: { id: 'Q2', statements: {} } });
    let now = 0;
    const engine = createEngine({
      repos,
      logger: silentLogger,
      config: { referenceCacheTtlMs: 1000 },
      now: () => now,
    });

    expect((await engine.evaluateChangeById('Q1', 2, 3)).results.get('P3373$symmetric')?.verdict).toBe('violated');

    repos.addRevision({
      ...createRevision(2, 1, {}),
      entityId: 'Q2',
      payload: { id: 'Q2', statements: { P3373: [sibling('Q2$sib', 'Q1')] } },
    });
    now = 500;
    expect((await engine.evaluateChangeById('Q1', 2, 3)).results.get('P3373$symmetric')?.verdict).toBe('violated');

    now = 1000;
    expect((await engine.evaluateChangeById('Q1', 2, 3)).results.get('P3373$symmetric')?.verdict).toBe('satisfied');
  });

  it('merges partial configuration over the defaults', () => {
    const engine = createEngine({ repos, logger: silentLogger, config: { spanWindowMs: 60_000 } });

    expect(engine.config).toEqual({ ...DEFAULT_ENGINE_CONFIG, spanWindowMs: 60_000 });
  });

  it('logs through the given logger', async () => {
    const logger = createCapturingLogger();
    const engine = createEngine({ repos, logger });

    await engine.evaluateChangeById('Q1', 1, 2);

    expect(logger.entries.map((e) => e.message)).toEqual(['Fetched constraint definitions', 'Evaluated change']);
  });

  it('evaluates a fixture bundle', async () => {
    const { repos: bundle } = await loadFixtureBundle(BASIC_BUNDLE);
    const engine = createEngine({ repos: bundle, logger: silentLogger });

    const report = await engine.evaluateChangeById('Q100', 1, 2);

    expect(report.changes?.touched).toEqual(['P1082']);
    expect(report.results.get('P1082$range')).toMatchObject({
      verdict: 'satisfied',
      baseVerdict: 'inapplicable',
      transition: 'unchanged-satisfied',
      constraint: { params: { min: '0', max: null } },
    });
  });
});

describe('createEngineFromEnv', () => {
  it('uses in-memory collaborators without DATABASE_URL', async () => {
    const { engine, close } = createEngineFromEnv({ SPAN_WINDOW_MS: '30000' }, { logger: silentLogger });

    expect(engine.config.spanWindowMs).toBe(30_000);
    expect(engine.config.databaseUrl).toBeUndefined();
    await expect(engine.evaluateLatest('Q1')).rejects.toThrow(RevisionNotFoundError);
    await close();
  });

  it('rejects invalid configuration', () => {
    expect(() => createEngineFromEnv({ LOG_LEVEL: 'verbose' }, { logger: silentLogger })).toThrow(ConfigurationError);
  });
});
