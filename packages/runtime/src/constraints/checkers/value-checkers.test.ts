import { describe, it, expect, vi, afterEach } from 'vitest';
import type {
  ConstraintBase,
  ConstraintKind,
  ConstraintOfKind,
  ConstraintParamsMap,
  DataValue,
  Snak,
  Statement,
} from '@claimwatch/protocol';
import { RevisionWrapper } from '../../revisions/wrapper.js';
import type { ReferenceLookup } from '../reference.js';
import {
  oneOfChecker,
  noneOfChecker,
  formatChecker,
  quantityRangeChecker,
  timeRangeChecker,
  integerChecker,
  noBoundsChecker,
  unitsChecker,
  differenceWithinRangeChecker,
} from './value-checkers.js';

// --- Test Fixtures ---

let sequence = 0;

function valueSnak(datavalue: DataValue, property = 'P1'): Snak {
  return { snaktype: 'value', property, datavalue };
}

function createStatement(mainsnak: Snak, overrides: Partial<Statement> = {}): Statement {
  sequence += 1;
  return {
    id: `Q42$${sequence}`,
    mainsnak,
    rank: 'normal',
    qualifiers: [],
    references: [],
    ...overrides,
  };
}

function createEntity(statements: Statement[]): RevisionWrapper {
  const grouped: Record<string, Statement[]> = {};
  for (const statement of statements) {
    const list = grouped[statement.mainsnak.property] ?? [];
    list.push(statement);
    grouped[statement.mainsnak.property] = list;
  }
  return new RevisionWrapper({ id: 'Q42', statements: grouped }, 100);
}

function createConstraint<K extends ConstraintKind>(
  kind: K,
  params: ConstraintParamsMap[K],
  overrides: Partial<ConstraintBase> = {}
): ConstraintOfKind<K> {
  return {
    id: 'P1$constraint',
    propertyId: 'P1',
    typeId: 'Q21510859',
    status: 'regular',
    scopes: ['main', 'qualifier', 'reference'],
    exceptions: [],
    ...overrides,
    kind,
    params,
  };
}

const lookup: ReferenceLookup = {
  async superclassesOf(classIds) {
    return new Map<string, Set<string>>(classIds.map((id) => [id, new Set<string>()]));
  },
  async statementsOf() {
    return null;
  },
};

const item = (id: string): Snak => valueSnak({ type: 'entity', id });
const text = (value: string): Snak => valueSnak({ type: 'string', value });
const quantity = (amount: string, extra: { unit?: string; lowerBound?: string; upperBound?: string } = {}): Snak =>
  valueSnak({ type: 'quantity', amount, ...extra, unit: extra.unit ?? '1' });
const time = (value: string, precision: number): Snak => valueSnak({ type: 'time', time: value, precision });

// --- Tests ---

describe('oneOfChecker', () => {
  const constraint = createConstraint('one_of', { values: ['Q1', 'novalue'] });

  it('accepts listed values and sentinels', async () => {
    expect(await oneOfChecker(createEntity([createStatement(item('Q1'))]), constraint, lookup)).toBe('satisfied');
    expect(
      await oneOfChecker(createEntity([createStatement({ snaktype: 'novalue', property: 'P1' })]), constraint, lookup)
    ).toBe('satisfied');
  });

  it('rejects values outside the list', async () => {
    const entity = createEntity([createStatement(item('Q1')), createStatement(item('Q2'))]);
    expect(await oneOfChecker(entity, constraint, lookup)).toBe('violated');
  });

  it('rejects an unlisted sentinel', async () => {
    const entity = createEntity([createStatement({ snaktype: 'somevalue', property: 'P1' })]);
    expect(await oneOfChecker(entity, constraint, lookup)).toBe('violated');
  });

  it('ignores values a list cannot name', async () => {
    expect(await oneOfChecker(createEntity([createStatement(text('Q2'))]), constraint, lookup)).toBe('satisfied');
  });

  it('ignores deprecated statements', async () => {
    const entity = createEntity([
      createStatement(item('Q1')),
      createStatement(item('Q2'), { rank: 'deprecated' }),
    ]);
    expect(await oneOfChecker(entity, constraint, lookup)).toBe('satisfied');
  });

  it('is inapplicable when the property has no current statements', async () => {
    const absent = createEntity([createStatement(valueSnak({ type: 'entity', id: 'Q2' }, 'P2'))]);
    const deprecatedOnly = createEntity([createStatement(item('Q2'), { rank: 'deprecated' })]);

    expect(await oneOfChecker(absent, constraint, lookup)).toBe('inapplicable');
    expect(await oneOfChecker(deprecatedOnly, constraint, lookup)).toBe('inapplicable');
  });

  it('is inapplicable for exempt entities', async () => {
    const exempt = createConstraint('one_of', { values: ['Q1'] }, { exceptions: ['Q42'] });
    expect(await oneOfChecker(createEntity([createStatement(item('Q2'))]), exempt, lookup)).toBe('inapplicable');
  });

  it('is inapplicable when main values are out of scope', async () => {
    const scoped = createConstraint('one_of', { values: ['Q1'] }, { scopes: ['qualifier'] });
    expect(await oneOfChecker(createEntity([createStatement(item('Q2'))]), scoped, lookup)).toBe('inapplicable');
  });

  it('checks qualifier values in the qualifier scope', async () => {
    const entity = createEntity([
      createStatement(valueSnak({ type: 'entity', id: 'Q7' }, 'P2'), { qualifiers: [item('Q1'), item('Q2')] }),
    ]);

    expect(await oneOfChecker(entity, constraint, lookup, { scope: 'qualifier' })).toBe('violated');
    expect(await oneOfChecker(entity, constraint, lookup)).toBe('inapplicable');
  });

  it('is inapplicable for qualifiers when the qualifier scope is excluded', async () => {
    const mainOnly = createConstraint('one_of', { values: ['Q1'] }, { scopes: ['main'] });
    const entity = createEntity([
      createStatement(valueSnak({ type: 'entity', id: 'Q7' }, 'P2'), { qualifiers: [item('Q2')] }),
    ]);

    expect(await oneOfChecker(entity, mainOnly, lookup, { scope: 'qualifier' })).toBe('inapplicable');
  });

  it('refuses a constraint of another kind', async () => {
    const other = createConstraint('none_of', { values: ['Q1'] });
    await expect(oneOfChecker(createEntity([createStatement(item('Q1'))]), other, lookup)).rejects.toThrow(
      'Checker for one_of received a none_of constraint'
    );
  });
});

describe('noneOfChecker', () => {
  const constraint = createConstraint('none_of', { values: ['Q1', 'somevalue'] });

  it('rejects listed values and sentinels', async () => {
    expect(await noneOfChecker(createEntity([createStatement(item('Q1'))]), constraint, lookup)).toBe('violated');
    expect(
      await noneOfChecker(createEntity([createStatement({ snaktype: 'somevalue', property: 'P1' })]), constraint, lookup)
    ).toBe('violated');
  });

  it('accepts other values', async () => {
    expect(await noneOfChecker(createEntity([createStatement(item('Q2'))]), constraint, lookup)).toBe('satisfied');
  });
});

describe('formatChecker', () => {
  const constraint = createConstraint('format', { pattern: '[A-Z]{2}\\d+' });

  it('matches the whole string', async () => {
    expect(await formatChecker(createEntity([createStatement(text('AB12'))]), constraint, lookup)).toBe('satisfied');
    expect(await formatChecker(createEntity([createStatement(text('ab12'))]), constraint, lookup)).toBe('violated');
    expect(await formatChecker(createEntity([createStatement(text('XAB12'))]), constraint, lookup)).toBe('violated');
  });

  it('anchors alternations as a whole', async () => {
    const alternation = createConstraint('format', { pattern: 'a|b' });
    expect(await formatChecker(createEntity([createStatement(text('b'))]), alternation, lookup)).toBe('satisfied');
    expect(await formatChecker(createEntity([createStatement(text('ab'))]), alternation, lookup)).toBe('violated');
  });

  it('reads patterns with Unicode property classes', async () => {
    const letters = createConstraint('format', { pattern: '\\p{Lu}\\d+' });
    expect(await formatChecker(createEntity([createStatement(text('Ä12'))]), letters, lookup)).toBe('satisfied');
    expect(await formatChecker(createEntity([createStatement(text('ä12'))]), letters, lookup)).toBe('violated');
  });

  it('falls back to the legacy syntax for patterns Unicode mode rejects', async () => {
    const legacy = createConstraint('format', { pattern: '\\_\\d+' });
    expect(await formatChecker(createEntity([createStatement(text('_12'))]), legacy, lookup)).toBe('satisfied');
    expect(await formatChecker(createEntity([createStatement(text('12'))]), legacy, lookup)).toBe('violated');
  });

  it('checks monolingual text', async () => {
    const entity = createEntity([
      createStatement(valueSnak({ type: 'monolingualtext', text: 'AB1', language: 'en' })),
    ]);
    expect(await formatChecker(entity, constraint, lookup)).toBe('satisfied');
  });

  it('skips values without text', async () => {
    expect(await formatChecker(createEntity([createStatement(item('Q1'))]), constraint, lookup)).toBe('satisfied');
  });
});

describe('quantityRangeChecker', () => {
  const constraint = createConstraint('quantity_range', { min: '0', max: '100' });

  it.each([
    ['+50', 'satisfied'],
    ['+0', 'satisfied'],
    ['+100', 'satisfied'],
    ['-1', 'violated'],
    ['+100.5', 'violated'],
    ['+100.0000000000000001', 'violated'],
    ['+100.0000000000000000', 'satisfied'],
    ['-0.0000000000000001', 'violated'],
  ])('checks %s', async (amount, expected) => {
    expect(await quantityRangeChecker(createEntity([createStatement(quantity(amount))]), constraint, lookup)).toBe(
      expected
    );
  });

  it('compares amounts beyond float precision exactly', async () => {
    const large = createConstraint('quantity_range', { min: '12345678901234567890', max: null });
    expect(
      await quantityRangeChecker(createEntity([createStatement(quantity('+12345678901234567891'))]), large, lookup)
    ).toBe('satisfied');
    expect(
      await quantityRangeChecker(createEntity([createStatement(quantity('+12345678901234567889'))]), large, lookup)
    ).toBe('violated');
  });

  it('keeps the fraction of an amount beyond float precision', async () => {
    const lower = createConstraint('quantity_range', { min: '12345678901234567.6', max: null });
    expect(
      await quantityRangeChecker(createEntity([createStatement(quantity('+12345678901234567.5'))]), lower, lookup)
    ).toBe('violated');
  });

  it('treats a null bound as open', async () => {
    const open = createConstraint('quantity_range', { min: null, max: '10' });
    expect(await quantityRangeChecker(createEntity([createStatement(quantity('-1000'))]), open, lookup)).toBe(
      'satisfied'
    );
  });
});

describe('timeRangeChecker', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  const constraint = createConstraint('time_range', {
    min: { type: 'time', time: '+1900-01-01T00:00:00Z', precision: 9 },
    max: { type: 'time', time: '+2000-12-31T00:00:00Z', precision: 11 },
  });

  it('accepts times inside the range', async () => {
    const entity = createEntity([createStatement(time('+1900-06-01T00:00:00Z', 11))]);
    expect(await timeRangeChecker(entity, constraint, lookup)).toBe('satisfied');
  });

  it('rejects times before the lower bound', async () => {
    expect(
      await timeRangeChecker(createEntity([createStatement(time('+1899-12-31T00:00:00Z', 11))]), constraint, lookup)
    ).toBe('violated');
    expect(
      await timeRangeChecker(createEntity([createStatement(time('-0500-01-01T00:00:00Z', 9))]), constraint, lookup)
    ).toBe('violated');
  });

  it('compares at the coarser precision', async () => {
    expect(
      await timeRangeChecker(createEntity([createStatement(time('+2000-06-01T00:00:00Z', 9))]), constraint, lookup)
    ).toBe('satisfied');
    expect(
      await timeRangeChecker(createEntity([createStatement(time('+2001-01-01T00:00:00Z', 9))]), constraint, lookup)
    ).toBe('violated');
  });

  it('resolves "now" at check time', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T12:00:00Z'));
    const untilNow = createConstraint('time_range', { min: null, max: 'now' });

    expect(
      await timeRangeChecker(createEntity([createStatement(time('+2024-05-01T00:00:00Z', 11))]), untilNow, lookup)
    ).toBe('satisfied');
    expect(
      await timeRangeChecker(createEntity([createStatement(time('+2025-01-01T00:00:00Z', 11))]), untilNow, lookup)
    ).toBe('violated');
  });

  it('skips values that are not times', async () => {
    expect(await timeRangeChecker(createEntity([createStatement(quantity('+1'))]), constraint, lookup)).toBe(
      'satisfied'
    );
  });
});

describe('integerChecker', () => {
  const constraint = createConstraint('integer', {});

  it('accepts whole amounts', async () => {
    expect(await integerChecker(createEntity([createStatement(quantity('+3'))]), constraint, lookup)).toBe('satisfied');
    expect(await integerChecker(createEntity([createStatement(quantity('+3.0'))]), constraint, lookup)).toBe(
      'satisfied'
    );
  });

  it('rejects fractional amounts', async () => {
    expect(await integerChecker(createEntity([createStatement(quantity('+3.5'))]), constraint, lookup)).toBe(
      'violated'
    );
  });

  it('reads the fraction from the decimal string', async () => {
    expect(
      await integerChecker(createEntity([createStatement(quantity('+12345678901234567.5'))]), constraint, lookup)
    ).toBe('violated');
    expect(await integerChecker(createEntity([createStatement(quantity('-7.000'))]), constraint, lookup)).toBe(
      'satisfied'
    );
  });
});

describe('noBoundsChecker', () => {
  const constraint = createConstraint('no_bounds', {});

  it('rejects quantities with bounds', async () => {
    const bounded = createEntity([createStatement(quantity('+3', { lowerBound: '+2', upperBound: '+4' }))]);
    expect(await noBoundsChecker(bounded, constraint, lookup)).toBe('violated');
  });

  it('accepts plain quantities', async () => {
    expect(await noBoundsChecker(createEntity([createStatement(quantity('+3'))]), constraint, lookup)).toBe(
      'satisfied'
    );
  });
});

describe('unitsChecker', () => {
  const constraint = createConstraint('units', { units: ['Q11573', 'novalue'] });

  it('accepts listed units given as concept URIs', async () => {
    const entity = createEntity([
      createStatement(quantity('+3', { unit: 'http://www.wikidata.org/entity/Q11573' })),
    ]);
    expect(await unitsChecker(entity, constraint, lookup)).toBe('satisfied');
  });

  it('rejects unlisted units', async () => {
    expect(await unitsChecker(createEntity([createStatement(quantity('+3', { unit: 'Q174728' }))]), constraint, lookup)).toBe(
      'violated'
    );
  });

  it('accepts unitless quantities only when novalue is listed', async () => {
    const unitless = createEntity([createStatement(quantity('+3'))]);
    const strict = createConstraint('units', { units: ['Q11573'] });

    expect(await unitsChecker(unitless, constraint, lookup)).toBe('satisfied');
    expect(await unitsChecker(createEntity([createStatement(quantity('+3'))]), strict, lookup)).toBe('violated');
  });
});

describe('differenceWithinRangeChecker', () => {
  const years = (amount: string) => ({ amount, unit: 'Q577' });
  const days = (amount: string) => ({ amount, unit: 'Q573' });
  const start = (value: string): Statement =>
    createStatement(valueSnak({ type: 'time', time: value, precision: 11 }, 'P2'));
  const lifespan = createConstraint('difference_within_range', { property: 'P2', min: years('0'), max: years('150') });

  it('accepts a time within the range from the other property', async () => {
    const entity = createEntity([createStatement(time('+1950-01-01T00:00:00Z', 11)), start('+1900-06-01T00:00:00Z')]);
    expect(await differenceWithinRangeChecker(entity, lifespan, lookup)).toBe('satisfied');
  });

  it('rejects times below or above the range', async () => {
    const before = createEntity([createStatement(time('+1899-01-01T00:00:00Z', 11)), start('+1900-06-01T00:00:00Z')]);
    const after = createEntity([createStatement(time('+2100-01-01T00:00:00Z', 11)), start('+1900-06-01T00:00:00Z')]);

    expect(await differenceWithinRangeChecker(before, lifespan, lookup)).toBe('violated');
    expect(await differenceWithinRangeChecker(after, lifespan, lookup)).toBe('violated');
  });

  it('counts whole years elapsed', async () => {
    const constraint = createConstraint('difference_within_range', { property: 'P2', min: null, max: years('49') });
    const dayBefore = createEntity([createStatement(time('+1950-05-31T00:00:00Z', 11)), start('+1900-06-01T00:00:00Z')]);
    const anniversary = createEntity([createStatement(time('+1950-06-01T00:00:00Z', 11)), start('+1900-06-01T00:00:00Z')]);

    expect(await differenceWithinRangeChecker(dayBefore, constraint, lookup)).toBe('satisfied');
    expect(await differenceWithinRangeChecker(anniversary, constraint, lookup)).toBe('violated');
  });

  it('measures days', async () => {
    const constraint = createConstraint('difference_within_range', { property: 'P2', min: days('0'), max: days('30') });
    const inside = createEntity([createStatement(time('+2000-01-31T00:00:00Z', 11)), start('+2000-01-01T00:00:00Z')]);
    const outside = createEntity([createStatement(time('+2000-02-01T00:00:00Z', 11)), start('+2000-01-01T00:00:00Z')]);

    expect(await differenceWithinRangeChecker(inside, constraint, lookup)).toBe('satisfied');
    expect(await differenceWithinRangeChecker(outside, constraint, lookup)).toBe('violated');
  });

  it('needs one time of the other property within range', async () => {
    const entity = createEntity([
      createStatement(time('+1950-01-01T00:00:00Z', 11)),
      start('+1700-01-01T00:00:00Z'),
      start('+1900-06-01T00:00:00Z'),
    ]);
    expect(await differenceWithinRangeChecker(entity, lifespan, lookup)).toBe('satisfied');
  });

  it('holds when the other property has no time', async () => {
    const entity = createEntity([createStatement(time('+2500-01-01T00:00:00Z', 11))]);
    expect(await differenceWithinRangeChecker(entity, lifespan, lookup)).toBe('satisfied');
  });
});
