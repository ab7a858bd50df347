import { describe, it, expect } from 'vitest';
import type { EntityPayload, EntityRevision } from '@claimwatch/protocol';
import { RevisionWrapper } from './wrapper.js';
import { MalformedEntityError } from '../errors.js';

// --- Test Fixtures ---

function createPayload(): EntityPayload {
  return {
    id: 'Q42',
    labels: { en: 'Douglas Adams' },
    statements: {
      P31: [
        {
          id: 'Q42$a',
          mainsnak: { snaktype: 'value', property: 'P31', datavalue: { type: 'entity', id: 'Q5' } },
          rank: 'normal',
          qualifiers: [],
          references: [],
        },
      ],
      P69: [
        {
          id: 'Q42$b',
          mainsnak: { snaktype: 'value', property: 'P69', datavalue: { type: 'entity', id: 'Q691283' } },
          rank: 'deprecated',
          qualifiers: [],
          references: [],
        },
        {
          id: 'Q42$c',
          mainsnak: { snaktype: 'value', property: 'P69', datavalue: { type: 'entity', id: 'Q4961791' } },
          rank: 'normal',
          qualifiers: [],
          references: [],
        },
        {
          id: 'Q42$d',
          mainsnak: { snaktype: 'somevalue', property: 'P69' },
          rank: 'preferred',
          qualifiers: [],
          references: [],
        },
      ],
      P18: [],
    },
  };
}

// --- Tests ---

describe('RevisionWrapper', () => {
  it('exposes entity and revision ids', () => {
    const wrapper = new RevisionWrapper(createPayload(), 7);

    expect(wrapper.entityId).toBe('Q42');
    expect(wrapper.revisionId).toBe(7);
  });

  it('enumerates properties with statements in payload order', () => {
    const wrapper = new RevisionWrapper(createPayload(), 7);

    expect(wrapper.propertyIds).toEqual(['P31', 'P69']);
  });

  it('returns an empty sequence for an absent property', () => {
    const wrapper = new RevisionWrapper(createPayload(), 7);

    expect(wrapper.statements('P999')).toEqual([]);
    expect(wrapper.hasProperty('P999')).toBe(false);
  });

  it('does not resolve inherited object keys as properties', () => {
    const wrapper = new RevisionWrapper(createPayload(), 7);

    expect(wrapper.statements('constructor')).toEqual([]);
  });

  it('filters deprecated statements from active statements', () => {
    const wrapper = new RevisionWrapper(createPayload(), 7);

    expect(wrapper.activeStatements('P69').map((s) => s.id)).toEqual(['Q42$c', 'Q42$d']);
  });

  it('returns only preferred statements as best when any exist', () => {
    const wrapper = new RevisionWrapper(createPayload(), 7);

    expect(wrapper.bestStatements('P69').map((s) => s.id)).toEqual(['Q42$d']);
    expect(wrapper.bestStatements('P31').map((s) => s.id)).toEqual(['Q42$a']);
  });

  it('finds statements by id', () => {
    const wrapper = new RevisionWrapper(createPayload(), 7);

    expect(wrapper.getStatement('Q42$c')?.rank).toBe('normal');
    expect(wrapper.getStatement('Q42$zzz')).toBeUndefined();
  });

  it('exposes labels and defaults missing descriptions to empty', () => {
    const wrapper = new RevisionWrapper(createPayload(), 7);

    expect(wrapper.labels).toEqual({ en: 'Douglas Adams' });
    expect(wrapper.descriptions).toEqual({});
  });

  it('is not affected by later mutation of the input payload', () => {
    const payload = createPayload();
    const wrapper = new RevisionWrapper(payload, 7);

    payload.statements.P31[0].rank = 'deprecated';
    payload.statements.P31.push({
      id: 'Q42$e',
      mainsnak: { snaktype: 'novalue', property: 'P31' },
      rank: 'normal',
      qualifiers: [],
      references: [],
    });

    expect(wrapper.statements('P31')).toHaveLength(1);
    expect(wrapper.statements('P31')[0].rank).toBe('normal');
  });

  it('shares no statement objects between wrappers of the same payload', () => {
    const payload = createPayload();
    const a = new RevisionWrapper(payload, 7);
    const b = new RevisionWrapper(payload, 8);

    expect(a.statements('P31')[0]).toEqual(b.statements('P31')[0]);
    expect(a.statements('P31')[0]).not.toBe(b.statements('P31')[0]);
  });

  it('freezes its statements', () => {
    const wrapper = new RevisionWrapper(createPayload(), 7);

    expect(Object.isFrozen(wrapper.statements('P31')[0])).toBe(true);
    expect(Object.isFrozen(wrapper.statements('P31')[0].mainsnak)).toBe(true);
  });

  it('returns a mutable detached payload copy', () => {
    const wrapper = new RevisionWrapper(createPayload(), 7);
    const copy = wrapper.toPayload();

    copy.statements.P31 = [];

    expect(wrapper.statements('P31')).toHaveLength(1);
  });

  it('collects qualifier snaks of non-deprecated statements', () => {
    const payload = createPayload();
    const start = { snaktype: 'value', property: 'P580', datavalue: { type: 'time', time: '+1971-00-00T00:00:00Z', precision: 9 } } as const;
    const end = { snaktype: 'novalue', property: 'P582' } as const;
    payload.statements.P69[0].qualifiers = [{ ...start, datavalue: { ...start.datavalue, time: '+1960-00-00T00:00:00Z' } }];
    payload.statements.P69[1].qualifiers = [start, end];

    const wrapper = new RevisionWrapper(payload, 7);

    expect(wrapper.qualifierSnaks('P580')).toEqual([start]);
    expect(wrapper.qualifierPropertyIds()).toEqual(['P580', 'P582']);
    expect(wrapper.qualifierPropertyIds(['P31'])).toEqual([]);
  });

  it('builds from a stored revision', () => {
    const revision: EntityRevision = {
      entityId: 'Q42',
      revisionId: 11,
      parentId: 10,
      user: 'Editor',
      timestamp: '2024-01-01T00:00:00Z',
      tags: [],
      deleted: false,
      trustedUser: true,
      payload: createPayload(),
    };

    const wrapper = RevisionWrapper.fromRevision(revision);

    expect(wrapper.revisionId).toBe(11);
    expect(wrapper.entityId).toBe('Q42');
  });

  describe('malformed payloads', () => {
    it('rejects a statement without an id', () => {
      const payload = {
        id: 'Q42',
        statements: {
          P31: [{ mainsnak: { snaktype: 'value', property: 'P31', datavalue: { type: 'entity', id: 'Q5' } } }],
        },
      };

      expect(() => new RevisionWrapper(payload, 1)).toThrow(MalformedEntityError);
    });

    it('rejects a statement without a property id', () => {
      const payload = {
        id: 'Q42',
        statements: {
          P31: [{ id: 'Q42$a', mainsnak: { snaktype: 'novalue' } }],
        },
      };

      try {
        new RevisionWrapper(payload, 1);
        expect.fail('expected MalformedEntityError');
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedEntityError);
        if (error instanceof MalformedEntityError) {
          expect(error.entityId).toBe('Q42');
          expect(error.code).toBe('MALFORMED_ENTITY');
          expect(error.retryable).toBe(false);
          expect(error.issues.some((i) => i.path === 'statements.P31.0.mainsnak.property')).toBe(true);
        }
      }
    });

    it('reports an unknown entity id when the payload has none', () => {
      try {
        new RevisionWrapper('not an entity', 1);
        expect.fail('expected MalformedEntityError');
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedEntityError);
        if (error instanceof MalformedEntityError) {
          expect(error.entityId).toBeNull();
        }
      }
    });
  });
});
