import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockFetchPropertyTagSummaries = vi.fn();

vi.mock('./stacker.repository', () => ({
  fetchPropertyTagSummaries: (...args: unknown[]) => mockFetchPropertyTagSummaries(...args),
}));

vi.mock('../../shared/logger', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import {
  buildPainlessScript,
  buildUpdateForQueryBody,
  createStackerUpdater,
  renderPainlessLiteral,
  toFieldChanges,
} from './stacker.updates';
import { ValidationError } from '../../shared/errors';

const PROPERTY_INDEX = 'test_stacker-property';
const PROSPECT_INDEX = 'test_stacker-prospect';

describe('renderPainlessLiteral', () => {
  it.each([
    ['plain', "'plain'"],
    ["O'Brien", "'O\\'Brien'"],
    ['C:\\temp', "'C:\\\\temp'"],
    ["\\'", "'\\\\\\''"],
  ])('quotes the string %s', (input, expected) => {
    expect(renderPainlessLiteral(input)).toBe(expected);
  });

  it('renders booleans, numbers and null', () => {
    expect(renderPainlessLiteral(true)).toBe('true');
    expect(renderPainlessLiteral(false)).toBe('false');
    expect(renderPainlessLiteral(12)).toBe('12');
    expect(renderPainlessLiteral(-1.5)).toBe('-1.5');
    expect(renderPainlessLiteral(null)).toBe('null');
  });

  it('renders lists', () => {
    expect(renderPainlessLiteral([1, 2, 3])).toBe('[1, 2, 3]');
    expect(renderPainlessLiteral([])).toBe('[]');
    expect(renderPainlessLiteral(['a', null])).toBe("['a', null]");
  });

  it('rejects non-finite numbers', () => {
    expect(() => renderPainlessLiteral(Number.NaN)).toThrow(ValidationError);
    expect(() => renderPainlessLiteral(Number.POSITIVE_INFINITY)).toThrow(ValidationError);
  });
});

describe('buildPainlessScript', () => {
  it('joins assignments with a trailing semicolon', () => {
    const script = buildPainlessScript([
      { field: 'is_archived', op: 'set', value: true },
      { field: 'city', op: 'set', value: 'Austin' },
      { field: 'lead_stage_id', op: 'set', value: 4 },
    ]);

    expect(script).toBe("ctx._source.is_archived=true;ctx._source.city='Austin';ctx._source.lead_stage_id=4;");
  });

  it('is empty for no changes', () => {
    expect(buildPainlessScript([])).toBe('');
  });

  it('keeps a quote inside a value from closing the literal', () => {
    const script = buildPainlessScript([{ field: 'address', op: 'set', value: "1 Main St'; ctx.op='delete" }]);

    expect(script).toBe("ctx._source.address='1 Main St\\'; ctx.op=\\'delete';");
  });
});

describe('toFieldChanges', () => {
  it('converts a record of index fields', () => {
    expect(toFieldChanges({ is_archived: true, zip_code: '78701' })).toEqual([
      { field: 'is_archived', op: 'set', value: true },
      { field: 'zip_code', op: 'set', value: '78701' },
    ]);
  });

  it('rejects unknown fields', () => {
    expect(() => toFieldChanges({ 'is_archived=true;ctx.op': 1 })).toThrow('Unknown index field');
  });

  it('rejects values that have no literal form', () => {
    expect(() => toFieldChanges({ city: { nested: true } })).toThrow(ValidationError);
    expect(() => toFieldChanges({ tags_length: Number.NaN })).toThrow(ValidationError);
  });
});

describe('buildUpdateForQueryBody', () => {
  it('uses term for a single id', () => {
    expect(buildUpdateForQueryBody('address', 7, 'ctx._source.city=null;')).toEqual({
      query: { bool: { must: [{ term: { address_id: 7 } }] } },
      script: { source: 'ctx._source.city=null;', lang: 'painless' },
    });
  });

  it('uses terms for an id list', () => {
    expect(buildUpdateForQueryBody('prospect', [1, 2], '').query).toEqual({
      bool: { must: [{ terms: { prospect_id: [1, 2] } }] },
    });
  });
});

describe('createStackerUpdater', () => {
  const mockUpdateByQuery = vi.fn();
  const updater = createStackerUpdater({ updateByQuery: mockUpdateByQuery });

  beforeEach(() => {
    vi.clearAllMocks();
    mockUpdateByQuery.mockResolvedValue({ total: 1, updated: 1, version_conflicts: 0, failures: [] });
  });

  it('updates the prospect index before the property index', async () => {
    await updater.updatePropertyData(5, [{ field: 'is_archived', op: 'set', value: true }]);

    expect(mockUpdateByQuery.mock.calls.map((c) => c[0])).toEqual([PROSPECT_INDEX, PROPERTY_INDEX]);
    expect(mockUpdateByQuery.mock.calls[0][1]).toEqual({
      query: { bool: { must: [{ term: { property_id: 5 } }] } },
      script: { source: 'ctx._source.is_archived=true;', lang: 'painless' },
    });
  });

  it('skips the update when nothing changed', async () => {
    await updater.updateProspectData([1, 2], []);
    await updater.updateAddressData(3, []);

    expect(mockUpdateByQuery).not.toHaveBeenCalled();
  });

  it('sets tags with their count and distress total together', async () => {
    await updater.updatePropertyTags(9, [3, 4], 1);

    expect(mockUpdateByQuery.mock.calls[1][1].script.source).toBe(
      'ctx._source.tags=[3, 4];ctx._source.tags_length=2;ctx._source.distress_indicators=1;',
    );
  });

  it('pushes relational tag summaries for each property', async () => {
    mockFetchPropertyTagSummaries.mockResolvedValue([
      { propertyId: 1, tagIds: [2, 3], distressCount: 2 },
      { propertyId: 4, tagIds: [], distressCount: 0 },
    ]);

    await updater.prepareTagsForIndexUpdate([1, 4]);

    expect(mockFetchPropertyTagSummaries).toHaveBeenCalledWith([1, 4]);
    expect(mockUpdateByQuery).toHaveBeenCalledTimes(4);
    expect(mockUpdateByQuery.mock.calls[3][1]).toEqual({
      query: { bool: { must: [{ term: { property_id: 4 } }] } },
      script: {
        source: 'ctx._source.tags=[];ctx._source.tags_length=0;ctx._source.distress_indicators=0;',
        lang: 'painless',
      },
    });
  });

  it('propagates an update failure', async () => {
    mockUpdateByQuery.mockRejectedValueOnce(new Error('cluster down'));

    await expect(updater.updateProspectData(1, [{ field: 'opted_out', op: 'set', value: true }])).rejects.toThrow(
      'cluster down',
    );
    expect(mockUpdateByQuery).toHaveBeenCalledTimes(1);
  });
});
