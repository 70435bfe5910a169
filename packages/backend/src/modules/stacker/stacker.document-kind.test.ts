import { describe, it, expect } from 'vitest';
import { PROPERTY, PROSPECT, kindFor, kindForIndex } from './stacker.document-kind';
import { ValidationError } from '../../shared/errors';

describe('stacker.document-kind', () => {
  it('carries the id field and results key per kind', () => {
    expect(PROPERTY.idField).toBe('property_id');
    expect(PROPERTY.resultsKey).toBe('properties');
    expect(PROSPECT.idField).toBe('prospect_id');
    expect(PROSPECT.resultsKey).toBe('prospects');
  });

  it('kindFor resolves both document types', () => {
    expect(kindFor('property')).toBe(PROPERTY);
    expect(kindFor('prospect')).toBe(PROSPECT);
  });

  it('kindForIndex resolves the test-prefixed index names', () => {
    expect(kindForIndex('test_stacker-property')).toBe(PROPERTY);
    expect(kindForIndex('test_stacker-prospect')).toBe(PROSPECT);
  });

  it('kindForIndex rejects unknown indexes', () => {
    expect(() => kindForIndex('stacker-company')).toThrow(ValidationError);
    expect(() => kindForIndex('stacker-company')).toThrow('Index name does not exist.');
  });

  describe('present', () => {
    it('renames owner_status for prospects', () => {
      expect(PROSPECT.present({ prospect_id: 4, owner_status: 'verified' })).toEqual({
        prospect_id: 4,
        owner_verified_status: 'verified',
      });
    });

    it('keeps owner_status for properties', () => {
      expect(PROPERTY.present({ property_id: 9, owner_status: ['open'] })).toEqual({
        property_id: 9,
        owner_status: ['open'],
      });
    });

    it('does not mutate the indexed document', () => {
      const doc = { prospect_id: 4, owner_status: 'open' };
      PROSPECT.present(doc);
      expect(doc).toEqual({ prospect_id: 4, owner_status: 'open' });
    });
  });
});
