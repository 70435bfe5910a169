import { describe, it, expect, afterEach } from 'vitest';
import {
  STACKER_INDEX_V1,
  fields,
  isStackerField,
  getPropertyIndexName,
  getProspectIndexName,
} from './stacker-index.v1';

describe('stacker-index.v1', () => {
  const originalNodeEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalNodeEnv;
  });

  describe('index names', () => {
    it('prefixes both indexes with test_ under NODE_ENV=test', () => {
      process.env.NODE_ENV = 'test';
      expect(getPropertyIndexName()).toBe('test_stacker-property');
      expect(getProspectIndexName()).toBe('test_stacker-prospect');
    });

    it('uses bare names outside tests', () => {
      process.env.NODE_ENV = 'production';
      expect(getPropertyIndexName()).toBe('stacker-property');
      expect(getProspectIndexName()).toBe('stacker-prospect');
    });
  });

  describe('fields', () => {
    it('lists the mapping properties in declaration order', () => {
      expect(fields()).toEqual([
        'company_id', 'prospect_id', 'property_id', 'address_id',
        'name', 'address', 'city', 'state', 'zip_code',
        'last_sold_date', 'tags', 'tags_length', 'distress_indicators',
        'phone_raw', 'lead_stage_id',
        'is_blocked', 'do_not_call', 'is_priority', 'is_qualified_lead', 'wrong_number', 'opted_out',
        'owner_status', 'is_archived',
        'last_contact', 'last_contact_inbound', 'created_date', 'last_modified',
        'campaigns', 'dm_campaigns', 'has_reminder', 'recently_vacant',
        'bankruptcy_date', 'judgment_date', 'foreclosure_date', 'lien_date', 'skiptrace_date',
        'campaign_id', 'prospect_status', 'property_status',
        'first_import_date', 'last_import_date',
      ]);
    });

    it('matches the mapping keys exactly', () => {
      expect([...fields()].sort()).toEqual(Object.keys(STACKER_INDEX_V1.mappings.properties).sort());
    });

    it('isStackerField rejects unknown and inherited names', () => {
      expect(isStackerField('tags_length')).toBe(true);
      expect(isStackerField('owner_verified_status')).toBe(false);
      expect(isStackerField('toString')).toBe(false);
    });
  });

  describe('settings', () => {
    it('uses 2 shards, 0 replicas, a 10 minute idle and ngram diff 3', () => {
      expect(STACKER_INDEX_V1.settings.index).toEqual({
        number_of_shards: 2,
        number_of_replicas: 0,
        search: { idle: { after: '600s' } },
        max_ngram_diff: 3,
      });
    });

    it('indexes phones as digit n-grams and searches them as one keyword', () => {
      const { analyzer, tokenizer, char_filter } = STACKER_INDEX_V1.settings.analysis;
      expect(char_filter.digits_only.pattern).toBe('[^\\d]');
      expect(tokenizer.phone_number_tokenizer).toMatchObject({ type: 'ngram', min_gram: '4', max_gram: '7' });
      expect(analyzer.index_phone_analyzer.tokenizer).toBe('phone_number_tokenizer');
      expect(analyzer.search_phone_analyzer.tokenizer).toBe('keyword');
    });

    it('applies street synonyms only when indexing addresses', () => {
      const { analyzer } = STACKER_INDEX_V1.settings.analysis;
      expect(analyzer.index_address_analyzer.filter).toContain('street_synonyms');
      expect(analyzer.search_address_analyzer.filter).not.toContain('street_synonyms');
      expect(analyzer.search_address_analyzer.filter).toContain('street_search_filter');
    });
  });

  describe('mapping', () => {
    it('gives the fuzzy text fields an exact raw keyword', () => {
      const props = STACKER_INDEX_V1.mappings.properties;
      for (const field of ['name', 'address', 'phone_raw'] as const) {
        expect(props[field].fields.raw.type).toBe('keyword');
      }
    });

    it('does not index created_date and last_modified', () => {
      const props = STACKER_INDEX_V1.mappings.properties;
      expect(props.created_date.index).toBe(false);
      expect(props.last_modified.index).toBe(false);
    });

    it('caps state and zip lengths', () => {
      const props = STACKER_INDEX_V1.mappings.properties;
      expect(props.state.ignore_above).toBe(2);
      expect(props.zip_code.ignore_above).toBe(5);
    });
  });
});
