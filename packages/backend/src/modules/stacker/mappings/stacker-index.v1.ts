/**
 * OpenSearch index definition shared by the two stacker indexes (v1).
 *
 * The property index holds one document per property with its prospects'
 * facts aggregated into arrays; the prospect index holds one document per
 * prospect with property-level facts joined in. Both use this mapping.
 *
 * The key order of `STACKER_PROPERTIES` is the canonical field order:
 * projector queries select their columns in exactly this order and rows
 * are zipped against `fields()` by position.
 */

const PROPERTY_INDEX_BASE = 'stacker-property';
const PROSPECT_INDEX_BASE = 'stacker-prospect';

function testPrefix(): string {
  return process.env.NODE_ENV === 'test' ? 'test_' : '';
}

export function getPropertyIndexName(): string {
  return `${testPrefix()}${PROPERTY_INDEX_BASE}`;
}

export function getProspectIndexName(): string {
  return `${testPrefix()}${PROSPECT_INDEX_BASE}`;
}

const rawKeyword = { raw: { type: 'keyword' } } as const;

const statusHistory = {
  type: 'object',
  properties: {
    title: { type: 'text' },
    date_utc: { type: 'date' },
  },
} as const;

export const STACKER_PROPERTIES = {
  company_id:           { type: 'integer' },
  prospect_id:          { type: 'integer' },
  property_id:          { type: 'integer' },
  address_id:           { type: 'integer' },
  name:                 { type: 'text', analyzer: 'name_analyzer', fields: rawKeyword },
  address:              { type: 'text', analyzer: 'index_address_analyzer', search_analyzer: 'search_address_analyzer', fields: rawKeyword },
  city:                 { type: 'keyword', normalizer: 'city_normalizer' },
  state:                { type: 'keyword', ignore_above: 2 },
  zip_code:             { type: 'keyword', ignore_above: 5 },
  last_sold_date:       { type: 'date' },
  tags:                 { type: 'integer' },
  tags_length:          { type: 'integer' },
  distress_indicators:  { type: 'integer' },
  phone_raw:            { type: 'text', analyzer: 'index_phone_analyzer', search_analyzer: 'search_phone_analyzer', fields: rawKeyword },
  lead_stage_id:        { type: 'integer' },
  is_blocked:           { type: 'boolean' },
  do_not_call:          { type: 'boolean' },
  is_priority:          { type: 'boolean' },
  is_qualified_lead:    { type: 'boolean' },
  wrong_number:         { type: 'boolean' },
  opted_out:            { type: 'boolean' },
  owner_status:         { type: 'keyword' },
  is_archived:          { type: 'boolean' },
  last_contact:         { type: 'date' },
  last_contact_inbound: { type: 'date' },
  created_date:         { type: 'date', index: false },
  last_modified:        { type: 'date', index: false },
  campaigns:            { type: 'integer' },
  dm_campaigns:         { type: 'integer' },
  has_reminder:         { type: 'boolean' },
  recently_vacant:      { type: 'boolean' },
  bankruptcy_date:      { type: 'date' },
  judgment_date:        { type: 'date' },
  foreclosure_date:     { type: 'date' },
  lien_date:            { type: 'date' },
  skiptrace_date:       { type: 'date' },
  campaign_id:          { type: 'integer' },
  prospect_status:      statusHistory,
  property_status:      statusHistory,
  first_import_date:    { type: 'date' },
  last_import_date:     { type: 'date' },
} as const;

export type StackerField = keyof typeof STACKER_PROPERTIES;

export function isStackerField(name: string): name is StackerField {
  return Object.prototype.hasOwnProperty.call(STACKER_PROPERTIES, name);
}

const FIELDS: readonly StackerField[] = Object.keys(STACKER_PROPERTIES).filter(isStackerField);

/** Canonical ordered field list used to zip projector rows into documents. */
export function fields(): readonly StackerField[] {
  return FIELDS;
}

/**
 * Settings:
 *  - 2 shards, 0 replicas, shards go search-idle after 10 minutes
 *  - names and addresses use a 4-7 edge n-gram (original token kept);
 *    addresses expand street-type synonyms at index time and drop
 *    street stop words at search time
 *  - phones are reduced to digits and indexed as 4-7 n-grams, searched
 *    as a single keyword token
 *  - city is an exact keyword with a lowercase normalizer
 *
 * The synonym and stop word files are resolved on the cluster nodes,
 * relative to the OpenSearch config directory.
 */
export const STACKER_INDEX_V1 = {
  settings: {
    index: {
      number_of_shards: 2,
      number_of_replicas: 0,
      search: { idle: { after: '600s' } },
      max_ngram_diff: 3,
    },
    analysis: {
      char_filter: {
        digits_only: { type: 'pattern_replace', pattern: '[^\\d]' },
      },
      filter: {
        street_synonyms: {
          type: 'synonym',
          lenient: true,
          synonyms_path: 'synonyms/street_synonyms.txt',
        },
        '4_7_egram': {
          type: 'edge_ngram',
          min_gram: 4,
          max_gram: 7,
          preserve_original: true,
        },
        street_search_filter: {
          type: 'stop',
          ignore_case: true,
          stopwords_path: 'stop/stop_words.txt',
        },
      },
      normalizer: {
        city_normalizer: { type: 'custom', char_filter: [], filter: ['lowercase'] },
      },
      tokenizer: {
        phone_number_tokenizer: {
          type: 'ngram',
          min_gram: '4',
          max_gram: '7',
          token_chars: ['digit'],
        },
      },
      analyzer: {
        index_phone_analyzer: {
          type: 'custom',
          char_filter: ['digits_only'],
          tokenizer: 'phone_number_tokenizer',
          filter: ['trim'],
        },
        search_phone_analyzer: {
          type: 'custom',
          char_filter: ['digits_only'],
          tokenizer: 'keyword',
          filter: ['trim'],
        },
        name_analyzer: {
          type: 'custom',
          tokenizer: 'standard',
          filter: ['trim', 'lowercase', '4_7_egram'],
        },
        index_address_analyzer: {
          type: 'custom',
          tokenizer: 'standard',
          filter: ['trim', 'lowercase', 'street_synonyms', '4_7_egram'],
        },
        search_address_analyzer: {
          type: 'custom',
          tokenizer: 'standard',
          filter: ['trim', 'lowercase', 'street_search_filter', '4_7_egram'],
        },
      },
    },
  },
  mappings: {
    properties: STACKER_PROPERTIES,
  },
} as const;
