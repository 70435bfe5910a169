import { ValidationError } from '../../shared/errors';
import type { DocumentType } from './stacker.document-kind';

// ---------------------------------------------------------------------------
// Query DSL types
// ---------------------------------------------------------------------------

export type JsonPrimitive = string | number | boolean | null;
export type Json = JsonPrimitive | Json[] | { [key: string]: Json };
export type JsonObject = { [key: string]: Json };
export type Clause = JsonObject;

export interface BoolClauses {
  must: Clause[];
  must_not: Clause[];
  should: Clause[];
}

export interface BoolQuery extends BoolClauses {
  filter: Clause[];
  minimum_should_match?: number;
}

export interface SearchBody {
  query: { bool: BoolQuery };
  _source?: string;
  aggs?: JsonObject;
  sort?: Clause[];
  search_after?: Json[];
}

// ---------------------------------------------------------------------------
// Request types
// ---------------------------------------------------------------------------

export type TagOption = 'any' | 'all';
export type TagCriteria = 'tagBefore' | 'tagBetween' | 'tagAfter';

export interface TagFilterInput<T extends string | number = string | number> {
  option: TagOption;
  include?: T[];
  exclude?: T[];
  criteria?: TagCriteria | '' | null;
  date_from?: string | null;
  date_to?: string | null;
}

export const PROSPECT_STATUSES = [
  'isBlocked',
  'doNotCall',
  'isPriority',
  'isQualifiedLead',
  'wrongNumber',
] as const;

export type ProspectStatus = (typeof PROSPECT_STATUSES)[number];

export interface DateRange {
  gte?: string | null;
  lte?: string | null;
}

export const QUERY_FIELDS = ['name', 'address', 'city', 'phone'] as const;
export type QueryField = (typeof QUERY_FIELDS)[number];
export type SearchQueries = Partial<Record<QueryField, string | null>>;

/**
 * Filters accepted by the compiler. Keys not listed here are generic
 * document fields and compile to `term` (scalar) or `terms` (list).
 */
export interface StackerFilters {
  property_tags?: TagFilterInput<number> | null;
  prospect_status?: TagFilterInput<ProspectStatus> | null;
  skip_traced?: boolean | null;
  in_campaign?: boolean | null;
  in_dm_campaign?: boolean | null;
  lead_stage_id?: number[] | null;
  zip_code?: string | null;
  is_reminder?: boolean | null;
  last_sold_date?: DateRange | null;
  inbound_date?: DateRange | null;
  outbound_date?: DateRange | null;
  skiptrace_date?: DateRange | null;
  first_import_date?: DateRange | null;
  last_import_date?: DateRange | null;
  [field: string]: unknown;
}

export const SORT_FIELDS = [
  'tags',
  'campaigns',
  'last_contact',
  'created_date',
  'last_modified',
  '_score',
] as const;

export type SortField = (typeof SORT_FIELDS)[number];
export type SortOrder = 'asc' | 'desc';

export interface SortRequest {
  field: SortField;
  order: SortOrder;
}

export interface BuildSearchBodyOptions {
  queries?: SearchQueries | null;
  filters?: StackerFilters | null;
  idFieldName?: string;
  aggregates?: JsonObject;
  exclude?: number[];
  source?: string;
}

// ---------------------------------------------------------------------------
// Static maps
// ---------------------------------------------------------------------------

type QueryMapEntry =
  | { type: 'multi_match'; fields: string[] }
  | { type: 'term' };

export const QUERY_MAP: Record<QueryField, QueryMapEntry> = {
  name: { type: 'multi_match', fields: ['name', 'name.raw^6'] },
  address: { type: 'multi_match', fields: ['address', 'address.raw^6'] },
  city: { type: 'term' },
  phone: { type: 'multi_match', fields: ['phone_raw', 'phone_raw.raw^6'] },
};

export const PROSPECT_STATUS_QUERY_MAP: Record<ProspectStatus, JsonObject> = {
  isBlocked: { 'prospect_status.title': 'is_blocked' },
  doNotCall: { 'prospect_status.title': 'Added to DNC' },
  isPriority: { 'prospect_status.title': 'Added as Priority' },
  isQualifiedLead: { 'prospect_status.title': 'Qualified Lead Added' },
  wrongNumber: { 'prospect_status.title': 'Added Wrong Number' },
};

// Filter key -> indexed date field, in clause order.
const DATE_FILTERS = [
  ['inbound_date', 'last_contact_inbound'],
  ['outbound_date', 'last_contact'],
  ['last_sold_date', 'last_sold_date'],
  ['skiptrace_date', 'skiptrace_date'],
  ['last_import_date', 'last_import_date'],
  ['first_import_date', 'first_import_date'],
] as const;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isJson(value: unknown): value is Json {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJson);
      return Object.values(value).every(isJson);
    default:
      return false;
  }
}

function isEmpty(value: object | null | undefined): boolean {
  return value === null || value === undefined || Object.keys(value).length === 0;
}

function dateBounds(range: DateRange): JsonObject {
  const bounds: JsonObject = {};
  if (range.gte !== undefined && range.gte !== null) bounds.gte = range.gte;
  if (range.lte !== undefined && range.lte !== null) bounds.lte = range.lte;
  return bounds;
}

function mergeInto(target: BoolClauses, source: BoolClauses): void {
  target.must.push(...source.must);
  target.must_not.push(...source.must_not);
  target.should.push(...source.should);
}

// ---------------------------------------------------------------------------
// Clause builders
// ---------------------------------------------------------------------------

/**
 * Range clause for a tag/status assignment date. `tagBefore` bounds by
 * `dateTo`, `tagAfter` by `dateFrom`, `tagBetween` by both. Null when the
 * criteria's bounds are all missing.
 */
export function getDateQueryBasedOnCriteria(
  field: string,
  criteria: TagCriteria,
  dateTo?: string | null,
  dateFrom?: string | null,
): Clause | null {
  const bounds = dateBounds({
    gte: criteria === 'tagBefore' ? null : dateFrom,
    lte: criteria === 'tagAfter' ? null : dateTo,
  });
  return isEmpty(bounds) ? null : { range: { [field]: bounds } };
}

/**
 * Builds include/exclude/date clauses for property tags or, when a
 * `mapping` is supplied, prospect statuses.
 *
 * With option `all` every included item is required (`must`); otherwise
 * any one suffices (`should`, the caller sets `minimum_should_match`).
 * Excluded items always land in `must_not`.
 */
export function getTagFilter<T extends string | number>(
  data: TagFilterInput<T>,
  filterType = 'term',
  mapping?: Partial<Record<T, JsonObject>>,
): BoolClauses {
  const body: BoolClauses = { must: [], must_not: [], should: [] };
  const included = data.option === 'all' ? body.must : body.should;

  const fragment = (key: T): JsonObject => {
    if (!mapping) return { tags: key };
    const mapped = mapping[key];
    if (!mapped) {
      throw new ValidationError(`Unknown filter value: ${key}`);
    }
    return structuredClone(mapped);
  };

  for (const key of data.include ?? []) {
    included.push({ [filterType]: fragment(key) });
  }
  for (const key of data.exclude ?? []) {
    body.must_not.push({ [filterType]: fragment(key) });
  }

  if (data.criteria) {
    const field = mapping ? 'prospect_status.date_utc' : 'property_status.date_utc';
    const range = getDateQueryBasedOnCriteria(field, data.criteria, data.date_to, data.date_from);
    if (range) body.must.push(range);
  }

  return body;
}

export function buildSearchQuery(queries: SearchQueries): Clause[] {
  const clauses: Clause[] = [];
  for (const field of QUERY_FIELDS) {
    const value = queries[field];
    if (value === undefined || value === null || value.trim() === '') continue;

    const entry = QUERY_MAP[field];
    if (entry.type === 'multi_match') {
      clauses.push({ multi_match: { query: value, fields: [...entry.fields] } });
    } else {
      clauses.push({ term: { [field]: value } });
    }
  }
  return clauses;
}

/** Generic filters: lists become `terms`, scalars `term`. */
export function buildSearchFilters(filters: Record<string, unknown>): Clause[] {
  const clauses: Clause[] = [];
  for (const [rawKey, value] of Object.entries(filters)) {
    if (value === undefined || value === null) continue;
    if (!isJson(value)) {
      throw new ValidationError(`Unsupported value for filter "${rawKey}"`);
    }
    const key = rawKey === 'is_reminder' ? 'has_reminder' : rawKey;
    clauses.push({ [Array.isArray(value) ? 'terms' : 'term']: { [key]: value } });
  }
  return clauses;
}

/**
 * Sort clauses with a secondary tie-break on the index's id field. `tags`
 * has no scalar sort value, so it sorts by `tags_length`.
 */
export function generateSortObject(
  field: SortField | string,
  order: SortOrder,
  missing: Json,
  idField: string,
): Clause[] {
  const sortField = field === 'tags' ? 'tags_length' : field;
  const sort: Clause[] =
    sortField === '_score'
      ? [{ _score: { order } }]
      : [{ [sortField]: { order, missing } }];

  if (sortField !== idField) {
    sort.push({ [idField]: { order } });
  }
  return sort;
}

// ---------------------------------------------------------------------------
// Search body
// ---------------------------------------------------------------------------

/**
 * Compiles queries and filters into a bool query scoped to `companyId`.
 * Pure: the options are copied and never mutated.
 */
export function buildSearchBody(companyId: number, options: BuildSearchBodyOptions = {}): SearchBody {
  const { queries, filters, idFieldName, aggregates, exclude, source } = structuredClone(options);

  const bool: BoolQuery = {
    filter: [{ term: { company_id: companyId } }],
    must: [],
    must_not: [],
    should: [],
  };
  const body: SearchBody = { query: { bool } };

  if (source !== undefined) {
    body._source = source;
  }
  if (aggregates !== undefined) {
    body.aggs = aggregates;
  }
  if (exclude !== undefined && idFieldName !== undefined) {
    bool.must_not.push({ terms: { [idFieldName]: exclude } });
  }

  if (isEmpty(queries) && isEmpty(filters)) {
    return body;
  }

  if (filters) {
    const {
      property_tags: propertyTags,
      skip_traced: skipTraced,
      in_campaign: inCampaign,
      in_dm_campaign: inDmCampaign,
      lead_stage_id: leadStageId,
      is_reminder: hasReminder,
      zip_code: zipCode,
      prospect_status: prospectStatus,
      last_sold_date: _lastSoldDate,
      inbound_date: _inboundDate,
      outbound_date: _outboundDate,
      skiptrace_date: _skiptraceDate,
      first_import_date: _firstImportDate,
      last_import_date: _lastImportDate,
      ...generic
    } = filters;

    if (hasReminder !== undefined && hasReminder !== null) {
      bool.filter.push({ term: { has_reminder: hasReminder } });
    }

    if (skipTraced === true) {
      bool.filter.push({ exists: { field: 'phone_raw' } });
    } else if (skipTraced === false) {
      bool.must_not.push({ exists: { field: 'phone_raw' } });
    }

    for (const [flag, field] of [[inCampaign, 'campaigns'], [inDmCampaign, 'dm_campaigns']] as const) {
      if (flag === true) {
        bool.filter.push({ range: { [field]: { gt: 0 } } });
      } else if (flag === false) {
        bool.filter.push({ term: { [field]: 0 } });
      }
    }

    // A null date must never satisfy a range, so every range is paired with exists.
    for (const [filterKey, field] of DATE_FILTERS) {
      const range = filters[filterKey];
      if (!range) continue;
      const bounds = dateBounds(range);
      if (isEmpty(bounds)) continue;
      bool.filter.push({ exists: { field } }, { range: { [field]: bounds } });
    }

    if (propertyTags) {
      mergeInto(bool, getTagFilter(propertyTags));
    }
    if (prospectStatus) {
      mergeInto(bool, getTagFilter(prospectStatus, 'match', PROSPECT_STATUS_QUERY_MAP));
    }

    if (leadStageId && leadStageId.length > 0) {
      bool.filter.push({ terms: { lead_stage_id: leadStageId } });
    }
    if (zipCode) {
      bool.filter.push({ term: { zip_code: zipCode } });
    }

    bool.filter.push(...buildSearchFilters(generic));
  }

  if (queries) {
    bool.must.push(...buildSearchQuery(queries));
  }

  if (bool.should.length > 0) {
    bool.minimum_should_match = 1;
  }

  return body;
}

// ---------------------------------------------------------------------------
// Bulk request -> compiler input
// ---------------------------------------------------------------------------

export interface StackerSearchInput {
  query?: SearchQueries | null;
  filters?: StackerFilters | null;
}

export interface BulkSearchInput {
  type?: DocumentType;
  id_list?: number[];
  search?: StackerSearchInput | null;
}

export interface FiltersAndQueriesOptions {
  forcedType?: DocumentType;
  forceSkip?: boolean;
  notInCampaign?: boolean;
  idFieldName?: string;
}

/**
 * Turns a bulk action request into compiler filters: explicit id lists
 * become an id-field filter, and the forced flags are layered on top.
 */
export function buildFiltersAndQueries(
  request: BulkSearchInput,
  options: FiltersAndQueriesOptions = {},
): { filters: StackerFilters; queries: SearchQueries } {
  const data = structuredClone(request);
  const type = data.type ?? options.forcedType;
  if (!type && !options.idFieldName) {
    throw new ValidationError('A document type is required');
  }
  const idField = options.idFieldName ?? `${type}_id`;

  const { is_reminder: hasReminder, ...filters }: StackerFilters = data.search?.filters ?? {};
  if (hasReminder !== undefined && hasReminder !== null) {
    filters.has_reminder = hasReminder;
  }

  if (options.forceSkip) {
    filters.skip_traced = true;
  }
  if (data.id_list && data.id_list.length > 0) {
    filters[idField] = data.id_list;
  }
  if (options.notInCampaign) {
    filters.in_campaign = false;
  }

  return { filters, queries: data.search?.query ?? {} };
}
