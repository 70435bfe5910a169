import { getOpenSearch, healthCheck, type ClusterHealth } from './opensearch/client';
import { isOpenSearchError, toSearchError } from './opensearch/errors';
import {
  countResponseSchema,
  searchResponseSchema,
  updateByQueryResponseSchema,
  type UpdateByQueryResult,
} from './opensearch/responses';
import { STACKER_INDEX_V1 } from './mappings/stacker-index.v1';
import {
  DOCUMENT_KINDS,
  PROPERTY,
  PROSPECT,
  kindForIndex,
  type DocumentKind,
  type StackerDocument,
} from './stacker.document-kind';
import {
  buildSearchBody,
  generateSortObject,
  type Json,
  type JsonObject,
  type SearchBody,
  type SearchQueries,
  type SortRequest,
  type StackerFilters,
} from './stacker.query-builder';
import { countsCacheKey, type StackerCache } from './stacker.cache';
import { logger } from '../../shared/logger';
import { AppError } from '../../shared/errors';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CompanyCounts {
  prospects: number;
  properties: number;
}

export interface SearchResult {
  results: StackerDocument[];
  total: number;
  search_after: Json[] | null;
  aggs?: JsonObject;
}

export interface SearchOptions {
  size?: number;
  sort?: SortRequest;
  searchAfter?: Json[] | null;
}

export interface SearchAfterPair {
  properties?: Json[] | null;
  prospects?: Json[] | null;
}

export interface SearchIndexesOptions {
  size?: number;
  sort?: SortRequest;
  searchAfter?: SearchAfterPair | null;
}

export interface PairedResults {
  prospects: SearchResult;
  properties: SearchResult;
}

export interface StackerSearchRequest {
  query?: SearchQueries;
  filters?: StackerFilters;
  sort: SortRequest;
  search_after?: SearchAfterPair | null;
  size: number;
}

export interface StackerSearchResponse extends PairedResults {
  counts: CompanyCounts;
}

export interface UpdateByQueryBody {
  query: JsonObject;
  script: { source: string; lang: 'painless' };
}

export interface StackerService {
  createIndexes(): Promise<void>;
  deleteIndexes(): Promise<void>;
  search(indexName: string, body: SearchBody, options?: SearchOptions): Promise<SearchResult>;
  searchIndexes(body: SearchBody, options?: SearchIndexesOptions): Promise<PairedResults>;
  totalCountsByCompany(companyId: number): Promise<CompanyCounts>;
  getIdList(indexName: string, body: SearchBody, idField: string): Promise<number[]>;
  aggregate(indexName: string, body: SearchBody): Promise<JsonObject>;
  updateByQuery(indexName: string, body: UpdateByQueryBody): Promise<UpdateByQueryResult>;
  getClusterHealth(): Promise<ClusterHealth>;
  runSearch(companyId: number, request: StackerSearchRequest): Promise<StackerSearchResponse>;
}

export interface StackerServiceDeps {
  cache: StackerCache<CompanyCounts>;
  countsTtlMs?: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const SCAN_PAGE_SIZE = 10_000;
const SCROLL_KEEPALIVE = '1m';
const DEFAULT_COUNTS_TTL_MS = 180_000;
// Sort value for documents missing the sort field.
const SORT_MISSING = 0;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function presentResult(kind: DocumentKind, result: SearchResult): SearchResult {
  return { ...result, results: result.results.map((doc) => kind.present(doc)) };
}

function isIdValue(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Flattens one level when every value is an id array. A mix of scalar
 * and array values means the scan ran against the wrong id field.
 */
export function normalizeIdList(values: unknown[], idField: string): number[] {
  if (values.length === 0) return [];

  const arrays = values.filter(Array.isArray);
  if (arrays.length > 0 && arrays.length !== values.length) {
    throw new AppError(500, 'INCONSISTENT_ID_LIST', `Mixed scalar and array values for "${idField}"`);
  }

  const flat: unknown[] = arrays.length > 0 ? arrays.flat() : values;
  if (!flat.every(isIdValue)) {
    throw new AppError(500, 'INCONSISTENT_ID_LIST', `Non-integer values for "${idField}"`);
  }
  return flat;
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export function createStackerService(deps: StackerServiceDeps): StackerService {
  const countsTtlMs = deps.countsTtlMs ?? DEFAULT_COUNTS_TTL_MS;

  const service: StackerService = {
    /** Creates both indexes; an index that already exists (400) is left alone. */
    async createIndexes(): Promise<void> {
      const os = getOpenSearch();
      for (const kind of DOCUMENT_KINDS) {
        const index = kind.indexName();
        try {
          await os.indices.create({ index, body: STACKER_INDEX_V1, timeout: '30s' });
          logger.info('Created stacker index', { index });
        } catch (err: unknown) {
          if (isOpenSearchError(err, 400)) {
            logger.info('Stacker index already exists', { index });
            continue;
          }
          throw err;
        }
      }
    },

    /** Deletes both indexes; a missing index (404) is ignored. */
    async deleteIndexes(): Promise<void> {
      const os = getOpenSearch();
      for (const kind of DOCUMENT_KINDS) {
        const index = kind.indexName();
        try {
          await os.indices.delete({ index });
          logger.info('Deleted stacker index', { index });
        } catch (err: unknown) {
          if (isOpenSearchError(err, 404)) {
            logger.info('Stacker index does not exist, nothing to delete', { index });
            continue;
          }
          throw err;
        }
      }
    },

    /**
     * Runs one page of `body` against a stacker index. A sort adds a
     * tie-break on the index id field; the last hit's sort values are
     * returned as the cursor for the next page.
     */
    async search(indexName: string, body: SearchBody, options: SearchOptions = {}): Promise<SearchResult> {
      const kind = kindForIndex(indexName);
      const request: SearchBody = structuredClone(body);

      if (options.searchAfter && options.searchAfter.length > 0) {
        request.search_after = options.searchAfter;
      }
      if (options.sort) {
        request.sort = generateSortObject(options.sort.field, options.sort.order, SORT_MISSING, kind.idField);
      }

      let responseBody: unknown;
      try {
        const response = await getOpenSearch().search({
          index: indexName,
          body: request,
          size: options.size,
          track_total_hits: true,
        });
        responseBody = response.body;
      } catch (err: unknown) {
        throw toSearchError(err);
      }

      const parsed = searchResponseSchema.parse(responseBody);
      const hits = parsed.hits.hits;
      const lastHit = hits[hits.length - 1];

      const result: SearchResult = {
        results: hits.map((hit) => hit._source),
        total: parsed.hits.total?.value ?? 0,
        search_after: options.sort && lastHit?.sort ? lastHit.sort : null,
      };
      if (request.aggs) {
        result.aggs = parsed.aggregations ?? {};
      }
      return result;
    },

    /** Same body against both indexes; each keeps its own cursor. */
    async searchIndexes(body: SearchBody, options: SearchIndexesOptions = {}): Promise<PairedResults> {
      const { size, sort, searchAfter } = options;
      const [prospects, properties] = await Promise.all([
        service.search(PROSPECT.indexName(), body, { size, sort, searchAfter: searchAfter?.prospects }),
        service.search(PROPERTY.indexName(), body, { size, sort, searchAfter: searchAfter?.properties }),
      ]);
      return { prospects, properties };
    },

    /** Unfiltered document counts per company, cached for `countsTtlMs`. */
    async totalCountsByCompany(companyId: number): Promise<CompanyCounts> {
      const key = countsCacheKey(companyId);
      const cached = deps.cache.get(key);
      if (cached) return cached;

      const { query } = buildSearchBody(companyId);
      const os = getOpenSearch();

      let prospectBody: unknown;
      let propertyBody: unknown;
      try {
        const [prospectResponse, propertyResponse] = await Promise.all([
          os.count({ index: PROSPECT.indexName(), body: { query } }),
          os.count({ index: PROPERTY.indexName(), body: { query } }),
        ]);
        prospectBody = prospectResponse.body;
        propertyBody = propertyResponse.body;
      } catch (err: unknown) {
        throw toSearchError(err);
      }

      const counts: CompanyCounts = {
        prospects: countResponseSchema.parse(prospectBody).count,
        properties: countResponseSchema.parse(propertyBody).count,
      };
      deps.cache.set(key, counts, countsTtlMs);
      return counts;
    },

    /**
     * Scrolls every match of `body` and collects `idField` from each hit.
     * Bulk actions use this to resolve a search to its full id list.
     */
    async getIdList(indexName: string, body: SearchBody, idField: string): Promise<number[]> {
      kindForIndex(indexName);
      const os = getOpenSearch();
      const values: unknown[] = [];
      let scrollId: string | undefined;

      try {
        const first = await os.search({
          index: indexName,
          body,
          size: SCAN_PAGE_SIZE,
          scroll: SCROLL_KEEPALIVE,
        });
        let page = searchResponseSchema.parse(first.body);
        scrollId = page._scroll_id;

        while (page.hits.hits.length > 0) {
          for (const hit of page.hits.hits) {
            values.push(hit._source[idField]);
          }
          if (!scrollId || page.hits.hits.length < SCAN_PAGE_SIZE) break;

          const next = await os.scroll({ body: { scroll_id: scrollId, scroll: SCROLL_KEEPALIVE } });
          page = searchResponseSchema.parse(next.body);
          scrollId = page._scroll_id ?? scrollId;
        }
      } catch (err: unknown) {
        throw toSearchError(err);
      } finally {
        if (scrollId) {
          await os.clearScroll({ body: { scroll_id: scrollId } }).catch((err: unknown) => {
            logger.warn('Failed to clear stacker scroll', {
              indexName,
              error: err instanceof Error ? err.message : String(err),
            });
          });
        }
      }

      return normalizeIdList(values, idField);
    },

    async aggregate(indexName: string, body: SearchBody): Promise<JsonObject> {
      const result = await service.search(indexName, body, { size: 0 });
      return result.aggs ?? {};
    },

    /**
     * Scripted in-place update. Version conflicts are skipped and the index
     * is refreshed so the next read sees the change.
     */
    async updateByQuery(indexName: string, body: UpdateByQueryBody): Promise<UpdateByQueryResult> {
      kindForIndex(indexName);
      const response = await getOpenSearch().updateByQuery({
        index: indexName,
        body,
        refresh: true,
        conflicts: 'proceed',
      });
      const result = updateByQueryResponseSchema.parse(response.body);
      if (result.failures.length > 0) {
        logger.error('Stacker update by query reported failures', {
          indexName,
          failures: result.failures.length,
        });
      }
      return result;
    },

    async getClusterHealth(): Promise<ClusterHealth> {
      try {
        return await healthCheck();
      } catch (err: unknown) {
        throw toSearchError(err);
      }
    },

    /** The stacker search endpoint: both result pages plus company totals. */
    async runSearch(companyId: number, request: StackerSearchRequest): Promise<StackerSearchResponse> {
      const body = buildSearchBody(companyId, {
        queries: request.query,
        filters: request.filters,
      });

      const [paired, counts] = await Promise.all([
        service.searchIndexes(body, {
          size: request.size,
          sort: request.sort,
          searchAfter: request.search_after,
        }),
        service.totalCountsByCompany(companyId),
      ]);

      return {
        prospects: presentResult(PROSPECT, paired.prospects),
        properties: presentResult(PROPERTY, paired.properties),
        counts,
      };
    },
  };

  return service;
}
