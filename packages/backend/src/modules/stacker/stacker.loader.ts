import { AppError } from '../../shared/errors';
import { logger } from '../../shared/logger';
import { getOpenSearch } from './opensearch/client';
import { bulkResponseSchema } from './opensearch/responses';
import { fields } from './mappings/stacker-index.v1';
import { PROPERTY, PROSPECT, type DocumentKind, type StackerDocument } from './stacker.document-kind';
import { PROPERTY_KEY_POSITION, PROSPECT_KEY_POSITION } from './stacker.queries';
import * as stackerRepo from './stacker.repository';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LoadStats {
  indexed: number;
  failed: number;
}

export interface LoadResult {
  properties: LoadStats;
  prospects: LoadStats;
}

export interface StackerLoaderConfig {
  chunkSize: number;
}

export interface StackerLoader {
  populate(companyIds: number[]): Promise<LoadResult>;
  refresh(propertyIds: number[], prospectIds: number[]): Promise<LoadResult>;
}

type BulkLine = Record<string, unknown>;

interface KindSource {
  kind: DocumentKind;
  keyPosition: number;
  byCompany(companyIds: number[], afterId: number, limit: number): Promise<unknown[][]>;
  byIds(ids: number[]): Promise<unknown[][]>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_CONFIG: StackerLoaderConfig = {
  chunkSize: 5000,
};

const PROPERTY_SOURCE: KindSource = {
  kind: PROPERTY,
  keyPosition: PROPERTY_KEY_POSITION,
  byCompany: stackerRepo.fetchPropertyRowsByCompany,
  byIds: stackerRepo.fetchPropertyRowsByIds,
};

const PROSPECT_SOURCE: KindSource = {
  kind: PROSPECT,
  keyPosition: PROSPECT_KEY_POSITION,
  byCompany: stackerRepo.fetchProspectRowsByCompany,
  byIds: stackerRepo.fetchProspectRowsByIds,
};

// ---------------------------------------------------------------------------
// Row → document
// ---------------------------------------------------------------------------

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Projected dates are calendar dates. A Date built by a driver at local
 * midnight is written as its local `YYYY-MM-DD`, never as a UTC instant.
 */
export function toIndexValue(value: unknown): unknown {
  if (!(value instanceof Date)) return value;
  return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
}

/** Zips a positional projector row against the mapping's field order. */
export function zipRow(row: unknown[]): StackerDocument {
  const names = fields();
  if (row.length !== names.length) {
    throw new AppError(
      500,
      'PROJECTION_MISMATCH',
      `Projector returned ${row.length} columns, expected ${names.length}`,
    );
  }
  const doc: StackerDocument = {};
  names.forEach((name, i) => {
    doc[name] = toIndexValue(row[i]);
  });
  return doc;
}

function rowKey(row: unknown[], position: number): number {
  const key = row[position];
  if (typeof key !== 'number') {
    throw new AppError(500, 'PROJECTION_MISMATCH', `Projector row has a non-numeric key: ${String(key)}`);
  }
  return key;
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// ---------------------------------------------------------------------------
// Bulk indexing
// ---------------------------------------------------------------------------

function toBulkBody(kind: DocumentKind, docs: StackerDocument[]): BulkLine[] {
  const index = kind.indexName();
  return docs.flatMap((doc) => [{ index: { _index: index, _id: String(doc[kind.idField]) } }, doc]);
}

/** Sends one bulk request; a request that throws is sent once more. */
async function sendBulk(kind: DocumentKind, body: BulkLine[]) {
  const os = getOpenSearch();
  try {
    const { body: result } = await os.bulk({ body });
    return bulkResponseSchema.parse(result);
  } catch (err) {
    logger.warn('Stacker bulk request failed, retrying once', {
      index: kind.indexName(),
      documents: body.length / 2,
      error: err instanceof Error ? err.message : String(err),
    });
    const { body: result } = await os.bulk({ body });
    return bulkResponseSchema.parse(result);
  }
}

/** Documents whose bulk item came back with an error, in request order. */
async function indexOnce(kind: DocumentKind, docs: StackerDocument[]): Promise<StackerDocument[]> {
  const response = await sendBulk(kind, toBulkBody(kind, docs));
  if (!response.errors) return [];

  const failed: StackerDocument[] = [];
  response.items.forEach((item, i) => {
    const action = item.index ?? item.create;
    if (action?.error !== undefined) {
      failed.push(docs[i]);
    }
  });
  return failed;
}

/**
 * Indexes one chunk. Failed items are retried once; items that fail again
 * are logged and counted.
 */
async function indexDocuments(kind: DocumentKind, docs: StackerDocument[]): Promise<LoadStats> {
  if (docs.length === 0) return { indexed: 0, failed: 0 };

  const firstFailures = await indexOnce(kind, docs);
  if (firstFailures.length === 0) return { indexed: docs.length, failed: 0 };

  logger.warn('Stacker bulk items failed, retrying once', {
    index: kind.indexName(),
    failed: firstFailures.length,
  });

  const finalFailures = await indexOnce(kind, firstFailures);
  for (const doc of finalFailures) {
    logger.error('Stacker bulk item failed after retry', {
      index: kind.indexName(),
      id: String(doc[kind.idField]),
    });
  }
  return { indexed: docs.length - finalFailures.length, failed: finalFailures.length };
}

function addStats(total: LoadStats, chunkStats: LoadStats): void {
  total.indexed += chunkStats.indexed;
  total.failed += chunkStats.failed;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Loads projector rows into the stacker indexes. Each document is keyed by
 * its own id field, so loading the same rows twice overwrites in place.
 */
export function createStackerLoader(config: Partial<StackerLoaderConfig> = {}): StackerLoader {
  const cfg: StackerLoaderConfig = { ...DEFAULT_CONFIG, ...config };

  async function populateKind(source: KindSource, companyIds: number[]): Promise<LoadStats> {
    const stats: LoadStats = { indexed: 0, failed: 0 };
    let afterId = 0;

    for (;;) {
      const rows = await source.byCompany(companyIds, afterId, cfg.chunkSize);
      if (rows.length === 0) break;

      addStats(stats, await indexDocuments(source.kind, rows.map(zipRow)));
      afterId = rowKey(rows[rows.length - 1], source.keyPosition);

      if (rows.length < cfg.chunkSize) break;
    }
    return stats;
  }

  async function refreshKind(source: KindSource, ids: number[]): Promise<LoadStats> {
    const stats: LoadStats = { indexed: 0, failed: 0 };
    for (const idChunk of chunk(ids, cfg.chunkSize)) {
      const rows = await source.byIds(idChunk);
      addStats(stats, await indexDocuments(source.kind, rows.map(zipRow)));
    }
    return stats;
  }

  return {
    async populate(companyIds) {
      if (companyIds.length === 0) {
        return { properties: { indexed: 0, failed: 0 }, prospects: { indexed: 0, failed: 0 } };
      }

      const properties = await populateKind(PROPERTY_SOURCE, companyIds);
      const prospects = await populateKind(PROSPECT_SOURCE, companyIds);

      logger.info('Stacker population completed', { companyIds, properties, prospects });
      return { properties, prospects };
    },

    async refresh(propertyIds, prospectIds) {
      const properties = await refreshKind(PROPERTY_SOURCE, propertyIds);
      const prospects = await refreshKind(PROSPECT_SOURCE, prospectIds);

      logger.info('Stacker refresh completed', {
        propertyIds: propertyIds.length,
        prospectIds: prospectIds.length,
        properties,
        prospects,
      });
      return { properties, prospects };
    },
  };
}
