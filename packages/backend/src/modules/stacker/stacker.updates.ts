import { ValidationError } from '../../shared/errors';
import { logger } from '../../shared/logger';
import { isStackerField, type StackerField } from './mappings/stacker-index.v1';
import { PROPERTY, PROSPECT } from './stacker.document-kind';
import { fetchPropertyTagSummaries } from './stacker.repository';
import type { StackerService, UpdateByQueryBody } from './stacker.service';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PainlessValue = string | number | boolean | null | PainlessValue[];

export interface FieldChange {
  field: StackerField;
  op: 'set';
  value: PainlessValue;
}

/** Relational entities whose id appears on indexed documents. */
export type UpdateEntity = 'address' | 'property' | 'prospect';

export interface StackerUpdater {
  updateAddressData(addressId: number | number[], changes: FieldChange[]): Promise<void>;
  updatePropertyData(propertyId: number | number[], changes: FieldChange[]): Promise<void>;
  updateProspectData(prospectId: number | number[], changes: FieldChange[]): Promise<void>;
  updatePropertyTags(propertyId: number, tags: number[], distressIndicators: number): Promise<void>;
  prepareTagsForIndexUpdate(propertyIds: number[]): Promise<void>;
}

// ---------------------------------------------------------------------------
// Script rendering
// ---------------------------------------------------------------------------

function isPainlessValue(value: unknown): value is PainlessValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    default:
      return Array.isArray(value) && value.every(isPainlessValue);
  }
}

export function renderPainlessLiteral(value: PainlessValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) {
    return `[${value.map(renderPainlessLiteral).join(', ')}]`;
  }
  switch (typeof value) {
    case 'string':
      return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
    case 'boolean':
      return value ? 'true' : 'false';
    default:
      if (!Number.isFinite(value)) {
        throw new ValidationError(`Cannot render non-finite number ${value}`);
      }
      return String(value);
  }
}

/** One assignment per change, each terminated by `;`. */
export function buildPainlessScript(changes: FieldChange[]): string {
  return changes.map((change) => `ctx._source.${change.field}=${renderPainlessLiteral(change.value)};`).join('');
}

/**
 * Converts a `{ field: value }` record into field changes. Field names must
 * be index fields; values must be representable as painless literals.
 */
export function toFieldChanges(record: Record<string, unknown>): FieldChange[] {
  return Object.entries(record).map(([field, value]): FieldChange => {
    if (!isStackerField(field)) {
      throw new ValidationError(`Unknown index field "${field}"`);
    }
    if (!isPainlessValue(value)) {
      throw new ValidationError(`Unsupported value for index field "${field}"`);
    }
    return { field, op: 'set', value };
  });
}

export function buildUpdateForQueryBody(
  entity: UpdateEntity,
  idOrIds: number | number[],
  source: string,
): UpdateByQueryBody {
  const lookup = Array.isArray(idOrIds) ? 'terms' : 'term';
  return {
    query: {
      bool: {
        must: [{ [lookup]: { [`${entity}_id`]: idOrIds } }],
      },
    },
    script: { source, lang: 'painless' },
  };
}

// ---------------------------------------------------------------------------
// Updater
// ---------------------------------------------------------------------------

/**
 * Partial updates against both indexes. A property change has to reach
 * the prospect documents that embed it and vice versa, so every update
 * runs on the prospect index first, then the property index.
 */
export function createStackerUpdater(service: Pick<StackerService, 'updateByQuery'>): StackerUpdater {
  async function applyToBothIndexes(entity: UpdateEntity, idOrIds: number | number[], changes: FieldChange[]) {
    if (changes.length === 0) return;

    const body = buildUpdateForQueryBody(entity, idOrIds, buildPainlessScript(changes));
    for (const kind of [PROSPECT, PROPERTY]) {
      const result = await service.updateByQuery(kind.indexName(), body);
      logger.debug('Applied stacker partial update', {
        index: kind.indexName(),
        entity,
        fields: changes.map((c) => c.field),
        updated: result.updated,
        versionConflicts: result.version_conflicts,
      });
    }
  }

  const updater: StackerUpdater = {
    updateAddressData(addressId, changes) {
      return applyToBothIndexes('address', addressId, changes);
    },

    updatePropertyData(propertyId, changes) {
      return applyToBothIndexes('property', propertyId, changes);
    },

    updateProspectData(prospectId, changes) {
      return applyToBothIndexes('prospect', prospectId, changes);
    },

    /** `tags`, `tags_length` and `distress_indicators` always change together. */
    updatePropertyTags(propertyId, tags, distressIndicators) {
      return applyToBothIndexes('property', propertyId, [
        { field: 'tags', op: 'set', value: tags },
        { field: 'tags_length', op: 'set', value: tags.length },
        { field: 'distress_indicators', op: 'set', value: distressIndicators },
      ]);
    },

    async prepareTagsForIndexUpdate(propertyIds) {
      const summaries = await fetchPropertyTagSummaries(propertyIds);
      for (const summary of summaries) {
        await updater.updatePropertyTags(summary.propertyId, summary.tagIds, summary.distressCount);
      }
    },
  };

  return updater;
}
