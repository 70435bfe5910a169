import { z } from 'zod';

import { AuthorizationError, ValidationError } from '../../shared/errors';
import { logger } from '../../shared/logger';
import { PROSPECT, kindFor, type DocumentType } from './stacker.document-kind';
import {
  buildFiltersAndQueries,
  buildSearchBody,
  type StackerSearchInput,
} from './stacker.query-builder';
import * as stackerRepo from './stacker.repository';
import type {
  BulkArchiveBody,
  BulkPropertyTagBody,
  BulkProspectTagBody,
  PushToCampaignBody,
  PushToDirectMailBody,
  StackerBulkActionBody,
} from './stacker.schemas';
import type { StackerService } from './stacker.service';
import type { TaskQueue } from './stacker.tasks';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ActionContext {
  companyId: number;
  userId: number;
}

export interface IdListRequest {
  type?: DocumentType;
  search?: StackerSearchInput | null;
  id_list?: number[];
  group?: [number, number];
  exclude?: number[] | null;
}

export interface ResolveOptions {
  idFieldName?: string;
  forceSkip?: boolean;
  notInCampaign?: boolean;
  forcedType?: DocumentType;
  /** Document field to collect; defaults to the id field. */
  source?: string;
}

export type TagMode = 'add' | 'remove';

export interface PushPreview {
  new: number;
  existing: number;
}

export interface BulkActions {
  resolveIdList(companyId: number, request: IdListRequest, options?: ResolveOptions): Promise<number[]>;
  archive(ctx: ActionContext, request: BulkArchiveBody): Promise<number[]>;
  archiveOne(ctx: ActionContext, type: DocumentType, id: number, archive: boolean): Promise<void>;
  tagProperties(ctx: ActionContext, request: BulkPropertyTagBody, mode: TagMode): Promise<number[]>;
  tagProspects(ctx: ActionContext, request: BulkProspectTagBody, mode: TagMode): Promise<number[]>;
  exportDocuments(ctx: ActionContext, request: StackerBulkActionBody): Promise<string | null>;
  exportOne(ctx: ActionContext, type: DocumentType, id: number): Promise<string>;
  skipTrace(ctx: ActionContext, request: StackerBulkActionBody): Promise<string>;
  skipTraceOne(ctx: ActionContext, propertyId: number): Promise<string>;
  previewPush(ctx: ActionContext, request: StackerBulkActionBody): Promise<PushPreview>;
  pushToCampaign(ctx: ActionContext, request: PushToCampaignBody & { import_type: 'all' | 'new' }): Promise<string>;
  pushToDirectMail(ctx: ActionContext, request: PushToDirectMailBody): Promise<string>;
}

export interface BulkActionsDeps {
  service: Pick<StackerService, 'getIdList' | 'aggregate'>;
  queue: TaskQueue;
}

const NEW_CAMPAIGN_AGG = 'new_campaign_prospects';

const newCampaignAggSchema = z.object({
  [NEW_CAMPAIGN_AGG]: z.object({ doc_count: z.number().int() }),
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Slices `ids` from the position of `startId`, taking `size` entries. */
export function sliceGroup(ids: number[], [startId, size]: [number, number]): number[] {
  const start = ids.indexOf(startId);
  if (start === -1) {
    throw new ValidationError('Could not locate ID.');
  }
  return ids.slice(start, start + size);
}

function pickToggles(request: BulkProspectTagBody): stackerRepo.ProspectToggles {
  const toggles: stackerRepo.ProspectToggles = {};
  for (const flag of stackerRepo.PROSPECT_FLAGS) {
    const value = request[flag];
    if (value !== undefined && value !== null) {
      toggles[flag] = value;
    }
  }
  return toggles;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Resolves bulk action requests to id lists, applies the relational change,
 * then enqueues the index update. The index catches up asynchronously.
 */
export function createBulkActions(deps: BulkActionsDeps): BulkActions {
  const { service, queue } = deps;

  async function resolveIdList(
    companyId: number,
    request: IdListRequest,
    options: ResolveOptions = {},
  ): Promise<number[]> {
    const type = request.type ?? options.forcedType;
    if (!type) {
      throw new ValidationError('A document type is required');
    }
    const kind = kindFor(type);
    const idField = options.idFieldName ?? kind.idField;
    const source = options.source ?? idField;
    const exclude = request.exclude ?? [];

    let ids: number[];
    const usesIdsDirectly =
      request.id_list !== undefined &&
      request.id_list.length > 0 &&
      !options.forceSkip &&
      !options.notInCampaign &&
      source === idField;

    if (usesIdsDirectly && request.id_list) {
      const excluded = new Set(exclude);
      ids = request.id_list.filter((id) => !excluded.has(id));
    } else {
      const { filters, queries } = buildFiltersAndQueries(request, {
        forcedType: options.forcedType,
        forceSkip: options.forceSkip,
        notInCampaign: options.notInCampaign,
        idFieldName: idField,
      });
      const body = buildSearchBody(companyId, {
        queries,
        filters,
        idFieldName: idField,
        exclude: exclude.length > 0 ? exclude : undefined,
        source,
      });
      ids = await service.getIdList(kind.indexName(), body, source);
    }

    return request.group ? sliceGroup(ids, request.group) : ids;
  }

  async function enqueueArchive(type: DocumentType, ids: number | number[], isArchived: boolean): Promise<void> {
    await queue.enqueue({
      task: type === 'property' ? 'update_property_data' : 'update_prospect_data',
      id: ids,
      changes: { is_archived: isArchived },
    });
  }

  async function applyPropertyTags(
    companyId: number,
    propertyIds: number[],
    tagIds: number[],
    mode: TagMode,
  ): Promise<void> {
    if (propertyIds.length === 0 || tagIds.length === 0) return;
    if (mode === 'add') {
      await stackerRepo.addPropertyTags(companyId, propertyIds, tagIds);
    } else {
      await stackerRepo.removePropertyTags(companyId, propertyIds, tagIds);
    }
    await queue.enqueue({ task: 'prepare_tags_for_index_update', propertyIds });
  }

  async function recordJob(
    ctx: ActionContext,
    action: stackerRepo.BulkJobAction,
    documentType: DocumentType,
    attributes: Record<string, unknown>,
  ): Promise<string> {
    const job = await stackerRepo.createBulkJob({
      companyId: ctx.companyId,
      userId: ctx.userId,
      action,
      documentType,
      attributes,
    });
    logger.info('Stacker bulk job recorded', {
      jobId: job.id,
      action,
      companyId: ctx.companyId,
    });
    return job.id;
  }

  async function skipTrace(ctx: ActionContext, request: StackerBulkActionBody): Promise<string> {
    if (!(await stackerRepo.canSkipTrace(ctx.companyId, ctx.userId))) {
      throw new AuthorizationError('User is not valid to skip trace.');
    }
    const ids = await resolveIdList(ctx.companyId, request, { idFieldName: 'property_id' });
    return recordJob(ctx, 'skiptrace', 'property', { ids, total: ids.length });
  }

  return {
    resolveIdList,

    async archive(ctx, request) {
      const ids = await resolveIdList(ctx.companyId, request);
      const changed = await stackerRepo.setArchived(request.type, ctx.companyId, ids, request.archive);
      if (changed.length > 0) {
        await enqueueArchive(request.type, changed, request.archive);
      }
      return changed;
    },

    async archiveOne(ctx, type, id, archive) {
      const changed = await stackerRepo.setArchived(type, ctx.companyId, [id], archive);
      if (changed.length === 0) {
        throw new ValidationError('Could not locate object');
      }
      await enqueueArchive(type, id, archive);
    },

    async tagProperties(ctx, request, mode) {
      const ids = await resolveIdList(ctx.companyId, request, {
        idFieldName: 'property_id',
        forcedType: 'property',
      });
      await applyPropertyTags(ctx.companyId, ids, request.tags, mode);
      return ids;
    },

    async tagProspects(ctx, request, mode) {
      const ids = await resolveIdList(ctx.companyId, request, {
        idFieldName: 'prospect_id',
        forcedType: 'prospect',
      });
      if (ids.length === 0) return ids;

      if (request.tags && request.tags.length > 0) {
        const propertyIds = await stackerRepo.fetchPropertyIdsForProspects(ctx.companyId, ids);
        await applyPropertyTags(ctx.companyId, propertyIds, request.tags, mode);
      }

      const toggles = pickToggles(request);
      if (Object.keys(toggles).length > 0) {
        const updated = await stackerRepo.updateProspectFlags(ctx.companyId, ids, toggles);
        if (updated.length > 0) {
          await queue.enqueue({ task: 'update_prospect_data', id: updated, changes: toggles });
        }
      }
      return ids;
    },

    async exportDocuments(ctx, request) {
      const ids = await resolveIdList(ctx.companyId, request);
      if (ids.length === 0) return null;
      return recordJob(ctx, 'export', request.type, { ids });
    },

    async exportOne(ctx, type, id) {
      return recordJob(ctx, 'export', type, { ids: [id] });
    },

    skipTrace,

    async skipTraceOne(ctx, propertyId) {
      if (!(await stackerRepo.propertyExists(ctx.companyId, propertyId))) {
        throw new ValidationError('Could not locate property.');
      }
      return skipTrace(ctx, { type: 'property', id_list: [propertyId] });
    },

    async previewPush(ctx, request) {
      const ids = await resolveIdList(ctx.companyId, request, {
        forceSkip: true,
        source: PROSPECT.idField,
      });

      const { filters, queries } = buildFiltersAndQueries(request, {
        idFieldName: PROSPECT.idField,
        forceSkip: true,
      });
      const body = buildSearchBody(ctx.companyId, {
        queries,
        filters,
        idFieldName: PROSPECT.idField,
        aggregates: { [NEW_CAMPAIGN_AGG]: { filter: { term: { campaigns: 0 } } } },
      });
      const aggs = newCampaignAggSchema.parse(await service.aggregate(PROSPECT.indexName(), body));
      const fresh = aggs[NEW_CAMPAIGN_AGG].doc_count;

      return { new: fresh, existing: ids.length - fresh };
    },

    async pushToCampaign(ctx, request) {
      const ids = await resolveIdList(ctx.companyId, request, {
        idFieldName: PROSPECT.idField,
        forceSkip: true,
        notInCampaign: request.import_type === 'new',
      });
      return recordJob(ctx, 'push_to_campaign', 'prospect', {
        campaign_name: request.campaign_name ?? null,
        campaign_id: request.campaign_id ?? null,
        market_id: request.market_id ?? null,
        import_type: request.import_type,
        push_count: ids.length,
        id_list: ids,
        user_id: ctx.userId,
        tags: request.tags,
        charge: 0,
      });
    },

    async pushToDirectMail(ctx, request) {
      const found = await resolveIdList(ctx.companyId, request, { source: PROSPECT.idField });
      const ids = await stackerRepo.dedupeProspectsByProperty(ctx.companyId, found);
      return recordJob(ctx, 'push_to_campaign', 'prospect', {
        campaign_name: request.campaign_name,
        push_count: ids.length,
        id_list: ids,
        user_id: request.from_id,
        drop_date: request.drop_date,
        template: request.template,
        creative_type: request.creative_type,
        budget_per_order: request.budget_per_order ?? 0,
        note_for_processor: request.note_for_processor ?? null,
        return_address: request.return_address,
        return_city: request.return_city,
        return_state: request.return_state,
        return_zip: request.return_zip,
        return_phone: request.return_phone,
        podio_email: request.podio_email ?? null,
        zapier_webhook: request.zapier_webhook ?? null,
        access: request.access ?? [],
        owner: request.owner ?? null,
        direct_mail: true,
        tags: request.tags,
      });
    },
  };
}
