import { Request, Response, NextFunction } from 'express';
import type { StackerService } from './stacker.service';
import type { ActionContext, BulkActions, TagMode } from './stacker.bulk-actions';
import type { TaskQueue } from './stacker.tasks';
import type { PropertyDataReader } from './stacker.property-data';
import { successResponse } from '../../shared/envelope';
import { AuthenticationError } from '../../shared/errors';
import { companyIdOf } from '../../middleware/rbac';

export interface StackerControllerDeps {
  service: StackerService;
  bulkActions: BulkActions;
  queue: TaskQueue;
  propertyData: PropertyDataReader;
}

function contextOf(req: Request): ActionContext {
  if (!req.user) {
    throw new AuthenticationError('Authentication required');
  }
  return { companyId: companyIdOf(req), userId: req.user.userId };
}

function tagModeOf(req: Request): TagMode {
  return req.method === 'DELETE' ? 'remove' : 'add';
}

function idParam(req: Request): number {
  return Number(req.params.id);
}

export function createStackerController(deps: StackerControllerDeps) {
  const { service, bulkActions, queue, propertyData } = deps;

  /**
   * POST /api/v1/stacker
   * Searches both indexes and returns per-company totals.
   */
  async function search(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await service.runSearch(companyIdOf(req), req.body);
      res.status(201).json(successResponse(result, { requestId: req.id }));
    } catch (err) {
      next(err);
    }
  }

  /** PATCH /api/v1/stacker/archive */
  async function bulkArchive(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await bulkActions.archive(contextOf(req), req.body);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  }

  /** PATCH /api/v1/stacker/:id/archive */
  async function singleArchive(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await bulkActions.archiveOne(contextOf(req), req.body.type, idParam(req), req.body.archive);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  }

  /** POST|DELETE /api/v1/stacker/property/tag */
  async function bulkPropertyTag(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await bulkActions.tagProperties(contextOf(req), req.body, tagModeOf(req));
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  }

  /** POST|DELETE /api/v1/stacker/:id/property/tag */
  async function singlePropertyTag(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await bulkActions.tagProperties(contextOf(req), { ...req.body, id_list: [idParam(req)] }, tagModeOf(req));
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  }

  /** POST|DELETE /api/v1/stacker/prospect/tag */
  async function bulkProspectTag(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await bulkActions.tagProspects(contextOf(req), req.body, tagModeOf(req));
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  }

  /** POST|DELETE /api/v1/stacker/:id/prospect/tag */
  async function singleProspectTag(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await bulkActions.tagProspects(contextOf(req), { ...req.body, id_list: [idParam(req)] }, tagModeOf(req));
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  }

  /**
   * POST /api/v1/stacker/export
   * 204 when nothing matched, otherwise 201 with the export job id.
   */
  async function bulkExport(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const id = await bulkActions.exportDocuments(contextOf(req), req.body);
      if (id === null) {
        res.status(204).end();
        return;
      }
      res.status(201).json(successResponse({ id }));
    } catch (err) {
      next(err);
    }
  }

  /** POST /api/v1/stacker/:id/export */
  async function singleExport(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const id = await bulkActions.exportOne(contextOf(req), req.body.type, idParam(req));
      res.status(201).json(successResponse({ id }));
    } catch (err) {
      next(err);
    }
  }

  /** POST /api/v1/stacker/skiptrace */
  async function skipTrace(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const id = await bulkActions.skipTrace(contextOf(req), req.body);
      res.status(200).json(successResponse({ id }));
    } catch (err) {
      next(err);
    }
  }

  /** GET /api/v1/stacker/:id/skiptrace */
  async function singleSkipTrace(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const id = await bulkActions.skipTraceOne(contextOf(req), idParam(req));
      res.status(200).json(successResponse({ id }));
    } catch (err) {
      next(err);
    }
  }

  /**
   * GET /api/v1/stacker/:id/property/data
   * Everything the property detail panel shows, in one response.
   */
  async function getPropertyData(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const data = await propertyData.getPropertyData(companyIdOf(req), idParam(req));
      res.status(200).json(successResponse(data));
    } catch (err) {
      next(err);
    }
  }

  /**
   * POST /api/v1/stacker/push
   * Without `import_type` this only previews how many prospects are new.
   */
  async function pushToCampaign(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const ctx = contextOf(req);
      const importType = req.body.import_type;
      if (importType === undefined) {
        const preview = await bulkActions.previewPush(ctx, req.body);
        res.status(200).json(successResponse(preview));
        return;
      }
      const id = await bulkActions.pushToCampaign(ctx, { ...req.body, import_type: importType });
      res.status(201).json(successResponse({ id }));
    } catch (err) {
      next(err);
    }
  }

  /** POST /api/v1/stacker/directmail */
  async function pushToDirectMail(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const id = await bulkActions.pushToDirectMail(contextOf(req), req.body);
      res.status(201).json(successResponse({ id }));
    } catch (err) {
      next(err);
    }
  }

  /**
   * GET /api/v1/admin/stacker/health
   * Returns OpenSearch cluster health.
   */
  async function getClusterHealth(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const health = await service.getClusterHealth();
      res.status(200).json(successResponse(health));
    } catch (err) {
      next(err);
    }
  }

  /**
   * POST /api/v1/admin/stacker/populate
   * Queues a full load of the given companies. Returns 202 Accepted.
   */
  async function populate(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const taskId = await queue.enqueue({ task: 'populate_by_company', companyIds: req.body.company_ids });
      res.status(202).json(successResponse({ taskId }));
    } catch (err) {
      next(err);
    }
  }

  return {
    search,
    bulkArchive,
    singleArchive,
    bulkPropertyTag,
    singlePropertyTag,
    bulkProspectTag,
    singleProspectTag,
    bulkExport,
    singleExport,
    skipTrace,
    singleSkipTrace,
    getPropertyData,
    pushToCampaign,
    pushToDirectMail,
    getClusterHealth,
    populate,
  };
}
