import { Router } from 'express';
import { validate } from '../../middleware/validate';
import { requireRole } from '../../middleware/rbac';
import { createStackerController, type StackerControllerDeps } from './stacker.controller';
import {
  bulkArchiveSchema,
  bulkPropertyTagSchema,
  bulkProspectTagSchema,
  populateSchema,
  pushToCampaignSchema,
  pushToDirectMailSchema,
  singleArchiveSchema,
  singlePropertyTagSchema,
  singleProspectTagSchema,
  stackerActionSchema,
  stackerBulkActionSchema,
  stackerIdParamsSchema,
  stackerSearchSchema,
} from './stacker.schemas';

/**
 * Creates stacker route factories.
 *
 * Returns two routers:
 * - stackerRoutes: company-scoped search and bulk actions
 * - adminStackerRoutes: cluster health and index population
 */
export function createStackerRoutes(deps: StackerControllerDeps): {
  stackerRoutes: Router;
  adminStackerRoutes: Router;
} {
  const controller = createStackerController(deps);

  // --- Company-scoped routes ---
  const stackerRoutes = Router();

  // POST /stacker: search both indexes (staff+)
  stackerRoutes.post('/', validate({ body: stackerSearchSchema }), requireRole('staff'), controller.search);

  // PATCH /stacker/archive: bulk archive/unarchive
  stackerRoutes.patch('/archive', validate({ body: bulkArchiveSchema }), requireRole('staff'), controller.bulkArchive);

  stackerRoutes.patch(
    '/:id/archive',
    validate({ params: stackerIdParamsSchema, body: singleArchiveSchema }),
    requireRole('staff'),
    controller.singleArchive,
  );

  // POST adds tags, DELETE removes them
  for (const method of ['post', 'delete'] as const) {
    stackerRoutes[method](
      '/property/tag',
      validate({ body: bulkPropertyTagSchema }),
      requireRole('staff'),
      controller.bulkPropertyTag,
    );
    stackerRoutes[method](
      '/:id/property/tag',
      validate({ params: stackerIdParamsSchema, body: singlePropertyTagSchema }),
      requireRole('staff'),
      controller.singlePropertyTag,
    );
    stackerRoutes[method](
      '/prospect/tag',
      validate({ body: bulkProspectTagSchema }),
      requireRole('staff'),
      controller.bulkProspectTag,
    );
    stackerRoutes[method](
      '/:id/prospect/tag',
      validate({ params: stackerIdParamsSchema, body: singleProspectTagSchema }),
      requireRole('staff'),
      controller.singleProspectTag,
    );
  }

  // POST /stacker/export: queue an export job; 204 when nothing matches
  stackerRoutes.post('/export', validate({ body: stackerBulkActionSchema }), requireRole('staff'), controller.bulkExport);

  stackerRoutes.post(
    '/:id/export',
    validate({ params: stackerIdParamsSchema, body: stackerActionSchema }),
    requireRole('staff'),
    controller.singleExport,
  );

  // POST /stacker/skiptrace
  stackerRoutes.post('/skiptrace', validate({ body: stackerBulkActionSchema }), requireRole('staff'), controller.skipTrace);

  stackerRoutes.get(
    '/:id/skiptrace',
    validate({ params: stackerIdParamsSchema }),
    requireRole('staff'),
    controller.singleSkipTrace,
  );

  // GET /stacker/:id/property/data: detail panel for one property
  stackerRoutes.get(
    '/:id/property/data',
    validate({ params: stackerIdParamsSchema }),
    requireRole('staff'),
    controller.getPropertyData,
  );

  // POST /stacker/push: preview without import_type, push with it
  stackerRoutes.post('/push', validate({ body: pushToCampaignSchema }), requireRole('staff'), controller.pushToCampaign);

  // POST /stacker/directmail
  stackerRoutes.post(
    '/directmail',
    validate({ body: pushToDirectMailSchema }),
    requireRole('staff'),
    controller.pushToDirectMail,
  );

  // --- Admin routes ---
  const adminStackerRoutes = Router();

  // GET /admin/stacker/health: cluster health (admin)
  adminStackerRoutes.get('/health', requireRole('admin'), controller.getClusterHealth);

  // POST /admin/stacker/populate: queue a company load (master_admin)
  adminStackerRoutes.post(
    '/populate',
    validate({ body: populateSchema }),
    requireRole('master_admin'),
    controller.populate,
  );

  return { stackerRoutes, adminStackerRoutes };
}
