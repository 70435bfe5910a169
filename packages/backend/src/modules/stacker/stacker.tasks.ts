import { z } from 'zod';

import * as stackerRepo from './stacker.repository';
import { toFieldChanges, type StackerUpdater } from './stacker.updates';
import type { StackerLoader } from './stacker.loader';

// ---------------------------------------------------------------------------
// Task schemas
// ---------------------------------------------------------------------------

export const TASK_CHANNEL = 'stacker_index_tasks';

const id = z.number().int().positive();
const ids = z.array(id);
const idOrIds = z.union([id, ids]);
const changes = z.record(z.unknown());

export const stackerTaskSchema = z.discriminatedUnion('task', [
  z.object({ task: z.literal('update_address_data'), id: idOrIds, changes }),
  z.object({ task: z.literal('update_property_data'), id: idOrIds, changes }),
  z.object({ task: z.literal('update_prospect_data'), id: idOrIds, changes }),
  z.object({
    task: z.literal('update_property_tags'),
    propertyId: id,
    tags: ids,
    distressIndicators: z.number().int().min(0),
  }),
  z.object({ task: z.literal('prepare_tags_for_index_update'), propertyIds: ids }),
  z.object({ task: z.literal('full_update'), propertyIds: ids, prospectIds: ids }),
  z.object({ task: z.literal('populate_by_company'), companyIds: ids }),
]);

export type StackerTask = z.infer<typeof stackerTaskSchema>;
export type StackerTaskName = StackerTask['task'];

export interface TaskDeps {
  loader: StackerLoader;
  updater: StackerUpdater;
}

export interface TaskQueue {
  enqueue(task: StackerTask): Promise<string>;
}

// ---------------------------------------------------------------------------
// Queue
// ---------------------------------------------------------------------------

/**
 * Persists a task row and wakes listening workers. Callers do not wait for
 * the index update itself.
 */
export function createTaskQueue(): TaskQueue {
  return {
    async enqueue(task) {
      const parsed = stackerTaskSchema.parse(task);
      const record = await stackerRepo.insertIndexTask(parsed.task, parsed);
      await stackerRepo.notifyIndexTask(TASK_CHANNEL, record.id);
      return record.id;
    },
  };
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export function parseTask(payload: unknown): StackerTask {
  return stackerTaskSchema.parse(payload);
}

export async function runTask(task: StackerTask, deps: TaskDeps): Promise<void> {
  switch (task.task) {
    case 'update_address_data':
      return deps.updater.updateAddressData(task.id, toFieldChanges(task.changes));
    case 'update_property_data':
      return deps.updater.updatePropertyData(task.id, toFieldChanges(task.changes));
    case 'update_prospect_data':
      return deps.updater.updateProspectData(task.id, toFieldChanges(task.changes));
    case 'update_property_tags':
      return deps.updater.updatePropertyTags(task.propertyId, task.tags, task.distressIndicators);
    case 'prepare_tags_for_index_update':
      return deps.updater.prepareTagsForIndexUpdate(task.propertyIds);
    case 'full_update':
      await deps.loader.refresh(task.propertyIds, task.prospectIds);
      return;
    case 'populate_by_company':
      await deps.loader.populate(task.companyIds);
      return;
  }
}
