import { describe, it, expect, vi, beforeEach } from 'vitest';

// ---------------------------------------------------------------------------
// Mocks: must be declared before importing the module under test
// ---------------------------------------------------------------------------

const { MockClient, clientInstances } = vi.hoisted(() => {
  const clientInstances: Array<{
    connect: ReturnType<typeof vi.fn>;
    query: ReturnType<typeof vi.fn>;
    on: ReturnType<typeof vi.fn>;
    end: ReturnType<typeof vi.fn>;
  }> = [];
  const MockClient = vi.fn().mockImplementation(() => {
    const instance = {
      connect: vi.fn().mockResolvedValue(undefined),
      query: vi.fn().mockResolvedValue({ rows: [] }),
      on: vi.fn(),
      end: vi.fn().mockResolvedValue(undefined),
    };
    clientInstances.push(instance);
    return instance;
  });
  return { MockClient, clientInstances };
});

vi.mock('pg', () => ({ Client: MockClient }));

vi.mock('../../config/env', () => ({
  env: { DATABASE_URL: 'postgresql://localhost/test' },
}));

const mockClaimIndexTask = vi.fn();
const mockCompleteIndexTask = vi.fn();
const mockFailIndexTask = vi.fn();

vi.mock('./stacker.repository', () => ({
  claimIndexTask: (...args: unknown[]) => mockClaimIndexTask(...args),
  completeIndexTask: (...args: unknown[]) => mockCompleteIndexTask(...args),
  failIndexTask: (...args: unknown[]) => mockFailIndexTask(...args),
}));

vi.mock('../../shared/logger', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { createStackerWorker } from './stacker.worker';
import type { StackerLoader } from './stacker.loader';
import type { StackerUpdater } from './stacker.updates';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const now = new Date('2024-06-01T12:00:00Z');

function taskRecord(id: string, payload: unknown) {
  return {
    id,
    task: typeof payload === 'object' && payload !== null && 'task' in payload ? String(payload.task) : 'unknown',
    payload,
    status: 'running',
    errorReason: null,
    createdAt: now,
    startedAt: now,
    completedAt: null,
  };
}

function makeWorker() {
  const loader = {
    populate: vi.fn().mockResolvedValue({ properties: { indexed: 0, failed: 0 }, prospects: { indexed: 0, failed: 0 } }),
    refresh: vi.fn().mockResolvedValue({ properties: { indexed: 0, failed: 0 }, prospects: { indexed: 0, failed: 0 } }),
  };
  const updater = {
    updateAddressData: vi.fn().mockResolvedValue(undefined),
    updatePropertyData: vi.fn().mockResolvedValue(undefined),
    updateProspectData: vi.fn().mockResolvedValue(undefined),
    updatePropertyTags: vi.fn().mockResolvedValue(undefined),
    prepareTagsForIndexUpdate: vi.fn().mockResolvedValue(undefined),
  };
  const worker = createStackerWorker(
    { loader: loader as unknown as StackerLoader, updater: updater as unknown as StackerUpdater },
    { pollIntervalMs: 60_000 },
  );
  return { worker, loader, updater };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('stacker.worker', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    clientInstances.length = 0;
    mockClaimIndexTask.mockResolvedValue(null);
    mockCompleteIndexTask.mockResolvedValue(undefined);
    mockFailIndexTask.mockResolvedValue(undefined);
  });

  it('claims a notified task and marks it completed', async () => {
    const { worker, loader } = makeWorker();
    mockClaimIndexTask.mockResolvedValueOnce(
      taskRecord('task-1', { task: 'populate_by_company', companyIds: [3] }),
    );

    worker._handleNotification('stacker_index_tasks', 'task-1');
    await worker._drain();

    expect(mockClaimIndexTask).toHaveBeenNthCalledWith(1, 'task-1');
    expect(loader.populate).toHaveBeenCalledWith([3]);
    expect(mockCompleteIndexTask).toHaveBeenCalledWith('task-1');
    expect(worker.getStats()).toMatchObject({ completed: 1, failed: 0, bufferedTasks: 0 });
  });

  it('keeps polling for pending tasks after the buffer is empty', async () => {
    const { worker, updater } = makeWorker();
    mockClaimIndexTask
      .mockResolvedValueOnce(taskRecord('task-1', { task: 'prepare_tags_for_index_update', propertyIds: [1, 2] }))
      .mockResolvedValueOnce(taskRecord('task-2', { task: 'update_property_tags', propertyId: 1, tags: [4], distressIndicators: 0 }))
      .mockResolvedValue(null);

    await worker._drain();

    expect(mockClaimIndexTask.mock.calls).toEqual([[undefined], [undefined], [undefined]]);
    expect(updater.prepareTagsForIndexUpdate).toHaveBeenCalledWith([1, 2]);
    expect(updater.updatePropertyTags).toHaveBeenCalledWith(1, [4], 0);
  });

  it('marks a task failed with its reason and does not retry it', async () => {
    const { worker, loader } = makeWorker();
    loader.refresh.mockRejectedValueOnce(new Error('bulk rejected twice'));
    mockClaimIndexTask.mockResolvedValueOnce(
      taskRecord('task-9', { task: 'full_update', propertyIds: [1], prospectIds: [2] }),
    );

    await worker._drain();

    expect(mockFailIndexTask).toHaveBeenCalledWith('task-9', 'bulk rejected twice');
    expect(mockCompleteIndexTask).not.toHaveBeenCalled();
    expect(loader.refresh).toHaveBeenCalledTimes(1);
    expect(worker.getStats().failed).toBe(1);
  });

  it('fails a task whose payload does not match any task kind', async () => {
    const { worker } = makeWorker();
    mockClaimIndexTask.mockResolvedValueOnce(taskRecord('task-3', { task: 'reindex_everything' }));

    await worker._drain();

    expect(mockFailIndexTask).toHaveBeenCalledTimes(1);
    expect(mockFailIndexTask.mock.calls[0][0]).toBe('task-3');
  });

  it('converts field changes before updating', async () => {
    const { worker, updater } = makeWorker();
    mockClaimIndexTask.mockResolvedValueOnce(
      taskRecord('task-4', { task: 'update_prospect_data', id: [5, 6], changes: { is_archived: true } }),
    );

    await worker._drain();

    expect(updater.updateProspectData).toHaveBeenCalledWith([5, 6], [
      { field: 'is_archived', op: 'set', value: true },
    ]);
  });

  it('skips a notified task that another worker already claimed', async () => {
    const { worker } = makeWorker();

    worker._handleNotification('stacker_index_tasks', 'task-1');
    await worker._drain();

    expect(mockClaimIndexTask.mock.calls).toEqual([['task-1'], [undefined]]);
    expect(worker.getStats().completed).toBe(0);
  });

  it('ignores unknown channels and empty payloads', async () => {
    const { worker } = makeWorker();

    worker._handleNotification('other_channel', 'task-1');
    worker._handleNotification('stacker_index_tasks', undefined);

    expect(worker.getStats().bufferedTasks).toBe(0);
    expect(mockClaimIndexTask).not.toHaveBeenCalled();
  });

  it('listens on start and closes the connection on stop', async () => {
    const { worker } = makeWorker();

    await worker.start();
    const client = clientInstances[0];
    expect(MockClient).toHaveBeenCalledWith({ connectionString: 'postgresql://localhost/test' });
    expect(client.query).toHaveBeenCalledWith('LISTEN stacker_index_tasks');
    expect(client.on).toHaveBeenCalledWith('notification', expect.any(Function));

    await worker.stop();
    expect(client.end).toHaveBeenCalledTimes(1);
  });
});
