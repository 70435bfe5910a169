import { Client } from 'pg';
import { env } from '../../config/env';
import { logger } from '../../shared/logger';
import * as stackerRepo from './stacker.repository';
import { TASK_CHANNEL, parseTask, runTask, type TaskDeps } from './stacker.tasks';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StackerWorkerConfig {
  pollIntervalMs: number;
}

export interface WorkerStats {
  bufferedTasks: number;
  completed: number;
  failed: number;
  lastRunAt: Date | null;
}

export interface StackerWorker {
  start(): Promise<void>;
  stop(): Promise<void>;
  getStats(): WorkerStats;
  _handleNotification(channel: string, payload: string | undefined): void;
  _drain(): Promise<void>;
}

const DEFAULT_CONFIG: StackerWorkerConfig = {
  pollIntervalMs: 5_000,
};

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Runs stacker index tasks in the background.
 *
 * - Dedicated `pg.Client` for LISTEN (not from pool)
 * - Notified task ids are buffered; a poll timer picks up anything missed
 * - One task at a time, claimed with `FOR UPDATE SKIP LOCKED`
 * - A failed task is marked `failed` with its reason and not retried
 * - Graceful shutdown: drain the buffer, close the PG connection
 */
export function createStackerWorker(
  deps: TaskDeps,
  config: Partial<StackerWorkerConfig> = {},
): StackerWorker {
  const cfg: StackerWorkerConfig = { ...DEFAULT_CONFIG, ...config };

  // State
  let pgClient: Client | null = null;
  let pollTimer: ReturnType<typeof setInterval> | null = null;
  let running = false;
  let draining: Promise<void> | null = null;

  const buffer: string[] = [];

  const stats: Omit<WorkerStats, 'bufferedTasks'> = {
    completed: 0,
    failed: 0,
    lastRunAt: null,
  };

  // ---------------------------------------------------------------------------
  // Notifications
  // ---------------------------------------------------------------------------

  function handleNotification(channel: string, payload: string | undefined): void {
    if (!payload) return;
    if (channel !== TASK_CHANNEL) {
      logger.warn('StackerWorker: unknown channel', { channel });
      return;
    }
    if (!buffer.includes(payload)) {
      buffer.push(payload);
    }
    void drain();
  }

  // ---------------------------------------------------------------------------
  // Execution
  // ---------------------------------------------------------------------------

  async function execute(record: stackerRepo.IndexTaskRecord): Promise<void> {
    const startedAt = Date.now();
    try {
      await runTask(parseTask(record.payload), deps);
      await stackerRepo.completeIndexTask(record.id);
      stats.completed++;
      logger.info('StackerWorker: task completed', {
        taskId: record.id,
        task: record.task,
        durationMs: Date.now() - startedAt,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      stats.failed++;
      logger.error('StackerWorker: task failed', { taskId: record.id, task: record.task, error: reason });
      await stackerRepo.failIndexTask(record.id, reason);
    }
  }

  /** Claims and runs tasks until neither the buffer nor the table has any pending. */
  async function drainLoop(): Promise<void> {
    try {
      for (;;) {
        const taskId = buffer.shift();
        const record = await stackerRepo.claimIndexTask(taskId);
        if (!record) {
          // Claimed elsewhere, or nothing pending at all.
          if (taskId === undefined) break;
          continue;
        }
        await execute(record);
        stats.lastRunAt = new Date();
      }
    } catch (err) {
      logger.error('StackerWorker: drain error', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  function drain(): Promise<void> {
    if (!draining) {
      draining = drainLoop().finally(() => {
        draining = null;
      });
    }
    return draining;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async function start(): Promise<void> {
    if (running) return;

    logger.info('StackerWorker: starting');

    pgClient = new Client({ connectionString: env.DATABASE_URL });
    await pgClient.connect();
    await pgClient.query(`LISTEN ${TASK_CHANNEL}`);

    pgClient.on('notification', (msg) => {
      handleNotification(msg.channel, msg.payload);
    });

    pgClient.on('error', (err) => {
      logger.error('StackerWorker: PG LISTEN connection error', {
        error: err.message,
      });
    });

    pollTimer = setInterval(() => {
      void drain();
    }, cfg.pollIntervalMs);

    running = true;
    logger.info('StackerWorker: started', {
      channel: TASK_CHANNEL,
      pollIntervalMs: cfg.pollIntervalMs,
    });

    // Tasks enqueued while no worker was listening.
    void drain();
  }

  async function stop(): Promise<void> {
    if (!running) return;

    logger.info('StackerWorker: stopping');
    running = false;

    if (pollTimer) {
      clearInterval(pollTimer);
      pollTimer = null;
    }

    if (buffer.length > 0 || draining) {
      logger.info('StackerWorker: draining remaining tasks on shutdown', {
        buffered: buffer.length,
      });
      await drain();
    }

    if (pgClient) {
      try {
        await pgClient.end();
      } catch (err) {
        logger.error('StackerWorker: error closing PG LISTEN connection', {
          error: err instanceof Error ? err.message : String(err),
        });
      }
      pgClient = null;
    }

    logger.info('StackerWorker: stopped', {
      completed: stats.completed,
      failed: stats.failed,
    });
  }

  function getStats(): WorkerStats {
    return {
      ...stats,
      bufferedTasks: buffer.length,
    };
  }

  // Expose internals for testing
  return {
    start,
    stop,
    getStats,
    _handleNotification: handleNotification,
    _drain: drain,
  };
}
