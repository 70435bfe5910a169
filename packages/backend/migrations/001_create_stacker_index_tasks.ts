import { Client } from 'pg';

export async function up(client: Client): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS stacker_index_tasks (
      id           UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      task         VARCHAR(64) NOT NULL,
      payload      JSONB NOT NULL,
      status       VARCHAR(20) NOT NULL DEFAULT 'pending'
                   CHECK (status IN ('pending', 'running', 'completed', 'failed')),
      error_reason TEXT,
      created_at   TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      started_at   TIMESTAMPTZ,
      completed_at TIMESTAMPTZ
    );

    CREATE INDEX IF NOT EXISTS idx_stacker_index_tasks_pending
      ON stacker_index_tasks (created_at)
      WHERE status = 'pending';
  `);
}

export async function down(client: Client): Promise<void> {
  await client.query(`
    DROP TABLE IF EXISTS stacker_index_tasks CASCADE;
  `);
}
