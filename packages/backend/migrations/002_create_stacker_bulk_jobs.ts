import { Client } from 'pg';

// Jobs are picked up by the export, skip trace and campaign processors.
export async function up(client: Client): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS stacker_bulk_jobs (
      id            UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      company_id    INTEGER NOT NULL,
      user_id       INTEGER NOT NULL,
      action        VARCHAR(32) NOT NULL
                    CHECK (action IN ('export', 'skiptrace', 'push_to_campaign')),
      document_type VARCHAR(16) NOT NULL
                    CHECK (document_type IN ('property', 'prospect')),
      attributes    JSONB NOT NULL DEFAULT '{}'::jsonb,
      status        VARCHAR(20) NOT NULL DEFAULT 'pending'
                    CHECK (status IN ('pending', 'running', 'completed', 'failed')),
      created_at    TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE INDEX IF NOT EXISTS idx_stacker_bulk_jobs_company_created
      ON stacker_bulk_jobs (company_id, created_at DESC);
  `);
}

export async function down(client: Client): Promise<void> {
  await client.query(`
    DROP TABLE IF EXISTS stacker_bulk_jobs CASCADE;
  `);
}
