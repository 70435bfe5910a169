import { Client } from 'pg';
import * as fs from 'fs';
import * as path from 'path';
import { env } from '../src/config/env';

const MIGRATIONS_DIR = __dirname;
const MIGRATION_FILE_PATTERN = /^\d{3}_.*\.ts$/;

type MigrationStep = (client: Client) => Promise<void>;

interface Migration {
  up: MigrationStep;
  down: MigrationStep;
}

function isMigration(mod: unknown): mod is Migration {
  return (
    typeof mod === 'object' &&
    mod !== null &&
    'up' in mod &&
    typeof mod.up === 'function' &&
    'down' in mod &&
    typeof mod.down === 'function'
  );
}

async function loadMigration(file: string): Promise<Migration> {
  const mod: unknown = await import(path.join(MIGRATIONS_DIR, file));
  if (!isMigration(mod)) {
    throw new Error(`Migration ${file} must export up() and down()`);
  }
  return mod;
}

async function ensureMigrationsTable(client: Client): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL UNIQUE,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function getExecutedMigrations(client: Client): Promise<Set<string>> {
  const result = await client.query<{ name: string }>('SELECT name FROM _migrations ORDER BY name');
  return new Set(result.rows.map((r) => r.name));
}

export function getMigrationFiles(): string[] {
  return fs
    .readdirSync(MIGRATIONS_DIR)
    .filter((f) => MIGRATION_FILE_PATTERN.test(f))
    .sort();
}

/** Applies pending migrations in name order, each in its own transaction. */
export async function runUp(client: Client): Promise<string[]> {
  await ensureMigrationsTable(client);
  const executed = await getExecutedMigrations(client);
  const pending = getMigrationFiles().filter((f) => !executed.has(f));

  if (pending.length === 0) {
    console.log('No pending migrations.');
    return [];
  }

  console.log(`Found ${pending.length} pending migration(s).`);

  for (const file of pending) {
    console.log(`Running migration: ${file}`);
    const migration = await loadMigration(file);

    await client.query('BEGIN');
    try {
      await migration.up(client);
      await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
      await client.query('COMMIT');
      console.log(`  ✓ ${file}`);
    } catch (err) {
      await client.query('ROLLBACK');
      console.error(`  ✗ ${file} failed:`, err);
      throw err;
    }
  }

  console.log('All migrations applied successfully.');
  return pending;
}

/** Rolls back the most recently applied migration. */
export async function runDown(client: Client): Promise<string | null> {
  await ensureMigrationsTable(client);
  const result = await client.query<{ name: string }>(
    'SELECT name FROM _migrations ORDER BY name DESC LIMIT 1',
  );

  if (result.rows.length === 0) {
    console.log('No migrations to rollback.');
    return null;
  }

  const lastMigration = result.rows[0].name;
  if (!fs.existsSync(path.join(MIGRATIONS_DIR, lastMigration))) {
    throw new Error(`Migration file not found: ${lastMigration}`);
  }

  console.log(`Rolling back migration: ${lastMigration}`);
  const migration = await loadMigration(lastMigration);

  await client.query('BEGIN');
  try {
    await migration.down(client);
    await client.query('DELETE FROM _migrations WHERE name = $1', [lastMigration]);
    await client.query('COMMIT');
    console.log(`  ✓ Rolled back ${lastMigration}`);
  } catch (err) {
    await client.query('ROLLBACK');
    console.error(`  ✗ Rollback of ${lastMigration} failed:`, err);
    throw err;
  }
  return lastMigration;
}

async function main(): Promise<void> {
  const isDown = process.argv.includes('--down');
  const client = new Client({ connectionString: env.DATABASE_URL });

  try {
    await client.connect();
    console.log('Connected to database.');

    if (isDown) {
      await runDown(client);
    } else {
      await runUp(client);
    }
  } catch (err) {
    console.error('Migration failed:', err);
    process.exitCode = 1;
  } finally {
    await client.end();
    console.log('Database connection closed.');
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === __filename) {
  void main();
}
