import Pool from 'pg-pool';
import { types, type Client, type QueryResultRow, type QueryResult } from 'pg';

/** OID of the PostgreSQL `date` type. */
export const DATE_OID = 1082;

// A DATE has no time zone; keep it as the `YYYY-MM-DD` text PostgreSQL sends
// instead of a Date at local midnight.
types.setTypeParser(DATE_OID, (value: string) => value);

let pool: Pool<Client> | null = null;

export interface DbConfig {
  connectionString: string;
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Initializes the singleton pool. Called once from server.ts, the CLI
 * and the migration runner with values from validated env.
 */
export function initPool(config: DbConfig): Pool<Client> {
  if (!pool) {
    pool = new Pool({
      connectionString: config.connectionString,
      max: config.max ?? 20,
      idleTimeoutMillis: config.idleTimeoutMillis ?? 30_000,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 5_000,
    });
  }

  return pool;
}

export function getPool(): Pool<Client> {
  if (!pool) {
    throw new Error('Database pool not initialized. Call initPool() or setPool() first.');
  }
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<QueryResult<T>> {
  return getPool().query<T>(text, params);
}

/**
 * Runs a query in array row mode: each row comes back as a positional
 * tuple in SELECT-list order instead of a keyed object.
 */
export async function queryArrays(text: string, params: unknown[] = []): Promise<unknown[][]> {
  const client = await getPool().connect();
  try {
    const result = await client.query<unknown[]>({ text, values: params, rowMode: 'array' });
    return result.rows;
  } finally {
    client.release();
  }
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client, rolling back on error.
 */
export async function withTransaction<T>(fn: (client: Client) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/** Replaces the pool instance, e.g. with a mock in tests. */
export function setPool(customPool: Pool<Client>): void {
  pool = customPool;
}
