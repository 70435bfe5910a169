#!/usr/bin/env tsx
/**
 * Stacker index maintenance.
 *
 * Usage:
 *   stacker-indexes build
 *   stacker-indexes delete
 *   stacker-indexes populate [--company 1,2,3]
 *
 * `populate` without `--company` loads every active company. It runs
 * inline rather than through the task queue.
 */

import { realpathSync } from 'fs';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { env } from '../src/config/env';
import { initPool, closePool } from '../src/shared/db';
import { errorMessage, logger } from '../src/shared/logger';
import { initOpenSearch, closeOpenSearch } from '../src/modules/stacker/opensearch/client';
import { createStackerCache } from '../src/modules/stacker/stacker.cache';
import { createStackerService, type CompanyCounts, type StackerService } from '../src/modules/stacker/stacker.service';
import { createStackerLoader, type LoadResult, type StackerLoader } from '../src/modules/stacker/stacker.loader';
import * as stackerRepo from '../src/modules/stacker/stacker.repository';

export type IndexCommand =
  | { action: 'build' }
  | { action: 'delete' }
  | { action: 'populate'; companyIds: number[] | null };

export interface CommandDeps {
  service: Pick<StackerService, 'createIndexes' | 'deleteIndexes'>;
  loader: Pick<StackerLoader, 'populate'>;
  fetchActiveCompanyIds: () => Promise<number[]>;
}

export const USAGE = 'Usage: stacker-indexes build|delete|populate [--company <id,...>]';

const companyListSchema = z
  .string()
  .transform((value) => value.split(',').map((s) => s.trim()).filter(Boolean).map(Number))
  .pipe(z.array(z.number().int().positive()).min(1, 'At least one company id is required'));

export function parseCommand(argv: string[]): IndexCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      company: { type: 'string', short: 'c' },
    },
    allowPositionals: true,
  });

  const [action, ...rest] = positionals;
  if (rest.length > 0) {
    throw new Error(`Unexpected arguments: ${rest.join(' ')}`);
  }

  switch (action) {
    case 'build':
    case 'delete':
      if (values.company !== undefined) {
        throw new Error(`--company only applies to populate`);
      }
      return { action };
    case 'populate': {
      if (values.company === undefined) {
        return { action, companyIds: null };
      }
      const parsed = companyListSchema.safeParse(values.company);
      if (!parsed.success) {
        throw new Error(`Invalid --company: ${parsed.error.issues[0].message}`);
      }
      return { action, companyIds: parsed.data };
    }
    default:
      throw new Error(USAGE);
  }
}

export async function runCommand(command: IndexCommand, deps: CommandDeps): Promise<LoadResult | null> {
  switch (command.action) {
    case 'build':
      await deps.service.createIndexes();
      return null;
    case 'delete':
      await deps.service.deleteIndexes();
      return null;
    case 'populate': {
      const companyIds = command.companyIds ?? (await deps.fetchActiveCompanyIds());
      if (companyIds.length === 0) {
        logger.warn('No companies to populate');
        return null;
      }
      logger.info('Populating stacker indexes', { companies: companyIds.length });
      const result = await deps.loader.populate(companyIds);
      logger.info('Stacker indexes populated', {
        properties: result.properties,
        prospects: result.prospects,
      });
      return result;
    }
  }
}

async function main(): Promise<void> {
  let command: IndexCommand;
  try {
    command = parseCommand(process.argv.slice(2));
  } catch (err) {
    console.error(errorMessage(err));
    process.exitCode = 2;
    return;
  }

  initPool({ connectionString: env.DATABASE_URL });
  initOpenSearch({
    nodeUrls: env.OPENSEARCH_NODE_URLS,
    username: env.OPENSEARCH_USERNAME,
    password: env.OPENSEARCH_PASSWORD,
    requestTimeoutMs: env.OPENSEARCH_REQUEST_TIMEOUT_MS,
    maxRetries: env.OPENSEARCH_MAX_RETRIES,
    sslCertPath: env.OPENSEARCH_SSL_CERT_PATH,
  });

  const service = createStackerService({ cache: createStackerCache<CompanyCounts>() });
  const loader = createStackerLoader({ chunkSize: env.STACKER_BULK_CHUNK_SIZE });

  try {
    await runCommand(command, {
      service,
      loader,
      fetchActiveCompanyIds: stackerRepo.fetchActiveCompanyIds,
    });
  } catch (err) {
    logger.error('stacker-indexes failed', { action: command.action, error: errorMessage(err) });
    process.exitCode = 1;
  } finally {
    await closeOpenSearch();
    await closePool();
  }
}

// Invoked through the npm bin symlink or directly
if (process.argv[1] && realpathSync(process.argv[1]) === __filename) {
  void main();
}
