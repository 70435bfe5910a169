import { env } from './config/env';
import { initPool, closePool } from './shared/db';
import { errorMessage, logger } from './shared/logger';
import { createApp } from './app';
import { initRedis, closeRedis } from './cache/redis';
import { initOpenSearch, healthCheck, closeOpenSearch } from './modules/stacker/opensearch/client';
import { createStackerCache } from './modules/stacker/stacker.cache';
import { createStackerService, type CompanyCounts } from './modules/stacker/stacker.service';
import { createStackerUpdater } from './modules/stacker/stacker.updates';
import { createStackerLoader } from './modules/stacker/stacker.loader';
import { createTaskQueue } from './modules/stacker/stacker.tasks';
import { createBulkActions } from './modules/stacker/stacker.bulk-actions';
import { createPropertyDataReader } from './modules/stacker/stacker.property-data';
import { createStackerWorker } from './modules/stacker/stacker.worker';

// Initialize database pool
initPool({ connectionString: env.DATABASE_URL });

// OpenSearch client is lazy; an unreachable cluster surfaces per request
initOpenSearch({
  nodeUrls: env.OPENSEARCH_NODE_URLS,
  username: env.OPENSEARCH_USERNAME,
  password: env.OPENSEARCH_PASSWORD,
  requestTimeoutMs: env.OPENSEARCH_REQUEST_TIMEOUT_MS,
  maxRetries: env.OPENSEARCH_MAX_RETRIES,
  sslCertPath: env.OPENSEARCH_SSL_CERT_PATH,
});

if (env.REDIS_URL) {
  initRedis({ url: env.REDIS_URL });
} else {
  logger.warn('REDIS_URL not set, token revocation checks disabled');
}

const cache = createStackerCache<CompanyCounts>({ defaultTtlMs: env.STACKER_COUNTS_TTL_MS });
const service = createStackerService({ cache, countsTtlMs: env.STACKER_COUNTS_TTL_MS });
const updater = createStackerUpdater(service);
const loader = createStackerLoader({ chunkSize: env.STACKER_BULK_CHUNK_SIZE });
const queue = createTaskQueue();
const bulkActions = createBulkActions({ service, queue });
const propertyData = createPropertyDataReader({
  apiKey: env.GOOGLE_STREET_VIEW_API_KEY,
  secret: env.GOOGLE_STREET_VIEW_SECRET,
});

const worker = env.STACKER_WORKER_ENABLED ? createStackerWorker({ loader, updater }) : null;

const app = createApp({
  corsOrigins: env.CORS_ORIGINS,
  jwtSecret: env.JWT_SECRET,
  stacker: { service, bulkActions, queue, propertyData },
});

const server = app.listen(env.PORT, () => {
  logger.info(`Server listening on port ${env.PORT}`, {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
  });

  // Start the index task worker after server is ready
  worker?.start().catch((err: unknown) => {
    logger.warn('Stacker worker failed to start, index updates will queue until it runs', {
      error: errorMessage(err),
    });
  });

  // Verify OpenSearch cluster is reachable (non-blocking)
  healthCheck()
    .then((health) => {
      logger.info('OpenSearch cluster connected', {
        status: health.status,
        nodes: health.numberOfNodes,
        clusterName: health.clusterName,
      });
    })
    .catch((err: unknown) => {
      logger.warn('OpenSearch cluster unreachable, search will be unavailable until cluster recovers', {
        error: errorMessage(err),
      });
    });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully`);

  // Stop accepting new connections
  server.close();

  // Finish buffered index tasks
  await worker?.stop();

  await closeOpenSearch();
  await closeRedis();
  await closePool();

  logger.info('Shutdown complete');
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
