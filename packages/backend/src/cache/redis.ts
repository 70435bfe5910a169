import Redis from 'ioredis';
import { errorMessage, logger } from '../shared/logger';

let client: Redis | null = null;
let isConnected = false;

export interface RedisConfig {
  url: string;
}

/**
 * Initialize the Redis client used for the token revocation list. The app
 * runs without Redis; revocation checks are skipped while it is down.
 */
export function initRedis(config: RedisConfig): Redis {
  if (client) return client;

  client = new Redis(config.url, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => Math.min(times * 200, 3000),
    lazyConnect: true,
  });

  client.on('connect', () => { isConnected = true; });
  client.on('error', (err: Error) => {
    if (isConnected) {
      logger.warn('Redis connection error', { error: err.message });
    }
    isConnected = false;
  });
  client.on('close', () => { isConnected = false; });

  // Non-blocking connect
  client.connect().catch((err: unknown) => {
    isConnected = false;
    logger.warn('Redis unavailable, token revocation checks disabled', { error: errorMessage(err) });
  });

  return client;
}

export function getRedis(): Redis | null {
  return isConnected ? client : null;
}

export function isRedisConnected(): boolean {
  return isConnected;
}

export async function closeRedis(): Promise<void> {
  if (!client) return;
  const closing = client;
  client = null;
  isConnected = false;
  try {
    await closing.quit();
  } catch (err) {
    logger.warn('Redis quit failed', { error: errorMessage(err) });
  }
}

export async function redisHealthCheck(): Promise<boolean> {
  if (!client || !isConnected) return false;
  try {
    const result = await client.ping();
    return result === 'PONG';
  } catch (err) {
    logger.warn('Redis health check failed', { error: errorMessage(err) });
    return false;
  }
}
