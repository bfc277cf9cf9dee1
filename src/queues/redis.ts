import { Redis } from 'ioredis';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'redis' });

/** Reconnect attempts before giving up on a connection */
const MAX_RECONNECT_ATTEMPTS = 10;

const connections = new Set<Redis>();

/**
 * Open a named Redis connection for the bus.
 *
 * BullMQ workers block on their connection, so the bus opens one for
 * publishing and bindings plus one per subscribed topic.
 */
export function createRedisConnection(url: string, connectionName: string): Redis {
  const redis = new Redis(url, {
    connectionName,
    maxRetriesPerRequest: null, // Required for BullMQ
    enableReadyCheck: true,
    retryStrategy: (times: number) => {
      if (times > MAX_RECONNECT_ATTEMPTS) {
        logger.error({ connectionName }, `Redis connection failed after ${MAX_RECONNECT_ATTEMPTS} retries`);
        return null;
      }
      return Math.min(times * 100, 3000);
    },
  });

  redis.on('connect', () => {
    logger.info({ connectionName }, 'Redis connection established');
  });

  redis.on('error', (error: Error) => {
    logger.error({ connectionName, error }, 'Redis connection error');
  });

  redis.on('close', () => {
    logger.debug({ connectionName }, 'Redis connection closed');
  });

  connections.add(redis);
  return redis;
}

/**
 * Quit one connection and stop tracking it
 */
export async function closeRedisConnection(redis: Redis): Promise<void> {
  if (!connections.delete(redis)) {
    return;
  }
  await redis.quit();
}

/**
 * Close every connection opened through createRedisConnection
 */
export async function closeRedisConnections(): Promise<void> {
  const open = [...connections];
  connections.clear();
  await Promise.all(open.map((redis) => redis.quit()));
  if (open.length > 0) {
    logger.info({ count: open.length }, 'Redis connections closed');
  }
}
