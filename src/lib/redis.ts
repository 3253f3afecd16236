import Redis from 'ioredis';
import type { Logger } from './logger';

/**
 * Creates the Redis client shared by the draft store and the extraction cache.
 * The caller owns the client and quits it on shutdown.
 */
export function createRedisClient(url: string, logger: Logger): Redis {
  const client = new Redis(url);
  const log = logger.child({ component: 'redis' });

  // Event listeners for Redis connection status
  client.on('connect', () => {
    log.info('Connected to Redis');
  });

  client.on('error', (err: Error) => {
    log.error({ err }, 'Redis error');
  });

  client.on('ready', () => {
    log.info('Redis client is ready');
  });

  client.on('reconnecting', () => {
    log.warn('Redis client is reconnecting...');
  });

  client.on('end', () => {
    log.info('Redis client connection ended');
  });

  return client;
}
