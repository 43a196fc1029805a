/**
 * Redis Configuration
 *
 * Client behind the lookup-store sink. Reconnects with linear backoff
 * capped at 3s and gives up after 10 attempts; while disconnected, sink
 * writes fail and the dispatcher retries them.
 */

import { createClient } from 'redis';
import type { AppConfig } from './env';
import { logger } from '../utils/logger';

export type RedisClient = ReturnType<typeof createClient>;

export function maskRedisUrl(url: string): string {
  return url.replace(/:[^:@/]*@/, ':***@');
}

export function createRedisClient(config: AppConfig['redis']): RedisClient {
  const client = createClient({
    url: config.url,
    socket: {
      reconnectStrategy: (retries) => {
        if (retries > 10) {
          logger.error('Redis reconnection attempts exceeded', { retries });
          return new Error('Redis reconnection failed');
        }
        const delay = Math.min(retries * 100, 3000);
        logger.warn('Redis reconnecting', { retries, delay });
        return delay;
      },
    },
  });

  client.on('error', (error: Error) => {
    logger.error('Redis client error', { error: error.message });
  });

  client.on('ready', () => {
    logger.info('Redis client ready', { url: maskRedisUrl(config.url) });
  });

  return client;
}

export async function disconnectRedis(client: RedisClient): Promise<void> {
  if (!client.isOpen) return;

  try {
    await client.quit();
    logger.info('Redis connection closed');
  } catch (error) {
    logger.error('Error closing Redis connection', {
      error: error instanceof Error ? error.message : 'Unknown',
    });
  }
}
