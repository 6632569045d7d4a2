import { createClient } from 'redis';
import { logger } from '../utils/logger';

export type RedisClient = ReturnType<typeof createClient>;

export function createRedisClient(url: string): RedisClient {
  const client = createClient({
    url,
    socket: {
      connectTimeout: 30000,
      reconnectStrategy: (retries) => Math.min(retries * 500, 5000),
    },
  });

  client.on('error', (err: Error) => {
    logger.error('Redis error', { error: err.message });
  });

  client.on('connect', () => {
    logger.info('Redis connected');
  });

  return client;
}

export async function connectRedis(client: RedisClient): Promise<void> {
  if (!client.isOpen) {
    await client.connect();
  }
}

export async function checkRedisHealth(client: RedisClient): Promise<{ status: string; error?: string }> {
  try {
    await client.ping();
    return { status: 'healthy' };
  } catch (error: unknown) {
    return { status: 'unhealthy', error: error instanceof Error ? error.message : String(error) };
  }
}
