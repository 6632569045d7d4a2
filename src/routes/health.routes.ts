import { Router, Request, Response } from 'express';
import { RedisClient, checkRedisHealth } from '../config/redis';

export function createHealthRouter(redis: RedisClient): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const redisHealth = await checkRedisHealth(redis);
    const healthy = redisHealth.status === 'healthy';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      redis: redisHealth,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
