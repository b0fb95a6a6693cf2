import { Router, Request, Response } from 'express';
import { checkDatabaseHealth } from '../config/database';
import { checkRedisHealth } from '../config/redis';

const router = Router();

router.get('/health', async (_req: Request, res: Response) => {
  const [dbHealth, redisHealth] = await Promise.all([checkDatabaseHealth(), checkRedisHealth()]);

  const healthy = dbHealth.status === 'healthy' && redisHealth.status === 'healthy';

  res.status(healthy ? 200 : 503).json({
    status: healthy ? 'healthy' : 'degraded',
    database: dbHealth,
    redis: redisHealth,
    timestamp: new Date().toISOString(),
  });
});

export default router;
