import { Router, type Request, type Response } from 'express';
import type { SyncStore } from '../store/syncStore';

export interface HealthStatus {
  status: 'healthy' | 'unhealthy' | 'degraded';
  timestamp: string;
  uptime: number;
  checks: {
    storage: { status: string; latency?: number };
    memory: { used: number; total: number; percentage: number };
  };
}

/**
 * Storage round trip plus heap usage. Unhealthy when the store is unreachable.
 */
export const checkHealth = (store: SyncStore): HealthStatus => {
  const health: HealthStatus = {
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    checks: {
      storage: { status: 'unknown' },
      memory: { used: 0, total: 0, percentage: 0 },
    },
  };

  try {
    const start = Date.now();
    store.ping();
    health.checks.storage = { status: 'open', latency: Date.now() - start };
  } catch {
    health.checks.storage = { status: 'unavailable' };
    health.status = 'unhealthy';
  }

  const memUsage = process.memoryUsage();
  health.checks.memory = {
    used: Math.round(memUsage.heapUsed / 1024 / 1024),
    total: Math.round(memUsage.heapTotal / 1024 / 1024),
    percentage: Math.round((memUsage.heapUsed / memUsage.heapTotal) * 100),
  };

  // Memory warning if > 90%
  if (health.checks.memory.percentage > 90 && health.status === 'healthy') {
    health.status = 'degraded';
  }

  return health;
};

export const createHealthRoutes = (store: SyncStore): Router => {
  const router = Router();

  // GET /health - Basic health check
  router.get('/', (req: Request, res: Response) => {
    const health = checkHealth(store);
    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  });

  // GET /health/live - liveness probe
  router.get('/live', (req: Request, res: Response) => {
    res.status(200).json({ status: 'alive' });
  });

  // GET /health/ready - readiness probe
  router.get('/ready', (req: Request, res: Response) => {
    try {
      store.ping();
      res.status(200).json({ status: 'ready' });
    } catch {
      res.status(503).json({ status: 'not ready', error: 'Sync store unavailable' });
    }
  });

  return router;
};
