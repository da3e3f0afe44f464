import { Router, Request, Response } from 'express';
import os from 'os';
import type { AppServices } from '../services/container';
import { checkDatabaseHealth } from '../config/database';
import { logger } from '../config/logger';

interface ServiceHealth {
  status: 'up' | 'down';
  responseTime?: number;
  error?: string;
}

interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  services: {
    database: ServiceHealth;
    warehouse: ServiceHealth;
  };
  system: {
    memory: {
      total: number;
      free: number;
      used: number;
      usagePercent: number;
    };
    cpu: {
      cores: number;
      loadAverage: number[];
    };
  };
}

async function timed(check: () => Promise<boolean> | boolean): Promise<ServiceHealth> {
  const startTime = Date.now();
  try {
    const healthy = await check();
    return { status: healthy ? 'up' : 'down', responseTime: Date.now() - startTime };
  } catch (error) {
    return { status: 'down', error: error instanceof Error ? error.message : String(error) };
  }
}

export function createHealthRouter({ database, warehouse }: Pick<AppServices, 'database' | 'warehouse'>): Router {
  const router = Router();

  /**
   * GET /api/health
   * Basic health check endpoint
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  });

  /**
   * GET /api/health/live
   * Kubernetes liveness probe endpoint
   */
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).send('OK');
  });

  /**
   * GET /api/health/ready
   * Ready once the conversation database answers
   */
  router.get('/ready', (_req: Request, res: Response) => {
    if (checkDatabaseHealth(database)) {
      res.status(200).send('OK');
    } else {
      logger.warn('Readiness check failed');
      res.status(503).send('Not Ready');
    }
  });

  /**
   * GET /api/health/detailed
   * Conversation database, warehouse and host details
   */
  router.get('/detailed', async (_req: Request, res: Response) => {
    const [databaseHealth, warehouseHealth] = await Promise.all([
      timed(() => checkDatabaseHealth(database)),
      timed(async () => (await warehouse.listDatasets()).length >= 0)
    ]);

    const health: HealthStatus = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      services: {
        database: databaseHealth,
        warehouse: warehouseHealth
      },
      system: {
        memory: {
          total: os.totalmem(),
          free: os.freemem(),
          used: os.totalmem() - os.freemem(),
          usagePercent: ((os.totalmem() - os.freemem()) / os.totalmem()) * 100
        },
        cpu: {
          cores: os.cpus().length,
          loadAverage: os.loadavg()
        }
      }
    };

    const down = [databaseHealth, warehouseHealth].filter(service => service.status === 'down').length;
    if (down === 2) {
      health.status = 'unhealthy';
    } else if (down === 1) {
      health.status = 'degraded';
    }

    const statusCode = health.status === 'healthy' ? 200 : health.status === 'degraded' ? 206 : 503;
    res.status(statusCode).json(health);
  });

  return router;
}
