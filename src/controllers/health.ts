import { Request, Response } from 'express';
import { promises as fs } from 'fs';
import { join } from 'path';
import { db } from '@/database/pool';
import { appConfig, storageConfig } from '@/config';
import { lotSupervisor } from '@/services/lot-supervisor';
import { HealthStatus } from '@/types';
import { logger } from '@/utils/logger';
import { asyncHandler } from '@/utils';

const VERSION = '1.0.0';

const withTimeout = <T>(promise: Promise<T>, ms: number, label: string): Promise<T> =>
  Promise.race([
    promise,
    new Promise<T>((_, reject) => setTimeout(() => reject(new Error(`${label} timeout`)), ms).unref())
  ]);

const checkDatabase = async (): Promise<HealthStatus['services']['database']> => {
  try {
    const connected = await withTimeout(db.testConnection(), appConfig.health.timeout, 'Database');
    return connected ? 'connected' : 'error';
  } catch (error) {
    logger.error('Database health check failed:', error);
    return 'error';
  }
};

const checkStorage = async (): Promise<HealthStatus['services']['storage']> => {
  try {
    await fs.mkdir(storageConfig.dataRoot, { recursive: true });
    const testFile = join(storageConfig.dataRoot, `.health-test-${Date.now()}`);
    await fs.writeFile(testFile, 'test');
    await fs.unlink(testFile);
    return 'writable';
  } catch (error) {
    logger.error('Data root health check failed:', error);
    return 'readonly';
  }
};

export const healthCheck = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  const startTime = Date.now();
  const [database, storage] = await Promise.all([checkDatabase(), checkStorage()]);

  const healthStatus: HealthStatus = {
    status: 'healthy',
    timestamp: new Date().toISOString(),
    version: VERSION,
    uptime: process.uptime(),
    services: { database, storage },
    pipelines: lotSupervisor.status().length
  };

  // Database down: unhealthy. Data root unwritable: degraded.
  if (database !== 'connected') {
    healthStatus.status = 'unhealthy';
  } else if (storage !== 'writable') {
    healthStatus.status = 'degraded';
  }

  logger.debug('Health check completed:', {
    status: healthStatus.status,
    services: healthStatus.services,
    pool: db.getPoolStats(),
    responseTime: Date.now() - startTime
  });

  res.status(healthStatus.status === 'unhealthy' ? 503 : 200).json({
    data: healthStatus
  });
});

export const readiness = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  const database = await checkDatabase();

  if (database !== 'connected') {
    res.status(503).json({
      data: { ready: false, reason: 'Database not ready' },
      error: {
        message: 'Readiness check failed',
        code: 'NOT_READY'
      }
    });
    return;
  }

  res.json({
    data: { ready: true }
  });
});

export const liveness = asyncHandler(async (req: Request, res: Response): Promise<void> => {
  res.json({
    data: {
      alive: true,
      uptime: process.uptime(),
      timestamp: new Date().toISOString()
    }
  });
});
