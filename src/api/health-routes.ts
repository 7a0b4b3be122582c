/**
 * Health Check Routes
 *
 * GET /health        liveness: always 200 while the process serves requests;
 *                    database_accessible says whether PostgreSQL answered
 * GET /health/ready  readiness: 503 until PostgreSQL answers, since every
 *                    retention run starts with a catalog read
 */

import { Router, Request, Response } from 'express';
import { config } from '../config';
import { logger } from '../config/logger';
import { db } from '../database/client';

const router = Router();

async function databaseAccessible(): Promise<boolean> {
  try {
    await db.query('SELECT 1');
    return true;
  } catch (error: unknown) {
    logger.warn('HealthRoutes: Database not accessible', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

router.get('/health', async (_req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    service: config.service.name,
    version: config.service.version,
    database_accessible: await databaseAccessible(),
  });
});

router.get('/health/ready', async (_req: Request, res: Response) => {
  const ready = await databaseAccessible();
  res.status(ready ? 200 : 503).json({ ready });
});

export { router as healthRoutes };
