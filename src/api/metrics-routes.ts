/**
 * Metrics Routes
 *
 * Prometheus exposition of the retention counters plus Node process defaults.
 */

import { Router, Request, Response } from 'express';
import { collectDefaultMetrics, register } from 'prom-client';
import '../metrics/retention-metrics';

collectDefaultMetrics();

const router = Router();

router.get('/metrics', async (_req: Request, res: Response) => {
  res.set('Content-Type', register.contentType);
  res.end(await register.metrics());
});

export { router as metricsRoutes };
