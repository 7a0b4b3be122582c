/**
 * Partition Retention Service
 *
 * Main entry point.
 *
 * Responsibilities:
 *   - Expose health, metrics and prune endpoints
 *   - Apply the configured retention policy on startup (cron job mode)
 *   - Re-apply it on a fixed cadence in continuous mode
 *   - Graceful shutdown
 */

import express from 'express';
import { config } from './config';
import { logger } from './config/logger';
import { db } from './database/client';
import { RetentionError } from './errors/retention-errors';
import { healthRoutes } from './api/health-routes';
import { metricsRoutes } from './api/metrics-routes';
import { createPruneRoutes } from './api/prune-routes';
import { createRetentionPolicy, type RetentionPolicy } from './models/retention-policy';
import { PartitionCatalog } from './repositories/partition-catalog.repository';
import { RetentionExecutor } from './services/retention-executor';
import { ConditionDeleteStrategy } from './strategies/condition-delete.strategy';
import { PartitionDropStrategy } from './strategies/partition-drop.strategy';

function createExecutor(): RetentionExecutor {
  const catalog = new PartitionCatalog(db, {
    partitionIntervalSeconds: config.retention.partitionIntervalSeconds,
  });
  return new RetentionExecutor(catalog, {
    partitionDrop: new PartitionDropStrategy(db),
    rowDeletion: new ConditionDeleteStrategy(),
  });
}

let executor: RetentionExecutor;
try {
  executor = createExecutor();
} catch (error: unknown) {
  logger.error('Partition Retention Service: Invalid configuration', {
    error: error instanceof Error ? error.message : String(error),
    code: error instanceof RetentionError ? error.code : undefined,
  });
  process.exit(1);
}

const app = express();

app.set('trust proxy', true);

// Middleware
app.use(express.json());

// Routes
app.use(healthRoutes);
app.use(metricsRoutes);
app.use(createPruneRoutes(executor));

let nextRun: NodeJS.Timeout | undefined;

async function applyConfiguredPolicy(policy: RetentionPolicy): Promise<void> {
  const report = await executor.apply(policy, { dryRun: config.runner.dryRun });
  logger.info('Partition Retention Service: Run finished', {
    runId: report.runId,
    droppedCount: report.droppedCount,
    failedCount: report.failedCount,
    parentDropped: report.parentDropped,
  });
}

// Next run is scheduled only after the previous one settles, so runs never overlap
function scheduleNextRun(policy: RetentionPolicy): void {
  nextRun = setTimeout(() => {
    applyConfiguredPolicy(policy)
      .catch((error: unknown) => {
        logger.error('Partition Retention Service: Scheduled run failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => scheduleNextRun(policy));
  }, config.runner.intervalSeconds * 1000);
}

async function shutdown(exitCode: number): Promise<never> {
  if (nextRun) {
    clearTimeout(nextRun);
  }
  await db.close();
  process.exit(exitCode);
}

// Start server
const server = app.listen(config.port, async () => {
  logger.info(`Partition Retention Service: Server started on port ${config.port}`);

  if (!config.runner.runOnStartup) {
    return;
  }

  let policy: RetentionPolicy;
  try {
    policy = createRetentionPolicy(config.retention);
    await applyConfiguredPolicy(policy);
  } catch (error: unknown) {
    logger.error('Partition Retention Service: Retention run failed', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    await shutdown(1);
    return;
  }

  if (config.runner.continuousMode) {
    logger.info('Partition Retention Service: Continuous mode', {
      intervalSeconds: config.runner.intervalSeconds,
    });
    scheduleNextRun(policy);
  } else {
    logger.info('Partition Retention Service: Exiting after run (cron job mode)');
    await shutdown(0);
  }
});

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('Partition Retention Service: SIGTERM received, shutting down gracefully');
  server.close(() => {
    logger.info('Partition Retention Service: Server closed');
    shutdown(0).catch((error: unknown) => {
      logger.error('Partition Retention Service: Shutdown failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  });
});

export { app };
