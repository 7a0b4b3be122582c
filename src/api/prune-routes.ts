/**
 * Prune Routes
 *
 * POST /prune applies a retention policy to each listed table, in order.
 *
 * Request:
 *   {
 *     "tables": [{
 *       "table_name": "test_table1",
 *       "schema_name": "public",
 *       "retention_policy": { "mode": "time_window", "retention_seconds": 15 }
 *     }],
 *     "dry_run": false
 *   }
 *
 * A malformed body is rejected with 400. Otherwise every table gets its own
 * result: one table failing does not stop the others.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { logger } from '../config/logger';
import { RetentionError } from '../errors/retention-errors';
import { createRetentionPolicy, RETENTION_MODES } from '../models/retention-policy';
import type { RetentionExecutor } from '../services/retention-executor';
import type { RetentionReport } from '../strategies/retention-strategy.interface';

const retentionPolicySchema = z.object({
  mode: z.enum(RETENTION_MODES).default('time_window'),
  retention_seconds: z.number(),
  condition_expression: z.string().optional(),
  drop_parent_after_prune: z.boolean().default(false),
});

const pruneRequestSchema = z.object({
  tables: z
    .array(
      z.object({
        table_name: z.string().min(1),
        schema_name: z.string().min(1).default('public'),
        retention_policy: retentionPolicySchema,
      })
    )
    .min(1),
  dry_run: z.boolean().default(false),
});

export type PruneRequest = z.infer<typeof pruneRequestSchema>;

export interface PruneResult {
  table_name: string;
  schema_name: string;
  status: 'success' | 'error';
  message: string;
  code?: string;
  report?: ReturnType<typeof toReportBody>;
}

function toReportBody(report: RetentionReport) {
  return {
    run_id: report.runId,
    mode: report.mode,
    dry_run: report.dryRun,
    cutoff: report.cutoff.toISOString(),
    partitions_dropped: report.partitionsDropped,
    partitions_retained: report.partitionsRetained,
    dropped_count: report.droppedCount,
    failed_count: report.failedCount,
    parent_drop_attempted: report.parentDropAttempted,
    parent_dropped: report.parentDropped,
    errors: report.errors.map((error) => ({
      table: `${error.schema}.${error.tableName}`,
      target: error.target,
      message: error.message,
    })),
  };
}

export function createPruneRoutes(executor: Pick<RetentionExecutor, 'apply'>): Router {
  const router = Router();

  router.post('/prune', async (req: Request, res: Response) => {
    const parsed = pruneRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid prune request',
        issues: parsed.error.issues,
      });
      return;
    }

    const { tables, dry_run: dryRun } = parsed.data;
    logger.info('PruneRoutes: Prune request received', {
      tables: tables.length,
      dryRun,
    });

    const results: PruneResult[] = [];

    for (const table of tables) {
      const qualified = `${table.schema_name}.${table.table_name}`;
      try {
        const policy = createRetentionPolicy({
          targetSchema: table.schema_name,
          targetTable: table.table_name,
          mode: table.retention_policy.mode,
          retentionSeconds: table.retention_policy.retention_seconds,
          conditionExpression: table.retention_policy.condition_expression,
          dropParentAfterPrune: table.retention_policy.drop_parent_after_prune,
        });

        const report = await executor.apply(policy, { dryRun });

        results.push({
          table_name: table.table_name,
          schema_name: table.schema_name,
          status: report.errors.length > 0 ? 'error' : 'success',
          message:
            report.errors.length > 0
              ? `Processed ${qualified} with ${report.errors.length} failed drop(s)`
              : `Successfully processed ${qualified}`,
          report: toReportBody(report),
        });
      } catch (error: unknown) {
        logger.warn('PruneRoutes: Table not processed', {
          table: qualified,
          error: error instanceof Error ? error.message : String(error),
        });
        results.push({
          table_name: table.table_name,
          schema_name: table.schema_name,
          status: 'error',
          message: error instanceof Error ? error.message : String(error),
          code: error instanceof RetentionError ? error.code : undefined,
        });
      }
    }

    res.json({ results });
  });

  return router;
}
