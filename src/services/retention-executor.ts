/**
 * RetentionExecutor
 *
 * Service layer entry point: apply one retention policy now.
 *
 * Responsibilities:
 *   - Confirm the target table exists
 *   - Re-read the partition catalog (never cached across runs); time_window only
 *   - Compute the plan with the decider
 *   - Hand the plan to the strategy for its kind
 *   - Build the RetentionReport, record metrics, log the run
 *
 * The caller gets either a report (possibly with per-partition failures) or
 * the single error that stopped the run.
 *
 * Runs are not reentrant: two concurrent applies against one table are not
 * coordinated here.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import { RetentionError, TargetTableNotFoundError } from '../errors/retention-errors';
import { partitionDropFailures, partitionsDropped, retentionRuns, runDuration } from '../metrics/retention-metrics';
import type { RetentionPolicy } from '../models/retention-policy';
import type { PartitionCatalog } from '../repositories/partition-catalog.repository';
import type {
  RetentionReport,
  RetentionStrategy,
  StrategyContext,
  StrategyOutcome,
} from '../strategies/retention-strategy.interface';
import { decideRetention, type DropPartitionsPlan, type RetentionPlan, type RowDeletionPlan } from './retention-decider';

export interface RetentionStrategies {
  partitionDrop: RetentionStrategy<DropPartitionsPlan>;
  rowDeletion: RetentionStrategy<RowDeletionPlan>;
}

export interface ApplyOptions {
  // Defaults to the database server's clock
  now?: Date;
  dryRun?: boolean;
}

type CatalogReader = Pick<PartitionCatalog, 'tableExists' | 'listPartitions' | 'serverTime'>;

export class RetentionExecutor {
  constructor(
    private readonly catalog: CatalogReader,
    private readonly strategies: RetentionStrategies
  ) {}

  async apply(policy: RetentionPolicy, options: ApplyOptions = {}): Promise<RetentionReport> {
    const runId = uuidv4();
    const startedAt = new Date();
    const dryRun = options.dryRun ?? false;
    const table = `${policy.targetSchema}.${policy.targetTable}`;
    const endTimer = runDuration.startTimer({ mode: policy.mode });

    logger.info('RetentionExecutor: Starting retention run', {
      runId,
      table,
      mode: policy.mode,
      retentionSeconds: policy.retentionSeconds,
      dropParentAfterPrune: policy.dropParentAfterPrune,
      dryRun,
    });

    try {
      if (!(await this.catalog.tableExists(policy.targetSchema, policy.targetTable))) {
        throw new TargetTableNotFoundError(policy.targetSchema, policy.targetTable);
      }

      // Row deletion does not act on partition windows, so it never depends on parsing them
      const partitions =
        policy.mode === 'condition' ? [] : await this.catalog.listPartitions(policy.targetSchema, policy.targetTable);
      const now = options.now ?? (await this.catalog.serverTime());
      const plan = decideRetention(partitions, policy, now);

      logger.info('RetentionExecutor: Plan computed', {
        runId,
        table,
        kind: plan.kind,
        cutoff: plan.cutoff.toISOString(),
        partitionsFound: partitions.length,
        partitionsToDrop: plan.partitionsToDrop.map((partition) => partition.physicalName),
        dropParent: plan.dropParent,
      });

      const outcome = await this.executePlan(plan, policy, { runId, dryRun });

      const report: RetentionReport = {
        runId,
        targetSchema: policy.targetSchema,
        targetTable: policy.targetTable,
        mode: policy.mode,
        dryRun,
        cutoff: plan.cutoff,
        startedAt,
        completedAt: new Date(),
        partitionsDropped: outcome.partitionsDropped,
        partitionsRetained: plan.kind === 'drop_partitions' ? plan.partitionsRetained.length : partitions.length,
        droppedCount: outcome.partitionsDropped.length,
        failedCount: outcome.errors.filter((error) => error.target === 'partition').length,
        parentDropAttempted: outcome.parentDropAttempted,
        parentDropped: outcome.parentDropped,
        errors: outcome.errors,
      };

      if (!dryRun) {
        partitionsDropped.inc({ table }, report.droppedCount);
        partitionDropFailures.inc({ table }, outcome.errors.length);
      }
      retentionRuns.inc({ mode: policy.mode, outcome: outcome.errors.length > 0 ? 'partial' : 'success' });

      logger.info('RetentionExecutor: Retention run complete', {
        runId,
        table,
        droppedCount: report.droppedCount,
        failedCount: report.failedCount,
        partitionsRetained: report.partitionsRetained,
        parentDropped: report.parentDropped,
        dryRun,
      });

      return report;
    } catch (error: unknown) {
      retentionRuns.inc({ mode: policy.mode, outcome: 'failed' });
      logger.error('RetentionExecutor: Retention run failed', {
        runId,
        table,
        code: error instanceof RetentionError ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      throw error;
    } finally {
      endTimer();
    }
  }

  private executePlan(plan: RetentionPlan, policy: RetentionPolicy, context: StrategyContext): Promise<StrategyOutcome> {
    switch (plan.kind) {
      case 'drop_partitions':
        return this.strategies.partitionDrop.execute(plan, policy, context);
      case 'row_deletion':
        return this.strategies.rowDeletion.execute(plan, policy, context);
    }
  }
}
