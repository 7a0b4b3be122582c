/**
 * PartitionDropStrategy
 *
 * Executes a time-window plan: DROP TABLE for each expired partition, oldest
 * first, one statement at a time. No transaction spans the run; an interrupted
 * run leaves a partially pruned but valid table.
 *
 * A failed drop (e.g. a lock held by another session) is recorded and the
 * loop moves on. When the plan asks for it, the parent is dropped after every
 * partition has been attempted, whatever their outcome.
 */

import { logger } from '../config/logger';
import { qualifiedName } from '../database/identifiers';
import type { SqlClient } from '../database/types';
import { PartitionDropError } from '../errors/retention-errors';
import type { RetentionPolicy } from '../models/retention-policy';
import type { DropPartitionsPlan } from '../services/retention-decider';
import type { RetentionStrategy, StrategyContext, StrategyOutcome } from './retention-strategy.interface';

export class PartitionDropStrategy implements RetentionStrategy<DropPartitionsPlan> {
  readonly name = 'PartitionDropStrategy';

  constructor(private readonly db: SqlClient) {}

  async execute(plan: DropPartitionsPlan, policy: RetentionPolicy, context: StrategyContext): Promise<StrategyOutcome> {
    const outcome: StrategyOutcome = {
      partitionsDropped: [],
      errors: [],
      parentDropAttempted: false,
      parentDropped: false,
    };

    for (const partition of plan.partitionsToDrop) {
      if (context.dryRun) {
        outcome.partitionsDropped.push(partition.physicalName);
        continue;
      }

      try {
        await this.dropTable(partition.schema, partition.physicalName);
        outcome.partitionsDropped.push(partition.physicalName);
        logger.info('PartitionDropStrategy: Partition dropped', {
          runId: context.runId,
          partition: `${partition.schema}.${partition.physicalName}`,
          windowEnd: partition.windowEnd.toISOString(),
          cutoff: plan.cutoff.toISOString(),
        });
      } catch (error: unknown) {
        const dropError = new PartitionDropError(partition.schema, partition.physicalName, 'partition', error);
        outcome.errors.push(dropError);
        logger.error('PartitionDropStrategy: Partition drop failed', {
          runId: context.runId,
          partition: `${partition.schema}.${partition.physicalName}`,
          error: dropError.message,
        });
      }
    }

    if (plan.dropParent) {
      outcome.parentDropAttempted = true;
      if (context.dryRun) {
        outcome.parentDropped = true;
      } else {
        outcome.parentDropped = await this.dropParent(policy, context, outcome);
      }
    }

    return outcome;
  }

  private async dropParent(policy: RetentionPolicy, context: StrategyContext, outcome: StrategyOutcome): Promise<boolean> {
    const table = `${policy.targetSchema}.${policy.targetTable}`;
    try {
      await this.dropTable(policy.targetSchema, policy.targetTable);
      logger.warn('PartitionDropStrategy: Parent table dropped', {
        runId: context.runId,
        table,
      });
      return true;
    } catch (error: unknown) {
      const dropError = new PartitionDropError(policy.targetSchema, policy.targetTable, 'parent', error);
      outcome.errors.push(dropError);
      logger.error('PartitionDropStrategy: Parent drop failed', {
        runId: context.runId,
        table,
        error: dropError.message,
      });
      return false;
    }
  }

  private async dropTable(schema: string, table: string): Promise<void> {
    await this.db.query(`DROP TABLE IF EXISTS ${qualifiedName(schema, table)}`);
  }
}
