/**
 * ConditionDeleteStrategy
 *
 * Row-level deletion for condition-mode policies:
 *   DELETE FROM {schema}.{table} WHERE {conditionExpression}
 *
 * Not implemented. Running an arbitrary predicate string needs a safe way to
 * build the WHERE clause first, so the strategy refuses instead of reporting an
 * empty success.
 */

import { logger } from '../config/logger';
import { NotImplementedError } from '../errors/retention-errors';
import type { RetentionPolicy } from '../models/retention-policy';
import type { RowDeletionPlan } from '../services/retention-decider';
import type { RetentionStrategy, StrategyContext, StrategyOutcome } from './retention-strategy.interface';

export class ConditionDeleteStrategy implements RetentionStrategy<RowDeletionPlan> {
  readonly name = 'ConditionDeleteStrategy';

  async execute(plan: RowDeletionPlan, policy: RetentionPolicy, context: StrategyContext): Promise<StrategyOutcome> {
    logger.warn('ConditionDeleteStrategy: Row deletion requested', {
      runId: context.runId,
      table: `${policy.targetSchema}.${policy.targetTable}`,
      condition: plan.conditionExpression,
      dryRun: context.dryRun,
    });

    throw new NotImplementedError('Condition-based row deletion is not implemented', {
      schema: policy.targetSchema,
      table: policy.targetTable,
      condition: plan.conditionExpression,
    });
  }
}
