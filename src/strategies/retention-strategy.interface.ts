/**
 * Retention Strategy Interface
 *
 * Defines the contract for executing a retention plan. Each plan kind has its
 * own strategy (partition drop for time windows, row deletion for conditions),
 * so either can change without touching the other.
 */

import type { PartitionDropError } from '../errors/retention-errors';
import type { RetentionMode, RetentionPolicy } from '../models/retention-policy';
import type { RetentionPlan } from '../services/retention-decider';

export interface StrategyContext {
  runId: string;
  dryRun: boolean;
}

export interface StrategyOutcome {
  // Names in the order they were dropped (or would be, in dry run)
  partitionsDropped: string[];
  errors: PartitionDropError[];
  parentDropAttempted: boolean;
  parentDropped: boolean;
}

export interface RetentionStrategy<P extends RetentionPlan = RetentionPlan> {
  readonly name: string;
  execute(plan: P, policy: RetentionPolicy, context: StrategyContext): Promise<StrategyOutcome>;
}

export interface RetentionReport {
  runId: string;
  targetSchema: string;
  targetTable: string;
  mode: RetentionMode;
  dryRun: boolean;
  cutoff: Date;
  startedAt: Date;
  completedAt: Date;
  partitionsDropped: string[];
  partitionsRetained: number;
  droppedCount: number;
  failedCount: number;
  parentDropAttempted: boolean;
  parentDropped: boolean;
  errors: PartitionDropError[];
}
