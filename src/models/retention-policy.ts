/**
 * RetentionPolicy
 *
 * Immutable description of how long a partitioned table keeps its data.
 *
 *   - time_window: partitions whose window ends at or before now - retentionSeconds are dropped
 *   - condition:   rows matching conditionExpression are to be deleted (not implemented yet)
 *
 * dropParentAfterPrune drops the parent table once partitions are pruned. It is
 * destructive beyond retention and therefore off unless set explicitly.
 */

import { ConfigurationError } from '../errors/retention-errors';

export const RETENTION_MODES = ['time_window', 'condition'] as const;

export type RetentionMode = (typeof RETENTION_MODES)[number];

interface RetentionPolicyBase {
  readonly targetSchema: string;
  readonly targetTable: string;
  readonly retentionSeconds: number;
  readonly dropParentAfterPrune: boolean;
}

export interface TimeWindowRetentionPolicy extends RetentionPolicyBase {
  readonly mode: 'time_window';
}

export interface ConditionRetentionPolicy extends RetentionPolicyBase {
  readonly mode: 'condition';
  readonly conditionExpression: string;
}

export type RetentionPolicy = TimeWindowRetentionPolicy | ConditionRetentionPolicy;

export interface RetentionPolicyInput {
  targetSchema?: string;
  targetTable: string;
  retentionSeconds: number;
  mode?: string;
  conditionExpression?: string;
  dropParentAfterPrune?: boolean;
}

export function isRetentionMode(value: string): value is RetentionMode {
  return (RETENTION_MODES as readonly string[]).includes(value);
}

/**
 * Validate input and build a frozen policy.
 *
 * @throws ConfigurationError when the table is missing, the duration is not
 *   positive, the mode is unknown, or the condition does not match the mode
 */
export function createRetentionPolicy(input: RetentionPolicyInput): RetentionPolicy {
  const targetSchema = (input.targetSchema ?? 'public').trim();
  const targetTable = input.targetTable.trim();
  const mode = input.mode ?? 'time_window';
  const conditionExpression = input.conditionExpression?.trim() ?? '';

  if (targetTable === '') {
    throw new ConfigurationError('Retention policy requires a target table');
  }
  if (targetSchema === '') {
    throw new ConfigurationError('Retention policy requires a target schema', { targetTable });
  }
  if (!Number.isFinite(input.retentionSeconds) || input.retentionSeconds <= 0) {
    throw new ConfigurationError('Retention duration must be a positive number of seconds', {
      targetTable,
      retentionSeconds: input.retentionSeconds,
    });
  }
  if (!isRetentionMode(mode)) {
    throw new ConfigurationError(`Unknown retention mode "${mode}"`, {
      targetTable,
      allowed: RETENTION_MODES,
    });
  }

  const base: RetentionPolicyBase = {
    targetSchema,
    targetTable,
    retentionSeconds: input.retentionSeconds,
    dropParentAfterPrune: input.dropParentAfterPrune ?? false,
  };

  if (mode === 'condition') {
    if (conditionExpression === '') {
      throw new ConfigurationError('Condition mode requires a condition expression', { targetTable });
    }
    return Object.freeze({ ...base, mode, conditionExpression });
  }

  if (conditionExpression !== '') {
    throw new ConfigurationError('A condition expression is only valid in condition mode', {
      targetTable,
    });
  }
  return Object.freeze({ ...base, mode });
}

export function cutoffFor(policy: RetentionPolicy, now: Date): Date {
  return new Date(now.getTime() - policy.retentionSeconds * 1000);
}
