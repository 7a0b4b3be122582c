/**
 * RetentionDecider
 *
 * Pure planning step: partitions + policy + clock in, plan out. No I/O.
 *
 * time_window: drop every partition with windowEnd <= now - retention, oldest
 * first, so an interrupted run has already removed the oldest data.
 * condition:   no partition-level action; the plan says row deletion is needed.
 */

import {
  assertDisjointWindows,
  compareByWindowStart,
  type PartitionDescriptor,
} from '../models/partition-descriptor';
import { cutoffFor, type RetentionPolicy } from '../models/retention-policy';

export interface DropPartitionsPlan {
  readonly kind: 'drop_partitions';
  readonly cutoff: Date;
  readonly partitionsToDrop: readonly PartitionDescriptor[];
  readonly partitionsRetained: readonly PartitionDescriptor[];
  readonly dropParent: boolean;
}

export interface RowDeletionPlan {
  readonly kind: 'row_deletion';
  readonly cutoff: Date;
  readonly conditionExpression: string;
  readonly partitionsToDrop: readonly [];
  readonly dropParent: boolean;
}

export type RetentionPlan = DropPartitionsPlan | RowDeletionPlan;

/**
 * @throws PartitionOverlapError when two partitions claim the same time
 */
export function decideRetention(
  partitions: readonly PartitionDescriptor[],
  policy: RetentionPolicy,
  now: Date
): RetentionPlan {
  const cutoff = cutoffFor(policy, now);

  if (policy.mode === 'condition') {
    return {
      kind: 'row_deletion',
      cutoff,
      conditionExpression: policy.conditionExpression,
      partitionsToDrop: [],
      dropParent: policy.dropParentAfterPrune,
    };
  }

  const sorted = [...partitions].sort(compareByWindowStart);
  assertDisjointWindows(sorted);

  // Inclusive: a partition ending exactly at the cutoff holds nothing newer than it
  const isExpired = (partition: PartitionDescriptor) => partition.windowEnd.getTime() <= cutoff.getTime();

  return {
    kind: 'drop_partitions',
    cutoff,
    partitionsToDrop: sorted.filter(isExpired),
    partitionsRetained: sorted.filter((partition) => !isExpired(partition)),
    dropParent: policy.dropParentAfterPrune,
  };
}
