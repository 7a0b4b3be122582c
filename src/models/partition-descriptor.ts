import { PartitionOverlapError } from '../errors/retention-errors';

/**
 * One physical child partition and the half-open [windowStart, windowEnd)
 * time range it holds, as encoded in its name.
 */
export interface PartitionDescriptor {
  readonly physicalName: string;
  readonly schema: string;
  readonly parentTable: string;
  readonly windowStart: Date;
  readonly windowEnd: Date;
}

export function compareByWindowStart(a: PartitionDescriptor, b: PartitionDescriptor): number {
  return a.windowStart.getTime() - b.windowStart.getTime() || a.physicalName.localeCompare(b.physicalName);
}

/**
 * Siblings must cover disjoint windows. Expects partitions sorted by windowStart.
 *
 * @throws PartitionOverlapError on the first overlapping pair
 */
export function assertDisjointWindows(sorted: readonly PartitionDescriptor[]): void {
  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    if (previous.windowEnd.getTime() > current.windowStart.getTime()) {
      throw new PartitionOverlapError(previous.physicalName, current.physicalName);
    }
  }
}
