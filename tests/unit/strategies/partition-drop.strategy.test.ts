/**
 * PartitionDropStrategy Unit Tests
 *
 * Drops run oldest first, one statement each; failures are recorded and the
 * loop continues; the parent drop (when requested) comes last.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { PartitionDropStrategy } from '../../../src/strategies/partition-drop.strategy';
import { createRetentionPolicy } from '../../../src/models/retention-policy';
import type { PartitionDescriptor } from '../../../src/models/partition-descriptor';
import type { DropPartitionsPlan } from '../../../src/services/retention-decider';
import { PartitionDropError } from '../../../src/errors/retention-errors';
import type { SqlClient } from '../../../src/database/types';

function partition(name: string, start: string, schema = 'public'): PartitionDescriptor {
  const windowStart = new Date(start);
  return {
    physicalName: name,
    schema,
    parentTable: 'test_table1',
    windowStart,
    windowEnd: new Date(windowStart.getTime() + 1000),
  };
}

function plan(partitionsToDrop: PartitionDescriptor[], dropParent = false): DropPartitionsPlan {
  return {
    kind: 'drop_partitions',
    cutoff: new Date('2024-03-01T11:59:45Z'),
    partitionsToDrop,
    partitionsRetained: [],
    dropParent,
  };
}

describe('PartitionDropStrategy', () => {
  const context = { runId: 'run-1', dryRun: false };
  const policy = createRetentionPolicy({ targetTable: 'test_table1', retentionSeconds: 15 });
  const p1 = partition('test_table1_p20240301_115940', '2024-03-01T11:59:40Z');
  const p2 = partition('test_table1_p20240301_115941', '2024-03-01T11:59:41Z');
  const p3 = partition('test_table1_p20240301_115942', '2024-03-01T11:59:42Z');

  let mockDb: { query: Mock<SqlClient['query']> };
  let strategy: PartitionDropStrategy;

  beforeEach(() => {
    mockDb = { query: vi.fn<SqlClient['query']>().mockResolvedValue([]) };
    strategy = new PartitionDropStrategy(mockDb);
  });

  it('should have name "PartitionDropStrategy"', () => {
    expect(strategy.name).toBe('PartitionDropStrategy');
  });

  it('should issue one quoted DROP TABLE per partition, in plan order', async () => {
    const outcome = await strategy.execute(plan([p1, p2]), policy, context);

    expect(mockDb.query.mock.calls).toEqual([
      ['DROP TABLE IF EXISTS "public"."test_table1_p20240301_115940"'],
      ['DROP TABLE IF EXISTS "public"."test_table1_p20240301_115941"'],
    ]);
    expect(outcome).toEqual({
      partitionsDropped: ['test_table1_p20240301_115940', 'test_table1_p20240301_115941'],
      errors: [],
      parentDropAttempted: false,
      parentDropped: false,
    });
  });

  it('should drop each partition in its own schema', async () => {
    await strategy.execute(plan([partition('test_table1_p20240301_115940', '2024-03-01T11:59:40Z', 'archive')]), policy, context);

    expect(mockDb.query).toHaveBeenCalledWith('DROP TABLE IF EXISTS "archive"."test_table1_p20240301_115940"');
  });

  it('should escape double quotes in identifiers', async () => {
    await strategy.execute(plan([partition('odd"name_p20240301_115940', '2024-03-01T11:59:40Z')]), policy, context);

    expect(mockDb.query).toHaveBeenCalledWith('DROP TABLE IF EXISTS "public"."odd""name_p20240301_115940"');
  });

  it('should record a failed drop and continue with the rest', async () => {
    mockDb.query
      .mockResolvedValueOnce([])
      .mockRejectedValueOnce(new Error('could not obtain lock on relation'))
      .mockResolvedValueOnce([]);

    const outcome = await strategy.execute(plan([p1, p2, p3]), policy, context);

    expect(mockDb.query).toHaveBeenCalledTimes(3);
    expect(outcome.partitionsDropped).toEqual(['test_table1_p20240301_115940', 'test_table1_p20240301_115942']);
    expect(outcome.errors).toHaveLength(1);
    expect(outcome.errors[0]).toBeInstanceOf(PartitionDropError);
    expect(outcome.errors[0].tableName).toBe('test_table1_p20240301_115941');
    expect(outcome.errors[0].target).toBe('partition');
    expect(outcome.errors[0].message).toBe(
      'Failed to drop partition public.test_table1_p20240301_115941: could not obtain lock on relation'
    );
  });

  it('should drop the parent after all partitions when the plan asks for it', async () => {
    const outcome = await strategy.execute(plan([p1], true), policy, context);

    expect(mockDb.query).toHaveBeenLastCalledWith('DROP TABLE IF EXISTS "public"."test_table1"');
    expect(outcome.parentDropAttempted).toBe(true);
    expect(outcome.parentDropped).toBe(true);
  });

  it('should still attempt the parent drop after a partition failure', async () => {
    mockDb.query.mockRejectedValueOnce(new Error('lock timeout')).mockResolvedValue([]);

    const outcome = await strategy.execute(plan([p1, p2], true), policy, context);

    expect(mockDb.query).toHaveBeenCalledTimes(3);
    expect(mockDb.query).toHaveBeenLastCalledWith('DROP TABLE IF EXISTS "public"."test_table1"');
    expect(outcome.errors).toHaveLength(1);
    expect(outcome.parentDropped).toBe(true);
  });

  it('should record a failed parent drop', async () => {
    mockDb.query.mockResolvedValueOnce([]).mockRejectedValueOnce(new Error('cannot drop table because other objects depend on it'));

    const outcome = await strategy.execute(plan([p1], true), policy, context);

    expect(outcome.partitionsDropped).toEqual(['test_table1_p20240301_115940']);
    expect(outcome.parentDropAttempted).toBe(true);
    expect(outcome.parentDropped).toBe(false);
    expect(outcome.errors).toHaveLength(1);
    expect(outcome.errors[0].target).toBe('parent');
    expect(outcome.errors[0].tableName).toBe('test_table1');
  });

  it('should leave the parent alone when the plan does not ask for it', async () => {
    const outcome = await strategy.execute(plan([], false), policy, context);

    expect(mockDb.query).not.toHaveBeenCalled();
    expect(outcome.parentDropAttempted).toBe(false);
  });

  it('should support dry run mode without executing DROP', async () => {
    const outcome = await strategy.execute(plan([p1, p2], true), policy, { runId: 'run-2', dryRun: true });

    expect(mockDb.query).not.toHaveBeenCalled();
    expect(outcome.partitionsDropped).toEqual(['test_table1_p20240301_115940', 'test_table1_p20240301_115941']);
    expect(outcome.parentDropAttempted).toBe(true);
    expect(outcome.parentDropped).toBe(true);
  });
});
