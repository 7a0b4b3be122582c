/**
 * Prune Routes Unit Tests
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import express from 'express';
import request from 'supertest';
import { createPruneRoutes } from '../../../src/api/prune-routes';
import { NotImplementedError, PartitionDropError } from '../../../src/errors/retention-errors';
import type { RetentionPolicy } from '../../../src/models/retention-policy';
import type { RetentionReport } from '../../../src/strategies/retention-strategy.interface';

function report(policy: RetentionPolicy, overrides: Partial<RetentionReport> = {}): RetentionReport {
  return {
    runId: 'run-1',
    targetSchema: policy.targetSchema,
    targetTable: policy.targetTable,
    mode: policy.mode,
    dryRun: false,
    cutoff: new Date('2024-03-01T11:59:45Z'),
    startedAt: new Date('2024-03-01T12:00:00Z'),
    completedAt: new Date('2024-03-01T12:00:01Z'),
    partitionsDropped: ['test_table1_p20240301_115940'],
    partitionsRetained: 3,
    droppedCount: 1,
    failedCount: 0,
    parentDropAttempted: false,
    parentDropped: false,
    errors: [],
    ...overrides,
  };
}

describe('Prune Routes', () => {
  let app: express.Application;
  let executor: { apply: Mock<(policy: RetentionPolicy) => Promise<RetentionReport>> };

  beforeEach(() => {
    executor = {
      apply: vi.fn(async (policy: RetentionPolicy) => report(policy)),
    };
    app = express();
    app.use(express.json());
    app.use(createPruneRoutes(executor));
  });

  it('should apply a time window policy and return the report', async () => {
    const response = await request(app)
      .post('/prune')
      .send({
        tables: [
          {
            table_name: 'test_table1',
            schema_name: 'public',
            retention_policy: { retention_seconds: 15 },
          },
        ],
      });

    expect(response.status).toBe(200);
    expect(executor.apply).toHaveBeenCalledWith(
      {
        targetSchema: 'public',
        targetTable: 'test_table1',
        retentionSeconds: 15,
        mode: 'time_window',
        dropParentAfterPrune: false,
      },
      { dryRun: false }
    );
    expect(response.body.results).toEqual([
      {
        table_name: 'test_table1',
        schema_name: 'public',
        status: 'success',
        message: 'Successfully processed public.test_table1',
        report: {
          run_id: 'run-1',
          mode: 'time_window',
          dry_run: false,
          cutoff: '2024-03-01T11:59:45.000Z',
          partitions_dropped: ['test_table1_p20240301_115940'],
          partitions_retained: 3,
          dropped_count: 1,
          failed_count: 0,
          parent_drop_attempted: false,
          parent_dropped: false,
          errors: [],
        },
      },
    ]);
  });

  it('should default the schema to public and pass dry run through', async () => {
    await request(app)
      .post('/prune')
      .send({
        tables: [{ table_name: 'events', retention_policy: { retention_seconds: 60, drop_parent_after_prune: true } }],
        dry_run: true,
      });

    expect(executor.apply).toHaveBeenCalledWith(
      expect.objectContaining({ targetSchema: 'public', targetTable: 'events', dropParentAfterPrune: true }),
      { dryRun: true }
    );
  });

  it('should reject a malformed body with 400', async () => {
    const response = await request(app)
      .post('/prune')
      .send({ tables: [{ table_name: 'test_table1', retention_policy: { retention_seconds: 'fifteen' } }] });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Invalid prune request');
    expect(response.body.issues[0].path).toEqual(['tables', 0, 'retention_policy', 'retention_seconds']);
    expect(executor.apply).not.toHaveBeenCalled();
  });

  it('should reject an empty table list', async () => {
    const response = await request(app).post('/prune').send({ tables: [] });

    expect(response.status).toBe(400);
  });

  it('should report an invalid policy for its table and carry on with the next', async () => {
    const response = await request(app)
      .post('/prune')
      .send({
        tables: [
          { table_name: 'bad_table', retention_policy: { retention_seconds: -1 } },
          { table_name: 'test_table1', retention_policy: { retention_seconds: 15 } },
        ],
      });

    expect(response.status).toBe(200);
    expect(response.body.results[0]).toEqual({
      table_name: 'bad_table',
      schema_name: 'public',
      status: 'error',
      message: 'Retention duration must be a positive number of seconds',
      code: 'CONFIGURATION_ERROR',
    });
    expect(response.body.results[1].status).toBe('success');
    expect(executor.apply).toHaveBeenCalledTimes(1);
  });

  it('should report a condition policy as not implemented', async () => {
    executor.apply.mockRejectedValueOnce(new NotImplementedError('Condition-based row deletion is not implemented'));

    const response = await request(app)
      .post('/prune')
      .send({
        tables: [
          {
            table_name: 'test_table1',
            retention_policy: { mode: 'condition', retention_seconds: 15, condition_expression: "foo = 'x'" },
          },
        ],
      });

    expect(response.body.results[0]).toEqual({
      table_name: 'test_table1',
      schema_name: 'public',
      status: 'error',
      message: 'Condition-based row deletion is not implemented',
      code: 'NOT_IMPLEMENTED',
    });
  });

  it('should flag a run with failed drops', async () => {
    executor.apply.mockImplementationOnce(async (policy: RetentionPolicy) =>
      report(policy, {
        failedCount: 1,
        errors: [new PartitionDropError('public', 'test_table1_p20240301_115941', 'partition', new Error('lock timeout'))],
      })
    );

    const response = await request(app)
      .post('/prune')
      .send({ tables: [{ table_name: 'test_table1', retention_policy: { retention_seconds: 15 } }] });

    const [result] = response.body.results;
    expect(result.status).toBe('error');
    expect(result.message).toBe('Processed public.test_table1 with 1 failed drop(s)');
    expect(result.report.errors).toEqual([
      {
        table: 'public.test_table1_p20240301_115941',
        target: 'partition',
        message: 'Failed to drop partition public.test_table1_p20240301_115941: lock timeout',
      },
    ]);
  });
});
