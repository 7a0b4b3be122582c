/**
 * PartitionCatalog
 *
 * Repository over the PostgreSQL system catalogs for a partitioned table.
 *
 * Responsibilities:
 *   - List the physical children of a parent (pg_inherits), mapped to time windows
 *     in the server's timezone
 *   - Check the parent exists (information_schema.tables)
 *   - Read the server clock
 *
 * Every database failure surfaces as CatalogQueryError. An incomplete listing
 * must never be mistaken for "nothing to prune".
 */

import { z } from 'zod';
import { logger } from '../config/logger';
import type { SqlClient } from '../database/types';
import { CatalogQueryError, IntervalInferenceError, PartitionOverlapError } from '../errors/retention-errors';
import type { PartitionDescriptor } from '../models/partition-descriptor';
import { PartitionNameParser } from '../parsers/partition-name.parser';

const partitionRowSchema = z.object({
  partition_name: z.string(),
  partition_schema: z.string(),
  is_default: z.boolean(),
});

const existsRowSchema = z.object({
  exists: z.boolean(),
});

const nowRowSchema = z.object({
  now: z.date(),
});

const localStartRowSchema = z.object({
  local_start: z.string(),
  start_instant: z.date(),
  time_zone: z.string(),
});

type PartitionRow = z.infer<typeof partitionRowSchema>;

interface StartedPartition {
  row: PartitionRow;
  start: Date;
}

export interface PartitionCatalogOptions {
  // Fixed width of every partition; when absent it is inferred from sibling gaps
  partitionIntervalSeconds?: number;
}

export class PartitionCatalog {
  private readonly parser: PartitionNameParser;

  constructor(
    private readonly db: SqlClient,
    options: PartitionCatalogOptions = {}
  ) {
    this.parser = new PartitionNameParser({ intervalSeconds: options.partitionIntervalSeconds });
  }

  async tableExists(schema: string, table: string): Promise<boolean> {
    const rows = await this.run(
      'tableExists',
      `
      SELECT EXISTS (
        SELECT 1
        FROM information_schema.tables
        WHERE table_schema = $1 AND table_name = $2
      ) AS exists
    `,
      [schema, table],
      existsRowSchema
    );
    return rows[0]?.exists === true;
  }

  async serverTime(): Promise<Date> {
    const rows = await this.run('serverTime', 'SELECT now() AS now', [], nowRowSchema);
    if (rows.length === 0) {
      throw new CatalogQueryError('Server did not return a timestamp', { operation: 'serverTime' }, undefined);
    }
    return rows[0].now;
  }

  /**
   * Children of schema.parentTable with their time windows, in catalog order.
   * A DEFAULT partition has no window and is left out.
   *
   * @throws CatalogQueryError
   * @throws UnparsablePartitionNameError
   * @throws IntervalInferenceError
   */
  async listPartitions(schema: string, parentTable: string): Promise<PartitionDescriptor[]> {
    const rows = await this.run(
      'listPartitions',
      `
      SELECT
        child.relname AS partition_name,
        child_ns.nspname AS partition_schema,
        COALESCE(pg_get_expr(child.relpartbound, child.oid) = 'DEFAULT', false) AS is_default
      FROM pg_inherits
      JOIN pg_class parent ON pg_inherits.inhparent = parent.oid
      JOIN pg_namespace parent_ns ON parent.relnamespace = parent_ns.oid
      JOIN pg_class child ON pg_inherits.inhrelid = child.oid
      JOIN pg_namespace child_ns ON child.relnamespace = child_ns.oid
      WHERE parent.relname = $1
        AND parent_ns.nspname = $2
      ORDER BY child.relname
    `,
      [parentTable, schema],
      partitionRowSchema
    );

    const children = rows.filter((row) => {
      if (row.is_default) {
        logger.debug('PartitionCatalog: Skipping default partition', {
          partition: `${row.partition_schema}.${row.partition_name}`,
        });
        return false;
      }
      return true;
    });

    logger.debug('PartitionCatalog: Partitions listed', {
      table: `${schema}.${parentTable}`,
      count: children.length,
    });

    if (children.length === 0) {
      return [];
    }

    const localStarts = children.map((row) => this.parser.parseLocalStart(row.partition_name, parentTable));
    const instants = await this.resolveLocalStarts(localStarts);
    const started = children.map((row, i): StartedPartition => {
      const start = instants.get(localStarts[i]);
      if (start === undefined) {
        throw new CatalogQueryError(
          `Server did not resolve the start of partition "${row.partition_name}"`,
          { operation: 'resolveLocalStarts', localStart: localStarts[i] },
          undefined
        );
      }
      return { row, start };
    });

    if (this.parser.hasInterval) {
      return started.map(({ row, start }) =>
        this.parser.describe(row.partition_name, parentTable, start, { schema: row.partition_schema })
      );
    }
    return this.inferWindows(started, parentTable);
  }

  /**
   * Local 'YYYY-MM-DD HH:MM:SS' values to instants, read in the session's
   * TimeZone setting (the server's configured timezone unless the client
   * overrides it), which is also the zone pg_partman names partitions in.
   */
  private async resolveLocalStarts(localStarts: string[]): Promise<Map<string, Date>> {
    const rows = await this.run(
      'resolveLocalStarts',
      `
      SELECT
        local_start,
        local_start::timestamp AT TIME ZONE current_setting('TimeZone') AS start_instant,
        current_setting('TimeZone') AS time_zone
      FROM unnest($1::text[]) AS local_start
    `,
      [localStarts],
      localStartRowSchema
    );

    logger.debug('PartitionCatalog: Partition starts resolved', {
      timeZone: rows[0]?.time_zone,
      count: rows.length,
    });

    return new Map(rows.map((row) => [row.local_start, row.start_instant]));
  }

  /**
   * Each partition ends where the next one starts; the newest reuses the
   * smallest gap seen. A missing sibling only widens a window, which delays
   * its drop rather than bringing it forward.
   */
  private inferWindows(partitions: StartedPartition[], parentTable: string): PartitionDescriptor[] {
    if (partitions.length < 2) {
      throw new IntervalInferenceError(parentTable, partitions[0]?.row.partition_name ?? '');
    }

    const sorted = [...partitions].sort((a, b) => a.start.getTime() - b.start.getTime());

    const gaps: number[] = [];
    for (let i = 1; i < sorted.length; i++) {
      const gap = sorted[i].start.getTime() - sorted[i - 1].start.getTime();
      if (gap === 0) {
        throw new PartitionOverlapError(sorted[i - 1].row.partition_name, sorted[i].row.partition_name);
      }
      gaps.push(gap);
    }
    const smallestGap = Math.min(...gaps);

    return sorted.map(({ row, start }, i) =>
      this.parser.describe(row.partition_name, parentTable, start, {
        schema: row.partition_schema,
        intervalSeconds: (i < gaps.length ? gaps[i] : smallestGap) / 1000,
      })
    );
  }

  private async run<T>(operation: string, sql: string, params: unknown[], rowSchema: z.ZodType<T>): Promise<T[]> {
    let rows: unknown[];
    try {
      rows = await this.db.query(sql, params);
    } catch (error: unknown) {
      throw new CatalogQueryError(
        `Catalog query failed (${operation}): ${error instanceof Error ? error.message : String(error)}`,
        { operation, params },
        error
      );
    }

    const parsed = z.array(rowSchema).safeParse(rows);
    if (!parsed.success) {
      throw new CatalogQueryError(
        `Catalog query returned unexpected rows (${operation})`,
        { operation, issues: parsed.error.issues },
        parsed.error
      );
    }
    return parsed.data;
  }
}
