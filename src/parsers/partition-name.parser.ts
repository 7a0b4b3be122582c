/**
 * PartitionNameParser
 *
 * Recovers a partition's time window from its physical name.
 *
 * Partition naming convention (pg_partman, sub-daily intervals):
 *   {parent_table}_pYYYYMMDD_HHMMSS
 * Example: test_table1_p20240301_120005 starts at local time 2024-03-01 12:00:05
 *
 * The suffix is a wall-clock time in the server's configured timezone. The
 * parser only validates it and returns it as a PostgreSQL timestamp literal;
 * PartitionCatalog has the server turn it into an instant. The end is
 * start + partition interval.
 *
 * Retention decisions are made from names alone, so a name that does not
 * match exactly is an error, never a skip.
 */

import { ConfigurationError, UnparsablePartitionNameError } from '../errors/retention-errors';
import type { PartitionDescriptor } from '../models/partition-descriptor';

const SUFFIX_PATTERN = /^_p(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;

export interface PartitionNameParserOptions {
  intervalSeconds?: number;
}

export interface DescribeOptions {
  schema?: string;
  intervalSeconds?: number;
}

export class PartitionNameParser {
  private readonly intervalSeconds?: number;

  constructor(options: PartitionNameParserOptions = {}) {
    if (options.intervalSeconds !== undefined && !(options.intervalSeconds > 0)) {
      throw new ConfigurationError('Partition interval must be a positive number of seconds', {
        intervalSeconds: options.intervalSeconds,
      });
    }
    this.intervalSeconds = options.intervalSeconds;
  }

  get hasInterval(): boolean {
    return this.intervalSeconds !== undefined;
  }

  /**
   * Local start time encoded in the name, as 'YYYY-MM-DD HH:MM:SS'.
   *
   * @throws UnparsablePartitionNameError
   */
  parseLocalStart(physicalName: string, parentTable: string): string {
    if (!physicalName.startsWith(parentTable)) {
      throw new UnparsablePartitionNameError(physicalName, parentTable, 'name does not start with the parent table');
    }

    const match = SUFFIX_PATTERN.exec(physicalName.slice(parentTable.length));
    if (!match) {
      throw new UnparsablePartitionNameError(physicalName, parentTable, 'suffix is not _pYYYYMMDD_HHMMSS');
    }

    const [year, month, day, hour, minute, second] = match.slice(1).map((part) => parseInt(part, 10));
    // Calendar check only; the timezone is applied by the server
    const calendar = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

    // Date.UTC rolls over out-of-range fields (Feb 30 -> Mar 2); reject anything that moved
    if (
      calendar.getUTCFullYear() !== year ||
      calendar.getUTCMonth() !== month - 1 ||
      calendar.getUTCDate() !== day ||
      calendar.getUTCHours() !== hour ||
      calendar.getUTCMinutes() !== minute ||
      calendar.getUTCSeconds() !== second
    ) {
      throw new UnparsablePartitionNameError(physicalName, parentTable, 'suffix is not a valid calendar instant');
    }

    const [yyyy, mm, dd, hh, mi, ss] = match.slice(1);
    return `${yyyy}-${mm}-${dd} ${hh}:${mi}:${ss}`;
  }

  /**
   * Descriptor for a partition whose start instant is known. The interval
   * comes from the constructor unless given here.
   *
   * @throws ConfigurationError when no interval is known
   */
  describe(physicalName: string, parentTable: string, windowStart: Date, options: DescribeOptions = {}): PartitionDescriptor {
    const intervalSeconds = options.intervalSeconds ?? this.intervalSeconds;
    if (intervalSeconds === undefined || !(intervalSeconds > 0)) {
      throw new ConfigurationError('No positive partition interval available', { physicalName, intervalSeconds });
    }

    return {
      physicalName,
      schema: options.schema ?? 'public',
      parentTable,
      windowStart,
      windowEnd: new Date(windowStart.getTime() + intervalSeconds * 1000),
    };
  }
}
