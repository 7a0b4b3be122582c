/**
 * Retention Errors
 *
 * Every failure the engine raises carries a stable `code` so callers (the
 * HTTP layer, the runner, metrics) can branch without matching on messages.
 *
 * Raised before a run starts: ConfigurationError.
 * Fatal during a run: UnparsablePartitionNameError, PartitionOverlapError,
 * IntervalInferenceError, CatalogQueryError, TargetTableNotFoundError,
 * NotImplementedError.
 * Recorded per partition, run continues: PartitionDropError.
 */

export type RetentionErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'UNPARSABLE_PARTITION_NAME'
  | 'PARTITION_OVERLAP'
  | 'INTERVAL_NOT_INFERABLE'
  | 'CATALOG_QUERY_ERROR'
  | 'TARGET_TABLE_NOT_FOUND'
  | 'PARTITION_DROP_ERROR'
  | 'NOT_IMPLEMENTED';

export class RetentionError extends Error {
  constructor(
    message: string,
    readonly code: RetentionErrorCode,
    readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends RetentionError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

export class UnparsablePartitionNameError extends RetentionError {
  constructor(
    readonly partitionName: string,
    readonly parentTable: string,
    reason: string
  ) {
    super(`Cannot parse partition "${partitionName}" of "${parentTable}": ${reason}`, 'UNPARSABLE_PARTITION_NAME', {
      partitionName,
      parentTable,
    });
  }
}

export class PartitionOverlapError extends RetentionError {
  constructor(
    readonly first: string,
    readonly second: string
  ) {
    super(`Partitions "${first}" and "${second}" cover overlapping time windows`, 'PARTITION_OVERLAP', {
      first,
      second,
    });
  }
}

export class IntervalInferenceError extends RetentionError {
  constructor(
    readonly parentTable: string,
    readonly partitionName: string
  ) {
    super(
      `Partition interval of "${parentTable}" cannot be inferred from its single partition "${partitionName}"; set PARTITION_INTERVAL_SECONDS`,
      'INTERVAL_NOT_INFERABLE',
      { parentTable, partitionName }
    );
  }
}

export class CatalogQueryError extends RetentionError {
  constructor(message: string, details: Record<string, unknown>, cause: unknown) {
    super(message, 'CATALOG_QUERY_ERROR', details, { cause });
  }
}

export class TargetTableNotFoundError extends RetentionError {
  constructor(schema: string, table: string) {
    super(`Table ${schema}.${table} does not exist`, 'TARGET_TABLE_NOT_FOUND', { schema, table });
  }
}

export class PartitionDropError extends RetentionError {
  constructor(
    readonly schema: string,
    readonly tableName: string,
    readonly target: 'partition' | 'parent',
    cause: unknown
  ) {
    super(
      `Failed to drop ${target} ${schema}.${tableName}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'PARTITION_DROP_ERROR',
      { schema, tableName, target },
      { cause }
    );
  }
}

export class NotImplementedError extends RetentionError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'NOT_IMPLEMENTED', details);
  }
}
