/**
 * Configuration Loader
 *
 * Loads environment variables and provides typed configuration for the service.
 * Uses dotenv for local development.
 *
 * All config is externalized via environment variables. Values here are raw;
 * the retention section is validated when it is turned into a policy.
 */

import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // Database
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    maxConnections: number;
    ssl: boolean;
  };

  // Retention policy applied by the runner
  retention: {
    targetSchema: string;
    targetTable: string;
    retentionSeconds: number;
    mode: string;
    conditionExpression?: string;
    dropParentAfterPrune: boolean;
    // Unset: inferred from the gaps between sibling partitions
    partitionIntervalSeconds?: number;
  };

  // Runner
  runner: {
    dryRun: boolean;
    runOnStartup: boolean;
    continuousMode: boolean;
    intervalSeconds: number;
  };

  // Service
  service: {
    name: string;
    version: string;
  };
}

function optionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

export const config: Config = {
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  database: {
    host: process.env.PGHOST || 'localhost',
    port: parseInt(process.env.PGPORT || '5432', 10),
    database: process.env.PGDATABASE || 'postgres',
    user: process.env.PGUSER || 'postgres',
    password: process.env.PGPASSWORD || 'postgres',
    maxConnections: parseInt(process.env.PG_MAX_CONNECTIONS || '5', 10),
    ssl: process.env.PGSSLMODE === 'require',
  },

  retention: {
    targetSchema: process.env.RETENTION_TARGET_SCHEMA || 'public',
    targetTable: process.env.RETENTION_TARGET_TABLE || '',
    retentionSeconds: Number(process.env.RETENTION_SECONDS || '0'),
    mode: process.env.RETENTION_MODE || 'time_window',
    conditionExpression: process.env.RETENTION_CONDITION || undefined,
    dropParentAfterPrune: process.env.RETENTION_DROP_PARENT === 'true',
    partitionIntervalSeconds: optionalNumber(process.env.PARTITION_INTERVAL_SECONDS),
  },

  runner: {
    dryRun: process.env.DRY_RUN === 'true',
    runOnStartup: process.env.RUN_ON_STARTUP !== 'false',
    continuousMode: process.env.CONTINUOUS_MODE === 'true',
    intervalSeconds: parseInt(process.env.RUN_INTERVAL_SECONDS || '60', 10),
  },

  service: {
    name: process.env.SERVICE_NAME || 'partition-retention-service',
    version: process.env.npm_package_version || '1.0.0',
  },
};
