/**
 * PostgreSQL Database Client
 *
 * Thin wrapper over a pg Pool. Connections are opened lazily on first query.
 *
 * Note: db.query() returns rows directly, not QueryResult.
 */

import { Pool } from 'pg';
import { config } from '../config';
import { logger } from '../config/logger';
import type { QueryRow, SqlClient } from './types';

const pool = new Pool({
  host: config.database.host,
  port: config.database.port,
  database: config.database.database,
  user: config.database.user,
  password: config.database.password,
  ssl: config.database.ssl ? { rejectUnauthorized: false } : undefined,
  max: config.database.maxConnections,
  application_name: config.service.name,
});

// pg emits 'error' for idle clients the server disconnects; unhandled it would crash the process
pool.on('error', (error: Error) => {
  logger.error('Database: Idle client error', {
    error: error.message,
  });
});

/**
 * Database client for the partition-retention-service
 */
export const db = {
  /**
   * Execute a query with parameters
   * Returns array of rows (not QueryResult)
   */
  async query(sql: string, params?: unknown[]): Promise<QueryRow[]> {
    const result = await pool.query(sql, params);
    return result.rows;
  },

  /**
   * Close all connections
   */
  async close(): Promise<void> {
    await pool.end();
  },
} satisfies SqlClient & { close(): Promise<void> };
