/**
 * SQL boundary used by the retention engine.
 *
 * Anything that can run a statement and hand back rows satisfies it: the pg
 * backed `db` in production, an in-process fake in tests. Rows are untyped
 * here; readers validate the shape they expect.
 */
export type QueryRow = Record<string, unknown>;

export interface SqlClient {
  query(sql: string, params?: unknown[]): Promise<QueryRow[]>;
}
