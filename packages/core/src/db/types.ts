/**
 * Execution-side types. A QueryRunner executes one guarded SELECT and returns
 * rows; adapters that can also describe tables implement SchemaSource.
 */

export type DbType = 'clickhouse' | 'sqlite';

export interface ExecuteLimits {
  /** Maximum rows returned to the caller */
  maxRows?: number;
  /** Statement timeout in milliseconds */
  timeoutMs?: number;
}

export interface ExecuteResult {
  columns: string[];
  rows: Record<string, unknown>[];
  /** Rows produced by the database, before truncation */
  rowCount: number;
  truncated: boolean;
  execMs: number;
}

export interface QueryRunner {
  readonly type: DbType;
  run(sql: string, limits?: ExecuteLimits): Promise<ExecuteResult>;
  /** Round-trip check; resolves to the server version */
  ping(): Promise<string>;
  close(): Promise<void>;
}
