/**
 * ClickHouse runner over the HTTP interface.
 * Executes guarded SELECTs and reads table schemas from system.columns.
 */

import { createClient, type ClickHouseClient } from '@clickhouse/client';
import { QueryExecutionError, SchemaUnavailableError, errorMessage } from '../../errors.js';
import type { ColumnEntry } from '../../schema/types.js';
import type { SchemaSource } from '../../schema/provider.js';
import { SAFE_DEFAULTS } from '../defaults.js';
import type { ExecuteLimits, ExecuteResult, QueryRunner } from '../types.js';

export interface ClickHouseConnectionConfig {
  url: string;
  username: string;
  password: string;
  /** Database used for unqualified table names */
  database?: string;
  /** HTTP request timeout */
  requestTimeoutMs?: number;
}

interface SystemColumnRow {
  name: string;
  type: string;
  comment: string;
}

export class ClickHouseRunner implements QueryRunner, SchemaSource {
  readonly type = 'clickhouse' as const;
  private readonly client: ClickHouseClient;
  private readonly database: string | undefined;

  constructor(cfg: ClickHouseConnectionConfig) {
    this.database = cfg.database;
    this.client = createClient({
      url: cfg.url,
      username: cfg.username,
      password: cfg.password,
      database: cfg.database,
      request_timeout: cfg.requestTimeoutMs ?? 30_000,
    });
  }

  async run(sql: string, limits: ExecuteLimits = {}): Promise<ExecuteResult> {
    const maxRows = limits.maxRows ?? SAFE_DEFAULTS.maxRows;
    const timeoutMs = limits.timeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs;
    try {
      const start = performance.now();
      const resultSet = await this.client.query({
        query: sql,
        format: 'JSONEachRow',
        clickhouse_settings: {
          max_execution_time: Math.max(1, Math.ceil(timeoutMs / 1000)),
        },
      });
      const allRows = await resultSet.json<Record<string, unknown>>();
      const execMs = Math.round(performance.now() - start);
      const truncated = allRows.length > maxRows;
      return {
        columns: allRows.length > 0 ? Object.keys(allRows[0]) : [],
        rows: truncated ? allRows.slice(0, maxRows) : allRows,
        rowCount: allRows.length,
        truncated,
        execMs,
      };
    } catch (err: unknown) {
      throw new QueryExecutionError(sql, `ClickHouse error: ${errorMessage(err)}`, { cause: err });
    }
  }

  async describeTable(table: string): Promise<ColumnEntry[]> {
    const dot = table.indexOf('.');
    const name = dot === -1 ? table : table.slice(dot + 1);
    const database = dot === -1 ? this.database : table.slice(0, dot);

    const query =
      'SELECT name, type, comment FROM system.columns WHERE table = {table:String}' +
      (database ? ' AND database = {database:String}' : '') +
      ' ORDER BY position';

    try {
      const resultSet = await this.client.query({
        query,
        format: 'JSONEachRow',
        query_params: database ? { table: name, database } : { table: name },
      });
      const rows = await resultSet.json<SystemColumnRow>();
      return rows.map((row) => ({ name: row.name, type: row.type, description: row.comment }));
    } catch (err: unknown) {
      throw new SchemaUnavailableError(table, `Cannot read columns of "${table}": ${errorMessage(err)}`, { cause: err });
    }
  }

  async ping(): Promise<string> {
    try {
      const resultSet = await this.client.query({ query: 'SELECT version() AS version', format: 'JSONEachRow' });
      const rows = await resultSet.json<{ version: string }>();
      return `ClickHouse ${rows[0]?.version ?? 'unknown'}`;
    } catch (err: unknown) {
      throw new QueryExecutionError('SELECT version()', `ClickHouse is unreachable: ${errorMessage(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
