/**
 * SQLite runner for local files, used for offline runs and tests.
 * Opens the file read-only; writes are rejected by the driver.
 */

import Database from 'better-sqlite3';
import { QueryExecutionError, SchemaUnavailableError, errorMessage } from '../../errors.js';
import type { ColumnEntry } from '../../schema/types.js';
import type { SchemaSource } from '../../schema/provider.js';
import { SAFE_DEFAULTS } from '../defaults.js';
import type { ExecuteLimits, ExecuteResult, QueryRunner } from '../types.js';

export interface SqliteConnectionConfig {
  /** Path to the database file */
  file: string;
}

interface TableInfoRow {
  name: string;
  type: string;
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export class SqliteRunner implements QueryRunner, SchemaSource {
  readonly type = 'sqlite' as const;
  private readonly db: Database.Database;

  constructor(cfg: SqliteConnectionConfig) {
    if (!cfg.file.trim()) {
      throw new QueryExecutionError('', 'SQLite database path is required.');
    }
    try {
      this.db = new Database(cfg.file, { readonly: true, fileMustExist: true });
    } catch (err: unknown) {
      throw new QueryExecutionError('', `Cannot open SQLite database "${cfg.file}": ${errorMessage(err)}`, { cause: err });
    }
  }

  async run(sql: string, limits: ExecuteLimits = {}): Promise<ExecuteResult> {
    const maxRows = limits.maxRows ?? SAFE_DEFAULTS.maxRows;
    try {
      const start = performance.now();
      const stmt = this.db.prepare<[], Record<string, unknown>>(sql);
      if (!stmt.reader) {
        throw new QueryExecutionError(sql, 'Statement does not return rows.');
      }
      const allRows = stmt.all();
      const execMs = Math.round(performance.now() - start);
      const truncated = allRows.length > maxRows;
      return {
        columns: stmt.columns().map((column) => column.name),
        rows: truncated ? allRows.slice(0, maxRows) : allRows,
        rowCount: allRows.length,
        truncated,
        execMs,
      };
    } catch (err: unknown) {
      if (err instanceof QueryExecutionError) throw err;
      throw new QueryExecutionError(sql, `SQLite error: ${errorMessage(err)}`, { cause: err });
    }
  }

  async describeTable(table: string): Promise<ColumnEntry[]> {
    const dot = table.indexOf('.');
    const pragma =
      dot === -1
        ? `PRAGMA table_info(${quoteIdent(table)})`
        : `PRAGMA ${quoteIdent(table.slice(0, dot))}.table_info(${quoteIdent(table.slice(dot + 1))})`;

    let rows: TableInfoRow[];
    try {
      rows = this.db.prepare<[], TableInfoRow>(pragma).all();
    } catch (err: unknown) {
      throw new SchemaUnavailableError(table, `Cannot describe "${table}": ${errorMessage(err)}`, { cause: err });
    }
    return rows.map((row) => ({ name: row.name, type: row.type || 'TEXT', description: '' }));
  }

  async ping(): Promise<string> {
    const row = this.db.prepare<[], { version: string }>('SELECT sqlite_version() AS version').get();
    return `sqlite ${row?.version ?? 'unknown'}`;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
