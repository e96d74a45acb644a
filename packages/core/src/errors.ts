/**
 * Error types raised by the core pipeline.
 * Each carries a stable `code` so front ends can map them to exit codes.
 */

export type ColqueryErrorCode =
  | 'COMPLETION_FAILED'
  | 'SCHEMA_UNAVAILABLE'
  | 'INVALID_TABLE_NAME'
  | 'CONFIG_INVALID'
  | 'QUERY_EXECUTION_FAILED';

export class ColqueryError extends Error {
  readonly code: ColqueryErrorCode;
  readonly details?: unknown;

  constructor(code: ColqueryErrorCode, message: string, options?: { cause?: unknown; details?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.details = options?.details;
  }
}

/** The completion capability was unreachable, timed out, or errored. */
export class CompletionError extends ColqueryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('COMPLETION_FAILED', message, options);
  }
}

/** No usable schema could be obtained for a table. Fatal to the pipeline entry point. */
export class SchemaUnavailableError extends ColqueryError {
  readonly table: string;

  constructor(table: string, message: string, options?: { cause?: unknown }) {
    super('SCHEMA_UNAVAILABLE', message, options);
    this.table = table;
  }
}

export class InvalidTableNameError extends ColqueryError {
  readonly table: string;

  constructor(table: string) {
    super(
      'INVALID_TABLE_NAME',
      `Invalid table name "${table}". Use letters, digits and underscores, optionally as database.table.`,
    );
    this.table = table;
  }
}

export class ConfigError extends ColqueryError {
  constructor(message: string, options?: { cause?: unknown; details?: unknown }) {
    super('CONFIG_INVALID', message, options);
  }
}

export class QueryExecutionError extends ColqueryError {
  readonly sql: string;

  constructor(sql: string, message: string, options?: { cause?: unknown }) {
    super('QUERY_EXECUTION_FAILED', message, options);
    this.sql = sql;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
