import {
  ColqueryError,
  CompletionError,
  ConfigError,
  InvalidTableNameError,
  QueryExecutionError,
  SchemaUnavailableError,
} from '@colquery/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_INVALID'
  | 'INVALID_TABLE'
  | 'SCHEMA_UNAVAILABLE'
  | 'COMPLETION_FAILED'
  | 'DB_CONN_FAILED'
  | 'DB_QUERY_FAILED'
  | 'POLICY_BLOCKED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'DB_QUERY_FAILED', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, details?: unknown): CliError {
  return new CliError('policy', 'POLICY_BLOCKED', message, details);
}

/**
 * Map core pipeline errors onto CLI error kinds. Anything else is returned
 * unchanged and reported as an internal error.
 */
export function fromCoreError(error: unknown): unknown {
  if (!(error instanceof ColqueryError)) return error;
  if (error instanceof ConfigError) {
    return usageError(error.message, 'CONFIG_INVALID', error.details);
  }
  if (error instanceof InvalidTableNameError) {
    return usageError(error.message, 'INVALID_TABLE', { table: error.table });
  }
  if (error instanceof SchemaUnavailableError) {
    return runtimeError(error.message, 'SCHEMA_UNAVAILABLE', { table: error.table });
  }
  if (error instanceof CompletionError) {
    return runtimeError(error.message, 'COMPLETION_FAILED');
  }
  if (error instanceof QueryExecutionError) {
    return runtimeError(error.message, 'DB_QUERY_FAILED', { sql: error.sql });
  }
  return runtimeError(error.message, 'INTERNAL_ERROR', error.details);
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'policy') return EXIT_CODE_POLICY;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
