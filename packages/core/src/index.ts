/**
 * @colquery/core barrel export
 *
 * Question-to-SQL pipeline shared by the CLI and embedders.
 */

// Errors and logging
export {
  ColqueryError,
  CompletionError,
  SchemaUnavailableError,
  InvalidTableNameError,
  ConfigError,
  QueryExecutionError,
  errorMessage,
} from './errors.js';
export type { ColqueryErrorCode } from './errors.js';
export { logger, createLogger, setLogLevel, isLogLevel, addLogFile, LOG_FILE } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

// Configuration
export { loadConfig, configSchema, DEFAULT_CONFIG_FILE } from './config/index.js';
export type { ColqueryConfig, DatabaseConfig, PathsConfig, LoadConfigOptions, LoadedConfig } from './config/index.js';

// Schema
export type { ColumnMeta, ColumnEntry, SchemaDescriptor } from './schema/types.js';
export {
  createSchemaDescriptor,
  isValidIdentifier,
  isValidTableName,
  assertTableName,
  schemaColumns,
} from './schema/types.js';
export { SALES_DATA_TABLE, BUILTIN_SCHEMAS } from './schema/builtin.js';
export { CachingSchemaProvider } from './schema/provider.js';
export type { SchemaProvider, SchemaSource, CachingSchemaProviderOptions } from './schema/provider.js';

// SQL checks
export { stripCodeFences } from './sql/fences.js';
export { validateQuery, findUnknownIdentifiers, findUnsafePatterns, isReservedWord } from './sql/validator.js';
export type { ValidationCode, ValidationReason, ValidationVerdict } from './sql/validator.js';
export { synthesizeFallback, FALLBACK_LIMIT, FALLBACK_MAX_COLUMNS } from './sql/fallback.js';

// LLM module
export * from './llm/index.js';

// Generation
export {
  QueryGenerator,
  generateQuery,
  extractQueryText,
  DEFAULT_MAX_REPAIR_ATTEMPTS,
  DEFAULT_QUERY_FIELD,
} from './generate/repair-loop.js';
export type {
  Candidate,
  GenerationContext,
  GenerationOutcome,
  LoopState,
  QueryGeneratorOptions,
} from './generate/repair-loop.js';

// Execution guard
export { guardForExecution } from './policy/guard.js';
export type { GuardOptions, GuardResult } from './policy/guard.js';
export { parseSql } from './policy/parse.js';
export type { ParseResult, ParseOutcome, SqlKind } from './policy/parse.js';
export { ensureLimit } from './policy/rewrite.js';
export { isSafeSelect } from './policy/sql-check.js';

// Execution layer
export { SAFE_DEFAULTS } from './db/defaults.js';
export type { DbType, ExecuteLimits, ExecuteResult, QueryRunner } from './db/types.js';
export { createRunner } from './db/execute.js';
export type { RunnerConfig, SchemaAwareRunner } from './db/execute.js';
export { ClickHouseRunner } from './db/adapters/clickhouse.js';
export type { ClickHouseConnectionConfig } from './db/adapters/clickhouse.js';
export { SqliteRunner } from './db/adapters/sqlite.js';
export type { SqliteConnectionConfig } from './db/adapters/sqlite.js';

// Ask orchestration
export { askQuestion } from './ask.js';
export type { AskDeps, AskInput, AskLimits, AskResult, AskSettings, ExecutionAttempt } from './ask.js';

// Artifacts
export { writeArtifacts, ensureDirectories, renderQueryFile, LAST_QUERY_FILE, QUERY_RESULT_FILE } from './artifacts.js';
export type { ArtifactInput, ArtifactPaths, WrittenArtifacts } from './artifacts.js';
