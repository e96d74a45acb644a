/**
 * Runner dispatcher.
 * Selects the adapter for the configured database type.
 */

import { ClickHouseRunner, type ClickHouseConnectionConfig } from './adapters/clickhouse.js';
import { SqliteRunner } from './adapters/sqlite.js';
import type { QueryRunner } from './types.js';
import type { SchemaSource } from '../schema/provider.js';

export type RunnerConfig =
  | ({ type: 'clickhouse' } & ClickHouseConnectionConfig)
  | { type: 'sqlite'; file: string };

export type SchemaAwareRunner = QueryRunner & SchemaSource;

export function createRunner(config: RunnerConfig): SchemaAwareRunner {
  switch (config.type) {
    case 'clickhouse':
      return new ClickHouseRunner(config);
    case 'sqlite':
      return new SqliteRunner({ file: config.file });
  }
}
