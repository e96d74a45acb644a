/**
 * High-level "ask" orchestration.
 * Ties together schema lookup, generation with repair, the execution guard,
 * and execution with regenerate-and-retry on database errors.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { QueryExecutionError, errorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import type { GenerationOutcome, QueryGenerator } from './generate/repair-loop.js';
import { guardForExecution } from './policy/guard.js';
import type { SchemaProvider } from './schema/provider.js';
import { assertTableName } from './schema/types.js';
import type { ExecuteResult, QueryRunner } from './db/types.js';

export interface AskLimits {
  defaultLimit: number;
  maxLimit: number;
  maxRows: number;
  statementTimeoutMs: number;
}

export interface AskSettings {
  maxRepairAttempts: number;
  /** Generate-and-run rounds before giving up on database errors */
  maxExecutionAttempts: number;
  retryDelayMs: number;
}

export interface AskDeps {
  generator: QueryGenerator;
  schemaProvider: SchemaProvider;
  /** Required unless every call is a dry run */
  runner?: QueryRunner;
  limits: AskLimits;
  settings: AskSettings;
  defaultTable: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface AskInput {
  question: string;
  /** Falls back to the configured default table */
  table?: string;
  execute: boolean;
  maxRepairAttempts?: number;
}

export interface ExecutionAttempt {
  attempt: number;
  sql: string;
  usedFallback: boolean;
  error?: string;
}

export interface AskResult {
  question: string;
  table: string;
  /** The last query generated (after guard rewriting, when it ran) */
  query: string;
  /** Completion calls across all rounds */
  attempts: number;
  usedFallback: boolean;
  generation: GenerationOutcome;
  executionResult: ExecuteResult | null;
  executions: ExecutionAttempt[];
  warnings: string[];
  status: 'ok' | 'blocked' | 'error' | 'dry-run';
  error?: string;
}

export async function askQuestion(input: AskInput, deps: AskDeps): Promise<AskResult> {
  const log = deps.logger ?? createLogger('ask');
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));
  const table = assertTableName(input.table ?? deps.defaultTable);
  const maxRepairAttempts = input.maxRepairAttempts ?? deps.settings.maxRepairAttempts;

  const schema = await deps.schemaProvider.getSchema(table);

  const executions: ExecutionAttempt[] = [];
  let attempts = 0;
  let lastError = '';
  let generation: GenerationOutcome | undefined;
  let query = '';
  let warnings: string[] = [];

  for (let round = 1; round <= deps.settings.maxExecutionAttempts; round++) {
    generation = await deps.generator.generateQuery(input.question, schema, table, maxRepairAttempts);
    attempts += generation.attempts;
    query = generation.query;

    const base = { question: input.question, table, attempts, usedFallback: generation.usedFallback, generation, executions };

    if (!input.execute) {
      return { ...base, query, executionResult: null, warnings: [], status: 'dry-run' };
    }
    if (!deps.runner) {
      throw new QueryExecutionError(query, 'No database runner is configured.');
    }

    const guard = guardForExecution(query, { defaultLimit: deps.limits.defaultLimit, maxLimit: deps.limits.maxLimit });
    warnings = guard.warnings;
    if (!guard.allowed) {
      log.warn({ reason: guard.reason }, 'Execution guard blocked query');
      return { ...base, query, executionResult: null, warnings, status: 'blocked', error: guard.reason };
    }
    query = guard.sql;

    try {
      const executionResult = await deps.runner.run(query, {
        maxRows: deps.limits.maxRows,
        timeoutMs: deps.limits.statementTimeoutMs,
      });
      executions.push({ attempt: round, sql: query, usedFallback: generation.usedFallback });
      return { ...base, query, executionResult, warnings, status: 'ok' };
    } catch (err: unknown) {
      if (!(err instanceof QueryExecutionError)) throw err;
      lastError = errorMessage(err);
      executions.push({ attempt: round, sql: query, usedFallback: generation.usedFallback, error: lastError });
      log.warn({ round, err: lastError }, 'Query execution failed');
    }

    // The fallback is deterministic; regenerating would run it again.
    if (generation.usedFallback) break;
    if (round < deps.settings.maxExecutionAttempts) {
      await sleep(deps.settings.retryDelayMs);
    }
  }

  if (!generation) {
    throw new RangeError('maxExecutionAttempts must be at least 1');
  }
  return {
    question: input.question,
    table,
    query,
    attempts,
    usedFallback: generation.usedFallback,
    generation,
    executionResult: null,
    executions,
    warnings,
    status: 'error',
    error: lastError,
  };
}
