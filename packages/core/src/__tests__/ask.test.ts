/**
 * askQuestion tests with a scripted completion client and a fake runner.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { pino } from 'pino';
import { askQuestion, type AskDeps } from '../ask.js';
import { InvalidTableNameError, QueryExecutionError, SchemaUnavailableError } from '../errors.js';
import { QueryGenerator } from '../generate/repair-loop.js';
import type { CompletionClient, CompletionRequest, CompletionResult } from '../llm/types.js';
import { CachingSchemaProvider } from '../schema/provider.js';
import type { ExecuteLimits, ExecuteResult, QueryRunner } from '../db/types.js';

const silent = pino({ level: 'silent' });

class ScriptedClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: string[]) {}

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('no scripted reply left');
    return { kind: 'text', text: next };
  }
}

class FakeRunner implements QueryRunner {
  readonly type = 'sqlite' as const;
  readonly calls: Array<{ sql: string; limits?: ExecuteLimits }> = [];

  constructor(private readonly outcomes: Array<ExecuteResult | Error>) {}

  async run(sql: string, limits?: ExecuteLimits): Promise<ExecuteResult> {
    this.calls.push({ sql, limits });
    const next = this.outcomes.shift();
    if (next === undefined) throw new Error('no scripted outcome left');
    if (next instanceof Error) throw next;
    return next;
  }

  async ping(): Promise<string> {
    return 'fake';
  }

  async close(): Promise<void> {}
}

const ROWS: ExecuteResult = {
  columns: ['Region'],
  rows: [{ Region: 'North' }],
  rowCount: 1,
  truncated: false,
  execMs: 1,
};

function setup(replies: string[], outcomes: Array<ExecuteResult | Error> = []) {
  const client = new ScriptedClient(replies);
  const runner = new FakeRunner(outcomes);
  const sleeps: number[] = [];
  const deps: AskDeps = {
    generator: new QueryGenerator({ client, logger: silent, timeoutMs: 0 }),
    schemaProvider: new CachingSchemaProvider({ logger: silent }),
    runner,
    limits: { defaultLimit: 200, maxLimit: 10_000, maxRows: 5000, statementTimeoutMs: 15_000 },
    settings: { maxRepairAttempts: 1, maxExecutionAttempts: 3, retryDelayMs: 1000 },
    defaultTable: 'sales_data',
    logger: silent,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  };
  return { client, runner, sleeps, deps };
}

describe('askQuestion', () => {
  it('stops after generation on a dry run', async () => {
    const { runner, deps } = setup(['SELECT Region FROM sales_data']);
    const result = await askQuestion({ question: 'Regions?', execute: false }, deps);
    assert.equal(result.status, 'dry-run');
    assert.equal(result.query, 'SELECT Region FROM sales_data');
    assert.equal(result.table, 'sales_data');
    assert.equal(result.attempts, 1);
    assert.equal(result.executionResult, null);
    assert.deepEqual(runner.calls, []);
  });

  it('guards and runs the query', async () => {
    const { runner, deps } = setup(['SELECT Region FROM sales_data'], [ROWS]);
    const result = await askQuestion({ question: 'Regions?', execute: true }, deps);

    assert.equal(result.status, 'ok');
    assert.equal(result.query, 'SELECT Region FROM sales_data LIMIT 200');
    assert.deepEqual(result.warnings, ['No LIMIT clause; added LIMIT 200.']);
    assert.equal(result.executionResult, ROWS);
    assert.deepEqual(runner.calls, [
      { sql: 'SELECT Region FROM sales_data LIMIT 200', limits: { maxRows: 5000, timeoutMs: 15_000 } },
    ]);
    assert.deepEqual(result.executions, [{ attempt: 1, sql: 'SELECT Region FROM sales_data LIMIT 200', usedFallback: false }]);
  });

  it('regenerates and retries after an execution error', async () => {
    const { client, sleeps, deps } = setup(
      ['SELECT Region FROM sales_data LIMIT 5', 'SELECT Sales_Rep FROM sales_data LIMIT 5'],
      [new QueryExecutionError('SELECT Region FROM sales_data LIMIT 5', 'ClickHouse error: timeout'), ROWS],
    );
    const result = await askQuestion({ question: 'Who?', execute: true }, deps);

    assert.equal(result.status, 'ok');
    assert.equal(result.query, 'SELECT Sales_Rep FROM sales_data LIMIT 5');
    assert.equal(result.attempts, 2);
    assert.equal(client.requests.length, 2);
    assert.deepEqual(sleeps, [1000]);
    assert.deepEqual(result.executions.map((e) => e.error), ['ClickHouse error: timeout', undefined]);
  });

  it('reports an error once every round failed', async () => {
    const fail = (n: number) => new QueryExecutionError('q', `failure ${n}`);
    const { sleeps, runner, deps } = setup(
      ['SELECT Region FROM sales_data LIMIT 1', 'SELECT Region FROM sales_data LIMIT 2', 'SELECT Region FROM sales_data LIMIT 3'],
      [fail(1), fail(2), fail(3)],
    );
    const result = await askQuestion({ question: 'Regions?', execute: true }, deps);

    assert.equal(result.status, 'error');
    assert.equal(result.error, 'failure 3');
    assert.equal(runner.calls.length, 3);
    assert.deepEqual(sleeps, [1000, 1000]);
    assert.equal(result.executionResult, null);
  });

  it('does not retry a failing fallback query', async () => {
    const { client, runner, sleeps, deps } = setup(['', ''], [new QueryExecutionError('q', 'table is gone')]);
    const result = await askQuestion({ question: 'Anything?', execute: true }, deps);

    assert.equal(result.status, 'error');
    assert.equal(result.usedFallback, true);
    assert.equal(client.requests.length, 2);
    assert.equal(runner.calls.length, 1);
    assert.equal(runner.calls[0].sql, 'SELECT Product_ID, Sale_Date, Sales_Rep, Region, Sales_Amount FROM sales_data LIMIT 10');
    assert.deepEqual(sleeps, []);
  });

  it('blocks stacked statements the validator let through', async () => {
    const { runner, deps } = setup(['SELECT Region FROM sales_data; SELECT Sales_Rep FROM sales_data']);
    const result = await askQuestion({ question: 'Both?', execute: true }, deps);
    assert.equal(result.status, 'blocked');
    assert.equal(result.error, 'Multiple statements are not allowed.');
    assert.deepEqual(runner.calls, []);
  });

  it('passes the per-call repair budget through', async () => {
    const { client, deps } = setup(['bad', 'bad', 'bad']);
    const result = await askQuestion({ question: 'q', execute: false, maxRepairAttempts: 2 }, deps);
    assert.equal(client.requests.length, 3);
    assert.equal(result.usedFallback, true);
  });

  it('rejects an invalid table name', async () => {
    const { deps } = setup([]);
    await assert.rejects(askQuestion({ question: 'q', table: 'sales data', execute: false }, deps), InvalidTableNameError);
  });

  it('rejects a table without a schema', async () => {
    const { deps } = setup([]);
    await assert.rejects(askQuestion({ question: 'q', table: 'events', execute: false }, deps), SchemaUnavailableError);
  });

  it('lets unexpected runner errors propagate', async () => {
    const { deps } = setup(['SELECT Region FROM sales_data'], [new TypeError('bug')]);
    await assert.rejects(askQuestion({ question: 'q', execute: true }, deps), TypeError);
  });
});
