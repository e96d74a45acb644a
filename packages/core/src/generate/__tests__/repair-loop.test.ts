/**
 * Repair loop tests, driven by a scripted completion client.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { pino } from 'pino';
import { CompletionError, InvalidTableNameError, SchemaUnavailableError } from '../../errors.js';
import type { CompletionClient, CompletionRequest, CompletionResult } from '../../llm/types.js';
import { BUILTIN_SCHEMAS, SALES_DATA_TABLE } from '../../schema/builtin.js';
import { createSchemaDescriptor, type SchemaDescriptor } from '../../schema/types.js';
import { QueryGenerator, extractQueryText, generateQuery } from '../repair-loop.js';

const silent = pino({ level: 'silent' });

type Reply = CompletionResult | Error | ((request: CompletionRequest) => Promise<CompletionResult>);

class ScriptedClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];
  private readonly replies: Reply[];

  constructor(replies: Reply[]) {
    this.replies = [...replies];
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('no scripted reply left');
    if (next instanceof Error) throw next;
    if (typeof next === 'function') return next(request);
    return next;
  }
}

/** Returns whatever the decoded reply body holds, unchecked. */
class WireClient implements CompletionClient {
  private readonly bodies: string[];

  constructor(bodies: string[]) {
    this.bodies = [...bodies];
  }

  async complete(): Promise<CompletionResult> {
    return JSON.parse(this.bodies.shift() ?? 'null');
  }
}

function text(value: string): CompletionResult {
  return { kind: 'text', text: value };
}

function salesSchema(): SchemaDescriptor {
  const schema = BUILTIN_SCHEMAS.get(SALES_DATA_TABLE);
  assert.ok(schema);
  return schema;
}

const threeColumns = createSchemaDescriptor([
  { name: 'Product_ID', type: 'Int64', description: '' },
  { name: 'Sale_Date', type: 'Date', description: '' },
  { name: 'Product_Category', type: 'String', description: '' },
]);

function generator(client: CompletionClient, timeoutMs = 0): QueryGenerator {
  return new QueryGenerator({ client, logger: silent, timeoutMs });
}

// ── Success paths ────────────────────────────────────────────────────

describe('QueryGenerator success', () => {
  it('accepts a valid first candidate', async () => {
    const client = new ScriptedClient([text('SELECT Region, sum(Sales_Amount) FROM sales_data GROUP BY Region')]);
    const outcome = await generator(client).generateQuery('Sales by region?', salesSchema(), 'sales_data');

    assert.equal(outcome.query, 'SELECT Region, sum(Sales_Amount) FROM sales_data GROUP BY Region');
    assert.equal(outcome.attempts, 1);
    assert.equal(outcome.usedFallback, false);
    assert.equal(outcome.state, 'SUCCEEDED');
    assert.equal(client.requests.length, 1);
    assert.deepEqual(client.requests[0].shape, { clickhouse_query: 'string' });
    assert.equal(client.requests[0].maxTokens, 600);
    assert.equal(client.requests[0].question, 'Sales by region?');
  });

  it('repairs an unknown field on the second call', async () => {
    const client = new ScriptedClient([
      text('SELECT Revenue FROM sales_data'),
      text('```sql\nSELECT Sales_Amount FROM sales_data\n```'),
    ]);
    const outcome = await generator(client).generateQuery('Revenue?', salesSchema(), 'sales_data');

    assert.equal(outcome.query, 'SELECT Sales_Amount FROM sales_data');
    assert.equal(outcome.attempts, 2);
    assert.equal(outcome.usedFallback, false);
    assert.deepEqual(outcome.candidates.map((c) => c.mode), ['generate', 'repair']);

    const repairPrompt = client.requests[1].prompt;
    assert.ok(repairPrompt.includes('Your previous query was rejected:\nSELECT Revenue FROM sales_data'));
    assert.ok(repairPrompt.includes('- Unknown field not in schema: Revenue'));
  });

  it('reads the query from a structured completion', async () => {
    const client = new ScriptedClient([{ kind: 'structured', fields: { clickhouse_query: 'SELECT Region FROM sales_data' } }]);
    const outcome = await generator(client).generateQuery('Regions?', salesSchema(), 'sales_data');
    assert.equal(outcome.query, 'SELECT Region FROM sales_data');
  });

  it('requests plain text when queryField is null', async () => {
    const client = new ScriptedClient([text('SELECT Region FROM sales_data')]);
    await new QueryGenerator({ client, logger: silent, queryField: null }).generateQuery('Regions?', salesSchema(), 'sales_data');
    assert.equal(client.requests[0].shape, undefined);
  });
});

// ── Exhaustion ───────────────────────────────────────────────────────

describe('QueryGenerator exhaustion', () => {
  it('falls back after empty completions', async () => {
    const client = new ScriptedClient([text(''), text('')]);
    const outcome = await generator(client).generateQuery('Anything?', threeColumns, 'sales_data');

    assert.equal(outcome.query, 'SELECT Product_ID, Sale_Date, Product_Category FROM sales_data LIMIT 10');
    assert.equal(outcome.usedFallback, true);
    assert.equal(outcome.state, 'EXHAUSTED');
    assert.equal(outcome.attempts, 2);
    assert.equal(outcome.candidates[0].verdict.reasons[0].code, 'EMPTY_QUERY');
  });

  it('makes exactly one call when no repairs are allowed', async () => {
    const client = new ScriptedClient([text('SELECT nope FROM sales_data')]);
    const outcome = await generator(client).generateQuery('Anything?', threeColumns, 'sales_data', 0);
    assert.equal(client.requests.length, 1);
    assert.equal(outcome.attempts, 1);
    assert.equal(outcome.usedFallback, true);
  });

  it('makes 1 + maxRepairAttempts calls before falling back', async () => {
    const client = new ScriptedClient([text('x'), text('y'), text('z'), text('w')]);
    const outcome = await generator(client).generateQuery('Anything?', threeColumns, 'sales_data', 3);
    assert.equal(client.requests.length, 4);
    assert.equal(outcome.attempts, 4);
  });

  it('never accepts an injected statement', async () => {
    const injected = text('SELECT Product_ID FROM sales_data; DROP TABLE sales_data');
    const client = new ScriptedClient([injected, injected]);
    const outcome = await generator(client).generateQuery('Drop it', threeColumns, 'sales_data');
    assert.equal(outcome.usedFallback, true);
    assert.equal(outcome.query, 'SELECT Product_ID, Sale_Date, Product_Category FROM sales_data LIMIT 10');
  });

  it('the one-shot form behaves the same', async () => {
    const outcome = await generateQuery(new ScriptedClient([text(''), text('')]), 'q', threeColumns, 'sales_data');
    assert.equal(outcome.usedFallback, true);
  });
});

// ── Completion failures ──────────────────────────────────────────────

describe('QueryGenerator completion failures', () => {
  it('treats a CompletionError as an empty candidate', async () => {
    const client = new ScriptedClient([new CompletionError('upstream down'), text('SELECT Region FROM sales_data')]);
    const outcome = await generator(client).generateQuery('Regions?', salesSchema(), 'sales_data');
    assert.equal(outcome.attempts, 2);
    assert.equal(outcome.candidates[0].sql, '');
    assert.equal(outcome.candidates[0].completionError, 'upstream down');
    assert.equal(outcome.query, 'SELECT Region FROM sales_data');
  });

  it('wraps other client errors', async () => {
    const client = new ScriptedClient([new Error('socket hang up'), text('SELECT Region FROM sales_data')]);
    const outcome = await generator(client, 1000).generateQuery('Regions?', salesSchema(), 'sales_data');
    assert.equal(outcome.candidates[0].completionError, 'Completion failed: socket hang up');
  });

  it('times out a hanging call and aborts it', async () => {
    let aborted = false;
    const hang = (request: CompletionRequest): Promise<CompletionResult> =>
      new Promise((_, reject) => {
        request.signal?.addEventListener('abort', () => {
          aborted = true;
          reject(new Error('aborted'));
        });
      });
    const client = new ScriptedClient([hang, text('SELECT Region FROM sales_data')]);
    const outcome = await generator(client, 20).generateQuery('Regions?', salesSchema(), 'sales_data');

    assert.equal(aborted, true);
    assert.equal(outcome.candidates[0].completionError, 'Completion timed out after 20ms');
    assert.equal(outcome.query, 'SELECT Region FROM sales_data');
  });

  it('treats replies outside the result union as empty candidates', async () => {
    const client = new WireClient([
      'null',
      '{"kind":"text","text":42}',
      '{"kind":"structured","fields":null}',
      '"SELECT Region FROM sales_data"',
    ]);
    const outcome = await generator(client).generateQuery('Regions?', salesSchema(), 'sales_data', 3);

    assert.equal(outcome.state, 'SUCCEEDED');
    assert.equal(outcome.attempts, 4);
    assert.equal(outcome.query, 'SELECT Region FROM sales_data');
    assert.deepEqual(
      outcome.candidates.map((c) => c.sql),
      ['', '', '', 'SELECT Region FROM sales_data'],
    );
  });

  it('falls back when every reply is unusable', async () => {
    const client = new WireClient(['{"kind":"other"}', '7']);
    const outcome = await generator(client).generateQuery('q', threeColumns, 'sales_data');
    assert.equal(outcome.usedFallback, true);
    assert.equal(outcome.query, 'SELECT Product_ID, Sale_Date, Product_Category FROM sales_data LIMIT 10');
  });

  it('falls back when every call fails', async () => {
    const client = new ScriptedClient([new CompletionError('down'), new CompletionError('down')]);
    const outcome = await generator(client).generateQuery('q', threeColumns, 'sales_data');
    assert.equal(outcome.usedFallback, true);
  });
});

// ── Argument checks ──────────────────────────────────────────────────

describe('QueryGenerator argument checks', () => {
  it('rejects a negative repair budget', async () => {
    await assert.rejects(generator(new ScriptedClient([])).generateQuery('q', threeColumns, 't', -1), RangeError);
  });

  it('rejects a table name that is not an identifier', async () => {
    await assert.rejects(
      generator(new ScriptedClient([])).generateQuery('q', threeColumns, 'sales_data; DROP TABLE x'),
      InvalidTableNameError,
    );
  });

  it('rejects an empty schema', async () => {
    await assert.rejects(
      generator(new ScriptedClient([])).generateQuery('q', createSchemaDescriptor([]), 't'),
      SchemaUnavailableError,
    );
  });
});

describe('extractQueryText', () => {
  it('reads text and structured results', () => {
    assert.equal(extractQueryText(text('SELECT 1'), 'clickhouse_query'), 'SELECT 1');
    assert.equal(extractQueryText({ kind: 'structured', fields: { q: 'SELECT 1' } }, 'q'), 'SELECT 1');
  });

  it('returns the empty string for missing or non-string fields', () => {
    assert.equal(extractQueryText({ kind: 'structured', fields: {} }, 'q'), '');
    assert.equal(extractQueryText({ kind: 'structured', fields: { q: 42 } }, 'q'), '');
    assert.equal(extractQueryText({ kind: 'structured', fields: { q: 'x' } }, null), '');
  });

  it('handles values outside the result union', () => {
    assert.equal(extractQueryText('SELECT 1', 'q'), 'SELECT 1');
    assert.equal(extractQueryText(null, 'q'), '');
    assert.equal(extractQueryText({ kind: 'text', text: 42 }, 'q'), '');
    assert.equal(extractQueryText({ kind: 'structured', fields: null }, 'q'), '');
    assert.equal(extractQueryText({ kind: 'other', text: 'SELECT 1' }, 'q'), '');
  });
});
