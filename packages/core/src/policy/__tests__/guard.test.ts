/**
 * Execution guard tests: parsing, LIMIT rewriting and the text fallback.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { guardForExecution } from '../guard.js';
import { extractLimit, parseSql, type ParseOutcome } from '../parse.js';
import { ensureLimit } from '../rewrite.js';
import { isSafeSelect } from '../sql-check.js';

const LIMITS = { defaultLimit: 200, maxLimit: 10_000 };

// ── Parsing ──────────────────────────────────────────────────────────

describe('parseSql', () => {
  it('parses a simple SELECT', () => {
    const result = parseSql('SELECT 1 as num');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(result.kind, 'select');
      assert.equal(result.statementCount, 1);
    }
  });

  it('parses a CTE SELECT', () => {
    const result = parseSql('WITH cte AS (SELECT 1) SELECT * FROM cte');
    assert.equal(result.ok, true);
    if (result.ok) assert.equal(result.kind, 'select');
  });

  it('classifies UPDATE as update', () => {
    const result = parseSql("UPDATE sales_data SET Region = 'x'");
    assert.equal(result.ok, true);
    if (result.ok) assert.equal(result.kind, 'update');
  });

  it('strips trailing semicolons', () => {
    const result = parseSql('SELECT 1;;  ');
    assert.equal(result.ok, true);
    if (result.ok) assert.equal(result.normalizedSql, 'SELECT 1');
  });

  it('reports empty input', () => {
    assert.deepEqual(parseSql('  ;'), { ok: false, error: 'Empty SQL statement' });
  });

  it('extracts LIMIT counts', () => {
    const plain = parseSql('SELECT a FROM t LIMIT 25');
    const none = parseSql('SELECT a FROM t');
    assert.ok(plain.ok && none.ok);
    assert.equal(extractLimit(plain.ast), 25);
    assert.equal(extractLimit(none.ast), null);
  });
});

// ── LIMIT rewriting ──────────────────────────────────────────────────

describe('ensureLimit', () => {
  it('appends the default LIMIT when missing', () => {
    assert.deepEqual(ensureLimit('SELECT Region FROM sales_data', 200, 10_000), {
      rewrittenSql: 'SELECT Region FROM sales_data LIMIT 200',
      limitApplied: true,
      originalLimit: null,
      clamped: false,
    });
  });

  it('leaves a LIMIT within bounds alone', () => {
    assert.deepEqual(ensureLimit('SELECT Region FROM sales_data LIMIT 10', 200, 10_000), {
      rewrittenSql: 'SELECT Region FROM sales_data LIMIT 10',
      limitApplied: false,
      originalLimit: 10,
      clamped: false,
    });
  });

  it('clamps LIMIT n OFFSET m', () => {
    const result = ensureLimit('SELECT Region FROM sales_data LIMIT 50000 OFFSET 5', 200, 10_000);
    assert.equal(result.rewrittenSql, 'SELECT Region FROM sales_data LIMIT 10000 OFFSET 5');
    assert.equal(result.originalLimit, 50_000);
    assert.equal(result.clamped, true);
  });

  it('clamps LIMIT m, n', () => {
    const result = ensureLimit('SELECT Region FROM sales_data LIMIT 5, 50000', 200, 10_000);
    assert.equal(result.rewrittenSql, 'SELECT Region FROM sales_data LIMIT 5, 10000');
  });
});

// ── Guard ────────────────────────────────────────────────────────────

describe('guardForExecution', () => {
  it('adds a LIMIT to an unbounded SELECT', () => {
    assert.deepEqual(guardForExecution('SELECT Region FROM sales_data;', LIMITS), {
      allowed: true,
      sql: 'SELECT Region FROM sales_data LIMIT 200',
      warnings: ['No LIMIT clause; added LIMIT 200.'],
      parsed: true,
    });
  });

  it('passes a bounded SELECT through unchanged', () => {
    assert.deepEqual(guardForExecution('SELECT Region FROM sales_data LIMIT 10', LIMITS), {
      allowed: true,
      sql: 'SELECT Region FROM sales_data LIMIT 10',
      warnings: [],
      parsed: true,
    });
  });

  it('clamps an oversized LIMIT with a warning', () => {
    const result = guardForExecution('SELECT Region FROM sales_data LIMIT 50000', LIMITS);
    assert.equal(result.allowed, true);
    if (result.allowed) {
      assert.equal(result.sql, 'SELECT Region FROM sales_data LIMIT 10000');
      assert.deepEqual(result.warnings, ['LIMIT 50000 exceeds the maximum; clamped to 10000.']);
    }
  });

  it('blocks writes', () => {
    const result = guardForExecution("DELETE FROM sales_data WHERE Region = 'x'", LIMITS);
    assert.deepEqual(result, {
      allowed: false,
      reason: 'Only SELECT statements may be executed (got DELETE).',
      warnings: [],
    });
  });

  it('blocks multiple statements', () => {
    const result = guardForExecution('SELECT 1; SELECT 2', LIMITS);
    assert.equal(result.allowed, false);
    if (!result.allowed) assert.equal(result.reason, 'Multiple statements are not allowed.');
  });

  it('falls back to text checks when the parser gives up', () => {
    const unreadable = (): ParseOutcome => ({ ok: false, error: 'SQL parse error: unexpected token' });
    assert.deepEqual(guardForExecution('SELECT Region FROM sales_data', LIMITS, unreadable), {
      allowed: true,
      sql: 'SELECT Region FROM sales_data LIMIT 200',
      warnings: [
        'SQL parser could not read the statement (SQL parse error: unexpected token); using text checks.',
        'No LIMIT clause; added LIMIT 200.',
      ],
      parsed: false,
    });
  });

  it('still blocks writes the parser could not read', () => {
    const unreadable = (): ParseOutcome => ({ ok: false, error: 'SQL parse error' });
    const result = guardForExecution('INSERT INTO sales_data VALUES (1)', LIMITS, unreadable);
    assert.equal(result.allowed, false);
    if (!result.allowed) assert.equal(result.reason, 'Statement must start with SELECT or WITH (CTE)');
  });
});

describe('isSafeSelect', () => {
  it('accepts SELECT and CTE queries', () => {
    assert.deepEqual(isSafeSelect('SELECT Region FROM sales_data'), { safe: true });
    assert.deepEqual(isSafeSelect('WITH x AS (SELECT 1) SELECT * FROM x'), { safe: true });
  });

  it('rejects write keywords anywhere', () => {
    assert.deepEqual(isSafeSelect('SELECT * FROM t WHERE a IN (SELECT 1) OPTIMIZE'), {
      safe: false,
      reason: 'Statement contains forbidden keyword: OPTIMIZE',
    });
  });

  it('rejects stacked statements', () => {
    assert.deepEqual(isSafeSelect('SELECT 1; SELECT 2'), { safe: false, reason: 'Multiple statements are not allowed' });
  });

  it('rejects table functions that reach outside the database', () => {
    assert.deepEqual(isSafeSelect("SELECT * FROM url('http://localhost/x.csv', CSV)"), {
      safe: false,
      reason: 'Statement contains potentially dangerous function: url',
    });
  });
});
