/**
 * Execution guard: the last check before a query reaches the database.
 *
 * Accepts a single read-only SELECT and makes sure it carries a bounded
 * LIMIT. Statements the AST parser cannot read (ClickHouse-only syntax) fall
 * back to the text check in sql-check.ts.
 */

import { parseSql, type ParseOutcome } from './parse.js';
import { ensureLimit } from './rewrite.js';
import { isSafeSelect } from './sql-check.js';

export interface GuardOptions {
  defaultLimit: number;
  maxLimit: number;
}

export type GuardResult =
  | { allowed: true; sql: string; warnings: string[]; parsed: boolean }
  | { allowed: false; reason: string; warnings: string[] };

export function guardForExecution(
  sql: string,
  opts: GuardOptions,
  parse: (sql: string) => ParseOutcome = parseSql,
): GuardResult {
  const warnings: string[] = [];
  const outcome = parse(sql);

  if (outcome.ok) {
    if (outcome.statementCount > 1) {
      return { allowed: false, reason: 'Multiple statements are not allowed.', warnings };
    }
    if (outcome.kind !== 'select') {
      return {
        allowed: false,
        reason: `Only SELECT statements may be executed (got ${outcome.kind.toUpperCase()}).`,
        warnings,
      };
    }
  } else {
    warnings.push(`SQL parser could not read the statement (${outcome.error}); using text checks.`);
    const check = isSafeSelect(sql);
    if (!check.safe) {
      return { allowed: false, reason: check.reason ?? 'Statement is not a safe SELECT.', warnings };
    }
  }

  const limit = ensureLimit(sql, opts.defaultLimit, opts.maxLimit);
  if (limit.clamped) {
    warnings.push(`LIMIT ${limit.originalLimit} exceeds the maximum; clamped to ${opts.maxLimit}.`);
  } else if (limit.limitApplied) {
    warnings.push(`No LIMIT clause; added LIMIT ${opts.defaultLimit}.`);
  }

  return { allowed: true, sql: limit.rewrittenSql, warnings, parsed: outcome.ok };
}
