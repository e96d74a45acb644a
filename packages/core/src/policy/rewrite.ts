/**
 * LIMIT injection and clamping.
 *
 * The AST (when available) decides whether a LIMIT exists; the rewrite itself
 * is textual so ClickHouse syntax the parser would re-render differently is
 * left untouched.
 */

import { extractLimit, normalizeSql, parseSql } from './parse.js';

export interface LimitRewrite {
  rewrittenSql: string;
  limitApplied: boolean;
  originalLimit: number | null;
  clamped: boolean;
}

const LIMIT_RE = /\bLIMIT\s+(?:(\d+)\s*,\s*)?(\d+)/gi;

/**
 * Ensure the query has a LIMIT clause, and clamp it if above max.
 *
 * - No LIMIT: appends ` LIMIT <defaultLimit>`
 * - LIMIT <= maxLimit: unchanged
 * - LIMIT > maxLimit: the last LIMIT count is replaced with maxLimit
 */
export function ensureLimit(sql: string, defaultLimit: number, maxLimit: number): LimitRewrite {
  const trimmed = normalizeSql(sql);
  const parsed = parseSql(trimmed);

  let existingLimit: number | null;
  if (parsed.ok) {
    if (parsed.kind !== 'select') {
      return { rewrittenSql: trimmed, limitApplied: false, originalLimit: null, clamped: false };
    }
    existingLimit = extractLimit(parsed.ast);
  } else {
    existingLimit = lastTextualLimit(trimmed);
  }

  if (existingLimit === null) {
    return {
      rewrittenSql: `${trimmed} LIMIT ${defaultLimit}`,
      limitApplied: true,
      originalLimit: null,
      clamped: false,
    };
  }

  if (existingLimit <= maxLimit) {
    return { rewrittenSql: trimmed, limitApplied: false, originalLimit: existingLimit, clamped: false };
  }

  return {
    rewrittenSql: replaceLastLimit(trimmed, maxLimit),
    limitApplied: true,
    originalLimit: existingLimit,
    clamped: true,
  };
}

function lastTextualLimit(sql: string): number | null {
  let count: number | null = null;
  for (const match of sql.matchAll(LIMIT_RE)) {
    count = Number(match[2]);
  }
  return count;
}

function replaceLastLimit(sql: string, value: number): string {
  const matches = [...sql.matchAll(LIMIT_RE)];
  const last = matches.at(-1);
  if (!last || last.index === undefined) {
    return `${sql} LIMIT ${value}`;
  }
  const offset = last[1] === undefined ? '' : `${last[1]}, `;
  return `${sql.slice(0, last.index)}LIMIT ${offset}${value}${sql.slice(last.index + last[0].length)}`;
}
