/**
 * AST-based statement parsing for the execution guard.
 * Uses node-sql-parser with the MySQL grammar, the closest it ships to
 * ClickHouse SQL. ClickHouse-only syntax may fail to parse; callers must treat
 * a parse error as "unknown", not as "unsafe".
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

const parser = new Parser();
const PARSE_OPT = { database: 'MySQL' } as const;

export type SqlKind =
  | 'select'
  | 'insert'
  | 'replace'
  | 'update'
  | 'delete'
  | 'create'
  | 'alter'
  | 'drop'
  | 'truncate'
  | 'unknown';

export interface ParseResult {
  /** First statement's AST, as returned by the parser */
  ast: unknown;
  statementCount: number;
  kind: SqlKind;
  /** Original SQL with trailing semicolons stripped */
  normalizedSql: string;
}

export interface ParseError {
  ok: false;
  error: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | ParseError;

const KNOWN_KINDS: readonly SqlKind[] = [
  'select',
  'insert',
  'replace',
  'update',
  'delete',
  'create',
  'alter',
  'drop',
  'truncate',
];

export function normalizeSql(sql: string): string {
  return sql.trim().replace(/;+\s*$/, '');
}

export function parseSql(sql: string): ParseOutcome {
  const normalizedSql = normalizeSql(sql);
  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  let statements: unknown[];
  try {
    const astResult: unknown = parser.astify(normalizedSql, PARSE_OPT);
    statements = Array.isArray(astResult) ? astResult : [astResult];
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }

  if (statements.length === 0) {
    return { ok: false, error: 'No statements found' };
  }

  const first = statements[0];
  const rawKind = isRecord(first) && typeof first.type === 'string' ? first.type.toLowerCase() : '';
  return {
    ok: true,
    ast: first,
    statementCount: statements.length,
    kind: isKnownKind(rawKind) ? rawKind : 'unknown',
    normalizedSql,
  };
}

/**
 * LIMIT row count from a parsed SELECT, or null when it has none.
 * `LIMIT o, n` stores offset first; `LIMIT n OFFSET o` stores the count first.
 */
export function extractLimit(ast: unknown): number | null {
  if (!isRecord(ast) || !isRecord(ast.limit)) return null;
  const values = ast.limit.value;
  if (!Array.isArray(values) || values.length === 0) return null;

  const countIdx = values.length === 2 && ast.limit.seperator === ',' ? 1 : 0;
  const entry: unknown = values[countIdx];
  if (isRecord(entry) && typeof entry.value === 'number') {
    return entry.value;
  }
  return null;
}

function isKnownKind(s: string): s is SqlKind {
  return (KNOWN_KINDS as readonly string[]).includes(s);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
