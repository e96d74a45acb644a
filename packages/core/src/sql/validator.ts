/**
 * Heuristic validator for generated SQL.
 *
 * There is no SQL parser here on purpose: identifiers are pulled out with a
 * word-boundary pattern and checked against the schema, and unsafe constructs
 * are matched against a denylist. Dialect-specific syntax can be rejected
 * (false positives) and disguised injection can slip through (false
 * negatives). The execution guard in policy/guard.ts runs after this.
 */

import sqlWords from './sql-words.json' with { type: 'json' };
import type { SchemaDescriptor } from '../schema/types.js';
import { stripCodeFences } from './fences.js';

export type ValidationCode =
  | 'EMPTY_QUERY'
  | 'MISSING_SELECT'
  | 'MISSING_FROM'
  | 'UNKNOWN_FIELD'
  | 'UNSAFE_PATTERN';

export interface ValidationReason {
  code: ValidationCode;
  /** Readable reason; this is what the repair prompt shows the model */
  message: string;
  /** Offending identifiers for UNKNOWN_FIELD */
  identifiers?: readonly string[];
}

export interface ValidationVerdict {
  readonly valid: boolean;
  readonly reasons: readonly ValidationReason[];
}

const SQL_KEYWORDS: ReadonlySet<string> = new Set(sqlWords.keywords.map((w) => w.toLowerCase()));
const SQL_FUNCTIONS: ReadonlySet<string> = new Set(sqlWords.functions.map((w) => w.toLowerCase()));

const IDENTIFIER_TOKEN_RE = /\b[A-Za-z_][A-Za-z0-9_]*\b/g;
const STRING_LITERAL_RE = /'(?:[^'\\]|\\.|'')*'/g;
const ALIAS_RE = /\bAS\s+[`"]?([A-Za-z_][A-Za-z0-9_]*)/gi;
const RELATION_RE = /\b(?:FROM|JOIN)\s+[`"]?([A-Za-z_][A-Za-z0-9_]*)[`"]?(?:\.[`"]?([A-Za-z_][A-Za-z0-9_]*))?/gi;

const UNSAFE_PATTERNS: ReadonlyArray<{ pattern: RegExp; label: string }> = [
  { pattern: /;\s*(DROP|DELETE|UPDATE|INSERT)\b/i, label: 'statement separator followed by a write/DDL keyword' },
  { pattern: /--/, label: 'SQL line comment (--)' },
  { pattern: /\/\*|\*\//, label: 'SQL block comment (/* */)' },
  { pattern: /\bUNION\s+(ALL\s+)?SELECT\b/i, label: 'UNION SELECT combination' },
];

/** True when the word is a reserved keyword or a known function name. */
export function isReservedWord(word: string): boolean {
  const lower = word.toLowerCase();
  return SQL_KEYWORDS.has(lower) || SQL_FUNCTIONS.has(lower);
}

/**
 * Identifiers in the query that are neither reserved words, relation names
 * right after FROM/JOIN, aliases defined with AS, nor schema columns.
 * First-appearance order, no duplicates.
 */
export function findUnknownIdentifiers(sql: string, schema: SchemaDescriptor): string[] {
  const withoutStrings = sql.replace(STRING_LITERAL_RE, ' ');
  const allowed = new Set<string>();
  for (const match of withoutStrings.matchAll(RELATION_RE)) {
    allowed.add(match[1]);
    if (match[2]) allowed.add(match[2]);
  }
  for (const match of withoutStrings.matchAll(ALIAS_RE)) {
    allowed.add(match[1]);
  }

  const unknown: string[] = [];
  for (const match of withoutStrings.matchAll(IDENTIFIER_TOKEN_RE)) {
    const token = match[0];
    if (isReservedWord(token) || allowed.has(token) || schema.has(token)) continue;
    if (!unknown.includes(token)) unknown.push(token);
  }
  return unknown;
}

/** Labels of every denylisted pattern found in the raw candidate. */
export function findUnsafePatterns(sql: string): string[] {
  return UNSAFE_PATTERNS.filter(({ pattern }) => pattern.test(sql)).map(({ label }) => label);
}

/**
 * Validate a candidate query against a schema.
 * The verdict is valid only when no reason was collected.
 */
export function validateQuery(candidate: string, schema: SchemaDescriptor): ValidationVerdict {
  const sql = stripCodeFences(candidate);
  if (!sql) {
    return verdict([{ code: 'EMPTY_QUERY', message: 'Query is empty.' }]);
  }

  const reasons: ValidationReason[] = [];

  if (!/\bSELECT\b/i.test(sql)) {
    reasons.push({ code: 'MISSING_SELECT', message: 'Query has no SELECT clause.' });
  }
  if (!/\bFROM\b/i.test(sql)) {
    reasons.push({ code: 'MISSING_FROM', message: 'Query has no FROM clause.' });
  }

  const unknown = findUnknownIdentifiers(sql, schema);
  if (unknown.length > 0) {
    reasons.push({
      code: 'UNKNOWN_FIELD',
      message: `Unknown field${unknown.length === 1 ? '' : 's'} not in schema: ${unknown.join(', ')}`,
      identifiers: unknown,
    });
  }

  for (const label of findUnsafePatterns(candidate)) {
    reasons.push({ code: 'UNSAFE_PATTERN', message: `Unsafe pattern: ${label}` });
  }

  return verdict(reasons);
}

function verdict(reasons: ValidationReason[]): ValidationVerdict {
  return Object.freeze({ valid: reasons.length === 0, reasons: Object.freeze(reasons) });
}
