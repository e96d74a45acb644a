/**
 * Text-based read-only check, used when the AST parser cannot read a
 * statement. Strict on purpose: a safe query containing a write keyword
 * as a bare word is rejected too.
 */

const FORBIDDEN_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'CREATE',
  'ALTER',
  'TRUNCATE',
  'RENAME',
  'ATTACH',
  'DETACH',
  'OPTIMIZE',
  'GRANT',
  'REVOKE',
  'KILL',
  'SYSTEM',
];

// ClickHouse table functions that reach outside the database
const DANGEROUS_FUNCTIONS = ['file', 'url', 'remote', 'remoteSecure', 's3', 'hdfs', 'mysql', 'postgresql', 'executable'];

export function isSafeSelect(sql: string): { safe: boolean; reason?: string } {
  const trimmed = sql.trim().replace(/;+\s*$/, '');
  if (!trimmed) {
    return { safe: false, reason: 'Empty SQL statement' };
  }

  const upper = trimmed.toUpperCase();
  if (!upper.startsWith('SELECT') && !upper.startsWith('WITH')) {
    return { safe: false, reason: 'Statement must start with SELECT or WITH (CTE)' };
  }
  if (upper.startsWith('WITH') && !/\bSELECT\b/.test(upper)) {
    return { safe: false, reason: 'CTE must contain a SELECT' };
  }
  if (trimmed.includes(';')) {
    return { safe: false, reason: 'Multiple statements are not allowed' };
  }

  for (const kw of FORBIDDEN_KEYWORDS) {
    if (new RegExp(`\\b${kw}\\b`, 'i').test(trimmed)) {
      return { safe: false, reason: `Statement contains forbidden keyword: ${kw}` };
    }
  }

  for (const fn of DANGEROUS_FUNCTIONS) {
    if (new RegExp(`\\b${fn}\\s*\\(`, 'i').test(trimmed)) {
      return { safe: false, reason: `Statement contains potentially dangerous function: ${fn}` };
    }
  }

  return { safe: true };
}
