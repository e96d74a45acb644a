/**
 * Deterministic fallback query used once repair attempts are exhausted.
 */

import { SchemaUnavailableError } from '../errors.js';
import type { SchemaDescriptor } from '../schema/types.js';

export const FALLBACK_MAX_COLUMNS = 5;
export const FALLBACK_LIMIT = 10;

/**
 * `SELECT <first five columns> FROM <table> LIMIT 10`.
 *
 * Valid under validateQuery by construction: only schema columns, SELECT and
 * FROM present, nothing on the denylist. `table` must already have passed
 * assertTableName.
 */
export function synthesizeFallback(schema: SchemaDescriptor, table: string): string {
  const columns = [...schema.keys()].slice(0, FALLBACK_MAX_COLUMNS);
  if (columns.length === 0) {
    throw new SchemaUnavailableError(table, `Cannot build a fallback query: schema for "${table}" has no columns.`);
  }
  return `SELECT ${columns.join(', ')} FROM ${table} LIMIT ${FALLBACK_LIMIT}`;
}
