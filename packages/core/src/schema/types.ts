/**
 * Schema descriptor types and identifier rules.
 */

import { InvalidTableNameError } from '../errors.js';

export interface ColumnMeta {
  /** Column type as the database reports it, e.g. `Float64` */
  type: string;
  /** Free-text description; empty when unknown */
  description: string;
}

/**
 * Ordered, read-only mapping from column name to metadata.
 * Iteration order is the column order used in prompts and fallback queries.
 */
export type SchemaDescriptor = ReadonlyMap<string, Readonly<ColumnMeta>>;

export interface ColumnEntry extends ColumnMeta {
  name: string;
}

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER_RE.test(name);
}

/**
 * Build a SchemaDescriptor from column entries, preserving their order.
 * Throws on invalid or duplicate column names.
 */
export function createSchemaDescriptor(columns: Iterable<ColumnEntry>): SchemaDescriptor {
  const map = new Map<string, Readonly<ColumnMeta>>();
  for (const col of columns) {
    if (!isValidIdentifier(col.name)) {
      throw new Error(`Invalid column name "${col.name}"`);
    }
    if (map.has(col.name)) {
      throw new Error(`Duplicate column name "${col.name}"`);
    }
    map.set(col.name, Object.freeze({ type: col.type, description: col.description }));
  }
  return map;
}

export function isValidTableName(table: string): boolean {
  const parts = table.split('.');
  return parts.length <= 2 && parts.every(isValidIdentifier);
}

/**
 * Caller-side guard for table names, which are embedded verbatim in SQL.
 */
export function assertTableName(table: string): string {
  if (!isValidTableName(table)) {
    throw new InvalidTableNameError(table);
  }
  return table;
}

/** Column entries in descriptor order, handy for rendering. */
export function schemaColumns(schema: SchemaDescriptor): ColumnEntry[] {
  return [...schema].map(([name, meta]) => ({ name, type: meta.type, description: meta.description }));
}
