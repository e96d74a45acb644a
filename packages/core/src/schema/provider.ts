/**
 * Schema provider with a per-process cache.
 *
 * Built-in schemas are served directly; other tables are introspected through
 * a SchemaSource (ClickHouse `system.columns`, SQLite `PRAGMA table_info`).
 * Concurrent lookups for one table share a single in-flight promise, and a
 * failed lookup is never cached.
 */

import { SchemaUnavailableError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { BUILTIN_SCHEMAS } from './builtin.js';
import { createSchemaDescriptor, isValidIdentifier, type ColumnEntry, type SchemaDescriptor } from './types.js';

export interface SchemaProvider {
  /** Resolve the schema for a table, or reject with SchemaUnavailableError. */
  getSchema(table: string): Promise<SchemaDescriptor>;
}

/** Something that can list a table's columns in declaration order. */
export interface SchemaSource {
  describeTable(table: string): Promise<ColumnEntry[]>;
}

export interface CachingSchemaProviderOptions {
  source?: SchemaSource;
  /** Extra static schemas; override the built-ins on name clash */
  staticSchemas?: ReadonlyMap<string, SchemaDescriptor>;
  logger?: Logger;
}

export class CachingSchemaProvider implements SchemaProvider {
  private readonly source?: SchemaSource;
  private readonly staticSchemas: ReadonlyMap<string, SchemaDescriptor>;
  private readonly cache = new Map<string, Promise<SchemaDescriptor>>();
  private readonly log: Logger;

  constructor(opts: CachingSchemaProviderOptions = {}) {
    this.source = opts.source;
    this.staticSchemas = new Map([...BUILTIN_SCHEMAS, ...(opts.staticSchemas ?? [])]);
    this.log = opts.logger ?? createLogger('schema');
  }

  getSchema(table: string): Promise<SchemaDescriptor> {
    const cached = this.cache.get(table);
    if (cached) return cached;

    const pending = this.load(table);
    this.cache.set(table, pending);
    pending.catch(() => {
      // Only evict our own entry; an invalidate() may already have replaced it
      if (this.cache.get(table) === pending) {
        this.cache.delete(table);
      }
    });
    return pending;
  }

  /** Drop one cached table so the next lookup introspects again. */
  invalidate(table: string): boolean {
    return this.cache.delete(table);
  }

  invalidateAll(): void {
    this.cache.clear();
  }

  /** Tables with a cached (or in-flight) entry */
  cachedTables(): string[] {
    return [...this.cache.keys()];
  }

  private async load(table: string): Promise<SchemaDescriptor> {
    const builtin = this.staticSchemas.get(table);
    if (builtin) {
      return builtin;
    }

    if (!this.source) {
      throw new SchemaUnavailableError(table, `No schema source configured and "${table}" is not a built-in table.`);
    }

    let columns: ColumnEntry[];
    try {
      columns = await this.source.describeTable(table);
    } catch (err: unknown) {
      this.log.error({ table, err }, 'Schema introspection failed');
      throw new SchemaUnavailableError(table, `Could not retrieve schema for table "${table}": ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const usable = columns.filter((col) => {
      if (isValidIdentifier(col.name)) return true;
      this.log.warn({ table, column: col.name }, 'Skipping column with unsupported name');
      return false;
    });

    if (usable.length === 0) {
      throw new SchemaUnavailableError(table, `Table "${table}" has no usable columns or does not exist.`);
    }

    this.log.debug({ table, columns: usable.length }, 'Schema cached');
    return createSchemaDescriptor(usable);
  }
}
