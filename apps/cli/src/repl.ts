/**
 * Line handling for `colquery interactive`.
 */

import { assertTableName, type SchemaProvider } from '@colquery/core';

export type ReplCommand =
  | { kind: 'empty' }
  | { kind: 'exit' }
  | { kind: 'table'; name: string }
  | { kind: 'ask'; question: string };

const TABLE_COMMAND_RE = /^table\s+(\S+)$/i;

export function parseReplLine(raw: string): ReplCommand {
  const line = raw.trim();
  if (!line) return { kind: 'empty' };
  if (line === 'exit' || line === 'quit') return { kind: 'exit' };
  const switchTo = TABLE_COMMAND_RE.exec(line);
  if (switchTo) return { kind: 'table', name: switchTo[1] };
  return { kind: 'ask', question: line };
}

/** The table an interactive session queries. */
export class ReplSession {
  private current: string;
  private readonly schemas: SchemaProvider;

  constructor(table: string, schemas: SchemaProvider) {
    this.current = assertTableName(table);
    this.schemas = schemas;
  }

  get table(): string {
    return this.current;
  }

  /** Switches only once the new table's schema has loaded; a failure keeps the current table. */
  async switchTable(name: string): Promise<string> {
    const next = assertTableName(name);
    await this.schemas.getSchema(next);
    this.current = next;
    return next;
  }
}
