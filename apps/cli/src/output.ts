/**
 * Human and JSON rendering for CLI commands.
 * Results go to stdout; warnings and errors go to stderr.
 */

import type { Command } from 'commander';
import {
  schemaColumns,
  type AskResult,
  type ExecuteResult,
  type SchemaDescriptor,
  type ValidationVerdict,
} from '@colquery/core';
import { formatTable } from './util/table.js';
import { CliError, toExitCode } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

// ── Formatting ───────────────────────────────────────────────────────

export function formatVerdict(verdict: ValidationVerdict): string {
  if (verdict.valid) return 'Valid query.';
  return ['Invalid query:', ...verdict.reasons.map((r) => `  - ${r.message}`)].join('\n');
}

export function formatSchema(table: string, schema: SchemaDescriptor): string {
  const rows = schemaColumns(schema).map((c) => ({ column: c.name, type: c.type, description: c.description }));
  return `Table ${table} (${rows.length} columns)\n${formatTable(['column', 'type', 'description'], rows)}`;
}

export function formatAskSummary(result: AskResult, verbose: boolean): string {
  const lines = ['Generated SQL:', result.query];
  if (result.usedFallback) {
    lines.push(`Note: no valid query after ${result.attempts} attempt(s); using fallback query.`);
  } else if (verbose) {
    lines.push(`Completion calls: ${result.attempts}`);
  }
  if (verbose) {
    for (const exec of result.executions) {
      if (exec.error) lines.push(`Execution attempt ${exec.attempt} failed: ${exec.error}`);
    }
  }
  return lines.join('\n');
}

export function formatRows(exec: ExecuteResult): string {
  const footer = `${exec.rowCount} row(s) in ${exec.execMs}ms`;
  const shown = exec.truncated ? ` (showing first ${exec.rows.length})` : '';
  return `${formatTable(exec.columns, exec.rows)}\n\n${footer}${shown}`;
}

// ── Printing ─────────────────────────────────────────────────────────

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

/** ClickHouse returns 64-bit integers as bigint through some settings. */
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, jsonReplacer, 2));
}

export function printError(error: unknown, output: OutputOptions): void {
  const isCliError = error instanceof CliError;
  const message = isCliError ? error.message : error instanceof Error ? error.message : String(error);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: isCliError ? error.code : 'INTERNAL_ERROR',
      exitCode: toExitCode(error),
      message,
    };
    if (output.debug) {
      payload.details = isCliError
        ? error.details ?? null
        : error instanceof Error
          ? { stack: error.stack }
          : { raw: String(error) };
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (output.debug) {
    if (isCliError && error.details !== undefined) {
      console.error('Details:', JSON.stringify(error.details, jsonReplacer, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

export function withOutputFlags<T extends Command>(command: T): T {
  command
    .option('--json', 'Print results as JSON on stdout', false)
    .option('--quiet', 'Only print errors', false)
    .option('--verbose', 'Show completion calls, failed executions and saved files', false)
    .option('--debug', 'Show error details and enable debug logging', false);
  return command;
}
