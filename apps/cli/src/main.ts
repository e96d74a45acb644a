#!/usr/bin/env tsx

/**
 * colquery CLI entrypoint.
 */

import { Command } from 'commander';
import { existsSync } from 'node:fs';
import { createInterface } from 'node:readline';
import {
  SAFE_DEFAULTS,
  assertTableName,
  askQuestion,
  errorMessage,
  validateQuery,
  writeArtifacts,
  type AskResult,
  type WrittenArtifacts,
} from '@colquery/core';
import { normalizeArgv } from './argv.js';
import { EXIT_CODE_SUCCESS, fromCoreError, policyError, runtimeError, toExitCode, usageError } from './errors.js';
import {
  formatAskSummary,
  formatRows,
  formatSchema,
  formatVerdict,
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';
import { ReplSession, parseReplLine } from './repl.js';
import { createRuntime, type CliRuntime } from './runtime.js';

const VERSION = '0.1.0';

// ── Helpers ──────────────────────────────────────────────────────────

function globalConfigPath(command: Command): string | undefined {
  const value: unknown = command.optsWithGlobals().config;
  return typeof value === 'string' ? value : undefined;
}

async function withRuntime<T>(command: Command, output: OutputOptions, fn: (rt: CliRuntime) => Promise<T>): Promise<T> {
  const rt = createRuntime({ configPath: globalConfigPath(command), debug: output.debug });
  try {
    return await fn(rt);
  } finally {
    await rt.close();
  }
}

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    const mapped = fromCoreError(error);
    printError(mapped, output);
    process.exitCode = toExitCode(mapped);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function parseNonNegativeInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw usageError(`Invalid ${flag}. Expected a non-negative integer.`);
  }
  return value;
}

/**
 * Report one ask result. Returns normally for ok and dry-run; blocked and
 * failed runs become CLI errors.
 */
async function reportAsk(result: AskResult, rt: CliRuntime, output: OutputOptions, save: boolean): Promise<void> {
  if (result.status === 'blocked') {
    throw policyError(result.error ?? 'Query blocked by the execution guard.', { query: result.query });
  }
  if (result.status === 'error') {
    throw runtimeError(`Query failed after ${result.executions.length} execution attempt(s): ${result.error ?? ''}`, 'DB_QUERY_FAILED', {
      query: result.query,
      executions: result.executions,
    });
  }

  let artifacts: WrittenArtifacts | null = null;
  if (save) {
    artifacts = await writeArtifacts(rt.config.paths, {
      question: result.question,
      query: result.query,
      rows: result.executionResult?.rows,
    });
  }

  if (output.json) {
    printCommandSuccess({ ...result, artifacts }, output);
    return;
  }

  printHuman(formatAskSummary(result, output.verbose), output);
  for (const warning of result.warnings) {
    printWarning(warning, output);
  }

  const exec = result.executionResult;
  if (!exec) {
    printHuman('\n(dry run: query not executed)', output);
    return;
  }
  printHuman(`\n${formatRows(exec)}`, output);
  if (artifacts && output.verbose) {
    printHuman(`Saved query to ${artifacts.queryFile}`, output);
    if (artifacts.resultFile) printHuman(`Saved rows to ${artifacts.resultFile}`, output);
  }
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('colquery')
  .description('Ask questions of a column-store table in plain language')
  .option('-c, --config <path>', 'Config file (default: ./colquery.yaml or $COLQUERY_CONFIG)')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential output', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and debug logs', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check environment, configuration and database connectivity')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeMajor = parseInt(nodeVersion.slice(1), 10);
          const nodeOk = nodeMajor >= 20;

          await withRuntime(this, output, async (rt) => {
            let database: { ok: boolean; version: string | null; error: string | null };
            try {
              database = { ok: true, version: await rt.runner.ping(), error: null };
            } catch (err: unknown) {
              database = { ok: false, version: null, error: errorMessage(err) };
            }

            const payload = {
              node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
              configFile: rt.configSource,
              logFile: rt.logFile,
              database: { type: rt.config.database.type, ...database },
              openAiKeySet: Boolean(rt.config.llm.apiKey),
              model: rt.config.llm.model,
              promptFormat: rt.config.llm.promptFormat,
              defaultTable: rt.config.defaultTable,
              paths: Object.fromEntries(
                Object.entries(rt.config.paths).map(([key, dir]) => [key, { dir, exists: existsSync(dir) }]),
              ),
              limits: rt.config.limits,
            };

            if (output.json) {
              printCommandSuccess(payload, output);
              return;
            }

            printHuman('colquery doctor', output);
            printHuman('===============', output);
            printHuman('', output);
            printHuman(`Node.js:       ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
            printHuman(`Config file:   ${rt.configSource ?? '(none, using defaults and environment)'}`, output);
            printHuman(
              `Database:      ${rt.config.database.type} ${database.ok ? `✓ ${database.version ?? ''}` : `✗ ${database.error ?? ''}`}`,
              output,
            );
            printHuman(`OpenAI key:    ${payload.openAiKeySet ? 'set ✓' : 'not set'}`, output);
            printHuman(`LLM model:     ${rt.config.llm.model} (${rt.config.llm.promptFormat})`, output);
            printHuman(`Default table: ${rt.config.defaultTable}`, output);
            printHuman(`Log file:      ${rt.logFile}`, output);
            printHuman('', output);
            printHuman('Limits:', output);
            printHuman(`  Default LIMIT:     ${rt.config.limits.defaultLimit} (built-in ${SAFE_DEFAULTS.defaultLimit})`, output);
            printHuman(`  Max LIMIT:         ${rt.config.limits.maxLimit}`, output);
            printHuman(`  Max rows:          ${rt.config.limits.maxRows}`, output);
            printHuman(`  Statement timeout: ${rt.config.limits.statementTimeoutMs}ms`, output);
          });
        });
      }),
  ),
  ['colquery doctor', 'colquery doctor --json'],
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('ask <question>')
      .description('Generate SQL for a question and run it')
      .option('-t, --table <table>', 'Table to query (defaults to config defaultTable)')
      .option('--max-repair-attempts <n>', 'Repair rounds after the first generation')
      .option('--dry-run', 'Generate and validate only; do not execute', false)
      .option('--no-save', 'Do not write last_query.sql and query_result.json')
      .action(async function (this: Command, question: string, opts: { table?: string; maxRepairAttempts?: string; dryRun: boolean; save: boolean }) {
        await runCommand(this, async (output) => {
          if (!question.trim()) throw usageError('Question must not be empty.');
          const maxRepairAttempts = parseNonNegativeInt(opts.maxRepairAttempts, '--max-repair-attempts');

          await withRuntime(this, output, async (rt) => {
            const result = await askQuestion(
              { question, table: opts.table, execute: !opts.dryRun, maxRepairAttempts },
              rt.askDeps(),
            );
            await reportAsk(result, rt, output, opts.save);
          });
        });
      }),
  ),
  [
    'colquery ask "Total sales amount by region"',
    'colquery ask "Top 5 products by quantity" --table sales_data --dry-run',
    'colquery ask "Monthly revenue" --json',
  ],
);

// ── interactive ──────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('interactive')
      .description('Ask questions in a loop ("table NAME" switches table, "exit" quits)')
      .option('-t, --table <table>', 'Table to start with')
      .option('--dry-run', 'Generate and validate only; do not execute', false)
      .action(async function (this: Command, opts: { table?: string; dryRun: boolean }) {
        await runCommand(this, async (output) => {
          await withRuntime(this, output, async (rt) => {
            const session = new ReplSession(opts.table ?? rt.config.defaultTable, rt.schemaProvider);
            const deps = rt.askDeps();
            const rl = createInterface({ input: process.stdin, output: process.stdout });
            printHuman(`Querying ${session.table}. Type "table NAME" to switch, "exit" to quit.`, output);
            rl.setPrompt('colquery> ');
            rl.prompt();

            for await (const raw of rl) {
              const command = parseReplLine(raw);
              if (command.kind === 'exit') break;

              try {
                if (command.kind === 'table') {
                  const table = await session.switchTable(command.name);
                  printHuman(`Now querying ${table}.`, output);
                } else if (command.kind === 'ask') {
                  const result = await askQuestion(
                    { question: command.question, table: session.table, execute: !opts.dryRun },
                    deps,
                  );
                  await reportAsk(result, rt, output, true);
                }
              } catch (error: unknown) {
                printError(fromCoreError(error), output);
              }
              rl.prompt();
            }
            rl.close();
          });
        });
      }),
  ),
  ['colquery interactive', 'colquery interactive --table sales_data'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('schema [table]')
      .description('Show the columns the generator sees for a table')
      .action(async function (this: Command, tableArg: string | undefined) {
        await runCommand(this, async (output) => {
          await withRuntime(this, output, async (rt) => {
            const table = assertTableName(tableArg ?? rt.config.defaultTable);
            const schema = await rt.schemaProvider.getSchema(table);
            if (output.json) {
              printCommandSuccess(
                { table, columns: [...schema].map(([name, meta]) => ({ name, ...meta })) },
                output,
              );
              return;
            }
            printHuman(formatSchema(table, schema), output);
          });
        });
      }),
  ),
  ['colquery schema', 'colquery schema sales_data --json'],
);

// ── validate ─────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('validate <sql>')
      .description('Check a query against a table schema without running it')
      .option('-t, --table <table>', 'Table whose schema to check against')
      .action(async function (this: Command, sql: string, opts: { table?: string }) {
        await runCommand(this, async (output) => {
          await withRuntime(this, output, async (rt) => {
            const table = assertTableName(opts.table ?? rt.config.defaultTable);
            const schema = await rt.schemaProvider.getSchema(table);
            const verdict = validateQuery(sql, schema);

            if (!verdict.valid) {
              throw policyError(formatVerdict(verdict), { reasons: verdict.reasons });
            }
            printCommandSuccess({ table, ...verdict }, output, formatVerdict(verdict));
          });
        });
      }),
  ),
  ['colquery validate "SELECT Region, sum(Sales_Amount) FROM sales_data GROUP BY Region"'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const normalizedArgv = normalizeArgv(process.argv);
  try {
    await program.parseAsync(normalizedArgv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    const code = commanderCode(error);
    if (code === 'commander.helpDisplayed' || code === 'commander.version') {
      process.exitCode = EXIT_CODE_SUCCESS;
      return;
    }
    if (code?.startsWith('commander.')) {
      printError(usageError(errorMessage(error)), output);
      process.exitCode = 1;
      return;
    }
    const mapped = fromCoreError(error);
    printError(mapped, output);
    process.exitCode = toExitCode(mapped);
  }
}

function commanderCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

void main();
