/**
 * Structured logging for colquery.
 *
 * Uses pino and writes to stderr so that stdout stays free for CLI output.
 * pino-pretty is used when stderr is an interactive terminal outside
 * production; everything else gets JSON lines. `addLogFile` adds a JSON-lines
 * file under the configured logs directory.
 *
 * Usage:
 *   const log = createLogger('repair-loop');
 *   log.warn({ attempt: 2, err }, 'Completion failed');
 */

import { join, resolve } from 'node:path';
import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.COLQUERY_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

export const LOG_FILE = 'colquery.log';

function stderrStream(): DestinationStream {
  const pretty = process.stderr.isTTY === true && process.env.NODE_ENV !== 'production';
  if (pretty) {
    return pino.transport({
      target: 'pino-pretty',
      options: {
        destination: 2,
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  }
  return pino.destination(2);
}

// Streams accept every level; the logger's own level does the filtering.
const streams = pino.multistream([{ level: 'trace', stream: stderrStream() }]);
const logFiles = new Set<string>();

function buildRootLogger(): Logger {
  const options: LoggerOptions = { name: 'colquery', level: initialLevel() };
  return pino(options, streams);
}

/** Root logger instance */
export const logger: Logger = buildRootLogger();

/**
 * Create a child logger with a namespace, e.g. `createLogger('schema')`.
 */
export function createLogger(namespace: string): Logger {
  return logger.child({ namespace });
}

/** Change the root level. Only child loggers created afterwards pick it up. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Also write log lines to `<dir>/colquery.log`, creating the directory.
 * Applies to every logger, including children created earlier.
 */
export function addLogFile(dir: string): string {
  const file = resolve(join(dir, LOG_FILE));
  if (!logFiles.has(file)) {
    streams.add({ level: 'trace', stream: pino.destination({ dest: file, mkdir: true, append: true, sync: true }) });
    logFiles.add(file);
  }
  return file;
}
