/**
 * Run artifacts: the last generated query and the last result set, written
 * under the configured directories.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

export interface ArtifactPaths {
  logs: string;
  output: string;
  sqlQueries: string;
}

export interface ArtifactInput {
  question: string;
  query: string;
  rows?: readonly Record<string, unknown>[];
}

export interface WrittenArtifacts {
  queryFile: string;
  resultFile: string | null;
}

export const LAST_QUERY_FILE = 'last_query.sql';
export const QUERY_RESULT_FILE = 'query_result.json';

export async function ensureDirectories(paths: ArtifactPaths, cwd: string = process.cwd()): Promise<void> {
  for (const dir of [paths.logs, paths.output, paths.sqlQueries]) {
    await mkdir(resolve(cwd, dir), { recursive: true });
  }
}

export function renderQueryFile(question: string, query: string): string {
  return `-- User Query: ${question}\n\n${query}\n`;
}

export async function writeArtifacts(
  paths: ArtifactPaths,
  input: ArtifactInput,
  cwd: string = process.cwd(),
): Promise<WrittenArtifacts> {
  await ensureDirectories(paths, cwd);

  const queryFile = join(resolve(cwd, paths.sqlQueries), LAST_QUERY_FILE);
  await writeFile(queryFile, renderQueryFile(input.question, input.query), 'utf-8');

  let resultFile: string | null = null;
  if (input.rows && input.rows.length > 0) {
    resultFile = join(resolve(cwd, paths.output), QUERY_RESULT_FILE);
    await writeFile(resultFile, JSON.stringify(input.rows, jsonReplacer, 2) + '\n', 'utf-8');
  }
  return { queryFile, resultFile };
}

// ClickHouse returns 64-bit integers as strings, but SQLite may hand back bigint.
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
