/**
 * Configuration schema. Every field has a default, so an empty file (or no
 * file at all) yields a complete config.
 */

import { z } from 'zod';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import { DEFAULT_MODEL } from '../llm/openai.js';
import { DEFAULT_MAX_REPAIR_ATTEMPTS, DEFAULT_QUERY_FIELD } from '../generate/repair-loop.js';
import { SALES_DATA_TABLE } from '../schema/builtin.js';
import { isValidTableName } from '../schema/types.js';

// ── Sections ─────────────────────────────────────────────────────────

const databaseSchema = z
  .object({
    type: z.enum(['clickhouse', 'sqlite']).default('clickhouse'),
    url: z.string().url().default('http://localhost:8123'),
    user: z.string().default('default'),
    password: z.string().default(''),
    database: z.string().min(1).optional(),
    /** SQLite file, required when type is sqlite */
    file: z.string().min(1).optional(),
    requestTimeoutMs: z.number().int().min(1000).default(30_000),
  })
  .refine((db) => db.type !== 'sqlite' || db.file !== undefined, {
    message: 'database.file is required when database.type is "sqlite"',
    path: ['file'],
  });

const llmSchema = z.object({
  apiKey: z.string().default(''),
  baseURL: z.string().url().optional(),
  model: z.string().min(1).default(DEFAULT_MODEL),
  promptFormat: z.enum(['chat', 'llama3']).default('chat'),
  temperature: z.number().min(0).max(2).default(0.1),
  maxTokens: z.number().int().min(1).default(600),
  timeoutMs: z.number().int().min(0).default(30_000),
  /** JSON field carrying the query in structured completions; null for plain text */
  queryField: z.string().min(1).nullable().default(DEFAULT_QUERY_FIELD),
});

const generationSchema = z.object({
  maxRepairAttempts: z.number().int().min(0).default(DEFAULT_MAX_REPAIR_ATTEMPTS),
  maxExecutionAttempts: z.number().int().min(1).default(3),
  retryDelayMs: z.number().int().min(0).default(1000),
});

const limitsSchema = z
  .object({
    defaultLimit: z.number().int().min(1).default(SAFE_DEFAULTS.defaultLimit),
    maxLimit: z.number().int().min(1).default(SAFE_DEFAULTS.maxLimit),
    maxRows: z.number().int().min(1).default(SAFE_DEFAULTS.maxRows),
    statementTimeoutMs: z.number().int().min(100).default(SAFE_DEFAULTS.statementTimeoutMs),
  })
  .refine((l) => l.defaultLimit <= l.maxLimit, {
    message: 'limits.defaultLimit must not exceed limits.maxLimit',
    path: ['defaultLimit'],
  });

const pathsSchema = z.object({
  logs: z.string().min(1).default('logs'),
  output: z.string().min(1).default('output'),
  sqlQueries: z.string().min(1).default('sql_queries'),
});

const loggingSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
});

// ── Root ─────────────────────────────────────────────────────────────

export const configSchema = z.object({
  database: databaseSchema.default({}),
  llm: llmSchema.default({}),
  generation: generationSchema.default({}),
  limits: limitsSchema.default({}),
  paths: pathsSchema.default({}),
  defaultTable: z
    .string()
    .refine(isValidTableName, { message: 'defaultTable must be an identifier or database.table' })
    .default(SALES_DATA_TABLE),
  logging: loggingSchema.default({}),
});

export type ColqueryConfig = z.infer<typeof configSchema>;
export type DatabaseConfig = ColqueryConfig['database'];
export type PathsConfig = ColqueryConfig['paths'];
