/**
 * Config loader.
 *
 * Precedence: environment > YAML file > schema defaults.
 * The file is `--config <path>`, else $COLQUERY_CONFIG, else ./colquery.yaml
 * when present.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { configSchema, type ColqueryConfig } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'colquery.yaml';

export interface LoadConfigOptions {
  /** Explicit config file; must exist */
  path?: string;
  /** Environment to overlay, defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Base directory for the default file lookup */
  cwd?: string;
}

export interface LoadedConfig {
  config: ColqueryConfig;
  /** Absolute path of the file read, if any */
  source: string | null;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: PlainObject, b: PlainObject): PlainObject {
  const result: PlainObject = { ...a };
  for (const [key, value] of Object.entries(b)) {
    const existing = result[key];
    result[key] = isPlainObject(value) && isPlainObject(existing) ? deepMerge(existing, value) : value;
  }
  return result;
}

// ── File ─────────────────────────────────────────────────────────────

function resolveConfigPath(opts: LoadConfigOptions, env: NodeJS.ProcessEnv): { path: string; required: boolean } {
  const cwd = opts.cwd ?? process.cwd();
  if (opts.path) return { path: resolve(cwd, opts.path), required: true };
  if (env.COLQUERY_CONFIG) return { path: resolve(cwd, env.COLQUERY_CONFIG), required: true };
  return { path: resolve(cwd, DEFAULT_CONFIG_FILE), required: false };
}

function readConfigFile(path: string): PlainObject {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a YAML mapping.`);
  }
  return parsed;
}

// ── Env overlay ──────────────────────────────────────────────────────

/** Only variables that are set end up in the overlay. */
function envOverlay(env: NodeJS.ProcessEnv): PlainObject {
  const pick = (entries: Record<string, string | undefined>): PlainObject =>
    Object.fromEntries(Object.entries(entries).filter(([, v]) => v !== undefined && v !== ''));

  const overlay: PlainObject = {
    database: pick({
      type: env.COLQUERY_DB_TYPE,
      url: env.CLICKHOUSE_URL,
      user: env.CLICKHOUSE_USER,
      password: env.CLICKHOUSE_PASSWORD,
      database: env.CLICKHOUSE_DATABASE,
      file: env.COLQUERY_SQLITE_FILE,
    }),
    llm: pick({
      apiKey: env.OPENAI_API_KEY,
      baseURL: env.OPENAI_BASE_URL,
      model: env.COLQUERY_MODEL,
      promptFormat: env.COLQUERY_PROMPT_FORMAT,
    }),
    logging: pick({ level: env.COLQUERY_LOG_LEVEL?.toLowerCase() }),
  };
  if (env.COLQUERY_DEFAULT_TABLE) {
    overlay.defaultTable = env.COLQUERY_DEFAULT_TABLE;
  }
  return overlay;
}

// ── Public API ───────────────────────────────────────────────────────

export function loadConfig(opts: LoadConfigOptions = {}): LoadedConfig {
  const log = createLogger('config');
  const env = opts.env ?? process.env;
  const target = resolveConfigPath(opts, env);

  let fileConfig: PlainObject = {};
  let source: string | null = null;
  if (existsSync(target.path)) {
    fileConfig = readConfigFile(target.path);
    source = target.path;
    log.debug({ path: source }, 'Configuration file loaded');
  } else if (target.required) {
    throw new ConfigError(`Config file not found: ${target.path}`);
  }

  const merged = deepMerge(fileConfig, envOverlay(env));
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration${source ? ` in ${source}` : ''}:\n  ${issues.join('\n  ')}`, {
      details: issues,
    });
  }
  return { config: result.data, source };
}
