/**
 * Wires config into the core components for one CLI invocation.
 */

import {
  CachingSchemaProvider,
  ConfigError,
  OpenAICompletionClient,
  QueryGenerator,
  addLogFile,
  createRunner,
  loadConfig,
  setLogLevel,
  type AskDeps,
  type ColqueryConfig,
  type DatabaseConfig,
  type RunnerConfig,
  type SchemaAwareRunner,
} from '@colquery/core';

export interface RuntimeOptions {
  configPath?: string;
  debug?: boolean;
}

export interface CliRuntime {
  config: ColqueryConfig;
  configSource: string | null;
  /** JSON-lines log written under paths.logs */
  logFile: string;
  runner: SchemaAwareRunner;
  schemaProvider: CachingSchemaProvider;
  /** Builds the completion-backed generator; throws when no API key is configured */
  createGenerator(): QueryGenerator;
  askDeps(): AskDeps;
  close(): Promise<void>;
}

export function toRunnerConfig(db: DatabaseConfig): RunnerConfig {
  if (db.type === 'sqlite') {
    if (!db.file) {
      throw new ConfigError('database.file is required when database.type is "sqlite"');
    }
    return { type: 'sqlite', file: db.file };
  }
  return {
    type: 'clickhouse',
    url: db.url,
    username: db.user,
    password: db.password,
    database: db.database,
    requestTimeoutMs: db.requestTimeoutMs,
  };
}

export function createRuntime(opts: RuntimeOptions = {}): CliRuntime {
  const { config, source } = loadConfig({ path: opts.configPath });
  setLogLevel(opts.debug ? 'debug' : config.logging.level);
  const logFile = addLogFile(config.paths.logs);

  const runner = createRunner(toRunnerConfig(config.database));
  const schemaProvider = new CachingSchemaProvider({ source: runner });

  let generator: QueryGenerator | undefined;
  const createGenerator = (): QueryGenerator => {
    generator ??= new QueryGenerator({
      client: new OpenAICompletionClient({
        apiKey: config.llm.apiKey,
        baseURL: config.llm.baseURL,
        model: config.llm.model,
        promptFormat: config.llm.promptFormat,
        temperature: config.llm.temperature,
      }),
      maxTokens: config.llm.maxTokens,
      timeoutMs: config.llm.timeoutMs,
      queryField: config.llm.queryField,
    });
    return generator;
  };

  return {
    config,
    configSource: source,
    logFile,
    runner,
    schemaProvider,
    createGenerator,
    askDeps: () => ({
      generator: createGenerator(),
      schemaProvider,
      runner,
      limits: config.limits,
      settings: config.generation,
      defaultTable: config.defaultTable,
    }),
    close: () => runner.close(),
  };
}
