export { configSchema, type ColqueryConfig, type DatabaseConfig, type PathsConfig } from './schema.js';
export { loadConfig, DEFAULT_CONFIG_FILE, type LoadConfigOptions, type LoadedConfig } from './load.js';
