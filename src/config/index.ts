/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `tsrr config` commands.
 */

// Schema and types
export { ConfigSchema, PartialConfigSchema, ScoringConfigSchema, ThresholdsConfigSchema } from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
} from './loader.js';

// Paths
export { getTsrrDir, getConfigPath } from './paths.js';

// Environment variables
export { loadEnv, getEnv, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
