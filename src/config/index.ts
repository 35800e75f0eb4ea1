/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `kbrag config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  VectorStoreConfigSchema,
  ObjectStoreConfigSchema,
  RetrievalConfigSchema,
  GenerationConfigSchema,
  RequestConfigSchema,
  GuardConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  resetConfig,
  deepMerge,
  parseValue,
} from './loader.js';

// Paths
export { getKbragDir, getConfigPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  getEnvRegion,
  envOverrideFor,
  EnvSchema,
  ENV_OVERRIDES,
  _clearEnvCache,
} from './env.js';
export type { EnvVars, EnvOverride } from './env.js';

// Connection context
export {
  createConnectionContext,
  resolveConnectionContext,
  type ConnectionContext,
  type ConnectionContextInput,
  type VectorStoreLocator,
  type ResolveContextOptions,
} from './context.js';
