/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `mcq config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  ProviderTypeSchema,
  GenerationConfigSchema,
  EmbeddingConfigSchema,
  CorpusConfigSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  ProviderType,
  GenerationConfig,
  EmbeddingConfig,
  CorpusConfig,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  resetConfig,
  listConfig,
  parseValue,
  deepMerge,
} from './loader.js';

// Paths
export { getMcqDir, getConfigPath, getCacheDir, expandHome } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasApiKey,
  getOllamaHost,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_GENERATION,
  COMMANDS_REQUIRING_EMBEDDING,
} from './startup-validation.js';
export type {
  StartupValidationResult,
  StartupValidationOptions,
} from './startup-validation.js';
