/**
 * Configuration module exports
 */

// Defaults
export { createDefaultConfig, MAX_RETENTION_DAYS, mergeConfig } from "./defaults";
// Inline
export {
  buildInlineConfig,
  extractInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  type InlineOptionValues,
} from "./inline";
// Loader
export {
  CONFIG_FILE_NAMES,
  findConfigFile,
  loadConfigFile,
  parseConfigContent,
  parseLegacyConf,
  type ResolveOptions,
  resolveRunConfig,
} from "./loader";
// Resolver
export { expandHome, freezeConfig, resolvePaths } from "./resolver";
// Validator
export { ConfigError, parseRetentionDays, validateConfig } from "./validator";
