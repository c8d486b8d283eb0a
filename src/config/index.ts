/**
 * Configuration module for tsbind.toml parsing.
 *
 * Provides typed configuration parsing with defaults and environment
 * variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export {
  CONFLICT_POLICIES,
  ConfigParseError,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  toFormattingOptions,
  validateConflictPolicy,
} from './parser.js';
export type {
  Config,
  FormattingConfig,
  LoggingConfig,
  PartialConfig,
  RegistryConfig,
} from './types.js';
export { DEFAULT_CONFIG, DEFAULT_FORMATTING, DEFAULT_LOGGING, DEFAULT_REGISTRY } from './defaults.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
