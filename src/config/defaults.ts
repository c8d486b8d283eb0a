/**
 * Default configuration values for tsbind.toml.
 *
 * @packageDocumentation
 */

import type { Config, FormattingConfig, LoggingConfig, RegistryConfig } from './types.js';

/**
 * Default formatting: two-space indent, names unchanged.
 */
export const DEFAULT_FORMATTING: FormattingConfig = {
  indent_width: 2,
  interface_name_prefix: '',
  interface_name_suffix: '',
  type_name_prefix: '',
  type_name_suffix: '',
};

/**
 * Conflicting registrations are errors by default.
 */
export const DEFAULT_REGISTRY: RegistryConfig = {
  on_conflict: 'error',
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  formatting: DEFAULT_FORMATTING,
  registry: DEFAULT_REGISTRY,
  logging: DEFAULT_LOGGING,
};
