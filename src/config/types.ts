/**
 * Configuration types for tsbind.toml parsing.
 *
 * @packageDocumentation
 */

import type { ConflictPolicy } from '../bindings/registry.js';

/**
 * Formatting settings handed to the renderer.
 */
export interface FormattingConfig {
  /** Spaces per indentation level (default: 2). */
  indent_width: number;
  /** Prepended to every interface name at render time. */
  interface_name_prefix: string;
  /** Appended to every interface name at render time. */
  interface_name_suffix: string;
  /** Prepended to every alternatives name at render time. */
  type_name_prefix: string;
  /** Appended to every alternatives name at render time. */
  type_name_suffix: string;
}

/**
 * Registry behaviour.
 */
export interface RegistryConfig {
  /** Policy for a second, different definition of one identity. */
  on_conflict: ConflictPolicy;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Emit debug-level entries. */
  debug: boolean;
}

/**
 * Complete configuration.
 */
export interface Config {
  formatting: FormattingConfig;
  registry: RegistryConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for overrides.
 */
export interface PartialConfig {
  formatting?: Partial<FormattingConfig>;
  registry?: Partial<RegistryConfig>;
  logging?: Partial<LoggingConfig>;
}
