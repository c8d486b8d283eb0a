/**
 * Environment variable overrides for configuration.
 *
 * TSBIND_* environment variables override configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';
import { CONFLICT_POLICIES } from './parser.js';
import type { ConflictPolicy } from '../bindings/registry.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvValueType = 'string' | 'indent' | 'boolean' | 'policy';

interface EnvMapping {
  readonly description: string;
  readonly type: EnvValueType;
  readonly apply: (overrides: PartialConfig, value: string | number | boolean) => void;
}

function asString(value: string | number | boolean): string {
  return String(value);
}

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: TSBIND_<SECTION>_<FIELD>, with shortcuts for the common ones.
 */
const ENV_VAR_MAPPINGS: ReadonlyMap<string, EnvMapping> = new Map<string, EnvMapping>([
  [
    'TSBIND_INDENT_WIDTH',
    {
      description: 'Override indentation width (shortcut for TSBIND_FORMATTING_INDENT_WIDTH)',
      type: 'indent',
      apply: (o, v) => {
        o.formatting = { ...o.formatting, indent_width: Number(v) };
      },
    },
  ],
  [
    'TSBIND_FORMATTING_INDENT_WIDTH',
    {
      description: 'Override indentation width',
      type: 'indent',
      apply: (o, v) => {
        o.formatting = { ...o.formatting, indent_width: Number(v) };
      },
    },
  ],
  [
    'TSBIND_FORMATTING_INTERFACE_NAME_PREFIX',
    {
      description: 'Override the interface name prefix',
      type: 'string',
      apply: (o, v) => {
        o.formatting = { ...o.formatting, interface_name_prefix: asString(v) };
      },
    },
  ],
  [
    'TSBIND_FORMATTING_INTERFACE_NAME_SUFFIX',
    {
      description: 'Override the interface name suffix',
      type: 'string',
      apply: (o, v) => {
        o.formatting = { ...o.formatting, interface_name_suffix: asString(v) };
      },
    },
  ],
  [
    'TSBIND_FORMATTING_TYPE_NAME_PREFIX',
    {
      description: 'Override the alternatives name prefix',
      type: 'string',
      apply: (o, v) => {
        o.formatting = { ...o.formatting, type_name_prefix: asString(v) };
      },
    },
  ],
  [
    'TSBIND_FORMATTING_TYPE_NAME_SUFFIX',
    {
      description: 'Override the alternatives name suffix',
      type: 'string',
      apply: (o, v) => {
        o.formatting = { ...o.formatting, type_name_suffix: asString(v) };
      },
    },
  ],
  [
    'TSBIND_ON_CONFLICT',
    {
      description: 'Override the registry conflict policy (error, replace)',
      type: 'policy',
      apply: (o, v) => {
        o.registry = { ...o.registry, on_conflict: asString(v) === 'replace' ? 'replace' : 'error' };
      },
    },
  ],
  [
    'TSBIND_DEBUG',
    {
      description: 'Enable or disable debug logging (true/false)',
      type: 'boolean',
      apply: (o, v) => {
        o.logging = { ...o.logging, debug: v === true };
      },
    },
  ],
]);

/**
 * Coerces a string value to a non-negative integer.
 *
 * @throws EnvCoercionError if the value is empty, not a number, negative or fractional.
 */
function coerceToIndent(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'integer', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (!Number.isInteger(num) || num < 0) {
    throw new EnvCoercionError(envVar, value, 'non-negative integer');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceToPolicy(value: string, envVar: string): ConflictPolicy {
  const trimmed = value.trim().toLowerCase();
  const policy = CONFLICT_POLICIES.find((p) => p === trimmed);
  if (policy === undefined) {
    throw new EnvCoercionError(
      envVar,
      value,
      'conflict policy',
      `Cannot coerce '${envVar}' value '${value}' to a conflict policy. Expected one of: ${CONFLICT_POLICIES.join(', ')}`
    );
  }
  return policy;
}

function coerceValue(value: string, type: EnvValueType, envVar: string): string | number | boolean {
  switch (type) {
    case 'string':
      return value;
    case 'indent':
      return coerceToIndent(value, envVar);
    case 'boolean':
      return coerceToBoolean(value, envVar);
    case 'policy':
      return coerceToPolicy(value, envVar);
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Empty values are ignored. Later entries of the mapping win over earlier
 * ones, so a full `TSBIND_FORMATTING_INDENT_WIDTH` beats the
 * `TSBIND_INDENT_WIDTH` shortcut.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ TSBIND_INDENT_WIDTH: '4' });
 * console.log(result.overrides.formatting?.indent_width); // 4
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = getDefaultEnv(),
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, coerceValue(value, mapping.type, envVar));
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    formatting: { ...base.formatting, ...partial.formatting },
    registry: { ...base.registry, ...partial.registry },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = getDefaultEnv()): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
