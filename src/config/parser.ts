/**
 * TOML configuration parser for tsbind.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CONFIG, DEFAULT_FORMATTING, DEFAULT_LOGGING, DEFAULT_REGISTRY } from './defaults.js';
import type { Config, FormattingConfig, LoggingConfig, RegistryConfig } from './types.js';
import type { ConflictPolicy } from '../bindings/registry.js';
import type { FormattingOptions } from '../bindings/types.js';
import { safeExists, safeReadTextFile } from '../utils/safe-fs.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/** Valid conflict policies. */
export const CONFLICT_POLICIES: readonly ConflictPolicy[] = ['error', 'replace'];

/**
 * Narrows a value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isConflictPolicy(value: string): value is ConflictPolicy {
  return CONFLICT_POLICIES.some((policy) => policy === value);
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a non-negative integer.
 *
 * @throws ConfigParseError if value is not a number or is negative / fractional.
 */
function validateIndentWidth(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': must be a non-negative integer, got ${String(value)}`
    );
  }
  return value;
}

/**
 * Validates a conflict policy value.
 *
 * @throws ConfigParseError if value is not a known policy.
 */
export function validateConflictPolicy(value: unknown, fieldPath: string): ConflictPolicy {
  const str = validateString(value, fieldPath);
  if (!isConflictPolicy(str)) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of [${CONFLICT_POLICIES.join(', ')}], got '${str}'`
    );
  }
  return str;
}

/**
 * Returns a section table, or undefined when absent.
 *
 * @throws ConfigParseError if the key holds something other than a table.
 */
function section(parsed: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
  if (!(name in parsed)) {
    return undefined;
  }
  const value = parsed[name];
  if (!isRecord(value)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeof value}`);
  }
  return value;
}

function parseFormatting(raw: Record<string, unknown> | undefined): FormattingConfig {
  const result: FormattingConfig = { ...DEFAULT_FORMATTING };
  if (raw === undefined) {
    return result;
  }

  if ('indent_width' in raw) {
    result.indent_width = validateIndentWidth(raw.indent_width, 'formatting.indent_width');
  }
  if ('interface_name_prefix' in raw) {
    result.interface_name_prefix = validateString(
      raw.interface_name_prefix,
      'formatting.interface_name_prefix'
    );
  }
  if ('interface_name_suffix' in raw) {
    result.interface_name_suffix = validateString(
      raw.interface_name_suffix,
      'formatting.interface_name_suffix'
    );
  }
  if ('type_name_prefix' in raw) {
    result.type_name_prefix = validateString(raw.type_name_prefix, 'formatting.type_name_prefix');
  }
  if ('type_name_suffix' in raw) {
    result.type_name_suffix = validateString(raw.type_name_suffix, 'formatting.type_name_suffix');
  }

  return result;
}

function parseRegistry(raw: Record<string, unknown> | undefined): RegistryConfig {
  const result: RegistryConfig = { ...DEFAULT_REGISTRY };
  if (raw !== undefined && 'on_conflict' in raw) {
    result.on_conflict = validateConflictPolicy(raw.on_conflict, 'registry.on_conflict');
  }
  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [formatting]
 * indent_width = 4
 * `);
 * console.log(config.formatting.indent_width); // 4
 * console.log(config.registry.on_conflict);    // "error"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    formatting: parseFormatting(section(parsed, 'formatting')),
    registry: parseRegistry(section(parsed, 'registry')),
    logging: parseLogging(section(parsed, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    formatting: { ...DEFAULT_CONFIG.formatting },
    registry: { ...DEFAULT_CONFIG.registry },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}

/**
 * Reads and parses a configuration file. A missing file yields the defaults.
 *
 * @throws ConfigParseError if the file exists but is invalid.
 * @throws PathValidationError if the path is empty or contains null bytes.
 */
export async function loadConfig(filePath: string): Promise<Config> {
  if (!(await safeExists(filePath))) {
    return getDefaultConfig();
  }
  const content = await safeReadTextFile(filePath);
  return parseConfig(content);
}

/**
 * Builds the renderer's formatting options from a configuration.
 *
 * @example
 * ```typescript
 * const options = toFormattingOptions(parseConfig('[formatting]\ninterface_name_prefix = "I"'));
 * options.interfaceNameTransform('User'); // "IUser"
 * ```
 */
export function toFormattingOptions(config: Config): FormattingOptions {
  const {
    indent_width,
    interface_name_prefix,
    interface_name_suffix,
    type_name_prefix,
    type_name_suffix,
  } = config.formatting;

  return {
    indentWidth: indent_width,
    interfaceNameTransform: (name) => `${interface_name_prefix}${name}${interface_name_suffix}`,
    typeNameTransform: (name) => `${type_name_prefix}${name}${type_name_suffix}`,
  };
}
