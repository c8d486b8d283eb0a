/**
 * TOML parser for schema description files.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import type {
  ConstructorMetadata,
  FieldLabelModifier,
  FieldMetadata,
  LabelCasing,
  RecordMetadata,
  SumMetadata,
} from '../synthesizer/types.js';
import type { OpaqueMetadata, SchemaDocument } from './types.js';

/**
 * Error class for schema parsing errors.
 */
export class SchemaParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new SchemaParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'SchemaParseError';
    this.cause = cause;
  }
}

/** Valid label casings. */
const VALID_CASINGS: readonly LabelCasing[] = ['identity', 'camel', 'snake', 'kebab'];

/** Keys that are prohibited due to prototype pollution concerns. */
const PROHIBITED_KEYS = ['__proto__', 'constructor', 'prototype'];

/** Keys accepted in each kind of table. */
const RECORD_KEYS = ['type_parameters', 'field_label_modifier', 'fields'];
const FIELD_KEYS = ['name', 'type', 'optional', 'json_key'];
const MODIFIER_KEYS = ['strip_prefix', 'casing'];
const SUM_KEYS = ['type_parameters', 'constructors'];
const CONSTRUCTOR_KEYS = ['name', 'payload'];
const OPAQUE_KEYS = ['type_expression', 'declarations', 'parent_types', 'optional'];
const TOP_LEVEL_KEYS = ['records', 'sums', 'opaque'];

/**
 * Validates that a key is safe for use as an object property.
 *
 * @throws SchemaParseError if key is prohibited.
 */
function validateKey(key: string, keyPath: string): void {
  if (PROHIBITED_KEYS.includes(key)) {
    throw new SchemaParseError(
      `Prohibited key '${key}' found at '${keyPath}': keys ${PROHIBITED_KEYS.map((k) => `'${k}'`).join(', ')} are not allowed`
    );
  }
}

/**
 * Rejects keys a table does not define.
 *
 * @throws SchemaParseError on the first unknown key.
 */
function validateKnownKeys(raw: Record<string, unknown>, allowed: readonly string[], tablePath: string): void {
  for (const key of Object.keys(raw)) {
    validateKey(key, tablePath);
    if (!allowed.includes(key)) {
      throw new SchemaParseError(
        `Unknown key '${key}' in '${tablePath}': expected one of [${allowed.join(', ')}]`
      );
    }
  }
}

function describeType(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a TOML table.
 *
 * @throws SchemaParseError if value is not a table.
 */
function validateTable(value: unknown, fieldPath: string): Record<string, unknown> {
  if (!isTable(value)) {
    throw new SchemaParseError(
      `Invalid type for '${fieldPath}': expected table, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @throws SchemaParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new SchemaParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws SchemaParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new SchemaParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array.
 *
 * @throws SchemaParseError if value is not an array.
 */
function validateArray(value: unknown, fieldPath: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new SchemaParseError(
      `Invalid type for '${fieldPath}': expected array, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 *
 * @throws SchemaParseError if value is not an array of strings.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  return validateArray(value, fieldPath).map((item, index) =>
    validateString(item, `${fieldPath}[${String(index)}]`)
  );
}

function requireKey(raw: Record<string, unknown>, key: string, tablePath: string): unknown {
  if (!(key in raw)) {
    throw new SchemaParseError(`Missing required field: '${tablePath}.${key}'`);
  }
  return raw[key];
}

function validateCasing(value: unknown, fieldPath: string): LabelCasing {
  const str = validateString(value, fieldPath);
  const casing = VALID_CASINGS.find((c) => c === str);
  if (casing === undefined) {
    throw new SchemaParseError(
      `Invalid value for '${fieldPath}': expected one of [${VALID_CASINGS.join(', ')}], got '${str}'`
    );
  }
  return casing;
}

function parseLabelModifier(value: unknown, fieldPath: string): FieldLabelModifier {
  const raw = validateTable(value, fieldPath);
  validateKnownKeys(raw, MODIFIER_KEYS, fieldPath);

  return {
    ...('strip_prefix' in raw
      ? { stripPrefix: validateString(raw.strip_prefix, `${fieldPath}.strip_prefix`) }
      : {}),
    ...('casing' in raw ? { casing: validateCasing(raw.casing, `${fieldPath}.casing`) } : {}),
  };
}

function parseField(value: unknown, fieldPath: string): FieldMetadata {
  const raw = validateTable(value, fieldPath);
  validateKnownKeys(raw, FIELD_KEYS, fieldPath);

  return {
    name: validateString(requireKey(raw, 'name', fieldPath), `${fieldPath}.name`),
    type: validateString(requireKey(raw, 'type', fieldPath), `${fieldPath}.type`),
    ...('optional' in raw
      ? { optional: validateBoolean(raw.optional, `${fieldPath}.optional`) }
      : {}),
    ...('json_key' in raw ? { jsonKey: validateString(raw.json_key, `${fieldPath}.json_key`) } : {}),
  };
}

function parseTypeParameters(raw: Record<string, unknown>, tablePath: string): { typeParameters?: string[] } {
  return 'type_parameters' in raw
    ? { typeParameters: validateStringArray(raw.type_parameters, `${tablePath}.type_parameters`) }
    : {};
}

/**
 * Parses one `[records.<Name>]` table.
 */
function parseRecord(name: string, value: unknown): RecordMetadata {
  const tablePath = `records.${name}`;
  const raw = validateTable(value, tablePath);
  validateKnownKeys(raw, RECORD_KEYS, tablePath);

  const fields = validateArray(requireKey(raw, 'fields', tablePath), `${tablePath}.fields`).map(
    (item, index) => parseField(item, `${tablePath}.fields[${String(index)}]`)
  );

  return {
    name,
    ...parseTypeParameters(raw, tablePath),
    fields,
    ...('field_label_modifier' in raw
      ? {
          fieldLabelModifier: parseLabelModifier(
            raw.field_label_modifier,
            `${tablePath}.field_label_modifier`
          ),
        }
      : {}),
  };
}

function parseConstructor(value: unknown, fieldPath: string): ConstructorMetadata {
  const raw = validateTable(value, fieldPath);
  validateKnownKeys(raw, CONSTRUCTOR_KEYS, fieldPath);

  return {
    name: validateString(requireKey(raw, 'name', fieldPath), `${fieldPath}.name`),
    payload: validateString(requireKey(raw, 'payload', fieldPath), `${fieldPath}.payload`),
  };
}

/**
 * Parses one `[sums.<Name>]` table.
 */
function parseSum(name: string, value: unknown): SumMetadata {
  const tablePath = `sums.${name}`;
  const raw = validateTable(value, tablePath);
  validateKnownKeys(raw, SUM_KEYS, tablePath);

  const constructors = validateArray(
    requireKey(raw, 'constructors', tablePath),
    `${tablePath}.constructors`
  ).map((item, index) => parseConstructor(item, `${tablePath}.constructors[${String(index)}]`));

  return {
    name,
    ...parseTypeParameters(raw, tablePath),
    constructors,
  };
}

/**
 * Parses one `[opaque.<Name>]` table.
 */
function parseOpaque(name: string, value: unknown): OpaqueMetadata {
  const tablePath = `opaque.${name}`;
  const raw = validateTable(value, tablePath);
  validateKnownKeys(raw, OPAQUE_KEYS, tablePath);

  return {
    name,
    typeExpression: validateString(
      requireKey(raw, 'type_expression', tablePath),
      `${tablePath}.type_expression`
    ),
    declarations:
      'declarations' in raw ? validateStringArray(raw.declarations, `${tablePath}.declarations`) : [],
    parentTypes:
      'parent_types' in raw ? validateStringArray(raw.parent_types, `${tablePath}.parent_types`) : [],
    optional: 'optional' in raw ? validateBoolean(raw.optional, `${tablePath}.optional`) : false,
  };
}

function parseSection<T>(
  parsed: Record<string, unknown>,
  section: string,
  parseEntry: (name: string, value: unknown) => T
): T[] {
  if (!(section in parsed)) {
    return [];
  }
  const raw = validateTable(parsed[section], section);
  return Object.entries(raw).map(([name, value]) => {
    validateKey(name, section);
    return parseEntry(name, value);
  });
}

/**
 * Parses a TOML schema description.
 *
 * Only the shape of the document is checked here; names and type
 * identifiers are validated when the schema is registered.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @throws SchemaParseError for invalid TOML syntax, wrong value types, missing
 *   required fields, unknown keys or prohibited keys.
 *
 * @example
 * ```typescript
 * const schema = parseSchema(`
 * [records.User]
 * fields = [{ name = "name", type = "Text" }]
 * `);
 * schema.records[0]?.fields[0]?.type; // "Text"
 * ```
 */
export function parseSchema(tomlContent: string): SchemaDocument {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new SchemaParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  validateKnownKeys(parsed, TOP_LEVEL_KEYS, '<root>');

  return {
    records: parseSection(parsed, 'records', parseRecord),
    sums: parseSection(parsed, 'sums', parseSum),
    opaque: parseSection(parsed, 'opaque', parseOpaque),
  };
}
