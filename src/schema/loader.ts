/**
 * Installs schema descriptions into a type registry.
 *
 * @packageDocumentation
 */

import { rawDeclaration } from '../bindings/declarations.js';
import type { TypeRegistry } from '../bindings/registry.js';
import { defineRecord, defineSum } from '../synthesizer/synthesizer.js';
import { safeReadTextFile } from '../utils/safe-fs.js';
import { parseSchema } from './parser.js';
import type { SchemaDocument } from './types.js';

/**
 * Registers every type of a schema.
 *
 * Opaque types register fixed bindings; records and sums go through the
 * declaration synthesizer. Definitions are lazy, so entries may reference
 * each other in any order, and types from other schemas registered later.
 *
 * @throws MalformedMetadataError if a record or sum is malformed.
 * @throws ConflictingBindingError if a name is already bound differently.
 * @throws RegistryFrozenError if the registry is frozen.
 */
export function registerSchema(registry: TypeRegistry, schema: SchemaDocument): void {
  for (const opaque of schema.opaque) {
    registry.register(opaque.name, {
      typeExpression: opaque.typeExpression,
      declarations: opaque.declarations.map(rawDeclaration),
      isOptional: opaque.optional,
      parentTypes: opaque.parentTypes,
    });
  }
  for (const record of schema.records) {
    defineRecord(registry, record);
  }
  for (const sum of schema.sums) {
    defineSum(registry, sum);
  }
}

/**
 * Reads and parses a schema file.
 *
 * @throws SchemaParseError if the file is not a valid schema.
 * @throws PathValidationError if the path is empty or contains null bytes.
 */
export async function loadSchema(filePath: string): Promise<SchemaDocument> {
  const content = await safeReadTextFile(filePath);
  return parseSchema(content);
}
