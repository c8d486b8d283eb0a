/**
 * Declaration synthesizer.
 *
 * Builds interface and alternatives declarations for records and sum types
 * from metadata, resolving each field's type through the registry, and
 * registers the synthesized types so other types can reference them.
 *
 * @packageDocumentation
 */

import { slotExpression } from '../bindings/builtins.js';
import { interfaceDeclaration, typeAlternatives } from '../bindings/declarations.js';
import { MalformedMetadataError } from '../bindings/errors.js';
import type {
  BindingBody,
  BindingHead,
  HeadResolver,
  TypeArgument,
  TypeDefinition,
  TypeRegistry,
  TypeScope,
} from '../bindings/registry.js';
import { formatTypeRef, parseTypeId, substituteTypeRef } from '../bindings/type-id.js';
import type {
  Field,
  InterfaceDeclaration,
  TypeAlternatives,
  TypeId,
  TypeRef,
} from '../bindings/types.js';
import { applyLabelModifier } from './labels.js';
import type { FieldMetadata, RecordMetadata, SumMetadata } from './types.js';

/** Identifier rule for type, field and parameter names. */
const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function requireName(value: string, location: string, typeId?: TypeId): void {
  if (value.trim() === '') {
    throw new MalformedMetadataError('name must not be empty', location, typeId);
  }
}

function requireUnique(values: readonly string[], what: string, location: string, typeId: TypeId): void {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      throw new MalformedMetadataError(`duplicate ${what} '${value}'`, location, typeId);
    }
    seen.add(value);
  }
}

function parseAt(typeId: TypeId, location: string, owner: TypeId): TypeRef {
  try {
    return parseTypeId(typeId);
  } catch (error) {
    if (error instanceof MalformedMetadataError) {
      throw new MalformedMetadataError(`invalid type identifier '${typeId}'`, location, owner);
    }
    throw error;
  }
}

function validateTypeParameters(name: string, parameters: readonly string[]): void {
  parameters.forEach((parameter, index) => {
    const location = `${name}.typeParameters[${String(index)}]`;
    requireName(parameter, location, name);
    if (!IDENTIFIER_PATTERN.test(parameter)) {
      throw new MalformedMetadataError(`'${parameter}' is not a valid type variable`, location, name);
    }
  });
  requireUnique(parameters, 'type parameter', `${name}.typeParameters`, name);
}

/** Name of a field in the JSON object: its JSON key, else the modified label. */
function memberName(meta: RecordMetadata, f: FieldMetadata): string {
  return f.jsonKey ?? applyLabelModifier(f.name, meta.fieldLabelModifier);
}

/**
 * Checks record metadata, returning the parsed field types.
 *
 * @throws MalformedMetadataError on empty or duplicate names, or unparseable types.
 */
export function validateRecordMetadata(meta: RecordMetadata): TypeRef[] {
  requireName(meta.name, 'record.name');
  if (!IDENTIFIER_PATTERN.test(meta.name)) {
    throw new MalformedMetadataError(`'${meta.name}' is not a valid type name`, 'record.name', meta.name);
  }
  validateTypeParameters(meta.name, meta.typeParameters ?? []);
  requireUnique(
    meta.fields.map((f) => f.name),
    'field',
    `${meta.name}.fields`,
    meta.name
  );

  const fieldTypes = meta.fields.map((f, index) => {
    const location = `${meta.name}.fields[${String(index)}]`;
    requireName(f.name, `${location}.name`, meta.name);
    if (f.jsonKey !== undefined) {
      requireName(f.jsonKey, `${location}.jsonKey`, meta.name);
    }
    return parseAt(f.type, `${location}.type`, meta.name);
  });

  // Distinct host names can still collapse to one JSON key.
  requireUnique(
    meta.fields.map((f) => memberName(meta, f)),
    'member name',
    `${meta.name}.fields`,
    meta.name
  );
  return fieldTypes;
}

/**
 * Checks sum metadata, returning the parsed payload types.
 *
 * @throws MalformedMetadataError on empty or duplicate names, no constructors, or unparseable types.
 */
export function validateSumMetadata(meta: SumMetadata): TypeRef[] {
  requireName(meta.name, 'sum.name');
  if (!IDENTIFIER_PATTERN.test(meta.name)) {
    throw new MalformedMetadataError(`'${meta.name}' is not a valid type name`, 'sum.name', meta.name);
  }
  validateTypeParameters(meta.name, meta.typeParameters ?? []);
  if (meta.constructors.length === 0) {
    throw new MalformedMetadataError(
      'a sum needs at least one constructor',
      `${meta.name}.constructors`,
      meta.name
    );
  }
  requireUnique(
    meta.constructors.map((c) => c.name),
    'constructor',
    `${meta.name}.constructors`,
    meta.name
  );

  return meta.constructors.map((c, index) => {
    const location = `${meta.name}.constructors[${String(index)}]`;
    requireName(c.name, `${location}.name`, meta.name);
    return parseAt(c.payload, `${location}.payload`, meta.name);
  });
}

/**
 * Scope binding each type parameter to its own name.
 */
export function typeParameterScope(parameters: readonly string[]): TypeScope {
  return new Map<string, BindingHead>(
    parameters.map((p): [string, BindingHead] => [p, { typeExpression: p, isOptional: false }])
  );
}

/**
 * Builds the interface declaration of a record.
 *
 * Field order follows the metadata. A field is optional when its type's
 * binding is optional or the metadata forces it.
 *
 * @example
 * ```typescript
 * synthesizeRecord(registry, {
 *   name: 'User',
 *   fields: [{ name: 'age', type: 'Maybe<Integer>' }],
 * });
 * // { kind: 'interface', name: 'User', genericParameters: [],
 * //   members: [{ optional: true, name: 'age', typeExpression: 'number' }] }
 * ```
 */
export function synthesizeRecord(resolver: HeadResolver, meta: RecordMetadata): InterfaceDeclaration {
  const fieldTypes = validateRecordMetadata(meta);
  const parameters = meta.typeParameters ?? [];
  const scope = typeParameterScope(parameters);

  const members = meta.fields.map((f, index): Field => {
    const ref = fieldTypes[index] ?? parseTypeId(f.type);
    const head = resolver.resolveHead(ref, scope);
    return {
      optional: head.isOptional || (f.optional ?? false),
      name: memberName(meta, f),
      typeExpression: head.typeExpression,
    };
  });

  return interfaceDeclaration(meta.name, members, parameters);
}

/**
 * Builds the alternatives declaration of a sum type: one alternative per
 * constructor, in order, without de-duplication.
 */
export function synthesizeSum(resolver: HeadResolver, meta: SumMetadata): TypeAlternatives {
  const payloadTypes = validateSumMetadata(meta);
  const parameters = meta.typeParameters ?? [];
  const scope = typeParameterScope(parameters);

  const alternatives = meta.constructors.map((c, index) => {
    const ref = payloadTypes[index] ?? parseTypeId(c.payload);
    const head = resolver.resolveHead(ref, scope);
    return head.isOptional ? `${head.typeExpression} | null` : head.typeExpression;
  });

  return typeAlternatives(meta.name, alternatives, parameters);
}

/**
 * Parent types of an instantiated generic: its member types with every
 * parameter replaced by the actual argument, de-duplicated in order.
 */
function instantiatedParents(
  memberTypes: readonly TypeRef[],
  parameters: readonly string[],
  args: readonly TypeArgument[]
): TypeId[] {
  const bindings = new Map<string, TypeRef>();
  parameters.forEach((parameter, index) => {
    const arg = args[index];
    if (arg !== undefined) {
      bindings.set(parameter, arg.ref);
    }
  });

  const parents: TypeId[] = [];
  for (const ref of memberTypes) {
    const id = formatTypeRef(substituteTypeRef(ref, bindings));
    if (!parents.includes(id)) {
      parents.push(id);
    }
  }
  return parents;
}

function synthesizedDefinition(
  kind: 'record' | 'sum',
  meta: RecordMetadata | SumMetadata,
  memberTypes: readonly TypeRef[],
  declare: (resolver: HeadResolver) => InterfaceDeclaration | TypeAlternatives
): TypeDefinition {
  const parameters = meta.typeParameters ?? [];
  return {
    fingerprint: JSON.stringify([kind, meta]),
    head: (args) => ({
      typeExpression:
        parameters.length === 0 ? meta.name : `${meta.name}<${args.map(slotExpression).join(', ')}>`,
      isOptional: false,
    }),
    body: (args, resolver): BindingBody => ({
      declarations: [declare(resolver)],
      parentTypes: instantiatedParents(memberTypes, parameters, args),
    }),
  };
}

/**
 * Registers a record type.
 *
 * A non-generic record is referenced by its name; a generic one as
 * `Name<arg, ...>`. The declaration is synthesized at first lookup, so
 * records referencing each other can be defined in any order.
 *
 * @throws MalformedMetadataError immediately if the metadata is invalid.
 */
export function defineRecord(registry: TypeRegistry, meta: RecordMetadata): void {
  const fieldTypes = validateRecordMetadata(meta);
  registry.define(
    meta.name,
    (meta.typeParameters ?? []).length,
    synthesizedDefinition('record', meta, fieldTypes, (resolver) => synthesizeRecord(resolver, meta))
  );
}

/**
 * Registers a sum type. See {@link defineRecord}.
 *
 * @throws MalformedMetadataError immediately if the metadata is invalid.
 */
export function defineSum(registry: TypeRegistry, meta: SumMetadata): void {
  const payloadTypes = validateSumMetadata(meta);
  registry.define(
    meta.name,
    (meta.typeParameters ?? []).length,
    synthesizedDefinition('sum', meta, payloadTypes, (resolver) => synthesizeSum(resolver, meta))
  );
}
