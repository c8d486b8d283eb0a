/**
 * Type registry and dispatch.
 *
 * Maps host type identities to TypeScript type expressions and the
 * declarations they require.
 *
 * @packageDocumentation
 */

import { registerBuiltins } from './builtins.js';
import { TypeRegistry, type TypeRegistryOptions } from './registry.js';

export type {
  Declaration,
  Field,
  FormattingOptions,
  InterfaceDeclaration,
  RawDeclaration,
  SpecialTag,
  TypeAlternatives,
  TypeBinding,
  TypeId,
  TypeRef,
} from './types.js';
export { DEFAULT_FORMATTING_OPTIONS } from './types.js';

export {
  BindingError,
  ConflictingBindingError,
  MalformedMetadataError,
  RegistryFrozenError,
  UnregisteredTypeError,
} from './errors.js';
export type { BindingErrorCode } from './errors.js';

export {
  compareDeclarations,
  declarationKey,
  declarationsEqual,
  field,
  interfaceDeclaration,
  rawDeclaration,
  typeAlternatives,
  uniqueDeclarations,
} from './declarations.js';

export { canonicalTypeId, formatTypeRef, parseTypeId, substituteTypeRef, typeRef } from './type-id.js';

export { TypeRegistry, bindingFingerprint } from './registry.js';
export type {
  BindingBody,
  BindingBuilder,
  BindingHead,
  ConflictPolicy,
  HeadResolver,
  TypeArgument,
  TypeDefinition,
  TypeRegistryOptions,
  TypeScope,
} from './registry.js';

export {
  EITHER_DECLARATIONS,
  FLOAT_TYPES,
  INTEGER_TYPES,
  STRING_TYPES,
  TYPE_VARIABLE_PLACEHOLDERS,
  arrayOf,
  needsParentheses,
  registerBuiltins,
  slotExpression,
} from './builtins.js';

/**
 * Creates a registry with every built-in binding installed.
 *
 * @example
 * ```typescript
 * const registry = createRegistry();
 * registry.lookup('List<Char>').typeExpression; // "string"
 * registry.lookup('Set<Char>').typeExpression;  // "string[]"
 * ```
 */
export function createRegistry(options: TypeRegistryOptions = {}): TypeRegistry {
  const registry = new TypeRegistry(options);
  registerBuiltins(registry);
  return registry;
}
