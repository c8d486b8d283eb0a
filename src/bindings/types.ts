/**
 * Core value types for type bindings and declarations.
 *
 * A {@link TypeBinding} describes how one host type maps onto a TypeScript
 * type expression and which top-level declarations it needs. Declarations are
 * plain immutable records compared structurally.
 *
 * @packageDocumentation
 */

/**
 * Canonical identifier of a host type, e.g. `"Either<Integer, Text>"`.
 */
export type TypeId = string;

/**
 * Parsed form of a {@link TypeId}: a constructor name applied to arguments.
 */
export interface TypeRef {
  /** Constructor name (e.g. `List`, `Integer`). */
  readonly name: string;
  /** Type arguments, empty for concrete types. */
  readonly args: readonly TypeRef[];
}

/**
 * Out-of-band metadata altering composition rules in specific contexts.
 *
 * - `character`: a sequence of this type collapses to `string`.
 */
export type SpecialTag = 'character';

/**
 * A single member of an interface declaration.
 */
export interface Field {
  /** Whether the member is marked `?`. */
  readonly optional: boolean;
  /** Member name as it appears in the serialized JSON. */
  readonly name: string;
  /** TypeScript type expression of the member. */
  readonly typeExpression: string;
}

/**
 * A structural record type.
 */
export interface InterfaceDeclaration {
  readonly kind: 'interface';
  readonly name: string;
  readonly genericParameters: readonly string[];
  readonly members: readonly Field[];
}

/**
 * A tagged union expressed as a set of alternative type expressions.
 */
export interface TypeAlternatives {
  readonly kind: 'alternatives';
  readonly name: string;
  readonly genericParameters: readonly string[];
  readonly alternatives: readonly string[];
}

/**
 * Hand-authored declaration text, emitted verbatim by the renderer.
 */
export interface RawDeclaration {
  readonly kind: 'raw';
  readonly text: string;
}

/**
 * Any top-level declaration a binding may require.
 */
export type Declaration = InterfaceDeclaration | TypeAlternatives | RawDeclaration;

/**
 * The generation-time record of how a host type maps to TypeScript.
 *
 * Invariant: `typeExpression` only relies on declarations listed in
 * `declarations` or reachable through `parentTypes`.
 */
export interface TypeBinding {
  /** Type expression used wherever the type is referenced. */
  readonly typeExpression: string;
  /** Top-level declarations this type requires. */
  readonly declarations: readonly Declaration[];
  /** Fields of this type are marked optional in a containing interface. */
  readonly isOptional: boolean;
  /** Composition metadata, see {@link SpecialTag}. */
  readonly specialTag?: SpecialTag;
  /** Types this binding depends on, used for closure traversal only. */
  readonly parentTypes: readonly TypeId[];
}

/**
 * Options handed to the external renderer alongside the declarations.
 *
 * Name transforms are applied at render time only; the registry and the
 * closure collector always work on canonical names.
 */
export interface FormattingOptions {
  /** Spaces per indentation level inside interface bodies. */
  readonly indentWidth: number;
  /** Applied to interface declaration names. */
  readonly interfaceNameTransform: (name: string) => string;
  /** Applied to alternatives declaration names. */
  readonly typeNameTransform: (name: string) => string;
}

/**
 * Default formatting options: two-space indent, names unchanged.
 */
export const DEFAULT_FORMATTING_OPTIONS: FormattingOptions = {
  indentWidth: 2,
  interfaceNameTransform: (name) => name,
  typeNameTransform: (name) => name,
};
