/**
 * Metadata consumed by the declaration synthesizer.
 *
 * This is the contract with whatever describes the host types: an external
 * derivation step, or the TOML schema loader in `src/schema/`.
 *
 * @packageDocumentation
 */

import type { TypeId } from '../bindings/types.js';

/**
 * Letter case applied to field labels after prefix stripping.
 */
export type LabelCasing = 'identity' | 'camel' | 'snake' | 'kebab';

/**
 * Record-level rule turning host field names into JSON keys.
 */
export interface FieldLabelModifier {
  /** Prefix removed from every field name that starts with it. */
  readonly stripPrefix?: string;
  /** Casing applied after the prefix is removed. Default: `'identity'`. */
  readonly casing?: LabelCasing;
}

/**
 * One field of a record.
 */
export interface FieldMetadata {
  /** Host field name. */
  readonly name: string;
  /** Type identifier of the field, e.g. `Maybe<Integer>`. */
  readonly type: TypeId;
  /** Forces the field optional even when its type is not. */
  readonly optional?: boolean;
  /** Renamed JSON key; takes precedence over the label modifier. */
  readonly jsonKey?: string;
}

/**
 * A record (product) type.
 */
export interface RecordMetadata {
  readonly name: string;
  /** Type variable names, in declaration order. */
  readonly typeParameters?: readonly string[];
  readonly fields: readonly FieldMetadata[];
  readonly fieldLabelModifier?: FieldLabelModifier;
}

/**
 * One constructor of a sum type.
 */
export interface ConstructorMetadata {
  readonly name: string;
  /** Type identifier of the constructor's encoded payload. */
  readonly payload: TypeId;
}

/**
 * A sum type, emitted as a union of its constructors' payload types.
 */
export interface SumMetadata {
  readonly name: string;
  readonly typeParameters?: readonly string[];
  readonly constructors: readonly ConstructorMetadata[];
}
