/**
 * Type definitions for schema description files.
 *
 * A schema file describes host types in TOML and stands in for the external
 * derivation step: records and sums feed the declaration synthesizer, opaque
 * entries register fixed bindings by hand.
 *
 * @packageDocumentation
 */

import type { RecordMetadata, SumMetadata } from '../synthesizer/types.js';

/**
 * A type with a hand-written binding.
 *
 * @example
 * ```toml
 * [opaque.UTCTime]
 * type_expression = "string"
 * declarations = ["type Iso8601 = string;"]
 * ```
 */
export interface OpaqueMetadata {
  /** Type identifier, possibly applied (`"Map<Text, Integer>"`). */
  readonly name: string;
  readonly typeExpression: string;
  /** Raw declaration text emitted with the type. */
  readonly declarations: readonly string[];
  /** Types whose declarations this one relies on. */
  readonly parentTypes: readonly string[];
  /** Marks fields of this type as optional. */
  readonly optional: boolean;
}

/**
 * Parsed schema description.
 *
 * Entries keep the order they appear in the file.
 */
export interface SchemaDocument {
  readonly records: readonly RecordMetadata[];
  readonly sums: readonly SumMetadata[];
  readonly opaque: readonly OpaqueMetadata[];
}
