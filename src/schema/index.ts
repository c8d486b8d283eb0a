/**
 * Schema description files: TOML documents describing host types.
 *
 * @packageDocumentation
 */

export { SchemaParseError, parseSchema } from './parser.js';
export { loadSchema, registerSchema } from './loader.js';
export type { OpaqueMetadata, SchemaDocument } from './types.js';
