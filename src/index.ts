/**
 * tsbind
 *
 * Derives TypeScript declarations from host type definitions and their JSON
 * serialization rules.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './bindings/index.js';

export {
  defineRecord,
  defineSum,
  synthesizeRecord,
  synthesizeSum,
  applyCasing,
  applyLabelModifier,
  splitWords,
  type ConstructorMetadata,
  type FieldLabelModifier,
  type FieldMetadata,
  type LabelCasing,
  type RecordMetadata,
  type SumMetadata,
} from './synthesizer/index.js';

export {
  collectClosure,
  collectDeclarations,
  type ClosureResult,
  type CollectOptions,
} from './closure/index.js';

export {
  SchemaParseError,
  loadSchema,
  parseSchema,
  registerSchema,
  type OpaqueMetadata,
  type SchemaDocument,
} from './schema/index.js';

export {
  ConfigParseError,
  EnvCoercionError,
  applyEnvOverrides,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  toFormattingOptions,
  type Config,
} from './config/index.js';

export {
  createConfiguredRegistry,
  generate,
  type GenerateOptions,
  type GenerationResult,
} from './generator.js';

export { Logger, type LogLevel, type LoggerOptions } from './utils/logger.js';
