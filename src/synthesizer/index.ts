/**
 * Declaration synthesizer for records and sum types.
 *
 * @packageDocumentation
 */

export {
  defineRecord,
  defineSum,
  synthesizeRecord,
  synthesizeSum,
  typeParameterScope,
  validateRecordMetadata,
  validateSumMetadata,
} from './synthesizer.js';

export { applyCasing, applyLabelModifier, splitWords } from './labels.js';

export type {
  ConstructorMetadata,
  FieldLabelModifier,
  FieldMetadata,
  LabelCasing,
  RecordMetadata,
  SumMetadata,
} from './types.js';
