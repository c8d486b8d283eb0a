/**
 * Error taxonomy for binding registration, lookup and synthesis.
 *
 * Every error is fatal to the current generation run.
 *
 * @packageDocumentation
 */

import type { TypeId } from './types.js';

/**
 * Error codes for binding errors.
 */
export type BindingErrorCode =
  | 'UNREGISTERED_TYPE'
  | 'CONFLICTING_BINDING'
  | 'MALFORMED_METADATA'
  | 'REGISTRY_FROZEN';

/**
 * Base class for all binding errors.
 */
export class BindingError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: BindingErrorCode;
  /** The type identity involved, if any. */
  public readonly typeId?: TypeId;

  constructor(message: string, code: BindingErrorCode, typeId?: TypeId) {
    super(message);
    this.name = 'BindingError';
    this.code = code;
    if (typeId !== undefined) {
      this.typeId = typeId;
    }
  }
}

/**
 * A type reachable from a root has no registered definition.
 */
export class UnregisteredTypeError extends BindingError {
  constructor(typeId: TypeId) {
    super(`No binding registered for type '${typeId}'`, 'UNREGISTERED_TYPE', typeId);
    this.name = 'UnregisteredTypeError';
  }
}

/**
 * Two different definitions were registered for one identity.
 */
export class ConflictingBindingError extends BindingError {
  constructor(typeId: TypeId) {
    super(
      `Conflicting binding for type '${typeId}': a different definition is already registered`,
      'CONFLICTING_BINDING',
      typeId
    );
    this.name = 'ConflictingBindingError';
  }
}

/**
 * Metadata handed to the registry or the synthesizer is structurally invalid.
 */
export class MalformedMetadataError extends BindingError {
  /** Where in the metadata the problem was found (e.g. `User.fields[2].name`). */
  public readonly location: string;

  constructor(message: string, location: string, typeId?: TypeId) {
    super(`Malformed metadata at '${location}': ${message}`, 'MALFORMED_METADATA', typeId);
    this.name = 'MalformedMetadataError';
    this.location = location;
  }
}

/**
 * A registration was attempted after the registry was frozen.
 */
export class RegistryFrozenError extends BindingError {
  constructor(typeId: TypeId) {
    super(
      `Cannot register '${typeId}': the registry is frozen and only accepts lookups`,
      'REGISTRY_FROZEN',
      typeId
    );
    this.name = 'RegistryFrozenError';
  }
}
