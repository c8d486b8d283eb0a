/**
 * Type registry: the open dispatch table from host type identities to
 * {@link TypeBinding} values.
 *
 * Definitions come in two shapes:
 *
 * - exact definitions, keyed by a canonical type identifier (`Integer`,
 *   `User`, `Map<Text, Integer>`);
 * - constructor definitions, keyed by name and arity (`List/1`, `Tuple/2`),
 *   which build a binding from the resolved bindings of their arguments.
 *
 * Resolution is split into a cheap *head* (type expression, optionality,
 * special tag) and a *body* (declarations, parent types). Heads only ever
 * depend on the heads of a reference's own arguments, and bodies only on
 * heads, so resolving mutually recursive records always terminates.
 *
 * @packageDocumentation
 */

import { ConflictingBindingError, RegistryFrozenError, UnregisteredTypeError } from './errors.js';
import { declarationKey } from './declarations.js';
import { canonicalTypeId, formatTypeRef, parseTypeId } from './type-id.js';
import type { Declaration, SpecialTag, TypeBinding, TypeId, TypeRef } from './types.js';
import { Logger } from '../utils/logger.js';

/**
 * The part of a binding needed to reference a type from another one.
 */
export interface BindingHead {
  readonly typeExpression: string;
  readonly isOptional: boolean;
  readonly specialTag?: SpecialTag;
}

/**
 * The part of a binding needed only for closure collection.
 */
export interface BindingBody {
  readonly declarations: readonly Declaration[];
  readonly parentTypes: readonly TypeId[];
}

/**
 * A resolved type argument handed to a constructor definition.
 */
export interface TypeArgument extends BindingHead {
  /** Canonical identifier of the argument. */
  readonly id: TypeId;
  /** Parsed form of the argument. */
  readonly ref: TypeRef;
}

/**
 * Names bound locally while resolving, e.g. the type parameters of a generic
 * record. A scoped name shadows any registered definition of the same name.
 */
export type TypeScope = ReadonlyMap<string, BindingHead>;

/**
 * Resolves the head of a type reference. Passed to definition bodies.
 */
export interface HeadResolver {
  resolveHead(ref: TypeRef, scope?: TypeScope): BindingHead;
}

/**
 * A registered definition.
 *
 * `fingerprint` identifies the definition for idempotent re-registration:
 * registering a definition whose fingerprint is `===` to the existing one is
 * a no-op, anything else is a conflict.
 */
export interface TypeDefinition {
  readonly fingerprint: string | object;
  head(args: readonly TypeArgument[]): BindingHead;
  body(args: readonly TypeArgument[], resolver: HeadResolver): BindingBody;
}

/**
 * Builds a complete binding from resolved arguments.
 */
export type BindingBuilder = (args: readonly TypeArgument[]) => TypeBinding;

/**
 * What to do when a different definition is registered for an existing identity.
 *
 * - `error`: raise {@link ConflictingBindingError}
 * - `replace`: keep the newer definition (last write wins)
 */
export type ConflictPolicy = 'error' | 'replace';

/**
 * Options for creating a registry.
 */
export interface TypeRegistryOptions {
  /** Conflict policy. Default: `'error'`. */
  readonly onConflict?: ConflictPolicy;
  /** Logger for registration events. */
  readonly logger?: Logger;
}

/**
 * Returns a fingerprint for a fixed binding, stable under property order.
 */
export function bindingFingerprint(binding: TypeBinding): string {
  return JSON.stringify([
    binding.typeExpression,
    binding.isOptional,
    binding.specialTag ?? null,
    binding.declarations.map(declarationKey),
    binding.parentTypes,
  ]);
}

function headOf(binding: BindingHead): BindingHead {
  return binding.specialTag !== undefined
    ? {
        typeExpression: binding.typeExpression,
        isOptional: binding.isOptional,
        specialTag: binding.specialTag,
      }
    : { typeExpression: binding.typeExpression, isOptional: binding.isOptional };
}

function constructorKey(name: string, arity: number): string {
  return `${name}/${String(arity)}`;
}

/**
 * Registry of type definitions.
 *
 * Populate it with `register`, `registerConstructor` or `define`, call
 * {@link TypeRegistry.freeze}, then resolve with {@link TypeRegistry.lookup}.
 *
 * @example
 * ```typescript
 * const registry = createRegistry();
 * registry.register('UTCTime', {
 *   typeExpression: 'string',
 *   declarations: [],
 *   isOptional: false,
 *   parentTypes: [],
 * });
 * registry.freeze();
 * registry.lookup('List<UTCTime>').typeExpression; // "string[]"
 * ```
 */
export class TypeRegistry implements HeadResolver {
  private readonly exact = new Map<TypeId, TypeDefinition>();
  private readonly constructors = new Map<string, TypeDefinition>();
  private readonly heads = new Map<TypeId, BindingHead>();
  private readonly bindings = new Map<TypeId, TypeBinding>();
  private readonly onConflict: ConflictPolicy;
  private readonly logger: Logger;
  private frozen = false;

  constructor(options: TypeRegistryOptions = {}) {
    this.onConflict = options.onConflict ?? 'error';
    this.logger = options.logger ?? new Logger({ component: 'TypeRegistry' });
  }

  /**
   * Whether the registration phase has ended.
   */
  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Registers a fixed binding for one exact type identity.
   *
   * @throws ConflictingBindingError if a different binding is registered under the `error` policy.
   * @throws RegistryFrozenError after {@link TypeRegistry.freeze}.
   */
  register(typeId: TypeId, binding: TypeBinding): void {
    const fixedHead = headOf(binding);
    const fixedBody: BindingBody = {
      declarations: binding.declarations,
      parentTypes: binding.parentTypes.map(canonicalTypeId),
    };
    this.defineExact(typeId, {
      fingerprint: bindingFingerprint(binding),
      head: () => fixedHead,
      body: () => fixedBody,
    });
  }

  /**
   * Registers a type constructor of the given arity.
   *
   * The builder receives the resolved arguments and returns the binding of
   * the applied type. Re-registering the same builder function is a no-op.
   */
  registerConstructor(name: string, arity: number, build: BindingBuilder): void {
    this.define(name, arity, {
      fingerprint: build,
      head: (args) => headOf(build(args)),
      body: (args) => {
        const binding = build(args);
        return {
          declarations: binding.declarations,
          parentTypes: binding.parentTypes.map(canonicalTypeId),
        };
      },
    });
  }

  /**
   * Registers a low-level definition. Arity 0 registers an exact identity.
   */
  define(name: string, arity: number, definition: TypeDefinition): void {
    if (arity === 0) {
      this.defineExact(name, definition);
      return;
    }
    this.store(this.constructors, constructorKey(name, arity), name, definition);
  }

  /**
   * Ends the registration phase. Further registrations throw.
   */
  freeze(): void {
    if (this.frozen) {
      return;
    }
    this.frozen = true;
    this.logger.info('registry_frozen', {
      exactDefinitions: this.exact.size,
      constructorDefinitions: this.constructors.size,
    });
  }

  /**
   * Whether a definition exists for the outermost constructor of an identity.
   * Arguments are not checked.
   */
  has(typeId: TypeId): boolean {
    const ref = parseTypeId(typeId);
    return (
      this.exact.has(formatTypeRef(ref)) ||
      this.constructors.has(constructorKey(ref.name, ref.args.length))
    );
  }

  /**
   * Key (`name/arity`) of the constructor definition an identity resolves
   * through, or `undefined` when it has an exact definition or none.
   */
  constructorOf(typeId: TypeId): string | undefined {
    const ref = parseTypeId(typeId);
    if (ref.args.length === 0 || this.exact.has(formatTypeRef(ref))) {
      return undefined;
    }
    const key = constructorKey(ref.name, ref.args.length);
    return this.constructors.has(key) ? key : undefined;
  }

  /**
   * Resolves the complete binding for a type identity.
   *
   * @throws UnregisteredTypeError naming the innermost identity with no definition.
   * @throws MalformedMetadataError if the identifier cannot be parsed.
   */
  lookup(typeId: TypeId): TypeBinding {
    return this.resolve(parseTypeId(typeId));
  }

  /**
   * Resolves the complete binding for a parsed reference.
   */
  resolve(ref: TypeRef): TypeBinding {
    const id = formatTypeRef(ref);
    const cached = this.bindings.get(id);
    if (cached !== undefined) {
      return cached;
    }

    const { definition, args } = this.instantiate(ref, undefined);
    const head = this.resolveHead(ref);
    const body = definition.body(args, this);
    const binding: TypeBinding = {
      ...head,
      declarations: body.declarations,
      parentTypes: body.parentTypes,
    };
    this.bindings.set(id, binding);
    return binding;
  }

  /**
   * Resolves only the head of a reference, honouring a local scope.
   */
  resolveHead(ref: TypeRef, scope?: TypeScope): BindingHead {
    if (ref.args.length === 0 && scope !== undefined) {
      const scoped = scope.get(ref.name);
      if (scoped !== undefined) {
        return scoped;
      }
    }

    const id = formatTypeRef(ref);
    const cacheable = scope === undefined || scope.size === 0;
    if (cacheable) {
      const cached = this.heads.get(id);
      if (cached !== undefined) {
        return cached;
      }
    }

    const { definition, args } = this.instantiate(ref, scope);
    const head = headOf(definition.head(args));
    if (cacheable) {
      this.heads.set(id, head);
    }
    return head;
  }

  private instantiate(
    ref: TypeRef,
    scope: TypeScope | undefined
  ): { definition: TypeDefinition; args: TypeArgument[] } {
    const id = formatTypeRef(ref);
    const exact = this.exact.get(id);
    if (exact !== undefined) {
      return { definition: exact, args: [] };
    }

    const definition = this.constructors.get(constructorKey(ref.name, ref.args.length));
    if (definition === undefined) {
      throw new UnregisteredTypeError(id);
    }

    const args = ref.args.map(
      (arg): TypeArgument => ({
        ...this.resolveHead(arg, scope),
        id: formatTypeRef(arg),
        ref: arg,
      })
    );
    return { definition, args };
  }

  private defineExact(typeId: TypeId, definition: TypeDefinition): void {
    const id = canonicalTypeId(typeId);
    this.store(this.exact, id, id, definition);
  }

  private store(
    table: Map<string, TypeDefinition>,
    key: string,
    label: string,
    definition: TypeDefinition
  ): void {
    if (this.frozen) {
      throw new RegistryFrozenError(label);
    }

    const existing = table.get(key);
    if (existing !== undefined) {
      if (existing.fingerprint === definition.fingerprint) {
        return;
      }
      if (this.onConflict === 'error') {
        throw new ConflictingBindingError(label);
      }
      this.logger.warn('binding_replaced', { typeId: label });
      this.heads.clear();
      this.bindings.clear();
    }

    table.set(key, definition);
    this.logger.debug('binding_registered', { typeId: label });
  }
}
