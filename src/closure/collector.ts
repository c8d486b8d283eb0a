/**
 * Transitive closure collector.
 *
 * Walks the bindings reachable from a set of root types through their
 * parent-type links and gathers every declaration they need, once each.
 *
 * @packageDocumentation
 */

import { declarationKey } from '../bindings/declarations.js';
import type { TypeRegistry } from '../bindings/registry.js';
import { canonicalTypeId, formatTypeRef, parseTypeId } from '../bindings/type-id.js';
import type { Declaration, TypeBinding, TypeId } from '../bindings/types.js';
import { Logger } from '../utils/logger.js';

/**
 * Result of a closure collection.
 */
export interface ClosureResult {
  /** Every required declaration, structurally unique, in emission order. */
  readonly declarations: readonly Declaration[];
  /** Binding of each root, in the order the roots were given. */
  readonly roots: readonly { readonly typeId: TypeId; readonly binding: TypeBinding }[];
  /** Canonical identities visited, in visiting order. */
  readonly visited: readonly TypeId[];
}

/**
 * Options for closure collection.
 */
export interface CollectOptions {
  readonly logger?: Logger;
}

/**
 * Collects the closure of the given root types.
 *
 * Traversal is depth-first: a type's own declarations are emitted before
 * those of its parent types, and each canonical identity is visited once, so
 * cyclic type graphs terminate.
 *
 * Declarations of a constructor definition do not depend on its arguments,
 * so only the first instantiation of each constructor is followed through
 * its parent types; later instantiations only visit their arguments. This
 * bounds generics that recurse at a growing argument
 * (`Nested<a>` holding a `Nested<List<a>>`).
 *
 * Either the whole closure is returned or an error propagates; no partial
 * result is produced.
 *
 * @throws UnregisteredTypeError if any reachable identity has no definition.
 * @throws MalformedMetadataError if a root identifier cannot be parsed.
 */
export function collectClosure(
  registry: TypeRegistry,
  rootIds: readonly TypeId[],
  options: CollectOptions = {}
): ClosureResult {
  const log = options.logger ?? new Logger({ component: 'ClosureCollector' });
  const declarations: Declaration[] = [];
  const emitted = new Set<string>();
  const visited: TypeId[] = [];
  const seen = new Set<TypeId>();
  const expanded = new Set<string>();

  const visit = (typeId: TypeId): void => {
    if (seen.has(typeId)) {
      return;
    }
    seen.add(typeId);
    visited.push(typeId);

    const binding = registry.lookup(typeId);
    log.debug('type_visited', { typeId, parents: binding.parentTypes.length });

    for (const declaration of binding.declarations) {
      const key = declarationKey(declaration);
      if (!emitted.has(key)) {
        emitted.add(key);
        declarations.push(declaration);
      }
    }

    const definitionKey = registry.constructorOf(typeId);
    let parents: readonly TypeId[] = binding.parentTypes;
    if (definitionKey !== undefined) {
      if (expanded.has(definitionKey)) {
        parents = parseTypeId(typeId).args.map(formatTypeRef);
      }
      expanded.add(definitionKey);
    }

    for (const parent of parents) {
      visit(canonicalTypeId(parent));
    }
  };

  const roots = rootIds.map((rootId) => {
    const typeId = canonicalTypeId(rootId);
    visit(typeId);
    return { typeId, binding: registry.lookup(typeId) };
  });

  log.info('closure_collected', {
    roots: roots.map((r) => r.typeId),
    visitedTypes: visited.length,
    declarationCount: declarations.length,
  });

  return { declarations, roots, visited };
}

/**
 * Collects only the declarations of the closure of the given root types.
 *
 * @example
 * ```typescript
 * collectDeclarations(registry, ['Either<Integer, Text>']).map((d) => d.kind);
 * // ['alternatives', 'interface', 'interface']
 * ```
 */
export function collectDeclarations(
  registry: TypeRegistry,
  rootIds: readonly TypeId[],
  options: CollectOptions = {}
): Declaration[] {
  return [...collectClosure(registry, rootIds, options).declarations];
}
