/**
 * Constructors and structural comparison for declarations.
 *
 * @packageDocumentation
 */

import type {
  Declaration,
  Field,
  InterfaceDeclaration,
  RawDeclaration,
  TypeAlternatives,
} from './types.js';

/**
 * Creates an interface member.
 */
export function field(name: string, typeExpression: string, optional = false): Field {
  return { optional, name, typeExpression };
}

/**
 * Creates an interface declaration.
 *
 * @example
 * ```typescript
 * interfaceDeclaration('ILeft', [field('Left', 'T')], ['T']);
 * ```
 */
export function interfaceDeclaration(
  name: string,
  members: readonly Field[],
  genericParameters: readonly string[] = []
): InterfaceDeclaration {
  return { kind: 'interface', name, genericParameters, members };
}

/**
 * Creates an alternatives (union type alias) declaration.
 */
export function typeAlternatives(
  name: string,
  alternatives: readonly string[],
  genericParameters: readonly string[] = []
): TypeAlternatives {
  return { kind: 'alternatives', name, genericParameters, alternatives };
}

/**
 * Creates a raw declaration emitted verbatim.
 */
export function rawDeclaration(text: string): RawDeclaration {
  return { kind: 'raw', text };
}

/**
 * Returns a string that identifies a declaration by value.
 *
 * Two declarations have the same key exactly when they are structurally
 * equal. Properties are serialized in a fixed order so that key equality does
 * not depend on how the objects were built.
 */
export function declarationKey(declaration: Declaration): string {
  switch (declaration.kind) {
    case 'interface':
      return JSON.stringify([
        declaration.kind,
        declaration.name,
        declaration.genericParameters,
        declaration.members.map((m) => [m.optional, m.name, m.typeExpression]),
      ]);
    case 'alternatives':
      return JSON.stringify([
        declaration.kind,
        declaration.name,
        declaration.genericParameters,
        declaration.alternatives,
      ]);
    case 'raw':
      return JSON.stringify([declaration.kind, declaration.text]);
  }
}

/**
 * Structural equality on declarations.
 */
export function declarationsEqual(a: Declaration, b: Declaration): boolean {
  return declarationKey(a) === declarationKey(b);
}

const KIND_RANK: Readonly<Record<Declaration['kind'], number>> = {
  interface: 0,
  alternatives: 1,
  raw: 2,
};

/**
 * Total order on declarations, consistent with {@link declarationsEqual}.
 *
 * Interfaces sort before alternatives, which sort before raw declarations;
 * within a kind the order follows the structural key.
 */
export function compareDeclarations(a: Declaration, b: Declaration): number {
  const rank = KIND_RANK[a.kind] - KIND_RANK[b.kind];
  if (rank !== 0) {
    return rank;
  }
  const keyA = declarationKey(a);
  const keyB = declarationKey(b);
  if (keyA === keyB) {
    return 0;
  }
  return keyA < keyB ? -1 : 1;
}

/**
 * Removes structural duplicates, keeping the first occurrence of each.
 */
export function uniqueDeclarations(declarations: Iterable<Declaration>): Declaration[] {
  const seen = new Set<string>();
  const result: Declaration[] = [];
  for (const declaration of declarations) {
    const key = declarationKey(declaration);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(declaration);
    }
  }
  return result;
}
