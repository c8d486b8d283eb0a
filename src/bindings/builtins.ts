/**
 * Built-in bindings for primitives, containers, options, tuples and sums.
 *
 * These reproduce how the host's JSON encoder writes its standard types:
 * sequences and sets become arrays, a sequence of characters becomes a string,
 * an option is either the value or absent, and a binary sum is an object with
 * a single `Left` or `Right` key.
 *
 * @packageDocumentation
 */

import { field, interfaceDeclaration, typeAlternatives } from './declarations.js';
import type { BindingBuilder, TypeArgument, TypeRegistry } from './registry.js';
import type { Declaration, TypeBinding } from './types.js';

/** String-like host types. */
export const STRING_TYPES = ['Text', 'LazyText', 'String'] as const;

/** Integer-like host types, arbitrary precision and fixed width. */
export const INTEGER_TYPES = [
  'Integer',
  'Natural',
  'Int',
  'Int8',
  'Int16',
  'Int32',
  'Int64',
  'Word',
  'Word8',
  'Word16',
  'Word32',
  'Word64',
] as const;

/** Floating-point host types. */
export const FLOAT_TYPES = ['Double', 'Float', 'Scientific'] as const;

/**
 * Type-variable placeholders. Each renders as its own name so that generic
 * declarations can be referenced in uninstantiated form (`Page<T1>`).
 */
export const TYPE_VARIABLE_PLACEHOLDERS = [
  'T',
  'T1',
  'T2',
  'T3',
  'T4',
  'T5',
  'T6',
  'T7',
  'T8',
  'T9',
  'T10',
] as const;

/**
 * Declarations contributed by every `Either<A, B>`.
 *
 * `Either` is genuinely generic here: each alternative is wired to its own
 * type parameter.
 */
export const EITHER_DECLARATIONS: readonly Declaration[] = [
  typeAlternatives('Either', ['ILeft<T1>', 'IRight<T2>'], ['T1', 'T2']),
  interfaceDeclaration('ILeft', [field('Left', 'T')], ['T']),
  interfaceDeclaration('IRight', [field('Right', 'T')], ['T']),
];

/**
 * Whether an expression contains a top-level union, intersection or function
 * arrow and so must be parenthesized before a postfix `[]`.
 */
export function needsParentheses(expression: string): boolean {
  let depth = 0;
  for (let i = 0; i < expression.length; i++) {
    const char = expression.charAt(i);
    if (char === '<' || char === '(' || char === '[' || char === '{') {
      depth++;
    } else if (char === '>' || char === ')' || char === ']' || char === '}') {
      if (char === '>' && expression.charAt(i - 1) === '=') {
        if (depth === 0) {
          return true;
        }
        continue;
      }
      depth--;
    } else if (depth === 0 && (char === '|' || char === '&')) {
      return true;
    }
  }
  return false;
}

/**
 * Array type of an element expression, parenthesizing where needed.
 */
export function arrayOf(elementExpression: string): string {
  return needsParentheses(elementExpression)
    ? `(${elementExpression})[]`
    : `${elementExpression}[]`;
}

/**
 * Expression of a type used inside a container slot.
 *
 * Optionality cannot be expressed with `?` inside a slot, so an optional
 * argument becomes a union with `null`, which is what the encoder writes for
 * a missing element.
 */
export function slotExpression(arg: TypeArgument): string {
  return arg.isOptional ? `${arg.typeExpression} | null` : arg.typeExpression;
}

function leaf(typeExpression: string): TypeBinding {
  return { typeExpression, declarations: [], isOptional: false, parentTypes: [] };
}

function requireArg(args: readonly TypeArgument[], index: number): TypeArgument {
  const arg = args[index];
  if (arg === undefined) {
    throw new RangeError(`Missing type argument ${String(index)}`);
  }
  return arg;
}

const buildList: BindingBuilder = (args) => {
  const element = requireArg(args, 0);
  return {
    typeExpression:
      element.specialTag === 'character' ? 'string' : arrayOf(slotExpression(element)),
    declarations: [],
    isOptional: false,
    parentTypes: [element.id],
  };
};

const buildSet: BindingBuilder = (args) => {
  const element = requireArg(args, 0);
  return {
    typeExpression: arrayOf(slotExpression(element)),
    declarations: [],
    isOptional: false,
    parentTypes: [element.id],
  };
};

const buildMaybe: BindingBuilder = (args) => {
  const inner = requireArg(args, 0);
  return {
    typeExpression: inner.typeExpression,
    declarations: [],
    isOptional: true,
    parentTypes: [inner.id],
  };
};

const buildTuple: BindingBuilder = (args) => ({
  typeExpression: `[${args.map(slotExpression).join(', ')}]`,
  declarations: [],
  isOptional: false,
  parentTypes: args.map((arg) => arg.id),
});

const buildEither: BindingBuilder = (args) => {
  const left = requireArg(args, 0);
  const right = requireArg(args, 1);
  return {
    typeExpression: `Either<${slotExpression(left)}, ${slotExpression(right)}>`,
    declarations: EITHER_DECLARATIONS,
    isOptional: false,
    parentTypes: [left.id, right.id],
  };
};

/**
 * Installs every built-in binding into a registry.
 */
export function registerBuiltins(registry: TypeRegistry): void {
  for (const name of STRING_TYPES) {
    registry.register(name, leaf('string'));
  }
  for (const name of [...INTEGER_TYPES, ...FLOAT_TYPES]) {
    registry.register(name, leaf('number'));
  }
  for (const name of TYPE_VARIABLE_PLACEHOLDERS) {
    registry.register(name, leaf(name));
  }

  registry.register('Bool', leaf('boolean'));
  registry.register('Char', { ...leaf('string'), specialTag: 'character' });
  registry.register('Value', leaf('any'));

  registry.registerConstructor('List', 1, buildList);
  registry.registerConstructor('Set', 1, buildSet);
  registry.registerConstructor('Maybe', 1, buildMaybe);
  registry.registerConstructor('Tuple', 2, buildTuple);
  registry.registerConstructor('Tuple', 3, buildTuple);
  registry.registerConstructor('Either', 2, buildEither);
}
