import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  EITHER_DECLARATIONS,
  FLOAT_TYPES,
  INTEGER_TYPES,
  STRING_TYPES,
  TYPE_VARIABLE_PLACEHOLDERS,
  arrayOf,
  needsParentheses,
} from './builtins.js';
import { field, interfaceDeclaration, typeAlternatives } from './declarations.js';
import { UnregisteredTypeError } from './errors.js';
import { createRegistry } from './index.js';

describe('built-in bindings', () => {
  const registry = createRegistry();

  describe('primitives', () => {
    it.each(STRING_TYPES)('should map %s to string', (name) => {
      expect(registry.lookup(name)).toEqual({
        typeExpression: 'string',
        declarations: [],
        isOptional: false,
        parentTypes: [],
      });
    });

    it.each([...INTEGER_TYPES, ...FLOAT_TYPES])('should map %s to number', (name) => {
      expect(registry.lookup(name).typeExpression).toBe('number');
    });

    it('should map Bool to boolean', () => {
      expect(registry.lookup('Bool').typeExpression).toBe('boolean');
    });

    it('should map Char to a string tagged as a character', () => {
      const binding = registry.lookup('Char');
      expect(binding.typeExpression).toBe('string');
      expect(binding.specialTag).toBe('character');
    });

    it('should map Value to any without declarations', () => {
      expect(registry.lookup('Value')).toEqual({
        typeExpression: 'any',
        declarations: [],
        isOptional: false,
        parentTypes: [],
      });
    });

    it.each(TYPE_VARIABLE_PLACEHOLDERS)('should render placeholder %s as itself', (name) => {
      expect(registry.lookup(name).typeExpression).toBe(name);
    });

    it('should not register Map', () => {
      expect(() => registry.lookup('Map<Text, Integer>')).toThrow(UnregisteredTypeError);
    });
  });

  describe('List and Set', () => {
    it('should collapse a list of characters to string', () => {
      expect(registry.lookup('List<Char>')).toEqual({
        typeExpression: 'string',
        declarations: [],
        isOptional: false,
        parentTypes: ['Char'],
      });
    });

    it('should not collapse a set of characters', () => {
      expect(registry.lookup('Set<Char>').typeExpression).toBe('string[]');
    });

    it('should render other lists as arrays', () => {
      expect(registry.lookup('List<Integer>').typeExpression).toBe('number[]');
      expect(registry.lookup('List<List<Char>>').typeExpression).toBe('string[]');
      expect(registry.lookup('List<Set<Bool>>').typeExpression).toBe('boolean[][]');
    });

    it('should not carry the character tag past a list', () => {
      expect(registry.lookup('List<Char>').specialTag).toBeUndefined();
    });

    it('should render optional elements as a parenthesized union with null', () => {
      expect(registry.lookup('List<Maybe<Integer>>').typeExpression).toBe('(number | null)[]');
      expect(registry.lookup('Set<Maybe<Text>>').typeExpression).toBe('(string | null)[]');
    });
  });

  describe('Maybe', () => {
    it('should keep the inner expression and mark the binding optional', () => {
      expect(registry.lookup('Maybe<Integer>')).toEqual({
        typeExpression: 'number',
        declarations: [],
        isOptional: true,
        parentTypes: ['Integer'],
      });
    });

    it('should collapse nested options', () => {
      const binding = registry.lookup('Maybe<Maybe<Integer>>');
      expect(binding.typeExpression).toBe('number');
      expect(binding.isOptional).toBe(true);
    });

    it('should drop the character tag', () => {
      expect(registry.lookup('Maybe<Char>').specialTag).toBeUndefined();
      expect(registry.lookup('List<Maybe<Char>>').typeExpression).toBe('(string | null)[]');
    });
  });

  describe('Tuple', () => {
    it('should render pairs and triples', () => {
      expect(registry.lookup('Tuple<Bool, Text>').typeExpression).toBe('[boolean, string]');
      expect(registry.lookup('Tuple<Bool, Text, Int>').typeExpression).toBe(
        '[boolean, string, number]'
      );
    });

    it('should list every slot as a parent type', () => {
      expect(registry.lookup('Tuple<Bool, Text, Int>').parentTypes).toEqual(['Bool', 'Text', 'Int']);
    });

    it('should only support arities two and three', () => {
      expect(() => registry.lookup('Tuple<Bool, Bool, Bool, Bool>')).toThrow(
        "No binding registered for type 'Tuple<Bool, Bool, Bool, Bool>'"
      );
    });
  });

  describe('Either', () => {
    it('should render a generic reference with three declarations', () => {
      expect(registry.lookup('Either<Integer, Text>')).toEqual({
        typeExpression: 'Either<number, string>',
        declarations: [
          typeAlternatives('Either', ['ILeft<T1>', 'IRight<T2>'], ['T1', 'T2']),
          interfaceDeclaration('ILeft', [field('Left', 'T')], ['T']),
          interfaceDeclaration('IRight', [field('Right', 'T')], ['T']),
        ],
        isOptional: false,
        parentTypes: ['Integer', 'Text'],
      });
    });

    it('should share the same declarations for every instantiation', () => {
      expect(registry.lookup('Either<Bool, Bool>').declarations).toBe(EITHER_DECLARATIONS);
    });

    it('should render optional arguments as unions with null', () => {
      expect(registry.lookup('Either<Maybe<Integer>, Text>').typeExpression).toBe(
        'Either<number | null, string>'
      );
    });
  });

  describe('errors', () => {
    it('should name the innermost unregistered identity', () => {
      try {
        registry.lookup('List<Maybe<UserId>>');
        expect.unreachable('lookup should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(UnregisteredTypeError);
        if (error instanceof UnregisteredTypeError) {
          expect(error.typeId).toBe('UserId');
        }
      }
    });
  });

  describe('needsParentheses', () => {
    it.each([
      ['number', false],
      ['number | null', true],
      ['A & B', true],
      ['() => void', true],
      ['Either<number | null, string>', false],
      ['[number | null, string]', false],
      ['(number | null)[]', false],
      ['Record<string, number>', false],
    ])('should decide %j needs parentheses: %j', (expression, expected) => {
      expect(needsParentheses(expression)).toBe(expected);
    });
  });

  describe('arrayOf', () => {
    it('should parenthesize unions only', () => {
      expect(arrayOf('number')).toBe('number[]');
      expect(arrayOf('number | null')).toBe('(number | null)[]');
    });
  });

  describe('property-based tests', () => {
    it('should nest lists of non-character types as one [] per level', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 6 }), fc.constantFrom('Integer', 'Bool', 'Text'), (depth, leaf) => {
          let id: string = leaf;
          for (let i = 0; i < depth; i++) {
            id = `List<${id}>`;
          }
          const base = registry.lookup(leaf).typeExpression;
          return registry.lookup(id).typeExpression === base + '[]'.repeat(depth);
        })
      );
    });
  });
});
