/**
 * Parsing and canonical formatting of type identifiers.
 *
 * A type identifier is a constructor name optionally applied to
 * comma-separated arguments in angle brackets:
 *
 * ```
 * Integer
 * List<Char>
 * Either<Integer, Maybe<Text>>
 * ```
 *
 * Names may be module-qualified (`Data.Time.UTCTime`).
 *
 * @packageDocumentation
 */

import { MalformedMetadataError } from './errors.js';
import type { TypeId, TypeRef } from './types.js';

/** Characters allowed in a constructor name after the first one. */
const NAME_CHAR = /[A-Za-z0-9_.']/;

/** Characters allowed as the first character of a constructor name. */
const NAME_START = /[A-Za-z_]/;

/**
 * Builds a {@link TypeRef} from a name and argument references.
 *
 * @example
 * ```typescript
 * formatTypeRef(typeRef('List', typeRef('Char'))); // "List<Char>"
 * ```
 */
export function typeRef(name: string, ...args: TypeRef[]): TypeRef {
  return { name, args };
}

/**
 * Renders a {@link TypeRef} in canonical spelling: arguments separated by
 * `", "`, no other whitespace.
 */
export function formatTypeRef(ref: TypeRef): TypeId {
  if (ref.args.length === 0) {
    return ref.name;
  }
  return `${ref.name}<${ref.args.map(formatTypeRef).join(', ')}>`;
}

class TypeIdParser {
  private pos = 0;

  constructor(private readonly source: string) {}

  parse(): TypeRef {
    const ref = this.parseRef();
    this.skipWhitespace();
    if (this.pos !== this.source.length) {
      this.fail(`unexpected '${this.source.charAt(this.pos)}' at offset ${String(this.pos)}`);
    }
    return ref;
  }

  private parseRef(): TypeRef {
    this.skipWhitespace();
    const name = this.parseName();
    this.skipWhitespace();

    if (this.source.charAt(this.pos) !== '<') {
      return { name, args: [] };
    }

    this.pos++;
    const args: TypeRef[] = [this.parseRef()];
    this.skipWhitespace();
    while (this.source.charAt(this.pos) === ',') {
      this.pos++;
      args.push(this.parseRef());
      this.skipWhitespace();
    }

    if (this.source.charAt(this.pos) !== '>') {
      this.fail(`expected ',' or '>' at offset ${String(this.pos)}`);
    }
    this.pos++;
    return { name, args };
  }

  private parseName(): string {
    const start = this.pos;
    if (!NAME_START.test(this.source.charAt(this.pos))) {
      this.fail(`expected a type name at offset ${String(this.pos)}`);
    }
    this.pos++;
    while (this.pos < this.source.length && NAME_CHAR.test(this.source.charAt(this.pos))) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source.charAt(this.pos))) {
      this.pos++;
    }
  }

  private fail(message: string): never {
    throw new MalformedMetadataError(message, `type identifier '${this.source}'`);
  }
}

/**
 * Parses a type identifier into a {@link TypeRef}.
 *
 * @throws MalformedMetadataError if the identifier is empty or malformed.
 */
export function parseTypeId(typeId: TypeId): TypeRef {
  return new TypeIdParser(typeId).parse();
}

/**
 * Normalizes a type identifier to its canonical spelling.
 *
 * @example
 * ```typescript
 * canonicalTypeId('Either<Integer,Text>'); // "Either<Integer, Text>"
 * ```
 */
export function canonicalTypeId(typeId: TypeId): TypeId {
  return formatTypeRef(parseTypeId(typeId));
}

/**
 * Replaces every argument-free occurrence of a bound name with its binding.
 *
 * Used to instantiate the field types of a generic record with the actual
 * type arguments of a reference to it.
 */
export function substituteTypeRef(ref: TypeRef, bindings: ReadonlyMap<string, TypeRef>): TypeRef {
  if (ref.args.length === 0) {
    return bindings.get(ref.name) ?? ref;
  }
  return { name: ref.name, args: ref.args.map((arg) => substituteTypeRef(arg, bindings)) };
}
