import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { SchemaParseError, parseSchema } from './parser.js';

describe('Schema Parser', () => {
  describe('parseSchema', () => {
    describe('valid documents', () => {
      it('should parse an empty document', () => {
        expect(parseSchema('')).toEqual({ records: [], sums: [], opaque: [] });
      });

      it('should parse records with every field option', () => {
        const schema = parseSchema(`
[records.User]
type_parameters = []
field_label_modifier = { strip_prefix = "user", casing = "camel" }
fields = [
  { name = "userName", type = "Text" },
  { name = "userEmail", type = "Maybe<Text>", json_key = "email" },
  { name = "userAge", type = "Int", optional = true },
]
`);

        expect(schema.records).toEqual([
          {
            name: 'User',
            typeParameters: [],
            fieldLabelModifier: { stripPrefix: 'user', casing: 'camel' },
            fields: [
              { name: 'userName', type: 'Text' },
              { name: 'userEmail', type: 'Maybe<Text>', jsonKey: 'email' },
              { name: 'userAge', type: 'Int', optional: true },
            ],
          },
        ]);
      });

      it('should leave absent options out of the metadata', () => {
        const schema = parseSchema(`
[records.Point]
fields = [{ name = "x", type = "Double" }]
`);
        const record = schema.records[0];

        expect(record).toEqual({ name: 'Point', fields: [{ name: 'x', type: 'Double' }] });
        expect(record).not.toHaveProperty('typeParameters');
        expect(record).not.toHaveProperty('fieldLabelModifier');
      });

      it('should parse sums', () => {
        const schema = parseSchema(`
[sums.Result]
type_parameters = ["e", "a"]
constructors = [
  { name = "Failure", payload = "e" },
  { name = "Success", payload = "a" },
]
`);

        expect(schema.sums).toEqual([
          {
            name: 'Result',
            typeParameters: ['e', 'a'],
            constructors: [
              { name: 'Failure', payload: 'e' },
              { name: 'Success', payload: 'a' },
            ],
          },
        ]);
      });

      it('should parse opaque types with defaults', () => {
        const schema = parseSchema(`
[opaque.UTCTime]
type_expression = "string"

[opaque."Map<Text, Integer>"]
type_expression = "Record<string, number>"
declarations = ["type Counts = Record<string, number>;"]
parent_types = ["Integer"]
optional = true
`);

        expect(schema.opaque).toEqual([
          {
            name: 'UTCTime',
            typeExpression: 'string',
            declarations: [],
            parentTypes: [],
            optional: false,
          },
          {
            name: 'Map<Text, Integer>',
            typeExpression: 'Record<string, number>',
            declarations: ['type Counts = Record<string, number>;'],
            parentTypes: ['Integer'],
            optional: true,
          },
        ]);
      });

      it('should keep entries in file order', () => {
        const schema = parseSchema(`
[records.Zeta]
fields = []

[records.Alpha]
fields = []
`);

        expect(schema.records.map((r) => r.name)).toEqual(['Zeta', 'Alpha']);
      });
    });

    describe('invalid TOML syntax', () => {
      it('should wrap parser errors', () => {
        expect(() => parseSchema('[records.User\nfields = []')).toThrow(SchemaParseError);
        expect(() => parseSchema('[records.User\nfields = []')).toThrow(/^Invalid TOML syntax: /);
      });
    });

    describe('structural errors', () => {
      it('should require fields on records', () => {
        expect(() => parseSchema('[records.User]\ntype_parameters = []\n')).toThrow(
          "Missing required field: 'records.User.fields'"
        );
      });

      it('should require a type on every field', () => {
        expect(() => parseSchema('[records.User]\nfields = [{ name = "id" }]\n')).toThrow(
          "Missing required field: 'records.User.fields[0].type'"
        );
      });

      it('should require constructors on sums', () => {
        expect(() => parseSchema('[sums.Shape]\n')).toThrow(
          "Missing required field: 'sums.Shape.constructors'"
        );
      });

      it('should require a type expression on opaque types', () => {
        expect(() => parseSchema('[opaque.UTCTime]\ndeclarations = []\n')).toThrow(
          "Missing required field: 'opaque.UTCTime.type_expression'"
        );
      });

      it('should report wrong value types with their path', () => {
        expect(() => parseSchema('[records.User]\nfields = [{ name = "id", type = 3 }]\n')).toThrow(
          "Invalid type for 'records.User.fields[0].type': expected string, got number"
        );
        expect(() => parseSchema('[records.User]\nfields = "id"\n')).toThrow(
          "Invalid type for 'records.User.fields': expected array, got string"
        );
        expect(() => parseSchema('[records.User]\nfields = ["id"]\n')).toThrow(
          "Invalid type for 'records.User.fields[0]': expected table, got string"
        );
        expect(() => parseSchema('records = []\n')).toThrow(
          "Invalid type for 'records': expected table, got array"
        );
      });

      it('should reject an unknown casing', () => {
        expect(() =>
          parseSchema(
            '[records.User]\nfield_label_modifier = { casing = "pascal" }\nfields = []\n'
          )
        ).toThrow(
          "Invalid value for 'records.User.field_label_modifier.casing': expected one of [identity, camel, snake, kebab], got 'pascal'"
        );
      });

      it('should reject unknown keys', () => {
        expect(() =>
          parseSchema('[records.User]\nfields = [{ name = "id", type = "Int", jsonKey = "x" }]\n')
        ).toThrow(
          "Unknown key 'jsonKey' in 'records.User.fields[0]': expected one of [name, type, optional, json_key]"
        );
        expect(() => parseSchema('[enums.Color]\nvariants = []\n')).toThrow(
          "Unknown key 'enums' in '<root>'"
        );
      });

      it('should reject prohibited keys', () => {
        expect(() => parseSchema('[records.constructor]\nfields = []\n')).toThrow(
          SchemaParseError
        );
        expect(() => parseSchema('[opaque.prototype]\ntype_expression = "x"\n')).toThrow(
          SchemaParseError
        );
      });
    });
  });

  describe('SchemaParseError', () => {
    it('should preserve name and cause', () => {
      const cause = new Error('original error');
      const error = new SchemaParseError('wrapper error', cause);

      expect(error.name).toBe('SchemaParseError');
      expect(error.message).toBe('wrapper error');
      expect(error.cause).toBe(cause);
    });
  });

  describe('property-based tests', () => {
    it('should preserve field names and types in order', () => {
      const name = fc.stringMatching(/^[a-z][A-Za-z0-9_]{0,10}$/);
      const type = fc.constantFrom('Int', 'Text', 'List<Char>', 'Maybe<Either<Int, Text>>');

      fc.assert(
        fc.property(fc.array(fc.tuple(name, type), { maxLength: 6 }), (fields) => {
          const toml = `[records.R]\nfields = [${fields
            .map(([n, t]) => `{ name = "${n}", type = "${t}" }`)
            .join(', ')}]\n`;
          const record = parseSchema(toml).records[0];
          expect(record?.fields).toEqual(fields.map(([n, t]) => ({ name: n, type: t })));
        })
      );
    });
  });
});
