import { describe, expect, it } from 'vitest';
import {
  buildSchemaFromConfig,
  GraphQLEnumType,
  GraphQLInputObjectType,
  GraphQLInterfaceType,
  GraphQLObjectType,
  GraphQLScalarType,
  GraphQLUnionType,
  SchemaConfigError,
} from '../src/index.js';
import { Kind } from '@querycheck/language';

const config = {
  query: 'Query',
  mutation: 'Mutation',
  types: {
    Query: {
      kind: 'object',
      fields: {
        dog: 'Dog',
        pets: { type: '[Pet!]!', args: { first: 'Int', filter: { type: 'PetFilter', defaultValue: null } } },
      },
    },
    Mutation: { kind: 'object', fields: { adopt: { type: 'Dog', args: { id: 'ID!' } } } },
    Named: { kind: 'interface', fields: { name: 'String' } },
    Dog: { kind: 'object', interfaces: ['Named'], fields: { name: 'String', born: 'Date' } },
    Cat: { kind: 'object', interfaces: ['Named'], fields: { name: 'String' } },
    Pet: { kind: 'union', types: ['Dog', 'Cat'] },
    Size: { kind: 'enum', values: ['SMALL', 'LARGE'] },
    PetFilter: { kind: 'input', fields: { size: 'Size', names: '[String!]' } },
    Date: { kind: 'scalar', description: 'ISO date' },
  },
  directives: {
    cached: { locations: ['FIELD'], args: { ttl: 'Int!' } },
  },
};

function configError(input: unknown): SchemaConfigError {
  try {
    buildSchemaFromConfig(input);
  } catch (error) {
    if (error instanceof SchemaConfigError) return error;
    throw error;
  }
  throw new Error('Expected the config to be rejected');
}

describe('buildSchemaFromConfig', () => {
  it('builds every kind of type', () => {
    const schema = buildSchemaFromConfig(config);
    expect(schema.getQueryType().name).toBe('Query');
    expect(schema.getMutationType()?.name).toBe('Mutation');
    expect(schema.getSubscriptionType()).toBeUndefined();
    expect(schema.getType('Named')).toBeInstanceOf(GraphQLInterfaceType);
    expect(schema.getType('Dog')).toBeInstanceOf(GraphQLObjectType);
    expect(schema.getType('Pet')).toBeInstanceOf(GraphQLUnionType);
    expect(schema.getType('Size')).toBeInstanceOf(GraphQLEnumType);
    expect(schema.getType('PetFilter')).toBeInstanceOf(GraphQLInputObjectType);
    expect(schema.getType('Date')).toBeInstanceOf(GraphQLScalarType);
  });

  it('parses type references and arguments', () => {
    const pets = buildSchemaFromConfig(config).getQueryType().getFields().pets;
    expect(String(pets.type)).toBe('[Pet!]!');
    expect(pets.args.map((arg) => `${arg.name}: ${String(arg.type)}`)).toEqual(['first: Int', 'filter: PetFilter']);
  });

  it('registers implementations and directives', () => {
    const schema = buildSchemaFromConfig(config);
    const named = schema.getType('Named');
    if (!(named instanceof GraphQLInterfaceType)) throw new Error('Expected an interface');
    expect(schema.getPossibleTypes(named).map((type) => type.name)).toEqual(['Dog', 'Cat']);
    expect(schema.getDirectives().map((d) => d.name)).toEqual(['include', 'skip', 'cached']);
    expect(schema.getDirective('cached')?.locations).toEqual(['FIELD']);
  });

  it('accepts any simple literal for custom scalars', () => {
    const date = buildSchemaFromConfig(config).getType('Date');
    if (!(date instanceof GraphQLScalarType)) throw new Error('Expected a scalar');
    expect(date.parseLiteral({ kind: Kind.STRING, value: '2020-01-01' })).toBe('2020-01-01');
    expect(date.parseLiteral({ kind: Kind.LIST, values: [] })).toBeUndefined();
  });

  it('defaults the query type name', () => {
    const schema = buildSchemaFromConfig({ types: { Query: { kind: 'object', fields: { a: 'Int' } } } });
    expect(schema.getQueryType().name).toBe('Query');
  });

  it('reports malformed configs with paths', () => {
    const error = configError({ types: { Query: { kind: 'object', fields: {} } } });
    expect(error.issues).toEqual(['types.Query.fields: Must define at least one field']);
  });

  it('reports unknown type references', () => {
    const error = configError({ types: { Query: { kind: 'object', fields: { a: '[Missing]' } } } });
    expect(error.issues).toEqual(['types.Query.fields.a: Unknown type "Missing"']);
  });

  it('reports types used in the wrong position', () => {
    const error = configError({
      types: {
        Query: { kind: 'object', fields: { a: { type: 'Int', args: { dog: 'Dog' } } } },
        Dog: { kind: 'object', fields: { name: 'String' } },
      },
    });
    expect(error.issues).toEqual(['types.Query.fields.a.args.dog: "Dog" is not an input type']);
  });

  it('reports unparseable type references', () => {
    const error = configError({ types: { Query: { kind: 'object', fields: { a: 'Int!!' } } } });
    expect(error.issues).toEqual(['types.Query.fields.a: Invalid type reference "Int!!": Expected EOF, found !']);
  });

  it('reports a missing query type', () => {
    const error = configError({ query: 'Root', types: { Query: { kind: 'object', fields: { a: 'Int' } } } });
    expect(error.issues).toEqual(['query: Unknown object type "Root"']);
  });

  it('rejects redefining built-in scalars', () => {
    const error = configError({ types: { Query: { kind: 'object', fields: { a: 'Int' } }, Int: { kind: 'scalar' } } });
    expect(error.issues).toEqual(['types.Int: Cannot redefine built-in type "Int"']);
  });

  it('wraps schema construction errors', () => {
    const error = configError({
      types: {
        Query: { kind: 'object', interfaces: ['Named'], fields: { a: 'Int' } },
        Named: { kind: 'interface', fields: { name: 'String' } },
      },
    });
    expect(error.issues).toEqual(['"Named" expects field "name" but "Query" does not provide it.']);
    expect(error.message).toBe(
      'Invalid schema config:\n  - "Named" expects field "name" but "Query" does not provide it.',
    );
  });
});
