/**
 * Schema configuration
 *
 * Builds a schema from a plain description, as read from a YAML or JSON
 * file. Type references use query syntax (`[String!]!`).
 *
 * ```yaml
 * query: Query
 * types:
 *   Query:
 *     kind: object
 *     fields:
 *       dog: Dog
 *       dogs: { type: '[Dog]', args: { limit: Int } }
 *   Dog:
 *     kind: object
 *     fields: { name: String! }
 * ```
 */

import {
  Kind,
  LanguageError,
  parseType,
  type ListTypeNode,
  type NamedTypeNode,
  type TypeNode,
  type ValueNode,
} from '@querycheck/language';
import { z } from 'zod';
import {
  GraphQLEnumType,
  GraphQLInputObjectType,
  GraphQLInterfaceType,
  GraphQLList,
  GraphQLNonNull,
  GraphQLObjectType,
  GraphQLScalarType,
  GraphQLUnionType,
  isInputType,
  isOutputType,
  type ArgumentConfig,
  type FieldConfig,
  type GraphQLInputType,
  type GraphQLNamedType,
  type GraphQLNullableType,
  type GraphQLOutputType,
  type GraphQLType,
  type InputFieldConfig,
} from './definition.js';
import { DirectiveLocation, GraphQLDirective, specifiedDirectives } from './directives.js';
import { specifiedScalarTypes } from './scalars.js';
import { GraphQLSchema } from './schema.js';

// ============================================================================
// Config Schema
// ============================================================================

const typeRefSchema = z.string().min(1);

const argumentSchema = z.union([
  typeRefSchema,
  z.object({
    type: typeRefSchema,
    defaultValue: z.unknown().optional(),
    description: z.string().optional(),
  }),
]);

const fieldSchema = z.union([
  typeRefSchema,
  z.object({
    type: typeRefSchema,
    args: z.record(z.string(), argumentSchema).optional(),
    description: z.string().optional(),
  }),
]);

const inputFieldSchema = argumentSchema;

const fieldsSchema = z.record(z.string(), fieldSchema).refine((fields) => Object.keys(fields).length > 0, {
  message: 'Must define at least one field',
});

const typeDefinitionSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('scalar'),
    description: z.string().optional(),
  }),
  z.object({
    kind: z.literal('object'),
    fields: fieldsSchema,
    interfaces: z.array(z.string()).optional(),
    description: z.string().optional(),
  }),
  z.object({
    kind: z.literal('interface'),
    fields: fieldsSchema,
    description: z.string().optional(),
  }),
  z.object({
    kind: z.literal('union'),
    types: z.array(z.string()).min(1),
    description: z.string().optional(),
  }),
  z.object({
    kind: z.literal('enum'),
    values: z.array(z.string()).min(1),
    description: z.string().optional(),
  }),
  z.object({
    kind: z.literal('input'),
    fields: z.record(z.string(), inputFieldSchema),
    description: z.string().optional(),
  }),
]);

const directiveDefinitionSchema = z.object({
  locations: z.array(z.nativeEnum(DirectiveLocation)).min(1),
  args: z.record(z.string(), argumentSchema).optional(),
  description: z.string().optional(),
});

export const schemaConfigSchema = z.object({
  query: z.string().default('Query'),
  mutation: z.string().optional(),
  subscription: z.string().optional(),
  types: z.record(z.string(), typeDefinitionSchema),
  directives: z.record(z.string(), directiveDefinitionSchema).optional(),
});

export type SchemaConfigInput = z.input<typeof schemaConfigSchema>;
export type SchemaDefinition = z.output<typeof schemaConfigSchema>;
type TypeDefinition = z.output<typeof typeDefinitionSchema>;
type ArgumentDefinition = z.output<typeof argumentSchema>;
type FieldDefinition = z.output<typeof fieldSchema>;

// ============================================================================
// Errors
// ============================================================================

export class SchemaConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid schema config:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'SchemaConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Validate a parsed config file and build the schema it describes.
 *
 * @throws SchemaConfigError when the config is malformed or references
 *   unknown or misplaced types
 */
export function buildSchemaFromConfig(input: unknown): GraphQLSchema {
  const result = schemaConfigSchema.safeParse(input);
  if (!result.success) {
    throw new SchemaConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }
  return new SchemaBuilder(result.data).build();
}

class SchemaBuilder {
  private readonly definition: SchemaDefinition;
  private readonly types = new Map<string, GraphQLNamedType>();

  constructor(definition: SchemaDefinition) {
    this.definition = definition;
    for (const scalar of specifiedScalarTypes) {
      this.types.set(scalar.name, scalar);
    }
  }

  build(): GraphQLSchema {
    for (const [name, typeDef] of Object.entries(this.definition.types)) {
      if (this.types.has(name)) {
        throw new SchemaConfigError([`types.${name}: Cannot redefine built-in type "${name}"`]);
      }
      this.types.set(name, this.defineType(name, typeDef));
    }

    const directives = Object.entries(this.definition.directives ?? {}).map(
      ([name, directive]) =>
        new GraphQLDirective({
          name,
          locations: directive.locations,
          description: directive.description,
          args: this.defineArguments(directive.args, `directives.${name}`),
        }),
    );

    const query = this.objectType(this.definition.query, 'query');
    if (!query) {
      throw new SchemaConfigError([`query: Unknown object type "${this.definition.query}"`]);
    }

    try {
      return new GraphQLSchema({
        query,
        mutation: this.rootType('mutation'),
        subscription: this.rootType('subscription'),
        types: [...this.types.values()],
        directives: [...specifiedDirectives, ...directives],
      });
    } catch (error) {
      if (error instanceof SchemaConfigError) throw error;
      if (error instanceof Error) throw new SchemaConfigError([error.message]);
      throw error;
    }
  }

  private rootType(operation: 'mutation' | 'subscription'): GraphQLObjectType | undefined {
    const name = this.definition[operation];
    if (name === undefined) return undefined;
    const type = this.objectType(name, operation);
    if (!type) {
      throw new SchemaConfigError([`${operation}: Unknown object type "${name}"`]);
    }
    return type;
  }

  private objectType(name: string, path: string): GraphQLObjectType | undefined {
    const type = this.types.get(name);
    if (type === undefined || type instanceof GraphQLObjectType) {
      return type;
    }
    throw new SchemaConfigError([`${path}: "${name}" is not an object type`]);
  }

  private defineType(name: string, typeDef: TypeDefinition): GraphQLNamedType {
    const path = `types.${name}`;
    const { description } = typeDef;

    switch (typeDef.kind) {
      case 'scalar':
        return new GraphQLScalarType({ name, description, parseLiteral: parseCustomScalarLiteral });
      case 'object': {
        const { fields, interfaces = [] } = typeDef;
        return new GraphQLObjectType({
          name,
          description,
          fields: () => this.defineFields(fields, path),
          interfaces: () =>
            interfaces.map((ifaceName) => {
              const iface = this.types.get(ifaceName);
              if (!(iface instanceof GraphQLInterfaceType)) {
                throw new SchemaConfigError([`${path}.interfaces: "${ifaceName}" is not an interface type`]);
              }
              return iface;
            }),
        });
      }
      case 'interface': {
        const { fields } = typeDef;
        return new GraphQLInterfaceType({
          name,
          description,
          fields: () => this.defineFields(fields, path),
        });
      }
      case 'union': {
        const { types } = typeDef;
        return new GraphQLUnionType({
          name,
          description,
          types: () =>
            types.map((memberName) => {
              const member = this.types.get(memberName);
              if (!(member instanceof GraphQLObjectType)) {
                throw new SchemaConfigError([`${path}.types: "${memberName}" is not an object type`]);
              }
              return member;
            }),
        });
      }
      case 'enum':
        return new GraphQLEnumType({
          name,
          description,
          values: Object.fromEntries(typeDef.values.map((value) => [value, {}])),
        });
      case 'input': {
        const { fields } = typeDef;
        return new GraphQLInputObjectType({
          name,
          description,
          fields: () => {
            const result: Record<string, InputFieldConfig> = {};
            for (const [fieldName, field] of Object.entries(fields)) {
              result[fieldName] = this.defineArgument(field, `${path}.fields.${fieldName}`);
            }
            return result;
          },
        });
      }
    }
  }

  private defineFields(fields: Record<string, FieldDefinition>, path: string): Record<string, FieldConfig> {
    const result: Record<string, FieldConfig> = {};
    for (const [name, field] of Object.entries(fields)) {
      const fieldPath = `${path}.fields.${name}`;
      if (typeof field === 'string') {
        result[name] = { type: this.outputType(field, fieldPath) };
      } else {
        result[name] = {
          type: this.outputType(field.type, fieldPath),
          args: this.defineArguments(field.args, fieldPath),
          description: field.description,
        };
      }
    }
    return result;
  }

  private defineArguments(
    args: Record<string, ArgumentDefinition> | undefined,
    path: string,
  ): Record<string, ArgumentConfig> {
    const result: Record<string, ArgumentConfig> = {};
    for (const [name, arg] of Object.entries(args ?? {})) {
      result[name] = this.defineArgument(arg, `${path}.args.${name}`);
    }
    return result;
  }

  private defineArgument(arg: ArgumentDefinition, path: string): ArgumentConfig {
    if (typeof arg === 'string') {
      return { type: this.inputType(arg, path) };
    }
    return {
      type: this.inputType(arg.type, path),
      defaultValue: arg.defaultValue,
      description: arg.description,
    };
  }

  private outputType(ref: string, path: string): GraphQLOutputType {
    const type = this.resolveType(ref, path);
    if (!isOutputType(type)) {
      throw new SchemaConfigError([`${path}: "${ref}" is not an output type`]);
    }
    return type;
  }

  private inputType(ref: string, path: string): GraphQLInputType {
    const type = this.resolveType(ref, path);
    if (!isInputType(type)) {
      throw new SchemaConfigError([`${path}: "${ref}" is not an input type`]);
    }
    return type;
  }

  private resolveType(ref: string, path: string): GraphQLType {
    let typeNode: TypeNode;
    try {
      typeNode = parseType(ref, { noLocation: true });
    } catch (error) {
      if (error instanceof LanguageError) {
        throw new SchemaConfigError([`${path}: Invalid type reference "${ref}": ${error.description}`]);
      }
      throw error;
    }
    return this.typeFromNode(typeNode, path);
  }

  private typeFromNode(typeNode: TypeNode, path: string): GraphQLType {
    if (typeNode.kind === Kind.NON_NULL_TYPE) {
      return new GraphQLNonNull(this.nullableTypeFromNode(typeNode.type, path));
    }
    return this.nullableTypeFromNode(typeNode, path);
  }

  private nullableTypeFromNode(typeNode: NamedTypeNode | ListTypeNode, path: string): GraphQLNullableType {
    if (typeNode.kind === Kind.LIST_TYPE) {
      return new GraphQLList(this.typeFromNode(typeNode.type, path));
    }
    const type = this.types.get(typeNode.name.value);
    if (!type) {
      throw new SchemaConfigError([`${path}: Unknown type "${typeNode.name.value}"`]);
    }
    return type;
  }
}

/**
 * Custom scalars accept any non-compound literal as is
 */
function parseCustomScalarLiteral(valueNode: ValueNode): unknown {
  switch (valueNode.kind) {
    case Kind.STRING:
    case Kind.INT:
    case Kind.FLOAT:
    case Kind.BOOLEAN:
    case Kind.ENUM:
      return valueNode.value;
    default:
      return undefined;
  }
}
