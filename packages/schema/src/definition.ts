/**
 * Type system definitions
 *
 * Named types are classes; lists and non-nulls wrap another type. Fields,
 * interfaces and union members may be given as thunks so types can refer to
 * each other before they exist.
 */

import { Kind, type ValueNode } from '@querycheck/language';

export type Thunk<T> = T | (() => T);

// Fields and arguments

export interface GraphQLArgument {
  name: string;
  type: GraphQLInputType;
  defaultValue?: unknown;
  description?: string;
}

export interface GraphQLField {
  name: string;
  type: GraphQLOutputType;
  args: GraphQLArgument[];
  description?: string;
}

export interface GraphQLInputField {
  name: string;
  type: GraphQLInputType;
  defaultValue?: unknown;
  description?: string;
}

export interface ArgumentConfig {
  type: GraphQLInputType;
  defaultValue?: unknown;
  description?: string;
}

export interface FieldConfig {
  type: GraphQLOutputType;
  args?: Record<string, ArgumentConfig>;
  description?: string;
}

export interface InputFieldConfig {
  type: GraphQLInputType;
  defaultValue?: unknown;
  description?: string;
}

export function argumentsFromConfig(args: Record<string, ArgumentConfig> = {}): GraphQLArgument[] {
  return Object.entries(args).map(([name, arg]) => ({
    name,
    type: arg.type,
    defaultValue: arg.defaultValue,
    description: arg.description,
  }));
}

function defineFields(fields: Record<string, FieldConfig>): Record<string, GraphQLField> {
  const result: Record<string, GraphQLField> = {};
  for (const [name, field] of Object.entries(fields)) {
    result[name] = {
      name,
      type: field.type,
      args: argumentsFromConfig(field.args),
      description: field.description,
    };
  }
  return result;
}

// Named types

export interface ScalarTypeConfig {
  name: string;
  description?: string;
  /** The internal value of a literal, or undefined when the literal is invalid */
  parseLiteral(valueNode: ValueNode): unknown;
}

export class GraphQLScalarType {
  readonly name: string;
  readonly description?: string;
  private readonly config: ScalarTypeConfig;

  constructor(config: ScalarTypeConfig) {
    this.name = config.name;
    this.description = config.description;
    this.config = config;
  }

  parseLiteral(valueNode: ValueNode): unknown {
    return this.config.parseLiteral(valueNode);
  }

  toString(): string {
    return this.name;
  }
}

export interface ObjectTypeConfig {
  name: string;
  fields: Thunk<Record<string, FieldConfig>>;
  interfaces?: Thunk<GraphQLInterfaceType[]>;
  description?: string;
}

export class GraphQLObjectType {
  readonly name: string;
  readonly description?: string;
  private readonly config: ObjectTypeConfig;
  private fields?: Record<string, GraphQLField>;
  private interfaces?: GraphQLInterfaceType[];

  constructor(config: ObjectTypeConfig) {
    this.name = config.name;
    this.description = config.description;
    this.config = config;
  }

  getFields(): Record<string, GraphQLField> {
    const { fields } = this.config;
    this.fields ??= defineFields(typeof fields === 'function' ? fields() : fields);
    return this.fields;
  }

  getInterfaces(): GraphQLInterfaceType[] {
    const interfaces = this.config.interfaces ?? [];
    this.interfaces ??= typeof interfaces === 'function' ? interfaces() : interfaces;
    return this.interfaces;
  }

  toString(): string {
    return this.name;
  }
}

export interface InterfaceTypeConfig {
  name: string;
  fields: Thunk<Record<string, FieldConfig>>;
  description?: string;
}

export class GraphQLInterfaceType {
  readonly name: string;
  readonly description?: string;
  private readonly config: InterfaceTypeConfig;
  private fields?: Record<string, GraphQLField>;

  constructor(config: InterfaceTypeConfig) {
    this.name = config.name;
    this.description = config.description;
    this.config = config;
  }

  getFields(): Record<string, GraphQLField> {
    const { fields } = this.config;
    this.fields ??= defineFields(typeof fields === 'function' ? fields() : fields);
    return this.fields;
  }

  toString(): string {
    return this.name;
  }
}

export interface UnionTypeConfig {
  name: string;
  types: Thunk<GraphQLObjectType[]>;
  description?: string;
}

export class GraphQLUnionType {
  readonly name: string;
  readonly description?: string;
  private readonly config: UnionTypeConfig;
  private types?: GraphQLObjectType[];

  constructor(config: UnionTypeConfig) {
    this.name = config.name;
    this.description = config.description;
    this.config = config;
  }

  getTypes(): GraphQLObjectType[] {
    if (!this.types) {
      const thunk = this.config.types;
      const types = typeof thunk === 'function' ? thunk() : thunk;
      if (types.length === 0) {
        throw new Error(`Union ${this.name} must have at least one member type.`);
      }
      this.types = types;
    }
    return this.types;
  }

  toString(): string {
    return this.name;
  }
}

export interface EnumValueConfig {
  /** Defaults to the value's name */
  value?: unknown;
  description?: string;
}

export interface GraphQLEnumValue {
  name: string;
  value: unknown;
  description?: string;
}

export interface EnumTypeConfig {
  name: string;
  values: Record<string, EnumValueConfig>;
  description?: string;
}

export class GraphQLEnumType {
  readonly name: string;
  readonly description?: string;
  private readonly values: Map<string, GraphQLEnumValue>;

  constructor(config: EnumTypeConfig) {
    this.name = config.name;
    this.description = config.description;
    this.values = new Map(
      Object.entries(config.values).map(([name, value]) => [
        name,
        { name, value: value.value ?? name, description: value.description },
      ]),
    );
  }

  getValues(): GraphQLEnumValue[] {
    return [...this.values.values()];
  }

  getValue(name: string): GraphQLEnumValue | undefined {
    return this.values.get(name);
  }

  parseLiteral(valueNode: ValueNode): unknown {
    if (valueNode.kind !== Kind.ENUM) {
      return undefined;
    }
    return this.values.get(valueNode.value)?.value;
  }

  toString(): string {
    return this.name;
  }
}

export interface InputObjectTypeConfig {
  name: string;
  fields: Thunk<Record<string, InputFieldConfig>>;
  description?: string;
}

export class GraphQLInputObjectType {
  readonly name: string;
  readonly description?: string;
  private readonly config: InputObjectTypeConfig;
  private fields?: Record<string, GraphQLInputField>;

  constructor(config: InputObjectTypeConfig) {
    this.name = config.name;
    this.description = config.description;
    this.config = config;
  }

  getFields(): Record<string, GraphQLInputField> {
    if (!this.fields) {
      const fields: Record<string, GraphQLInputField> = {};
      const thunk = this.config.fields;
      const config = typeof thunk === 'function' ? thunk() : thunk;
      for (const [name, field] of Object.entries(config)) {
        fields[name] = { name, ...field };
      }
      this.fields = fields;
    }
    return this.fields;
  }

  toString(): string {
    return this.name;
  }
}

// Wrapping types
//
// Private fields keep the two wrappers apart under structural typing.

export class GraphQLList<T extends GraphQLType> {
  private readonly itemType: T;

  constructor(ofType: T) {
    this.itemType = ofType;
  }

  get ofType(): T {
    return this.itemType;
  }

  toString(): string {
    return `[${String(this.ofType)}]`;
  }
}

export class GraphQLNonNull<T extends GraphQLNullableType> {
  private readonly nullableType: T;

  constructor(ofType: T) {
    this.nullableType = ofType;
  }

  get ofType(): T {
    return this.nullableType;
  }

  toString(): string {
    return `${String(this.ofType)}!`;
  }
}

// Type unions

export type GraphQLNamedType =
  | GraphQLScalarType
  | GraphQLObjectType
  | GraphQLInterfaceType
  | GraphQLUnionType
  | GraphQLEnumType
  | GraphQLInputObjectType;

export type GraphQLNullableType = GraphQLNamedType | GraphQLList<GraphQLType>;

export type GraphQLType = GraphQLNullableType | GraphQLNonNull<GraphQLNullableType>;

export type GraphQLNullableInputType =
  | GraphQLScalarType
  | GraphQLEnumType
  | GraphQLInputObjectType
  | GraphQLList<GraphQLInputType>;

export type GraphQLInputType = GraphQLNullableInputType | GraphQLNonNull<GraphQLNullableInputType>;

export type GraphQLNullableOutputType =
  | GraphQLScalarType
  | GraphQLObjectType
  | GraphQLInterfaceType
  | GraphQLUnionType
  | GraphQLEnumType
  | GraphQLList<GraphQLOutputType>;

export type GraphQLOutputType = GraphQLNullableOutputType | GraphQLNonNull<GraphQLNullableOutputType>;

export type GraphQLCompositeType = GraphQLObjectType | GraphQLInterfaceType | GraphQLUnionType;

export type GraphQLAbstractType = GraphQLInterfaceType | GraphQLUnionType;

export type GraphQLLeafType = GraphQLScalarType | GraphQLEnumType;

// Predicates

export function isNamedType(type: unknown): type is GraphQLNamedType {
  return (
    type instanceof GraphQLScalarType ||
    type instanceof GraphQLObjectType ||
    type instanceof GraphQLInterfaceType ||
    type instanceof GraphQLUnionType ||
    type instanceof GraphQLEnumType ||
    type instanceof GraphQLInputObjectType
  );
}

export function isInputType(type: GraphQLType | undefined): type is GraphQLInputType {
  const named = getNamedType(type);
  return (
    named instanceof GraphQLScalarType ||
    named instanceof GraphQLEnumType ||
    named instanceof GraphQLInputObjectType
  );
}

export function isOutputType(type: GraphQLType | undefined): type is GraphQLOutputType {
  const named = getNamedType(type);
  return (
    named instanceof GraphQLScalarType ||
    named instanceof GraphQLObjectType ||
    named instanceof GraphQLInterfaceType ||
    named instanceof GraphQLUnionType ||
    named instanceof GraphQLEnumType
  );
}

export function isLeafType(type: GraphQLType | undefined): type is GraphQLLeafType {
  return type instanceof GraphQLScalarType || type instanceof GraphQLEnumType;
}

export function isCompositeType(type: GraphQLType | undefined): type is GraphQLCompositeType {
  return (
    type instanceof GraphQLObjectType ||
    type instanceof GraphQLInterfaceType ||
    type instanceof GraphQLUnionType
  );
}

export function isAbstractType(type: GraphQLType | undefined): type is GraphQLAbstractType {
  return type instanceof GraphQLInterfaceType || type instanceof GraphQLUnionType;
}

export function getNullableType(type: GraphQLType): GraphQLNullableType;
export function getNullableType(type: GraphQLType | undefined): GraphQLNullableType | undefined;
export function getNullableType(type: GraphQLType | undefined): GraphQLNullableType | undefined {
  return type instanceof GraphQLNonNull ? type.ofType : type;
}

export function getNamedType(type: GraphQLType): GraphQLNamedType;
export function getNamedType(type: GraphQLType | undefined): GraphQLNamedType | undefined;
export function getNamedType(type: GraphQLType | undefined): GraphQLNamedType | undefined {
  let unwrapped = type;
  while (unwrapped instanceof GraphQLList || unwrapped instanceof GraphQLNonNull) {
    unwrapped = unwrapped.ofType;
  }
  return unwrapped;
}
