/**
 * Schema
 *
 * Holds the root operation types and every named type reachable from them,
 * the extra `types` and the directive arguments.
 */

import {
  getNamedType,
  GraphQLInputObjectType,
  GraphQLInterfaceType,
  GraphQLObjectType,
  GraphQLUnionType,
  type GraphQLAbstractType,
  type GraphQLNamedType,
  type GraphQLType,
} from './definition.js';
import { specifiedDirectives, type GraphQLDirective } from './directives.js';
import { GraphQLString } from './scalars.js';
import { isTypeSubTypeOf } from './utilities/type-comparators.js';

export interface SchemaConfig {
  query: GraphQLObjectType;
  mutation?: GraphQLObjectType;
  subscription?: GraphQLObjectType;
  /** Types not reachable from a root type that should still be known */
  types?: GraphQLNamedType[];
  /** Defaults to `@include` and `@skip` */
  directives?: readonly GraphQLDirective[];
}

export type TypeMap = Readonly<Record<string, GraphQLNamedType>>;

export class GraphQLSchema {
  private readonly queryType: GraphQLObjectType;
  private readonly mutationType?: GraphQLObjectType;
  private readonly subscriptionType?: GraphQLObjectType;
  private readonly directives: readonly GraphQLDirective[];
  private readonly typeMap: TypeMap;
  private readonly possibleTypes = new Map<GraphQLAbstractType, GraphQLObjectType[]>();

  constructor(config: SchemaConfig) {
    this.queryType = config.query;
    this.mutationType = config.mutation;
    this.subscriptionType = config.subscription;
    this.directives = config.directives ?? specifiedDirectives;

    const roots: GraphQLType[] = [config.query];
    if (config.mutation) roots.push(config.mutation);
    if (config.subscription) roots.push(config.subscription);
    roots.push(...(config.types ?? []));
    for (const directive of this.directives) {
      roots.push(...directive.args.map((arg) => arg.type));
    }
    // __typename is always available
    roots.push(GraphQLString);

    const typeMap: Record<string, GraphQLNamedType> = {};
    for (const type of roots) {
      collectTypes(typeMap, type);
    }
    this.typeMap = typeMap;

    for (const type of Object.values(typeMap)) {
      if (type instanceof GraphQLObjectType) {
        for (const iface of type.getInterfaces()) {
          this.addPossibleType(iface, type);
        }
      } else if (type instanceof GraphQLUnionType) {
        for (const member of type.getTypes()) {
          this.addPossibleType(type, member);
        }
      }
    }

    for (const type of Object.values(typeMap)) {
      if (type instanceof GraphQLObjectType) {
        for (const iface of type.getInterfaces()) {
          this.assertImplementation(type, iface);
        }
      }
    }
  }

  getQueryType(): GraphQLObjectType {
    return this.queryType;
  }

  getMutationType(): GraphQLObjectType | undefined {
    return this.mutationType;
  }

  getSubscriptionType(): GraphQLObjectType | undefined {
    return this.subscriptionType;
  }

  getTypeMap(): TypeMap {
    return this.typeMap;
  }

  getType(name: string): GraphQLNamedType | undefined {
    return Object.hasOwn(this.typeMap, name) ? this.typeMap[name] : undefined;
  }

  getDirectives(): readonly GraphQLDirective[] {
    return this.directives;
  }

  getDirective(name: string): GraphQLDirective | undefined {
    return this.directives.find((directive) => directive.name === name);
  }

  /**
   * Object types an abstract type may resolve to at runtime
   */
  getPossibleTypes(abstractType: GraphQLAbstractType): readonly GraphQLObjectType[] {
    return this.possibleTypes.get(abstractType) ?? [];
  }

  isPossibleType(abstractType: GraphQLAbstractType, type: GraphQLObjectType): boolean {
    return this.getPossibleTypes(abstractType).includes(type);
  }

  private addPossibleType(abstractType: GraphQLAbstractType, type: GraphQLObjectType): void {
    const types = this.possibleTypes.get(abstractType);
    if (!types) {
      this.possibleTypes.set(abstractType, [type]);
    } else if (!types.includes(type)) {
      types.push(type);
    }
  }

  private assertImplementation(type: GraphQLObjectType, iface: GraphQLInterfaceType): void {
    const objectFields = type.getFields();
    for (const [name, ifaceField] of Object.entries(iface.getFields())) {
      const objectField = Object.hasOwn(objectFields, name) ? objectFields[name] : undefined;
      if (!objectField) {
        throw new Error(`"${iface.name}" expects field "${name}" but "${type.name}" does not provide it.`);
      }
      if (!isTypeSubTypeOf(this, objectField.type, ifaceField.type)) {
        throw new Error(
          `${iface.name}.${name} expects type "${String(ifaceField.type)}" but ` +
            `${type.name}.${name} provides type "${String(objectField.type)}".`,
        );
      }
    }
  }
}

function collectTypes(typeMap: Record<string, GraphQLNamedType>, type: GraphQLType): void {
  const named = getNamedType(type);
  const existing = Object.hasOwn(typeMap, named.name) ? typeMap[named.name] : undefined;
  if (existing) {
    if (existing !== named) {
      throw new Error(`Schema must contain unique named types but contains multiple types named "${named.name}".`);
    }
    return;
  }
  typeMap[named.name] = named;

  if (named instanceof GraphQLObjectType) {
    for (const iface of named.getInterfaces()) {
      collectTypes(typeMap, iface);
    }
  }
  if (named instanceof GraphQLUnionType) {
    for (const member of named.getTypes()) {
      collectTypes(typeMap, member);
    }
  }
  if (named instanceof GraphQLObjectType || named instanceof GraphQLInterfaceType) {
    for (const field of Object.values(named.getFields())) {
      collectTypes(typeMap, field.type);
      for (const arg of field.args) {
        collectTypes(typeMap, arg.type);
      }
    }
  }
  if (named instanceof GraphQLInputObjectType) {
    for (const field of Object.values(named.getFields())) {
      collectTypes(typeMap, field.type);
    }
  }
}
