/**
 * TypeInfo
 *
 * Tracks the schema types in scope while an AST is walked. Call `enter` before
 * a node's children are visited and `leave` after; every push made by `enter`
 * is undone by the matching `leave`.
 */

import { Kind, type ASTNode, type FieldNode } from '@querycheck/language';
import {
  getNamedType,
  getNullableType,
  GraphQLInputObjectType,
  GraphQLInterfaceType,
  GraphQLList,
  GraphQLObjectType,
  isCompositeType,
  isInputType,
  isOutputType,
  type GraphQLArgument,
  type GraphQLCompositeType,
  type GraphQLField,
  type GraphQLInputField,
  type GraphQLInputType,
  type GraphQLOutputType,
} from '../definition.js';
import type { GraphQLDirective } from '../directives.js';
import { TypeNameMetaFieldDef } from '../introspection.js';
import type { GraphQLSchema } from '../schema.js';
import { typeFromAST } from './type-from-ast.js';

export class TypeInfo {
  private readonly schema: GraphQLSchema;
  private readonly typeStack: Array<GraphQLOutputType | undefined> = [];
  private readonly parentTypeStack: Array<GraphQLCompositeType | undefined> = [];
  private readonly inputTypeStack: Array<GraphQLInputType | undefined> = [];
  private readonly fieldDefStack: Array<GraphQLField | undefined> = [];
  private directive?: GraphQLDirective;
  private argument?: GraphQLArgument;

  constructor(schema: GraphQLSchema) {
    this.schema = schema;
  }

  /** Output type of the innermost field, operation or fragment */
  getType(): GraphQLOutputType | undefined {
    return this.typeStack.at(-1);
  }

  /** Composite type whose selection set is being visited */
  getParentType(): GraphQLCompositeType | undefined {
    return this.parentTypeStack.at(-1);
  }

  /** Expected type of the innermost argument, variable, list item or object field */
  getInputType(): GraphQLInputType | undefined {
    return this.inputTypeStack.at(-1);
  }

  getFieldDef(): GraphQLField | undefined {
    return this.fieldDefStack.at(-1);
  }

  getDirective(): GraphQLDirective | undefined {
    return this.directive;
  }

  getArgument(): GraphQLArgument | undefined {
    return this.argument;
  }

  /** True when every enter has been matched by a leave */
  isAtRoot(): boolean {
    return (
      this.typeStack.length === 0 &&
      this.parentTypeStack.length === 0 &&
      this.inputTypeStack.length === 0 &&
      this.fieldDefStack.length === 0 &&
      this.directive === undefined &&
      this.argument === undefined
    );
  }

  enter(node: ASTNode): void {
    switch (node.kind) {
      case Kind.SELECTION_SET: {
        const namedType = getNamedType(this.getType());
        this.parentTypeStack.push(isCompositeType(namedType) ? namedType : undefined);
        break;
      }
      case Kind.FIELD: {
        const parentType = this.getParentType();
        const fieldDef = parentType && getFieldDef(parentType, node);
        this.fieldDefStack.push(fieldDef);
        this.typeStack.push(fieldDef?.type);
        break;
      }
      case Kind.DIRECTIVE:
        this.directive = this.schema.getDirective(node.name.value);
        break;
      case Kind.OPERATION_DEFINITION: {
        const rootType =
          node.operation === 'query'
            ? this.schema.getQueryType()
            : node.operation === 'mutation'
              ? this.schema.getMutationType()
              : this.schema.getSubscriptionType();
        this.typeStack.push(rootType);
        break;
      }
      case Kind.INLINE_FRAGMENT:
      case Kind.FRAGMENT_DEFINITION: {
        const type = typeFromAST(this.schema, node.typeCondition);
        this.typeStack.push(isOutputType(type) ? type : undefined);
        break;
      }
      case Kind.VARIABLE_DEFINITION: {
        const type = typeFromAST(this.schema, node.type);
        this.inputTypeStack.push(isInputType(type) ? type : undefined);
        break;
      }
      case Kind.ARGUMENT: {
        const args = this.directive?.args ?? this.getFieldDef()?.args ?? [];
        const argDef = args.find((arg) => arg.name === node.name.value);
        this.argument = argDef;
        this.inputTypeStack.push(argDef?.type);
        break;
      }
      case Kind.LIST: {
        const listType = getNullableType(this.getInputType());
        const itemType = listType instanceof GraphQLList ? listType.ofType : undefined;
        this.inputTypeStack.push(isInputType(itemType) ? itemType : undefined);
        break;
      }
      case Kind.OBJECT_FIELD: {
        const objectType = getNamedType(this.getInputType());
        const fields: Record<string, GraphQLInputField> =
          objectType instanceof GraphQLInputObjectType ? objectType.getFields() : {};
        const inputField = Object.hasOwn(fields, node.name.value) ? fields[node.name.value] : undefined;
        this.inputTypeStack.push(inputField?.type);
        break;
      }
    }
  }

  leave(node: ASTNode): void {
    switch (node.kind) {
      case Kind.SELECTION_SET:
        this.parentTypeStack.pop();
        break;
      case Kind.FIELD:
        this.fieldDefStack.pop();
        this.typeStack.pop();
        break;
      case Kind.DIRECTIVE:
        this.directive = undefined;
        break;
      case Kind.OPERATION_DEFINITION:
      case Kind.INLINE_FRAGMENT:
      case Kind.FRAGMENT_DEFINITION:
        this.typeStack.pop();
        break;
      case Kind.VARIABLE_DEFINITION:
        this.inputTypeStack.pop();
        break;
      case Kind.ARGUMENT:
        this.argument = undefined;
        this.inputTypeStack.pop();
        break;
      case Kind.LIST:
      case Kind.OBJECT_FIELD:
        this.inputTypeStack.pop();
        break;
    }
  }
}

/**
 * The definition of a selected field, including `__typename`. Unions have no
 * fields of their own.
 */
export function getFieldDef(parentType: GraphQLCompositeType, fieldNode: FieldNode): GraphQLField | undefined {
  const name = fieldNode.name.value;
  if (name === TypeNameMetaFieldDef.name) {
    return TypeNameMetaFieldDef;
  }
  if (parentType instanceof GraphQLObjectType || parentType instanceof GraphQLInterfaceType) {
    const fields = parentType.getFields();
    return Object.hasOwn(fields, name) ? fields[name] : undefined;
  }
  return undefined;
}
