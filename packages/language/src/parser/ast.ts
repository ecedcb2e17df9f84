/**
 * AST node types for executable query documents
 */

import type { Source } from '../source.js';

/**
 * Character span of a node within its source
 */
export interface Location {
  start: number;
  end: number;
  source: Source;
}

export const Kind = {
  NAME: 'Name',
  DOCUMENT: 'Document',
  OPERATION_DEFINITION: 'OperationDefinition',
  VARIABLE_DEFINITION: 'VariableDefinition',
  VARIABLE: 'Variable',
  SELECTION_SET: 'SelectionSet',
  FIELD: 'Field',
  ARGUMENT: 'Argument',
  FRAGMENT_SPREAD: 'FragmentSpread',
  INLINE_FRAGMENT: 'InlineFragment',
  FRAGMENT_DEFINITION: 'FragmentDefinition',
  INT: 'IntValue',
  FLOAT: 'FloatValue',
  STRING: 'StringValue',
  BOOLEAN: 'BooleanValue',
  ENUM: 'EnumValue',
  LIST: 'ListValue',
  OBJECT: 'ObjectValue',
  OBJECT_FIELD: 'ObjectField',
  DIRECTIVE: 'Directive',
  NAMED_TYPE: 'NamedType',
  LIST_TYPE: 'ListType',
  NON_NULL_TYPE: 'NonNullType',
} as const;

export type Kind = (typeof Kind)[keyof typeof Kind];

export type OperationType = 'query' | 'mutation' | 'subscription';

export interface NameNode {
  kind: typeof Kind.NAME;
  value: string;
  loc?: Location;
}

export interface DocumentNode {
  kind: typeof Kind.DOCUMENT;
  definitions: DefinitionNode[];
  loc?: Location;
}

export type DefinitionNode = OperationDefinitionNode | FragmentDefinitionNode;

export interface OperationDefinitionNode {
  kind: typeof Kind.OPERATION_DEFINITION;
  operation: OperationType;
  name?: NameNode;
  variableDefinitions: VariableDefinitionNode[];
  directives: DirectiveNode[];
  selectionSet: SelectionSetNode;
  loc?: Location;
}

export interface VariableDefinitionNode {
  kind: typeof Kind.VARIABLE_DEFINITION;
  variable: VariableNode;
  type: TypeNode;
  defaultValue?: ValueNode;
  loc?: Location;
}

export interface VariableNode {
  kind: typeof Kind.VARIABLE;
  name: NameNode;
  loc?: Location;
}

export interface SelectionSetNode {
  kind: typeof Kind.SELECTION_SET;
  selections: SelectionNode[];
  loc?: Location;
}

export type SelectionNode = FieldNode | FragmentSpreadNode | InlineFragmentNode;

export interface FieldNode {
  kind: typeof Kind.FIELD;
  alias?: NameNode;
  name: NameNode;
  arguments: ArgumentNode[];
  directives: DirectiveNode[];
  selectionSet?: SelectionSetNode;
  loc?: Location;
}

export interface ArgumentNode {
  kind: typeof Kind.ARGUMENT;
  name: NameNode;
  value: ValueNode;
  loc?: Location;
}

export interface FragmentSpreadNode {
  kind: typeof Kind.FRAGMENT_SPREAD;
  name: NameNode;
  directives: DirectiveNode[];
  loc?: Location;
}

export interface InlineFragmentNode {
  kind: typeof Kind.INLINE_FRAGMENT;
  typeCondition: NamedTypeNode;
  directives: DirectiveNode[];
  selectionSet: SelectionSetNode;
  loc?: Location;
}

export interface FragmentDefinitionNode {
  kind: typeof Kind.FRAGMENT_DEFINITION;
  name: NameNode;
  typeCondition: NamedTypeNode;
  directives: DirectiveNode[];
  selectionSet: SelectionSetNode;
  loc?: Location;
}

export type ValueNode =
  | VariableNode
  | IntValueNode
  | FloatValueNode
  | StringValueNode
  | BooleanValueNode
  | EnumValueNode
  | ListValueNode
  | ObjectValueNode;

export interface IntValueNode {
  kind: typeof Kind.INT;
  value: string;
  loc?: Location;
}

export interface FloatValueNode {
  kind: typeof Kind.FLOAT;
  value: string;
  loc?: Location;
}

export interface StringValueNode {
  kind: typeof Kind.STRING;
  value: string;
  loc?: Location;
}

export interface BooleanValueNode {
  kind: typeof Kind.BOOLEAN;
  value: boolean;
  loc?: Location;
}

export interface EnumValueNode {
  kind: typeof Kind.ENUM;
  value: string;
  loc?: Location;
}

export interface ListValueNode {
  kind: typeof Kind.LIST;
  values: ValueNode[];
  loc?: Location;
}

export interface ObjectValueNode {
  kind: typeof Kind.OBJECT;
  fields: ObjectFieldNode[];
  loc?: Location;
}

export interface ObjectFieldNode {
  kind: typeof Kind.OBJECT_FIELD;
  name: NameNode;
  value: ValueNode;
  loc?: Location;
}

export interface DirectiveNode {
  kind: typeof Kind.DIRECTIVE;
  name: NameNode;
  arguments: ArgumentNode[];
  loc?: Location;
}

export type TypeNode = NamedTypeNode | ListTypeNode | NonNullTypeNode;

export interface NamedTypeNode {
  kind: typeof Kind.NAMED_TYPE;
  name: NameNode;
  loc?: Location;
}

export interface ListTypeNode {
  kind: typeof Kind.LIST_TYPE;
  type: TypeNode;
  loc?: Location;
}

export interface NonNullTypeNode {
  kind: typeof Kind.NON_NULL_TYPE;
  type: NamedTypeNode | ListTypeNode;
  loc?: Location;
}

export type ASTNode =
  | NameNode
  | DocumentNode
  | OperationDefinitionNode
  | VariableDefinitionNode
  | SelectionSetNode
  | FieldNode
  | ArgumentNode
  | FragmentSpreadNode
  | InlineFragmentNode
  | FragmentDefinitionNode
  | ValueNode
  | ObjectFieldNode
  | DirectiveNode
  | TypeNode;
