import { Kind, type TypeNode, type ValueNode } from './parser/ast.js';

/**
 * Render a value or type reference back to query syntax, as used in error
 * messages.
 */
export function print(node: ValueNode | TypeNode): string {
  switch (node.kind) {
    case Kind.VARIABLE:
      return `$${node.name.value}`;
    case Kind.INT:
    case Kind.FLOAT:
    case Kind.ENUM:
      return node.value;
    case Kind.STRING:
      return JSON.stringify(node.value);
    case Kind.BOOLEAN:
      return node.value ? 'true' : 'false';
    case Kind.LIST:
      return `[${node.values.map(print).join(', ')}]`;
    case Kind.OBJECT:
      return `{${node.fields.map((field) => `${field.name.value}: ${print(field.value)}`).join(', ')}}`;
    case Kind.NAMED_TYPE:
      return node.name.value;
    case Kind.LIST_TYPE:
      return `[${print(node.type)}]`;
    case Kind.NON_NULL_TYPE:
      return `${print(node.type)}!`;
  }
}
