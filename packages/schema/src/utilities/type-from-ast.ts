import { Kind, type ListTypeNode, type NamedTypeNode, type TypeNode } from '@querycheck/language';
import { GraphQLList, GraphQLNonNull, type GraphQLNullableType, type GraphQLType } from '../definition.js';
import type { GraphQLSchema } from '../schema.js';

/**
 * The schema type a type reference names, or undefined when any named type
 * in it is unknown.
 */
export function typeFromAST(schema: GraphQLSchema, typeNode: TypeNode): GraphQLType | undefined {
  if (typeNode.kind === Kind.NON_NULL_TYPE) {
    const inner = nullableTypeFromAST(schema, typeNode.type);
    return inner && new GraphQLNonNull(inner);
  }
  return nullableTypeFromAST(schema, typeNode);
}

function nullableTypeFromAST(
  schema: GraphQLSchema,
  typeNode: NamedTypeNode | ListTypeNode,
): GraphQLNullableType | undefined {
  if (typeNode.kind === Kind.LIST_TYPE) {
    const inner = typeFromAST(schema, typeNode.type);
    return inner && new GraphQLList(inner);
  }
  return schema.getType(typeNode.name.value);
}
