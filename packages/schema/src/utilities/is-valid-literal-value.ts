import { Kind, type ValueNode } from '@querycheck/language';
import {
  GraphQLInputObjectType,
  GraphQLList,
  GraphQLNonNull,
  type GraphQLInputType,
} from '../definition.js';

/**
 * Whether a literal can be coerced to `type`.
 *
 * Variables are accepted in any position; whether their declared type fits
 * is checked separately.
 */
export function isValidLiteralValue(type: GraphQLInputType, valueNode: ValueNode | undefined): boolean {
  if (type instanceof GraphQLNonNull) {
    return valueNode !== undefined && isValidLiteralValue(type.ofType, valueNode);
  }

  if (valueNode === undefined) return true;
  if (valueNode.kind === Kind.VARIABLE) return true;

  if (type instanceof GraphQLList) {
    const itemType = type.ofType;
    if (valueNode.kind === Kind.LIST) {
      return valueNode.values.every((item) => isValidLiteralValue(itemType, item));
    }
    return isValidLiteralValue(itemType, valueNode);
  }

  if (type instanceof GraphQLInputObjectType) {
    if (valueNode.kind !== Kind.OBJECT) return false;
    const fields = type.getFields();
    const fieldNodes = new Map(valueNode.fields.map((field) => [field.name.value, field]));

    for (const name of fieldNodes.keys()) {
      if (!Object.hasOwn(fields, name)) return false;
    }
    return Object.values(fields).every((field) =>
      isValidLiteralValue(field.type, fieldNodes.get(field.name)?.value),
    );
  }

  return type.parseLiteral(valueNode) !== undefined;
}
