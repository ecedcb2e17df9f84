import { Kind, type ValueNode } from '@querycheck/language';
import { GraphQLScalarType } from './definition.js';

// Int is a signed 32-bit integer
const MAX_INT = 2147483647;
const MIN_INT = -2147483648;

export const GraphQLInt = new GraphQLScalarType({
  name: 'Int',
  parseLiteral(valueNode: ValueNode) {
    if (valueNode.kind !== Kind.INT) return undefined;
    const num = parseInt(valueNode.value, 10);
    return num <= MAX_INT && num >= MIN_INT ? num : undefined;
  },
});

export const GraphQLFloat = new GraphQLScalarType({
  name: 'Float',
  parseLiteral(valueNode: ValueNode) {
    return valueNode.kind === Kind.FLOAT || valueNode.kind === Kind.INT
      ? parseFloat(valueNode.value)
      : undefined;
  },
});

export const GraphQLString = new GraphQLScalarType({
  name: 'String',
  parseLiteral(valueNode: ValueNode) {
    return valueNode.kind === Kind.STRING ? valueNode.value : undefined;
  },
});

export const GraphQLBoolean = new GraphQLScalarType({
  name: 'Boolean',
  parseLiteral(valueNode: ValueNode) {
    return valueNode.kind === Kind.BOOLEAN ? valueNode.value : undefined;
  },
});

export const GraphQLID = new GraphQLScalarType({
  name: 'ID',
  parseLiteral(valueNode: ValueNode) {
    return valueNode.kind === Kind.STRING || valueNode.kind === Kind.INT
      ? valueNode.value
      : undefined;
  },
});

export const specifiedScalarTypes: readonly GraphQLScalarType[] = Object.freeze([
  GraphQLInt,
  GraphQLFloat,
  GraphQLString,
  GraphQLBoolean,
  GraphQLID,
]);
