import {
  GraphQLList,
  GraphQLNonNull,
  GraphQLObjectType,
  isAbstractType,
  type GraphQLCompositeType,
  type GraphQLType,
} from '../definition.js';
import type { GraphQLSchema } from '../schema.js';

/**
 * Named types compare by identity, wrappers by what they wrap
 */
export function isEqualType(typeA: GraphQLType, typeB: GraphQLType): boolean {
  if (typeA === typeB) return true;
  if (typeA instanceof GraphQLNonNull && typeB instanceof GraphQLNonNull) {
    return isEqualType(typeA.ofType, typeB.ofType);
  }
  if (typeA instanceof GraphQLList && typeB instanceof GraphQLList) {
    return isEqualType(typeA.ofType, typeB.ofType);
  }
  return false;
}

/**
 * True when a value of `maybeSubType` may always be used where `superType`
 * is expected.
 */
export function isTypeSubTypeOf(schema: GraphQLSchema, maybeSubType: GraphQLType, superType: GraphQLType): boolean {
  if (maybeSubType === superType) return true;

  if (superType instanceof GraphQLNonNull) {
    return maybeSubType instanceof GraphQLNonNull && isTypeSubTypeOf(schema, maybeSubType.ofType, superType.ofType);
  }
  if (maybeSubType instanceof GraphQLNonNull) {
    return isTypeSubTypeOf(schema, maybeSubType.ofType, superType);
  }

  if (superType instanceof GraphQLList) {
    return maybeSubType instanceof GraphQLList && isTypeSubTypeOf(schema, maybeSubType.ofType, superType.ofType);
  }
  if (maybeSubType instanceof GraphQLList) {
    return false;
  }

  return (
    isAbstractType(superType) &&
    maybeSubType instanceof GraphQLObjectType &&
    schema.isPossibleType(superType, maybeSubType)
  );
}

/**
 * True when some object type could satisfy both type conditions
 */
export function doTypesOverlap(schema: GraphQLSchema, typeA: GraphQLCompositeType, typeB: GraphQLCompositeType): boolean {
  if (typeA === typeB) return true;

  if (isAbstractType(typeA)) {
    if (isAbstractType(typeB)) {
      return schema.getPossibleTypes(typeA).some((type) => schema.isPossibleType(typeB, type));
    }
    return schema.isPossibleType(typeA, typeB);
  }

  if (isAbstractType(typeB)) {
    return schema.isPossibleType(typeB, typeA);
  }

  return false;
}
