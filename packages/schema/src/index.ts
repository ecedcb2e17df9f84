/**
 * @querycheck/schema
 *
 * Type system, schema and the type tracking used while walking queries.
 */

export * from './definition.js';
export {
  buildSchemaFromConfig,
  SchemaConfigError,
  schemaConfigSchema,
  type SchemaConfigInput,
  type SchemaDefinition,
} from './config.js';
export {
  DirectiveLocation,
  GraphQLDirective,
  GraphQLIncludeDirective,
  GraphQLSkipDirective,
  isDirectiveLocation,
  specifiedDirectives,
  type DirectiveConfig,
} from './directives.js';
export { TypeNameMetaFieldDef } from './introspection.js';
export {
  GraphQLBoolean,
  GraphQLFloat,
  GraphQLID,
  GraphQLInt,
  GraphQLString,
  specifiedScalarTypes,
} from './scalars.js';
export { GraphQLSchema, type SchemaConfig, type TypeMap } from './schema.js';
export { isValidLiteralValue } from './utilities/is-valid-literal-value.js';
export { doTypesOverlap, isEqualType, isTypeSubTypeOf } from './utilities/type-comparators.js';
export { typeFromAST } from './utilities/type-from-ast.js';
export { getFieldDef, TypeInfo } from './utilities/type-info.js';
