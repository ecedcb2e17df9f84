import { GraphQLNonNull, type GraphQLField } from './definition.js';
import { GraphQLString } from './scalars.js';

/**
 * `__typename` may be selected on any composite type without being declared
 */
export const TypeNameMetaFieldDef: GraphQLField = {
  name: '__typename',
  type: new GraphQLNonNull(GraphQLString),
  description: 'The name of the current Object type at runtime.',
  args: [],
};
