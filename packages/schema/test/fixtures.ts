import {
  GraphQLEnumType,
  GraphQLInputObjectType,
  GraphQLInt,
  GraphQLInterfaceType,
  GraphQLList,
  GraphQLNonNull,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLString,
  GraphQLUnionType,
} from '../src/index.js';

export const Named = new GraphQLInterfaceType({
  name: 'Named',
  fields: { name: { type: GraphQLString } },
});

export const Color = new GraphQLEnumType({
  name: 'Color',
  values: { RED: {}, GREEN: { value: 'green' } },
});

export const Filter = new GraphQLInputObjectType({
  name: 'Filter',
  fields: {
    name: { type: new GraphQLNonNull(GraphQLString) },
    limit: { type: GraphQLInt, defaultValue: 10 },
    colors: { type: new GraphQLList(Color) },
  },
});

export const Dog: GraphQLObjectType = new GraphQLObjectType({
  name: 'Dog',
  interfaces: [Named],
  fields: () => ({
    name: { type: new GraphQLNonNull(GraphQLString) },
    color: { type: Color },
    friends: { type: new GraphQLList(Dog), args: { first: { type: GraphQLInt } } },
  }),
});

export const Cat = new GraphQLObjectType({
  name: 'Cat',
  interfaces: [Named],
  fields: { name: { type: GraphQLString }, lives: { type: GraphQLInt } },
});

export const Bird = new GraphQLObjectType({
  name: 'Bird',
  fields: { wingspan: { type: GraphQLInt } },
});

export const Pet = new GraphQLUnionType({ name: 'Pet', types: [Dog, Cat] });

export const Query = new GraphQLObjectType({
  name: 'Query',
  fields: {
    dog: { type: Dog },
    pets: { type: new GraphQLList(Pet), args: { filter: { type: Filter } } },
    named: { type: Named },
  },
});

export function createSchema(): GraphQLSchema {
  return new GraphQLSchema({ query: Query, types: [Bird] });
}
