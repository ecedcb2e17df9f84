import { describe, it } from 'vitest';
import {
  FieldsOnCorrectType,
  FragmentsOnCompositeTypes,
  KnownTypeNames,
  ScalarLeafs,
  undefinedFieldMessage,
  unknownTypeMessage,
  VariablesAreInputTypes,
} from '../../src/index.js';
import { at, expectFailsRule, expectPassesRule } from '../harness.js';

describe('KnownTypeNames', () => {
  it('accepts known type names', () => {
    expectPassesRule(
      KnownTypeNames,
      `query Foo($var: String, $required: [String!]!) {
        human(id: 4) { pets { ... on Pet { name }, ...PetFields } }
      }
      fragment PetFields on Pet { name }`,
    );
  });

  it('reports each unknown type name', () => {
    const query = `query Foo($var: JumbledUpLetters) {
  human(id: 4) { name pets { ... on Badger { name }, ...PetFields } }
}
fragment PetFields on Peettt { name }`;
    expectFailsRule(KnownTypeNames, query, [
      { message: unknownTypeMessage('JumbledUpLetters'), locations: [{ line: 1, column: 17 }] },
      { message: unknownTypeMessage('Badger'), locations: [at(query, 'Badger')] },
      { message: unknownTypeMessage('Peettt'), locations: [{ line: 4, column: 23 }] },
    ]);
  });
});

describe('FragmentsOnCompositeTypes', () => {
  it('accepts objects, interfaces and unions', () => {
    expectPassesRule(FragmentsOnCompositeTypes, 'fragment validFragment on Dog { barks }');
    expectPassesRule(FragmentsOnCompositeTypes, 'fragment validFragment on Pet { name }');
    expectPassesRule(FragmentsOnCompositeTypes, 'fragment validFragment on CatOrDog { __typename }');
    expectPassesRule(FragmentsOnCompositeTypes, 'fragment validFragment on Pet { ... on Dog { barks } }');
  });

  it('leaves unknown types to KnownTypeNames', () => {
    expectPassesRule(FragmentsOnCompositeTypes, 'fragment validFragment on Unknown { name }');
  });

  it('rejects a fragment on a scalar', () => {
    const query = 'fragment scalarFragment on Boolean { bad }';
    expectFailsRule(FragmentsOnCompositeTypes, query, [
      {
        message: 'Fragment "scalarFragment" cannot condition on non composite type "Boolean".',
        locations: [at(query, 'Boolean')],
      },
    ]);
  });

  it('rejects a fragment on an input object', () => {
    const query = 'fragment inputFragment on ComplexInput { stringField }';
    expectFailsRule(FragmentsOnCompositeTypes, query, [
      {
        message: 'Fragment "inputFragment" cannot condition on non composite type "ComplexInput".',
        locations: [at(query, 'ComplexInput')],
      },
    ]);
  });

  it('rejects an inline fragment on a scalar', () => {
    const query = 'fragment inlineFragOnScalar on Dog { ... on Boolean { barks } }';
    expectFailsRule(FragmentsOnCompositeTypes, query, [
      {
        message: 'Fragment cannot condition on non composite type "Boolean".',
        locations: [at(query, 'Boolean')],
      },
    ]);
  });
});

describe('VariablesAreInputTypes', () => {
  it('accepts input types', () => {
    expectPassesRule(
      VariablesAreInputTypes,
      'query Foo($a: String, $b: [Boolean!]!, $c: ComplexInput) { field(a: $a, b: $b, c: $c) }',
    );
  });

  it('rejects output types with their printed type', () => {
    const query = 'query Foo($a: Dog, $b: [[CatOrDog!]]!, $c: Pet) { field(a: $a, b: $b, c: $c) }';
    expectFailsRule(VariablesAreInputTypes, query, [
      { message: 'Variable "$a" cannot be non-input type "Dog".', locations: [at(query, 'Dog')] },
      { message: 'Variable "$b" cannot be non-input type "[[CatOrDog!]]!".', locations: [at(query, '[[CatOrDog')] },
      { message: 'Variable "$c" cannot be non-input type "Pet".', locations: [at(query, 'Pet')] },
    ]);
  });
});

describe('ScalarLeafs', () => {
  it('accepts leaf fields without selections', () => {
    expectPassesRule(ScalarLeafs, 'fragment scalarSelection on Dog { barks }');
    expectPassesRule(ScalarLeafs, 'fragment scalarWithArgs on Dog { isHousetrained(atOtherHomes: true) }');
  });

  it('accepts composite fields with selections', () => {
    expectPassesRule(ScalarLeafs, '{ dog { name } pet { name } }');
  });

  it('requires a selection on object fields', () => {
    const query = 'query directQueryOnObjectWithoutSubFields { human }';
    expectFailsRule(ScalarLeafs, query, [
      { message: 'Field "human" of type Human must have a sub selection.', locations: [at(query, 'human')] },
    ]);
  });

  it('requires a selection on interface fields', () => {
    expectFailsRule(ScalarLeafs, '{ pet }', [
      { message: 'Field "pet" of type Pet must have a sub selection.', locations: [{ line: 1, column: 3 }] },
    ]);
  });

  it('rejects a selection on a scalar field', () => {
    const query = 'fragment scalarSelectionsNotAllowedOnBoolean on Dog { barks { sinceWhen } }';
    expectFailsRule(ScalarLeafs, query, [
      {
        message: 'Field "barks" of type Boolean must not have a sub selection.',
        locations: [at(query, '{ sinceWhen')],
      },
    ]);
  });

  it('rejects a selection on an enum field', () => {
    const query = 'fragment scalarSelectionsNotAllowedOnEnum on Cat { furColor { inHexdec } }';
    expectFailsRule(ScalarLeafs, query, [
      {
        message: 'Field "furColor" of type FurColor must not have a sub selection.',
        locations: [at(query, '{ inHexdec')],
      },
    ]);
  });
});

describe('FieldsOnCorrectType', () => {
  it('accepts fields defined on the parent type', () => {
    expectPassesRule(FieldsOnCorrectType, 'fragment objectFieldSelection on Dog { __typename name }');
    expectPassesRule(FieldsOnCorrectType, 'fragment aliasedSelection on Dog { otherName: name }');
    expectPassesRule(FieldsOnCorrectType, 'fragment interfaceFieldSelection on Pet { __typename name }');
    expectPassesRule(FieldsOnCorrectType, 'fragment typeNameOnUnion on CatOrDog { __typename }');
  });

  it('rejects an undefined field', () => {
    const query = 'fragment fieldNotDefined on Dog { meowVolume }';
    expectFailsRule(FieldsOnCorrectType, query, [
      { message: undefinedFieldMessage('meowVolume', 'Dog'), locations: [at(query, 'meowVolume')] },
    ]);
  });

  it('reports an unknown field once, not its subfields', () => {
    const query = 'fragment deepFieldNotDefined on Dog { unknown_field { deeper_unknown_field } }';
    expectFailsRule(FieldsOnCorrectType, query, [
      { message: 'Cannot query field "unknown_field" on Dog.', locations: [at(query, 'unknown_field')] },
    ]);
  });

  it('locates an aliased field at its alias', () => {
    const query = 'fragment aliasedFieldNotDefined on Dog { tName: name, meow: meowVolume }';
    expectFailsRule(FieldsOnCorrectType, query, [
      { message: 'Cannot query field "meowVolume" on Dog.', locations: [at(query, 'meow:')] },
    ]);
  });

  it('rejects direct field selections on a union', () => {
    const query = 'fragment directFieldSelectionOnUnion on CatOrDog { name }';
    expectFailsRule(FieldsOnCorrectType, query, [
      { message: 'Cannot query field "name" on CatOrDog.', locations: [at(query, 'name }')] },
    ]);
  });
});
