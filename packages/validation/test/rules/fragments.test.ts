import { describe, it } from 'vitest';
import {
  cycleErrorMessage,
  duplicateFragmentNameMessage,
  KnownFragmentNames,
  NoFragmentCycles,
  NoUnusedFragments,
  PossibleFragmentSpreads,
  UniqueFragmentNames,
  unknownFragmentMessage,
  unusedFragMessage,
} from '../../src/index.js';
import { at, expectFailsRule, expectPassesRule } from '../harness.js';

describe('UniqueFragmentNames', () => {
  it('accepts distinct fragment names', () => {
    expectPassesRule(
      UniqueFragmentNames,
      '{ ...fragA ...fragB } fragment fragA on Type { fieldA } fragment fragB on Type { fieldB }',
    );
  });

  it('accepts inline fragments', () => {
    expectPassesRule(UniqueFragmentNames, '{ ... on Type { fieldA } ... on Type { fieldB } }');
  });

  it('rejects repeated fragment names', () => {
    const query = '{ ...fragA } fragment fragA on Type { fieldA } fragment fragA on Type { fieldB }';
    expectFailsRule(UniqueFragmentNames, query, [
      {
        message: duplicateFragmentNameMessage('fragA'),
        locations: [at(query, 'fragA', 2), at(query, 'fragA', 3)],
      },
    ]);
  });
});

describe('KnownFragmentNames', () => {
  it('accepts spreads of defined fragments', () => {
    expectPassesRule(
      KnownFragmentNames,
      `{ human(id: 4) { ...HumanFields1 } }
      fragment HumanFields1 on Human { name ...HumanFields2 }
      fragment HumanFields2 on Human { name }`,
    );
  });

  it('rejects spreads of undefined fragments wherever they appear', () => {
    const query = `{ human(id: 4) { ...UnknownFragment1 ... on Human { ...UnknownFragment2 } } }
fragment HumanFields on Human { name ...UnknownFragment3 }`;
    expectFailsRule(KnownFragmentNames, query, [
      { message: unknownFragmentMessage('UnknownFragment1'), locations: [at(query, 'UnknownFragment1')] },
      { message: unknownFragmentMessage('UnknownFragment2'), locations: [at(query, 'UnknownFragment2')] },
      { message: unknownFragmentMessage('UnknownFragment3'), locations: [{ line: 2, column: 41 }] },
    ]);
  });
});

describe('NoUnusedFragments', () => {
  it('accepts fragments reached through other fragments', () => {
    expectPassesRule(
      NoUnusedFragments,
      `{ human(id: 4) { ...HumanFields1 } }
      fragment HumanFields1 on Human { name ...HumanFields2 }
      fragment HumanFields2 on Human { name }`,
    );
  });

  it('rejects fragments only reached from unused fragments', () => {
    const query = `query Foo { human(id: 4) { ...HumanFields1 } }
fragment HumanFields1 on Human { name }
fragment Unused1 on Human { name }
fragment Unused2 on Human { name ...Unused1 }`;
    expectFailsRule(NoUnusedFragments, query, [
      { message: unusedFragMessage('Unused1'), locations: [{ line: 3, column: 1 }] },
      { message: unusedFragMessage('Unused2'), locations: [{ line: 4, column: 1 }] },
    ]);
  });

  it('terminates on cyclic fragments', () => {
    const query = `{ dog { ...A } }
fragment A on Dog { name ...B }
fragment B on Dog { barks ...A }
fragment C on Dog { ...C }`;
    expectFailsRule(NoUnusedFragments, query, [
      { message: unusedFragMessage('C'), locations: [{ line: 4, column: 1 }] },
    ]);
  });
});

describe('PossibleFragmentSpreads', () => {
  it('accepts spreads whose types overlap', () => {
    expectPassesRule(
      PossibleFragmentSpreads,
      'fragment objectWithinObject on Dog { ...dogFragment } fragment dogFragment on Dog { barkVolume }',
    );
    expectPassesRule(
      PossibleFragmentSpreads,
      'fragment interfaceWithinObject on Dog { ...petFragment } fragment petFragment on Pet { name }',
    );
    expectPassesRule(PossibleFragmentSpreads, 'fragment objectWithinInterface on Pet { ... on Dog { barks } }');
    expectPassesRule(
      PossibleFragmentSpreads,
      'fragment unionWithinInterface on Pet { ...catOrDogFragment } fragment catOrDogFragment on CatOrDog { __typename }',
    );
    expectPassesRule(PossibleFragmentSpreads, 'fragment unionWithinUnion on DogOrHuman { ... on CatOrDog { __typename } }');
  });

  it('ignores spreads of unknown fragments', () => {
    expectPassesRule(PossibleFragmentSpreads, 'fragment f on Dog { ...Unknown }');
  });

  it('rejects a named spread of a disjoint object type', () => {
    const query =
      'fragment invalidObjectWithinObject on Cat { ...dogFragment } fragment dogFragment on Dog { barkVolume }';
    expectFailsRule(PossibleFragmentSpreads, query, [
      {
        message: 'Fragment "dogFragment" cannot be spread here as objects of type "Cat" can never be of type "Dog".',
        locations: [at(query, '...dogFragment')],
      },
    ]);
  });

  it('rejects an inline spread of a disjoint object type', () => {
    const query = 'fragment invalidObjectWithinObjectAnon on Cat { ... on Dog { barkVolume } }';
    expectFailsRule(PossibleFragmentSpreads, query, [
      {
        message: 'Fragment cannot be spread here as objects of type "Cat" can never be of type "Dog".',
        locations: [at(query, '... on Dog')],
      },
    ]);
  });

  it('rejects a union spread into an interface it shares no object with', () => {
    const query =
      'fragment invalidUnionWithinInterface on Pet { ...humanOrAlienFragment } ' +
      'fragment humanOrAlienFragment on HumanOrAlien { __typename }';
    expectFailsRule(PossibleFragmentSpreads, query, [
      {
        message:
          'Fragment "humanOrAlienFragment" cannot be spread here as objects of type "Pet" can never be of type "HumanOrAlien".',
        locations: [at(query, '...humanOrAlienFragment')],
      },
    ]);
  });
});

describe('NoFragmentCycles', () => {
  it('accepts acyclic and repeated spreads', () => {
    expectPassesRule(NoFragmentCycles, 'fragment fragA on Dog { ...fragB } fragment fragB on Dog { name }');
    expectPassesRule(NoFragmentCycles, 'fragment fragA on Dog { ...fragB, ...fragB } fragment fragB on Dog { name }');
    expectPassesRule(
      NoFragmentCycles,
      'fragment fragA on Dog { ...fragB, ...fragC } fragment fragB on Dog { ...fragC } fragment fragC on Dog { name }',
    );
  });

  it('rejects a fragment spreading itself', () => {
    const query = 'fragment fragA on Human { relatives { ...fragA } }';
    expectFailsRule(NoFragmentCycles, query, [
      { message: cycleErrorMessage('fragA', []), locations: [at(query, '...fragA')] },
    ]);
  });

  it('rejects a cycle through another fragment once', () => {
    const query = 'fragment fragA on Dog { ...fragB } fragment fragB on Dog { ...fragA }';
    expectFailsRule(NoFragmentCycles, query, [
      {
        message: 'Cannot spread fragment "fragA" within itself via fragB.',
        locations: [at(query, '...fragB'), at(query, '...fragA')],
      },
    ]);
  });

  it('names every fragment on a longer cycle', () => {
    const query =
      'fragment fragA on Dog { ...fragB } fragment fragB on Dog { ...fragC } fragment fragC on Dog { ...fragA }';
    expectFailsRule(NoFragmentCycles, query, [
      {
        message: 'Cannot spread fragment "fragA" within itself via fragB, fragC.',
        locations: [at(query, '...fragB'), at(query, '...fragC'), at(query, '...fragA')],
      },
    ]);
  });
});
