import { describe, it } from 'vitest';
import {
  anonOperationNotAloneMessage,
  duplicateOperationNameMessage,
  LoneAnonymousOperation,
  UniqueOperationNames,
} from '../../src/index.js';
import { at, expectFailsRule, expectPassesRule } from '../harness.js';

describe('UniqueOperationNames', () => {
  it('accepts distinct and anonymous operations', () => {
    expectPassesRule(UniqueOperationNames, 'query Foo { dog { name } } query Bar { dog { name } }');
    expectPassesRule(UniqueOperationNames, '{ dog { name } }');
  });

  it('lets a fragment share an operation name', () => {
    expectPassesRule(UniqueOperationNames, 'query Foo { ...Foo } fragment Foo on QueryRoot { dog { name } }');
  });

  it('rejects repeated operation names', () => {
    const query = 'query Foo { fieldA } query Foo { fieldB }';
    expectFailsRule(UniqueOperationNames, query, [
      { message: duplicateOperationNameMessage('Foo'), locations: [at(query, 'Foo'), at(query, 'Foo', 2)] },
    ]);
  });

  it('rejects repeated names across operation types', () => {
    const query = 'query Foo { fieldA }\nmutation Foo { fieldB }';
    expectFailsRule(UniqueOperationNames, query, [
      {
        message: 'There can only be one operation named "Foo".',
        locations: [
          { line: 1, column: 7 },
          { line: 2, column: 10 },
        ],
      },
    ]);
  });
});

describe('LoneAnonymousOperation', () => {
  it('accepts a single anonymous operation', () => {
    expectPassesRule(LoneAnonymousOperation, '{ fieldA }');
    expectPassesRule(LoneAnonymousOperation, '{ ...Foo } fragment Foo on QueryRoot { dog { name } }');
  });

  it('accepts several named operations', () => {
    expectPassesRule(LoneAnonymousOperation, 'query Foo { field } query Bar { field }');
  });

  it('rejects every anonymous operation among several', () => {
    const query = '{ fieldA } { fieldB }';
    expectFailsRule(LoneAnonymousOperation, query, [
      { message: anonOperationNotAloneMessage(), locations: [at(query, '{ fieldA')] },
      { message: anonOperationNotAloneMessage(), locations: [at(query, '{ fieldB')] },
    ]);
  });

  it('rejects an anonymous operation next to a named one', () => {
    expectFailsRule(LoneAnonymousOperation, '{ fieldA } mutation Foo { fieldB }', [
      { message: 'This anonymous operation must be the only defined operation.', locations: [{ line: 1, column: 1 }] },
    ]);
  });
});
