import { readFileSync } from 'node:fs';
import { parse, type SourceLocation } from '@querycheck/language';
import { buildSchemaFromConfig, type GraphQLSchema } from '@querycheck/schema';
import { expect } from 'vitest';
import { ruleFactory, validate, type RuleClass } from '../src/index.js';

export const testSchema: GraphQLSchema = buildSchemaFromConfig(
  JSON.parse(readFileSync(new URL('./fixtures/test-schema.json', import.meta.url), 'utf8')),
);

export interface ExpectedError {
  message: string;
  locations: SourceLocation[];
}

export function runRule(Rule: RuleClass, query: string): ExpectedError[] {
  return validate(testSchema, parse(query), [ruleFactory(Rule)]).map((error) => ({
    message: error.message,
    locations: [...error.locations],
  }));
}

export function expectPassesRule(Rule: RuleClass, query: string): void {
  expect(runRule(Rule, query)).toEqual([]);
}

export function expectFailsRule(Rule: RuleClass, query: string, errors: ExpectedError[]): void {
  expect(runRule(Rule, query)).toEqual(errors);
}

/**
 * Line and column of the nth occurrence of `needle` in `query`
 */
export function at(query: string, needle: string, occurrence = 1): SourceLocation {
  let index = -1;
  for (let i = 0; i < occurrence; i++) {
    index = query.indexOf(needle, index + 1);
    if (index === -1) {
      throw new Error(`"${needle}" occurs fewer than ${occurrence} times`);
    }
  }
  const lines = query.slice(0, index).split('\n');
  return { line: lines.length, column: lines[lines.length - 1].length + 1 };
}
