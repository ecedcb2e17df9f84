import { Kind, parse, type ASTNode, type DocumentNode } from '@querycheck/language';
import { createMockLogger } from '@querycheck/logger/mock';
import { describe, expect, it } from 'vitest';
import {
  BaseRule,
  CONTINUE,
  KnownFragmentNames,
  report,
  ruleFactory,
  SKIP,
  specifiedRules,
  validate,
  ValidationError,
  type RuleOutcome,
  type ValidationContext,
} from '../src/index.js';
import { testSchema } from './harness.js';

function messages(document: DocumentNode, rules = specifiedRules): string[] {
  return validate(testSchema, document, rules).map((error) => error.message);
}

describe('validate', () => {
  it('returns no errors for a valid document', () => {
    const document = parse(`
      query DogQuery($command: DogCommand!, $withOwner: Boolean = false) {
        dog {
          ...DogFields
          doesKnowCommand(dogCommand: $command)
          isHousetrained(atOtherHomes: true) @skip(if: $withOwner)
        }
        catOrDog {
          ... on Cat { meows furColor }
        }
      }

      fragment DogFields on Dog { name nickname barkVolume }
    `);

    expect(validate(testSchema, document)).toEqual([]);
  });

  it('runs every specified rule in order', () => {
    expect(specifiedRules).toHaveLength(22);
  });

  it('names an undefined fragment', () => {
    expect(messages(parse('{ dog { ...Missing } }'))).toEqual(['Unknown fragment "Missing".']);
  });

  it('terminates on cyclic fragments under every rule', () => {
    const document = parse(`
      { dog { ...A } }
      fragment A on Dog { name ...B }
      fragment B on Dog { barks ...A }
    `);

    expect(messages(document)).toEqual(['Cannot spread fragment "A" within itself via B.']);
  });

  it('returns errors with locations', () => {
    const [error] = validate(testSchema, parse('{ dog { meowVolume } }'));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.toJSON()).toEqual({
      message: 'Cannot query field "meowVolume" on Dog.',
      locations: [{ line: 1, column: 9 }],
    });
  });

  it('indexes fragments once per document', () => {
    const captured: { context?: ValidationContext } = {};
    class CaptureContext extends BaseRule {
      enter(): RuleOutcome {
        captured.context = this.context;
        return SKIP;
      }
    }
    const document = parse(`
      { dog { ...A ...B } }
      fragment A on Dog { name ...B }
      fragment B on Dog { barks }
    `);

    validate(testSchema, document, [...specifiedRules, ruleFactory(CaptureContext)]);

    expect(captured.context?.getFragment('A')).toBe(document.definitions[1]);
    expect(captured.context?.getFragment('B')).toBe(document.definitions[2]);
    expect(captured.context?.fragmentIndexBuilds).toBe(1);
  });

  it('keeps type information balanced when rules skip and report', () => {
    class ReportEveryArgument extends BaseRule {
      enter(node: ASTNode): RuleOutcome {
        if (node.kind === Kind.ARGUMENT) {
          return report(new ValidationError(`argument ${node.name.value}`, node));
        }
        return node.kind === Kind.INLINE_FRAGMENT ? SKIP : CONTINUE;
      }
    }
    const document = parse(`
      { dog { doesKnowCommand(dogCommand: SIT) ... on Dog { name } isAtLocation(x: 1, y: 2) } }
    `);

    expect(messages(document, [ruleFactory(ReportEveryArgument)])).toEqual([
      'argument dogCommand',
      'argument x',
      'argument y',
    ]);
  });

  it('requires a schema and a document', () => {
    const document = parse('{ dog { name } }');

    expect(() => validate(undefined, document)).toThrow('Must provide schema');
    expect(() => validate(testSchema, undefined)).toThrow('Must provide document');
  });

  it('rejects a schema that is not a GraphQLSchema', () => {
    const document = parse('{ dog { name } }');

    expect(() => validate({} as never, document)).toThrow('Schema must be an instance of GraphQLSchema');
  });

  describe('maxErrors', () => {
    it('stops once the limit is reached', () => {
      const errors = validate(testSchema, parse('{ a b c }'), specifiedRules, { maxErrors: 2 });

      expect(errors.map((error) => error.message)).toEqual([
        'Cannot query field "a" on QueryRoot.',
        'Cannot query field "b" on QueryRoot.',
      ]);
    });

    it('rejects a limit that is not a positive integer', () => {
      const document = parse('{ dog { name } }');

      expect(() => validate(testSchema, document, specifiedRules, { maxErrors: 0 })).toThrow(
        'maxErrors must be a positive integer, got 0',
      );
      expect(() => validate(testSchema, document, specifiedRules, { maxErrors: 1.5 })).toThrow(
        'maxErrors must be a positive integer, got 1.5',
      );
    });
  });

  describe('logging', () => {
    it('logs the run and each rule', () => {
      const logger = createMockLogger();

      validate(testSchema, parse('{ dog { ...Missing } }'), [ruleFactory(KnownFragmentNames)], { logger });

      expect(logger.debug.mock.calls).toEqual([
        ['validation_started', { rules: 1, definitions: 1 }],
        ['validation_rule_completed', { rule: 'KnownFragmentNames', errors: 1 }],
        ['validation_completed', { errors: 1 }],
      ]);
    });

    it('logs truncation', () => {
      const logger = createMockLogger();

      validate(testSchema, parse('{ a b c }'), specifiedRules, { logger, maxErrors: 1 });

      expect(logger.debug).toHaveBeenCalledWith('validation_truncated', { max_errors: 1 });
      expect(logger.debug).toHaveBeenLastCalledWith('validation_completed', { errors: 1 });
    });
  });
});
