import { Kind, print, type ASTNode } from '@querycheck/language';
import { GraphQLNonNull, isValidLiteralValue } from '@querycheck/schema';
import { BaseRule, CONTINUE, report, SKIP, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function defaultForNonNullArgMessage(variableName: string, type: string, guessType: string): string {
  return (
    `Variable "$${variableName}" of type "${type}" is required and will not ` +
    `use the default value. Perhaps you meant to use type "${guessType}".`
  );
}

export function badValueForDefaultArgMessage(variableName: string, type: string, value: string): string {
  return `Variable "$${variableName}" of type "${type}" has invalid default value: ${value}.`;
}

/**
 * Variable default values fit the variable's type, and only nullable
 * variables have one
 */
export class DefaultValuesOfCorrectType extends BaseRule {
  enter(node: ASTNode): RuleOutcome {
    if (node.kind === Kind.SELECTION_SET) {
      return SKIP;
    }
    if (node.kind !== Kind.VARIABLE_DEFINITION) {
      return CONTINUE;
    }

    const variableName = node.variable.name.value;
    const defaultValue = node.defaultValue;
    const type = this.context.getInputType();

    if (type instanceof GraphQLNonNull && defaultValue) {
      return report(
        new ValidationError(
          defaultForNonNullArgMessage(variableName, String(type), String(type.ofType)),
          defaultValue,
        ),
      );
    }
    if (type && defaultValue && !isValidLiteralValue(type, defaultValue)) {
      return report(
        new ValidationError(
          badValueForDefaultArgMessage(variableName, String(type), print(defaultValue)),
          defaultValue,
        ),
      );
    }
    return SKIP;
  }
}
