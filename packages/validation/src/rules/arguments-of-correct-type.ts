import { Kind, print, type ASTNode } from '@querycheck/language';
import { isValidLiteralValue } from '@querycheck/schema';
import { BaseRule, CONTINUE, report, SKIP, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function badValueMessage(argName: string, type: string, value: string): string {
  return `Argument "${argName}" expected type "${type}" but got: ${value}.`;
}

/**
 * Literal argument values can be coerced to the argument's type
 */
export class ArgumentsOfCorrectType extends BaseRule {
  enter(node: ASTNode): RuleOutcome {
    if (node.kind !== Kind.ARGUMENT) {
      return CONTINUE;
    }
    const argDef = this.context.getArgument();
    if (argDef && !isValidLiteralValue(argDef.type, node.value)) {
      return report(
        new ValidationError(badValueMessage(node.name.value, String(argDef.type), print(node.value)), node.value),
      );
    }
    return SKIP;
  }
}
